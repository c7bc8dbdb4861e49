// src/data/activities.ts
import type { ActivityMap } from '../types/activity';

// Data awal, dimuat sekali saat registry dibuat
export const seedActivities: ActivityMap = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['nadia@lakeside.edu', 'tomas@lakeside.edu'],
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['priya@lakeside.edu', 'jonah@lakeside.edu'],
  },
  'Gym Class': {
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    max_participants: 30,
    participants: ['leo@lakeside.edu', 'amara@lakeside.edu'],
  },
};
