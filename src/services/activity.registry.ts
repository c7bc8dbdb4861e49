// src/services/activity.registry.ts
import { seedActivities } from '../data/activities';
import type { Activity, ActivityMap, SignupResult } from '../types/activity';
import { ActivityNotFoundError } from '../utils/errors';

/**
 * Daftar aktivitas di memori proses. Hilang saat restart.
 *
 * Tidak ada cek kapasitas maupun cek email ganda: signup selalu menambah
 * satu entri ke `participants`.
 */
export class ActivityRegistry {
  private readonly activities: Map<string, Activity>;

  constructor(seed: ActivityMap = seedActivities) {
    // Salin dalam supaya tiap instance punya state sendiri
    this.activities = new Map(Object.entries(structuredClone(seed)));
  }

  list(): ActivityMap {
    return Object.fromEntries(this.activities);
  }

  signup(activityName: string, email: string): SignupResult {
    const activity = this.activities.get(activityName);

    if (!activity) {
      throw new ActivityNotFoundError(activityName);
    }

    activity.participants.push(email);
    return { message: `Signed up ${email} for ${activityName}` };
  }
}
