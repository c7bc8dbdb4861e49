// src/types/activity.ts

export interface Activity {
  description: string;
  schedule: string;
  max_participants: number; // Ditampilkan saja, tidak pernah dibatasi
  participants: string[];
}

// Key = nama aktivitas
export type ActivityMap = Record<string, Activity>;

export interface SignupResult {
  message: string;
}
