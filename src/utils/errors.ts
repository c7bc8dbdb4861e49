// src/utils/errors.ts

// Error yang membawa status HTTP, ditangkap oleh global error handler
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly detail: string,
  ) {
    super(detail);
    this.name = 'HttpError';
  }
}

export class ActivityNotFoundError extends HttpError {
  constructor(public readonly activityName: string) {
    super(404, 'Activity not found');
    this.name = 'ActivityNotFoundError';
  }
}
