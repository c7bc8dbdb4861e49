// src/controllers/activities.controller.ts
import type { Request, Response, NextFunction } from 'express';
import type { ActivityRegistry } from '../services/activity.registry';

// Query ?email=... bisa berupa string, array (jika diulang), atau tidak ada
const readEmail = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === 'string' ? last : undefined;
  }
  return undefined;
};

export const createActivitiesController = (registry: ActivityRegistry) => {
  // GET /activities - Semua aktivitas beserta peserta
  const getAllActivities = (req: Request, res: Response) => {
    res.status(200).json(registry.list());
  };

  // POST /activities/:activityName/signup?email=...
  // Activity tidak ada -> ActivityNotFoundError diteruskan ke errorHandler (404)
  const signupForActivity = (
    req: Request<{ activityName: string }>,
    res: Response,
    next: NextFunction,
  ) => {
    const { activityName } = req.params;
    const email = readEmail(req.query.email);

    if (email === undefined) {
      return res.status(422).json({ detail: "Query parameter 'email' is required" });
    }

    try {
      const result = registry.signup(activityName, email);
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  };

  return { getAllActivities, signupForActivity };
};
