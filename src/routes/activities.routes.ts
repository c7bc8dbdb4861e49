// src/routes/activities.routes.ts
import { Router } from 'express';
import { createActivitiesController } from '../controllers/activities.controller';
import type { ActivityRegistry } from '../services/activity.registry';

export const createActivitiesRouter = (registry: ActivityRegistry): Router => {
  const router = Router();
  const activitiesController = createActivitiesController(registry);

  // GET /activities
  router.get('/', activitiesController.getAllActivities);

  // POST /activities/:activityName/signup
  router.post('/:activityName/signup', activitiesController.signupForActivity);

  return router;
};
