// src/app.ts
import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import path from 'path';

import { createActivitiesRouter } from './routes/activities.routes';
import { ActivityRegistry } from './services/activity.registry';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

export const STATIC_DIR = path.join(__dirname, '../static');
export const FRONTEND_ENTRY = '/static/index.html';

export interface AppOptions {
  registry?: ActivityRegistry;
  corsOrigin?: string;
  logRequests?: boolean;
}

export const createApp = ({
  registry = new ActivityRegistry(),
  corsOrigin = '*',
  logRequests = true,
}: AppOptions = {}): Express => {
  const app = express();

  // =======================================================================
  // 1. LOGGER MIDDLEWARE - WAJIB PALING ATAS
  // =======================================================================
  if (logRequests) {
    app.use(requestLogger);
  }

  // =======================================================================
  // 2. CONFIG DASAR
  // =======================================================================
  app.use(cors({ origin: corsOrigin }));

  // =======================================================================
  // 3. STATIC FOLDER (FRONTEND)
  // =======================================================================
  app.use('/static', express.static(STATIC_DIR));

  // =======================================================================
  // 4. ROUTES
  // =======================================================================
  app.get('/', (req: Request, res: Response) => {
    res.redirect(302, FRONTEND_ENTRY);
  });

  app.use('/activities', createActivitiesRouter(registry));

  // =======================================================================
  // 5. 404 HANDLER & GLOBAL ERROR HANDLER
  // =======================================================================
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
