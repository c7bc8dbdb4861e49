// src/middleware/logger.middleware.ts
import type { Request, Response, NextFunction } from 'express';

// Catat setiap request yang masuk, sukses maupun gagal
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  console.log(`📢 [REQUEST] ${req.method} ${req.url}`);
  next();
};
