// src/middleware/error.middleware.ts
import type { Request, Response, NextFunction } from 'express';
import { HttpError } from '../utils/errors';

// Error 4xx dari Express sendiri (mis. param URL yang tidak bisa di-decode)
// membawa `status` atau `statusCode`
const clientErrorStatus = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null) return undefined;

  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) return status;
  return undefined;
};

// Route tidak ditemukan (termasuk file static yang tidak ada)
export const notFoundHandler = (req: Request, res: Response): void => {
  console.log(`❌ [404] Route not found: ${req.url}`);
  res.status(404).json({ detail: 'Not Found' });
};

// Jaring pengaman terakhir: apa pun yang lolos dari controller masuk ke sini.
// Express mengenali error handler dari jumlah parameternya, jadi `next` harus tetap ada.
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  if (err instanceof HttpError) {
    console.log(`❌ [${err.status}] ${err.detail}: ${req.url}`);
    res.status(err.status).json({ detail: err.detail });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    const detail = err instanceof Error && err.message ? err.message : 'Bad Request';
    console.log(`❌ [${status}] ${detail}: ${req.url}`);
    res.status(status).json({ detail });
    return;
  }

  console.error('🔥 [FATAL SERVER ERROR]:', err);
  res.status(500).json({ detail: 'Internal Server Error' });
};
