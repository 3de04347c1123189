import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logging';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.http(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      durationMs: Math.round(durationMs * 10) / 10,
    });
  });

  next();
};
