import type { NextFunction, Request, Response } from 'express';

// Extend Request interface with the request start time
declare global {
  namespace Express {
    interface Request {
      startTime?: number;
    }
  }
}

export function requestTiming(req: Request, res: Response, next: NextFunction): void {
  req.startTime = Date.now();

  res.on('finish', () => {
    const responseTime = Date.now() - (req.startTime ?? Date.now());
    console.log(`📡 ${req.method} ${req.originalUrl} ${res.statusCode} ${responseTime}ms`);
  });

  next();
}
