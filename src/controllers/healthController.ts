import { Request, Response } from 'express';

export const healthCheck = (req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    service: 'mobile-api',
    timestamp: new Date().toISOString(),
  });
};
