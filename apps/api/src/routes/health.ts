import { Router } from 'express';
import os from 'os';

export interface HealthTarget {
  /** Provider path and name of the resource whose allow-list is managed. */
  resource: string;
  table: string;
  partition: string;
  scheduled: boolean;
}

export const createHealthRouter = (target: HealthTarget) => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      hostname: os.hostname(),
      uptime: process.uptime(),
      target,
    });
  });

  return router;
};
