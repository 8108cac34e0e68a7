import { Router } from 'express';
import type { ConnectionHub } from '../devices/connectionHub';

export function createHealthRouter(hub: Pick<ConnectionHub, 'size'>): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ status: 'ok', connections: hub.size() });
  });

  return router;
}
