import { Router } from 'express';
import { SessionRegistry } from '../services/sessionRegistry';

export function healthRouter(registry: SessionRegistry) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'velha', version: '0.1.0', sessions: registry.size });
  });

  return router;
}
