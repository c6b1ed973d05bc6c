import { Router } from 'express';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { BackendClient } from '../clients/backendClient.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';

export function healthRouter(backend: BackendClient) {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json(ResponseUtils.success({ status: 'ok', uptimeSec: Math.floor(process.uptime()) }));
  });

  router.get('/health/backend', asyncHandler(async (_req, res) => {
    const r = await backend.health();
    if (!r.ok) return res.status(503).json(ResponseUtils.unavailable('backend', r.errorMessage));
    res.json(ResponseUtils.success(r.data));
  }));

  return router;
}
