import { Router } from 'express';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { DashboardService } from '../shared/services/dashboard.service.js';
import type { DashboardQuery } from '../types/dashboard.types.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { renderDashboardPage } from '../views/dashboard.view.js';

// ?symbol=a&symbol=b keeps the first value
export function queryString(v: unknown): string | undefined {
  if (typeof v === 'string') return v;
  if (Array.isArray(v)) return queryString(v[0]);
  return undefined;
}

function readQuery(q: Record<string, unknown>): DashboardQuery {
  return { symbol: queryString(q.symbol), userText: queryString(q.user_text) };
}

export function dashboardRouter(service: DashboardService, backendUrl: string) {
  const router = Router();

  // Errors are rendered into the page; the status stays 200
  router.get('/', asyncHandler(async (req, res) => {
    const vm = await service.build(readQuery(req.query));
    res.status(200).type('html').send(renderDashboardPage(vm, { backendUrl }));
  }));

  router.get('/api/dashboard', asyncHandler(async (req, res) => {
    const vm = await service.build(readQuery(req.query));
    res.json(ResponseUtils.success(vm));
  }));

  return router;
}
