import express, { type Request, type Response, type NextFunction } from 'express';
import { getPortalUserOverviewStatistics, listEligibleHomeowners } from '../services/statistics.ts';
import { StatisticsQuerySchema, formatIssues } from '../schemas.ts';
import { InvalidFilterError } from '../shared/errors.ts';
import type { StatisticsSources } from '../services/dal.ts';

/**
 * Abort the data-source fetch if the client goes away before we answer.
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('Client closed request'));
  });
  return controller.signal;
}

export function createStatisticsRouter(sources: StatisticsSources): express.Router {
  const router = express.Router();

  /**
   * POST /api/portal-users/statistics — overview counts for a filter list
   * Body: { homeownerIds: number[], tenantId?, ratios? }
   */
  router.post('/portal-users/statistics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await getPortalUserOverviewStatistics(req.body, sources, { signal: requestSignal(res) });
      res.json({ success: true, data });
    } catch (err) { next(err); }
  });

  /**
   * GET /api/portal-users/statistics?ids=1,2,3&ratios=portalAdoption
   */
  router.get('/portal-users/statistics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = StatisticsQuerySchema.safeParse(req.query);
      if (!query.success) throw new InvalidFilterError('Invalid filter criteria', formatIssues(query.error));
      const data = await getPortalUserOverviewStatistics(query.data, sources, { signal: requestSignal(res) });
      res.json({ success: true, data });
    } catch (err) { next(err); }
  });

  /**
   * POST /api/homeowners/eligible — the eligible projection itself
   * Body: { homeownerIds: number[], tenantId?, sort?: { field, direction } }
   */
  router.post('/homeowners/eligible', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = await listEligibleHomeowners(req.body, sources, { signal: requestSignal(res) });
      res.json({ success: true, data: { total: data.length, results: data } });
    } catch (err) { next(err); }
  });

  return router;
}
