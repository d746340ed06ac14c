import { Router, Request, Response } from 'express';
import { HistoryModel } from '../models/History';
import { isOutcomeStatus, isValidTestId, parseLimit } from '../utils/validation';

export function createHistoryRoutes(historyModel: HistoryModel): Router {
  const router = Router();

  // GET /api/history — most recent records first
  router.get('/', (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit, 100, 1000);
    if (limit === null) {
      return res.status(400).json({ error: 'limit must be an integer between 1 and 1000' });
    }

    const { status } = req.query;
    if (status !== undefined && (typeof status !== 'string' || !isOutcomeStatus(status))) {
      return res.status(400).json({ error: 'status must be one of success, failure, timeout, connection_error' });
    }

    res.json(historyModel.getRecent(limit, status));
  });

  // Static paths MUST come before parameterized /:testId routes
  // GET /api/history/stats — record counts per outcome
  router.get('/stats', (_req: Request, res: Response) => {
    res.json({ total: historyModel.count(), byStatus: historyModel.countByStatus() });
  });

  // GET /api/history/:testId — a single record
  router.get('/:testId', (req: Request, res: Response) => {
    const { testId } = req.params;
    if (!isValidTestId(testId)) {
      return res.status(400).json({ error: 'Invalid test ID format' });
    }

    const record = historyModel.getByTestId(testId);
    if (!record) {
      return res.status(404).json({ error: 'History record not found' });
    }
    res.json(record);
  });

  return router;
}
