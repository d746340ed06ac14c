import { Router, Request, Response } from 'express';
import { ConnectionLogModel } from '../models/ConnectionLog';
import { ConnectionService } from '../services/ConnectionService';
import { RunController } from '../services/RunController';
import { parseLimit } from '../utils/validation';

export function createConnectionRoutes(
  connectionService: ConnectionService,
  connectionLog: ConnectionLogModel,
  runController: RunController,
): Router {
  const router = Router();

  // POST /api/connection/test — connect with retries and verify remote directories
  router.post('/test', async (_req: Request, res: Response) => {
    // The transfer channel is shared; a probe mid-run would interleave with job transfers.
    if (runController.isActive()) {
      return res.status(409).json({ error: 'A test run is in progress' });
    }
    try {
      const result = await connectionService.testConnection();
      res.status(result.connected && result.pathsVerified ? 200 : 502).json(result);
    } catch (err) {
      console.error('Connection test failed unexpectedly:', err);
      res.status(500).json({ error: 'Connection test failed' });
    }
  });

  // GET /api/connection/log — recent connection attempts
  router.get('/log', (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit, 50, 500);
    if (limit === null) {
      return res.status(400).json({ error: 'limit must be an integer between 1 and 500' });
    }
    res.json(connectionLog.getRecent(limit));
  });

  return router;
}
