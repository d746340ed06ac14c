import { Router, Request, Response } from 'express';
import { HistoryModel } from '../models/History';
import { RunController } from '../services/RunController';
import { analyzeTestImpacts, countTestCases, validateTestDefinition } from '../services/TestDefinitionValidator';
import { createTestJob } from '../services/TestJobFactory';
import { TestJob } from '../types/Delivery';
import { isValidTestId } from '../utils/validation';

interface FileRequest {
  path: string;
  testId?: string;
}

function readFileRequests(body: unknown): FileRequest[] | null {
  if (typeof body !== 'object' || body === null || !('files' in body)) return null;
  const { files } = body;
  if (!Array.isArray(files) || files.length === 0) return null;

  const requests: FileRequest[] = [];
  for (const item of files) {
    if (typeof item === 'string' && item.length > 0) {
      requests.push({ path: item });
    } else if (typeof item === 'object' && item !== null && 'path' in item && typeof item.path === 'string') {
      const testId = 'testId' in item && typeof item.testId === 'string' ? item.testId : undefined;
      requests.push({ path: item.path, testId });
    } else {
      return null;
    }
  }
  return requests;
}

export function createRunRoutes(runController: RunController, historyModel: HistoryModel, configDir: string): Router {
  const router = Router();

  // POST /api/runs — validate local test files and start delivering them in order
  router.post('/', (req: Request, res: Response) => {
    const requests = readFileRequests(req.body);
    if (!requests) {
      return res.status(400).json({ error: 'Body must contain a non-empty files array of paths or { path, testId } objects' });
    }
    if (runController.isActive()) {
      return res.status(409).json({ error: 'A test run is already in progress' });
    }

    const errors: { path: string; error: string }[] = [];
    const seenIds = new Set<string>();
    const jobs: TestJob[] = [];
    const files: { test_id: string; file_name: string; test_count: number; affects_wan: boolean; affects_lan: boolean }[] = [];

    for (const request of requests) {
      if (request.testId !== undefined) {
        if (!isValidTestId(request.testId)) {
          errors.push({ path: request.path, error: 'Invalid test ID format' });
          continue;
        }
        if (seenIds.has(request.testId) || historyModel.hasTestId(request.testId)) {
          errors.push({ path: request.path, error: `Test ID ${request.testId} is already in use` });
          continue;
        }
      }

      const validation = validateTestDefinition(request.path);
      if (!validation.valid || !validation.data) {
        errors.push({ path: request.path, error: validation.error });
        continue;
      }

      let job: TestJob;
      try {
        job = createTestJob(request.path, configDir, { testId: request.testId });
      } catch (err) {
        errors.push({ path: request.path, error: err instanceof Error ? err.message : String(err) });
        continue;
      }

      seenIds.add(job.test_id);
      jobs.push(job);
      files.push({
        test_id: job.test_id,
        file_name: job.file_name,
        test_count: countTestCases(validation.data),
        ...analyzeTestImpacts(validation.data),
      });
    }

    if (errors.length > 0) {
      return res.status(400).json({ error: 'Invalid test definitions', details: errors });
    }

    const runId = runController.start(jobs);
    res.status(202).json({ runId, jobs: files });
  });

  // GET /api/runs/current — progress of the active (or last) run
  router.get('/current', (_req: Request, res: Response) => {
    res.json(runController.getSnapshot());
  });

  // POST /api/runs/current/cancel — stop before the next job starts
  router.post('/current/cancel', (_req: Request, res: Response) => {
    if (!runController.cancel()) {
      return res.status(409).json({ error: 'No test run is in progress' });
    }
    res.status(202).json({ cancelled: true });
  });

  return router;
}
