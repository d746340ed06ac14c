/**
 * End-to-end delivery runs against the simulated device and a real SQLite
 * history, covering each outcome kind and the partial-write guard.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import { DeliveryConfig, resolvePollingConfig } from '../../backend/src/config';
import { createDatabase } from '../../backend/src/models/Database';
import { HistoryModel } from '../../backend/src/models/History';
import { DeliveryEngine, DeliveryReport } from '../../backend/src/services/DeliveryEngine';
import { TestQueueRunner } from '../../backend/src/services/TestQueueRunner';
import { createTestJob } from '../../backend/src/services/TestJobFactory';
import { PollAttempt, ProgressEvent, TestJob } from '../../backend/src/types/Delivery';
import { ManualClock } from '../../backend/__tests__/helpers/fakes';
import { DeviceSimulator } from './device_simulator';

const config: DeliveryConfig = {
  configDir: '/root/config',
  resultDir: '/root/result',
  resultFileTemplate: '{base}_result.json',
  polling: resolvePollingConfig({ pollIntervalMs: 2000, maxAttempts: 5, stabilityCheckMs: 500 }),
};

const FULL_RESULT = JSON.stringify({
  summary: { total_test_cases: 2, passed: 2, failed: 0, total_duration_ms: 900 },
  failed_by_service: {},
});

describe('E2E: delivering test definitions to a device', () => {
  let dir: string;
  let db: Database.Database;
  let history: HistoryModel;
  let clock: ManualClock;
  let device: DeviceSimulator;
  let runner: TestQueueRunner;
  let attempts: PollAttempt[];

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'e2e-defs-'));
    for (const name of ['a', 'b', 'c', 'd', 'e']) {
      writeFileSync(join(dir, `${name}.json`), JSON.stringify({ test_cases: [{ service: 'dns', action: 'check' }] }));
    }
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});

    db = createDatabase(':memory:');
    history = new HistoryModel(db);
    clock = new ManualClock(0);
    device = new DeviceSimulator(clock);
    runner = new TestQueueRunner(new DeliveryEngine(device, history, { clock }), config);
    attempts = [];
    runner.onProgress((event) => {
      if (event.type === 'poll.attempt') {
        attempts.push({ attempt: event.attempt, at: event.at, state: event.state });
      }
    });
  });

  afterEach(() => {
    db.close();
    jest.restoreAllMocks();
  });

  function job(name: string, testId: string): TestJob {
    return createTestJob(join(dir, `${name}.json`), config.configDir, { testId });
  }

  async function runAll(jobs: TestJob[]): Promise<DeliveryReport[]> {
    const reports: DeliveryReport[] = [];
    for await (const report of runner.run(jobs)) reports.push(report);
    return reports;
  }

  test('device never answers: timeout after the attempt budget', async () => {
    const [report] = await runAll([job('a', 'T-A')]);

    expect(report.record).toMatchObject({
      test_id: 'T-A',
      status: 'timeout',
      result: null,
      details: '5 attempts exhausted after 8.0s waiting for /root/result/a_result.json',
      connection_status: 'connected',
    });
    expect(history.count()).toBe(1);
    expect(device.transfers).toEqual([{ operation: 'upload', path: '/root/config/a.json', at: 0 }]);
  });

  test('device unreachable: connection error recorded without polling', async () => {
    device.goOffline();

    const [report] = await runAll([job('b', 'T-B')]);

    expect(report.record).toMatchObject({
      status: 'connection_error',
      result: null,
      details: 'Result check before upload failed: Connection to 192.168.88.1:22 failed: connect EHOSTUNREACH',
      connection_status: 'upload_failed',
    });
    expect(attempts).toEqual([]);
    expect(device.transfers).toEqual([]);
  });

  test('result appears before the third check: success with the parsed document', async () => {
    device.respondTo('c.json', { delayMs: 3000, content: '{"pass": true}' });

    const [report] = await runAll([job('c', 'T-C')]);

    expect(attempts.map((a) => a.state)).toEqual(['absent', 'absent', 'complete']);
    expect(report.record.status).toBe('success');
    expect(report.record.details).toBe('Result retrieved after 3 attempt(s)');
    expect(report.record.result?.document).toEqual({ pass: true });
    expect(history.getByTestId('T-C')?.result?.verdict).toBe('pass');
  });

  test('garbage result: failure with the parse error, no result stored', async () => {
    device.respondTo('d.json', { delayMs: 1000, content: Buffer.from([0x7b, 0x22, 0xff, 0x22, 0x3a, 0x31, 0x7d, 0x0a, 0x0a, 0x0a]) });

    const [report] = await runAll([job('d', 'T-D')]);

    expect(report.record).toMatchObject({
      status: 'failure',
      result: null,
      details: 'Result parse error: Result file is not valid UTF-8',
    });
  });

  test('half-written result behind a marker is never downloaded', async () => {
    device.respondTo('e.json', { delayMs: 1000, writeDurationMs: 3000, content: FULL_RESULT });

    const [report] = await runAll([job('e', 'T-E')]);

    expect(attempts.map((a) => a.state)).toEqual(['absent', 'incomplete', 'complete']);
    const downloads = device.downloadsOf('/root/result/e_result.json');
    expect(downloads).toEqual([{ operation: 'download', path: '/root/result/e_result.json', at: 4500 }]);
    expect(report.record.status).toBe('success');
    expect(report.record.result).toMatchObject({ verdict: 'pass', total: 2, passed: 2, duration_ms: 900 });
  });

  test('a growing file without a marker waits for its size to settle', async () => {
    device.respondTo('e.json', { delayMs: 1000, writeDurationMs: 3000, content: FULL_RESULT, useMarker: false });

    const [report] = await runAll([job('e', 'T-E2')]);

    expect(attempts.map((a) => a.state)).toEqual(['absent', 'incomplete', 'complete']);
    expect(device.downloadsOf('/root/result/e_result.json')).toHaveLength(1);
    expect(report.record.status).toBe('success');
  });

  test('a result left from an earlier run is not taken as the new result', async () => {
    device.leaveStaleResult('a.json', '{"pass": false, "run": "previous"}');

    const [report] = await runAll([job('a', 'T-STALE')]);

    expect(report.record.status).toBe('timeout');
    expect(device.downloadsOf('/root/result/a_result.json')).toEqual([]);
  });

  test('a rewritten result replaces the stale one', async () => {
    device.leaveStaleResult('c.json', '{"pass": false, "run": "previous"}');
    device.respondTo('c.json', { delayMs: 1000, content: '{"pass": true, "run": "current"}' });

    const [report] = await runAll([job('c', 'T-FRESH')]);

    expect(report.record.result?.document).toEqual({ pass: true, run: 'current' });
  });

  test('a dropped download is retried', async () => {
    device.respondTo('c.json', { delayMs: 0, content: '{"pass": true}' });
    device.failNextDownloads(1);

    const [report] = await runAll([job('c', 'T-RETRY')]);

    expect(report.record.status).toBe('success');
    expect(device.downloadsOf('/root/result/c_result.json')).toHaveLength(2);
  });

  test('downloads that keep failing end as a connection error', async () => {
    device.respondTo('c.json', { delayMs: 0, content: '{"pass": true}' });
    device.failNextDownloads(3);

    const [report] = await runAll([job('c', 'T-DROP')]);

    expect(report.record).toMatchObject({
      status: 'connection_error',
      connection_status: 'download_failed',
      details: 'Result download failed after 1 attempts: download failed: read ECONNRESET',
    });
  });

  test('a mixed queue runs in order and records one row per job', async () => {
    device.respondTo('c.json', { delayMs: 1000, content: '{"pass": true}' });
    device.respondTo('d.json', { delayMs: 1000, content: 'not json at all' });
    device.respondTo('e.json', { delayMs: 1000, content: FULL_RESULT });

    const reports = await runAll([job('c', 'Q1'), job('a', 'Q2'), job('d', 'Q3'), job('e', 'Q4')]);

    expect(reports.map((r) => [r.job.test_id, r.outcome.status])).toEqual([
      ['Q1', 'success'],
      ['Q2', 'timeout'],
      ['Q3', 'failure'],
      ['Q4', 'success'],
    ]);
    expect(history.getRecent(10).map((r) => r.test_id)).toEqual(['Q4', 'Q3', 'Q2', 'Q1']);
    expect(history.countByStatus()).toEqual({ success: 2, failure: 1, timeout: 1, connection_error: 0 });
  });

  test('the device going away mid-queue does not stop later jobs', async () => {
    device.respondTo('c.json', { delayMs: 1000, content: '{"pass": true}' });
    device.respondTo('e.json', { delayMs: 1000, content: '{"pass": true}' });
    const events: ProgressEvent[] = [];
    runner.onProgress((event) => {
      events.push(event);
      if (event.type === 'job.finished' && event.testId === 'N1') device.goOffline();
      if (event.type === 'job.finished' && event.testId === 'N2') device.goOnline();
    });

    const reports = await runAll([job('c', 'N1'), job('a', 'N2'), job('e', 'N3')]);

    expect(reports.map((r) => r.outcome.status)).toEqual(['success', 'connection_error', 'success']);
    expect(reports[1].record.connection_status).toBe('upload_failed');
    expect(events[events.length - 1]).toEqual({ type: 'run.finished', processed: 3, cancelled: false });
  });

  test('cancelling mid-queue leaves later jobs untouched', async () => {
    device.respondTo('c.json', { delayMs: 1000, content: '{"pass": true}' });
    runner.onProgress((event) => {
      if (event.type === 'job.finished' && event.testId === 'X1') runner.cancel();
    });

    const reports = await runAll([job('c', 'X1'), job('a', 'X2'), job('e', 'X3')]);

    expect(reports.map((r) => r.job.test_id)).toEqual(['X1']);
    expect(history.count()).toBe(1);
    expect(device.transfers.filter((t) => t.operation === 'upload')).toHaveLength(1);
  });
});
