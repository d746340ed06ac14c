import { FailedCase, JsonObject, JsonValue, Outcome, PollSignal, ResultSummary, Verdict } from '../types/Delivery';

export class ResultParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResultParseError';
  }
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(obj: JsonObject, key: string): number | null {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stringField(obj: JsonObject, key: string, fallback: string): string {
  const value = obj[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Decodes a result file as strict UTF-8 JSON whose root is an object.
 * Throws ResultParseError for anything else.
 */
export function parseResultDocument(payload: Buffer): JsonObject {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(payload);
  } catch {
    throw new ResultParseError('Result file is not valid UTF-8');
  }

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ResultParseError(err instanceof Error ? err.message : 'Invalid JSON');
  }

  if (!isJsonObject(parsed)) {
    throw new ResultParseError('Result document root must be a JSON object');
  }
  return parsed;
}

function collectFailures(document: JsonObject): FailedCase[] {
  const byService = document.failed_by_service;
  if (!isJsonObject(byService)) return [];

  const failures: FailedCase[] = [];
  for (const [service, tests] of Object.entries(byService)) {
    if (!Array.isArray(tests)) continue;
    for (const test of tests) {
      if (!isJsonObject(test)) continue;
      const testService = stringField(test, 'service', service);
      const action = stringField(test, 'action', '');
      failures.push({
        service: testService,
        action,
        message: stringField(test, 'message', `${testService} ${action} failed`.replace(/\s+/g, ' ')),
        execution_time_ms: numberField(test, 'execution_time_ms') ?? 0,
      });
    }
  }
  return failures;
}

function decideVerdict(total: number | null, passed: number | null, document: JsonObject): Verdict {
  if (total !== null && passed !== null) {
    if (total === passed) return 'pass';
    if (passed === 0) return 'fail';
    return 'partial';
  }
  if (typeof document.pass === 'boolean') {
    return document.pass ? 'pass' : 'fail';
  }
  return 'unknown';
}

/** Normalizes a parsed result document into the summary stored with the history record. */
export function summarizeResult(document: JsonObject): ResultSummary {
  const summary = document.summary;
  const total = isJsonObject(summary) ? numberField(summary, 'total_test_cases') : null;
  const passed = isJsonObject(summary) ? numberField(summary, 'passed') : null;
  const failed = isJsonObject(summary) ? numberField(summary, 'failed') : null;
  const duration = isJsonObject(summary) ? numberField(summary, 'total_duration_ms') : null;

  return {
    verdict: decideVerdict(total, passed, document),
    total,
    passed,
    failed,
    duration_ms: duration,
    failures: collectFailures(document),
    document,
  };
}

function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}

export class OutcomeClassifier {
  classify(signal: PollSignal): Outcome {
    switch (signal.kind) {
      case 'payload':
        return this.classifyPayload(signal.payload, signal.attempts);
      case 'timeout':
        return {
          status: 'timeout',
          result: null,
          details: `${signal.attempts} attempts exhausted after ${formatSeconds(signal.elapsedMs)}s waiting for ${signal.remotePath}`,
          connection_status: 'connected',
        };
      case 'connection_error':
        return {
          status: 'connection_error',
          result: null,
          details: `${signal.stage === 'probe' ? 'Result check' : 'Result download'} failed after ${signal.attempts} attempts: ${signal.message}`,
          connection_status: signal.stage === 'probe' ? 'probe_failed' : 'download_failed',
        };
    }
  }

  classifyPayload(payload: Buffer, attempts: number): Outcome {
    try {
      const document = parseResultDocument(payload);
      return {
        status: 'success',
        result: summarizeResult(document),
        details: `Result retrieved after ${attempts} attempt(s)`,
        connection_status: 'connected',
      };
    } catch (err) {
      if (!(err instanceof ResultParseError)) throw err;
      return {
        status: 'failure',
        result: null,
        details: `Result parse error: ${err.message}`,
        connection_status: 'connected',
      };
    }
  }
}
