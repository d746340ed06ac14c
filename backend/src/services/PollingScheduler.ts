import { PollingConfig } from '../config';
import { RemoteFileStat, RemoteTransport, TransportError, describeError } from '../transport/RemoteTransport';
import { PollAttempt, PollSignal, RemoteFileState } from '../types/Delivery';
import { Clock, systemClock } from '../utils/clock';

export interface WaitOptions {
  /** Stat of the result path taken before upload; an unchanged file is a leftover, not a result. */
  baseline?: RemoteFileStat | null;
  onAttempt?: (attempt: PollAttempt) => void;
}

function sameFile(a: RemoteFileStat, b: RemoteFileStat): boolean {
  return a.size === b.size && a.modifiedAt === b.modifiedAt;
}

export function nextDelay(config: PollingConfig, attempt: number): number {
  if (config.backoff === 'fixed') return config.pollIntervalMs;
  const grown = config.pollIntervalMs * Math.pow(config.backoffMultiplier, attempt - 1);
  return Math.min(grown, config.maxIntervalMs);
}

export class PollingScheduler {
  private transport: RemoteTransport;
  private clock: Clock;

  constructor(transport: RemoteTransport, clock: Clock = systemClock) {
    this.transport = transport;
    this.clock = clock;
  }

  /**
   * Checks for the result file until it is complete, the attempt or time bound
   * runs out, or the channel keeps failing. Never throws TransportError.
   */
  async waitForResult(remotePath: string, config: PollingConfig, options: WaitOptions = {}): Promise<PollSignal> {
    const startedAt = this.clock.now();
    const elapsed = () => this.clock.now() - startedAt;
    let attempts = 0;
    let probeFailures = 0;
    let lastProbeError = '';

    for (;;) {
      attempts++;
      let state: RemoteFileState;
      try {
        state = await this.probe(remotePath, config, options.baseline ?? null);
        probeFailures = 0;
      } catch (err) {
        if (!(err instanceof TransportError)) throw err;
        probeFailures++;
        lastProbeError = err.message;
        console.warn(`PollingScheduler: probe of ${remotePath} failed (${probeFailures}/${config.transientRetries + 1}): ${err.message}`);
        if (probeFailures > config.transientRetries) {
          return { kind: 'connection_error', stage: 'probe', message: lastProbeError, remotePath, attempts, elapsedMs: elapsed() };
        }
        state = 'absent';
      }

      options.onAttempt?.({ attempt: attempts, at: new Date(this.clock.now()).toISOString(), state });

      if (state === 'complete') {
        return this.downloadWithRetry(remotePath, config, attempts, elapsed);
      }

      const delay = nextDelay(config, attempts);
      const attemptsExhausted = config.maxAttempts !== undefined && attempts >= config.maxAttempts;
      const timeExhausted = config.maxWaitMs !== undefined && elapsed() + delay > config.maxWaitMs;
      if (attemptsExhausted || timeExhausted) {
        if (probeFailures > 0) {
          return { kind: 'connection_error', stage: 'probe', message: lastProbeError, remotePath, attempts, elapsedMs: elapsed() };
        }
        return { kind: 'timeout', remotePath, attempts, elapsedMs: elapsed() };
      }

      await this.clock.sleep(delay);
    }
  }

  /**
   * A file counts as complete only when no in-progress marker sits beside it,
   * it has reached the minimum size, and its size holds steady across the
   * stability gap.
   */
  async probe(remotePath: string, config: PollingConfig, baseline: RemoteFileStat | null): Promise<RemoteFileState> {
    const first = await this.transport.stat(remotePath);
    if (!first) return 'absent';
    if (baseline && sameFile(first, baseline)) return 'absent';

    if (config.inProgressSuffix && await this.transport.exists(`${remotePath}${config.inProgressSuffix}`)) {
      return 'incomplete';
    }
    if (first.size < config.minResultBytes) return 'incomplete';

    if (config.stabilityCheckMs > 0) {
      await this.clock.sleep(config.stabilityCheckMs);
    }
    const second = await this.transport.stat(remotePath);
    if (!second || second.size !== first.size) return 'incomplete';
    if (config.inProgressSuffix && await this.transport.exists(`${remotePath}${config.inProgressSuffix}`)) {
      return 'incomplete';
    }
    return 'complete';
  }

  private async downloadWithRetry(
    remotePath: string,
    config: PollingConfig,
    attempts: number,
    elapsed: () => number,
  ): Promise<PollSignal> {
    let lastError = '';
    for (let tries = 0; tries <= config.transientRetries; tries++) {
      if (tries > 0) {
        await this.clock.sleep(config.pollIntervalMs);
      }
      try {
        const payload = await this.transport.download(remotePath);
        return { kind: 'payload', payload, remotePath, attempts, elapsedMs: elapsed() };
      } catch (err) {
        if (!(err instanceof TransportError)) throw err;
        lastError = describeError(err);
        console.warn(`PollingScheduler: download of ${remotePath} failed (${tries + 1}/${config.transientRetries + 1}): ${lastError}`);
      }
    }
    return { kind: 'connection_error', stage: 'download', message: lastError, remotePath, attempts, elapsedMs: elapsed() };
  }
}
