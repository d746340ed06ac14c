import { DeliveryConfig, DeviceConfig } from '../config';
import { ConnectionLogModel } from '../models/ConnectionLog';
import { RemoteSession, describeError } from '../transport/RemoteTransport';
import { Clock, systemClock } from '../utils/clock';

export interface ConnectionTestResult {
  connected: boolean;
  attempts: number;
  pathsVerified: boolean;
  error?: string;
}

/** Checks that the device is reachable and both remote directories exist. */
export class ConnectionService {
  private session: RemoteSession;
  private device: DeviceConfig;
  private delivery: DeliveryConfig;
  private logModel: ConnectionLogModel;
  private clock: Clock;

  constructor(
    session: RemoteSession,
    device: DeviceConfig,
    delivery: DeliveryConfig,
    logModel: ConnectionLogModel,
    clock: Clock = systemClock,
  ) {
    this.session = session;
    this.device = device;
    this.delivery = delivery;
    this.logModel = logModel;
    this.clock = clock;
  }

  async testConnection(): Promise<ConnectionTestResult> {
    let delay = this.device.connectRetryDelayMs;
    let lastError = '';

    for (let attempt = 1; attempt <= this.device.connectAttempts; attempt++) {
      console.log(`ConnectionService: connection attempt ${attempt}/${this.device.connectAttempts} to ${this.device.host}`);
      try {
        await this.session.connect();
      } catch (err) {
        lastError = describeError(err);
        if (attempt < this.device.connectAttempts) {
          console.warn(`ConnectionService: attempt ${attempt} failed, retrying in ${delay}ms: ${lastError}`);
          await this.clock.sleep(delay);
          delay *= 2;
          continue;
        }
        break;
      }

      const missing = await this.findMissingDirectories();
      if (missing.length > 0) {
        const error = `Remote paths not accessible: ${missing.join(', ')}`;
        this.logModel.create({ host: this.device.host, status: 'Failed', details: error });
        return { connected: true, attempts: attempt, pathsVerified: false, error };
      }

      this.logModel.create({ host: this.device.host, status: 'Connected', details: 'Connection test successful with path verification' });
      return { connected: true, attempts: attempt, pathsVerified: true };
    }

    const error = `Connection failed after ${this.device.connectAttempts} attempts: ${lastError}`;
    console.error(`ConnectionService: ${error}`);
    this.logModel.create({ host: this.device.host, status: 'Failed', details: error });
    return { connected: false, attempts: this.device.connectAttempts, pathsVerified: false, error };
  }

  private async findMissingDirectories(): Promise<string[]> {
    const missing: string[] = [];
    for (const dir of [this.delivery.configDir, this.delivery.resultDir]) {
      try {
        if (!(await this.session.isDirectory(dir))) missing.push(dir);
      } catch (err) {
        console.warn(`ConnectionService: could not check ${dir}: ${describeError(err)}`);
        missing.push(dir);
      }
    }
    return missing;
  }
}
