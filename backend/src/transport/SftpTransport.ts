import SftpClient from 'ssh2-sftp-client';
import { DeviceConfig } from '../config';
import { RemoteFileStat, RemoteSession, TransportError, describeError } from './RemoteTransport';

/**
 * RemoteSession over SFTP. Operations are queued so that only one transfer
 * is on the channel at any time, and a dropped session reconnects on the next
 * call.
 */
export class SftpTransport implements RemoteSession {
  private device: DeviceConfig;
  private client: SftpClient | null = null;
  private connected: boolean = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(device: DeviceConfig) {
    this.device = device;
  }

  isConnected(): boolean {
    return this.connected;
  }

  connect(): Promise<void> {
    return this.exclusive(async () => {
      await this.ensureConnected();
    });
  }

  disconnect(): Promise<void> {
    return this.exclusive(async () => {
      const client = this.client;
      this.client = null;
      this.connected = false;
      if (!client) return;
      try {
        await client.end();
        console.log(`SftpTransport: disconnected from ${this.device.host}`);
      } catch (err) {
        console.warn(`SftpTransport: error while closing session: ${describeError(err)}`);
      }
    });
  }

  upload(localPath: string, remotePath: string): Promise<void> {
    return this.withClient('upload', async (client) => {
      await client.put(localPath, remotePath);
      console.log(`SftpTransport: uploaded ${localPath} -> ${remotePath}`);
    });
  }

  exists(remotePath: string): Promise<boolean> {
    return this.withClient('exists', async (client) => (await client.exists(remotePath)) !== false);
  }

  stat(remotePath: string): Promise<RemoteFileStat | null> {
    return this.withClient('stat', async (client) => {
      const kind = await client.exists(remotePath);
      if (kind === false) return null;
      const stats = await client.stat(remotePath);
      return { size: stats.size, modifiedAt: stats.modifyTime };
    });
  }

  isDirectory(remotePath: string): Promise<boolean> {
    return this.withClient('stat', async (client) => (await client.exists(remotePath)) === 'd');
  }

  download(remotePath: string): Promise<Buffer> {
    return this.withClient('download', async (client) => {
      const data = await client.get(remotePath);
      if (Buffer.isBuffer(data)) return data;
      if (typeof data === 'string') return Buffer.from(data, 'utf-8');
      throw new TransportError('download', `Unexpected stream result while downloading ${remotePath}`);
    });
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private withClient<T>(operation: string, fn: (client: SftpClient) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const client = await this.ensureConnected();
      try {
        return await fn(client);
      } catch (err) {
        if (err instanceof TransportError) throw err;
        // The session may be half-open after a failure; start fresh next time.
        this.connected = false;
        this.client = null;
        client.end().catch((endErr: unknown) => {
          console.warn(`SftpTransport: error while closing failed session: ${describeError(endErr)}`);
        });
        throw new TransportError(operation, `${operation} failed: ${describeError(err)}`);
      }
    });
  }

  private async ensureConnected(): Promise<SftpClient> {
    if (this.client && this.connected) return this.client;

    const client = new SftpClient('testbridge');
    console.log(`SftpTransport: connecting to ${this.device.host}:${this.device.port} as ${this.device.username}`);
    try {
      await client.connect({
        host: this.device.host,
        port: this.device.port,
        username: this.device.username,
        password: this.device.password,
        readyTimeout: this.device.connectTimeoutMs,
      });
    } catch (err) {
      throw new TransportError('connect', `Connection to ${this.device.host}:${this.device.port} failed: ${describeError(err)}`);
    }

    client.on('close', () => {
      if (this.client === client) {
        this.connected = false;
        this.client = null;
      }
    });

    this.client = client;
    this.connected = true;
    console.log('SftpTransport: SFTP session established');
    return client;
  }
}
