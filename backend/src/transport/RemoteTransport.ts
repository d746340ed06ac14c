export class TransportError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string) {
    super(message);
    this.name = 'TransportError';
    this.operation = operation;
  }
}

export interface RemoteFileStat {
  size: number;
  modifiedAt: number;
}

/**
 * File operations on the remote device. Implementations throw TransportError
 * for connection, authentication and I/O failures.
 */
export interface RemoteTransport {
  upload(localPath: string, remotePath: string): Promise<void>;
  exists(remotePath: string): Promise<boolean>;
  /** Resolves null when nothing exists at the path. */
  stat(remotePath: string): Promise<RemoteFileStat | null>;
  download(remotePath: string): Promise<Buffer>;
}

export interface RemoteSession extends RemoteTransport {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  isDirectory(remotePath: string): Promise<boolean>;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
