import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { ProgressEvent } from '../types/Delivery';

interface TrackedSocket extends WebSocket {
  isAlive?: boolean;
}

export class WebSocketService {
  private wss: WebSocketServer;
  private connections = new Set<TrackedSocket>();
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;

  constructor(server: HttpServer, heartbeatMs: number = 30000) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws: TrackedSocket) => {
      this.handleConnection(ws);
    });

    this.heartbeatInterval = setInterval(() => {
      for (const sock of this.connections) {
        if (sock.isAlive === false) {
          this.connections.delete(sock);
          sock.terminate();
          continue;
        }
        sock.isAlive = false;
        sock.ping();
      }
    }, heartbeatMs);
  }

  private handleConnection(ws: TrackedSocket): void {
    ws.isAlive = true;
    this.connections.add(ws);

    ws.on('pong', () => {
      ws.isAlive = true;
    });

    ws.on('close', () => {
      this.connections.delete(ws);
    });

    ws.send(JSON.stringify({ type: 'connected' }));
  }

  broadcastProgress(event: ProgressEvent): void {
    const { type, ...data } = event;
    this.broadcast({ type, data });
  }

  private broadcast(message: { type: string; data: object }): void {
    const payload = JSON.stringify(message);
    for (const ws of this.connections) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  close(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
    for (const ws of this.connections) {
      ws.terminate();
    }
    this.connections.clear();
    this.wss.close();
  }

  getConnectionCount(): number {
    return this.connections.size;
  }
}
