import express from 'express';
import http from 'http';
import Database from 'better-sqlite3';
import { AppConfig, loadConfig } from './config';
import { createDatabase } from './models/Database';
import { HistoryModel } from './models/History';
import { ConnectionLogModel } from './models/ConnectionLog';
import { RemoteSession } from './transport/RemoteTransport';
import { SftpTransport } from './transport/SftpTransport';
import { DeliveryEngine } from './services/DeliveryEngine';
import { TestQueueRunner } from './services/TestQueueRunner';
import { RunController } from './services/RunController';
import { ConnectionService } from './services/ConnectionService';
import { WebSocketService } from './services/WebSocketService';
import { Clock, systemClock } from './utils/clock';
import { createHistoryRoutes } from './routes/history';
import { createRunRoutes } from './routes/runs';
import { createConnectionRoutes } from './routes/connection';

export interface AppOptions {
  config?: AppConfig;
  dbPath?: string;
  transport?: RemoteSession;
  clock?: Clock;
}

export interface AppContext {
  app: express.Express;
  db: Database.Database;
  config: AppConfig;
  transport: RemoteSession;
  runner: TestQueueRunner;
  runController: RunController;
}

export function createApp(options: AppOptions = {}): AppContext {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? systemClock;

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // Initialize database and models
  const db = createDatabase(options.dbPath ?? config.dbPath);
  const historyModel = new HistoryModel(db);
  const connectionLog = new ConnectionLogModel(db);

  // Initialize services
  const transport = options.transport ?? new SftpTransport(config.device);
  const engine = new DeliveryEngine(transport, historyModel, { clock });
  const runner = new TestQueueRunner(engine, config.delivery);
  const runController = new RunController(runner);
  const connectionService = new ConnectionService(transport, config.device, config.delivery, connectionLog, clock);

  app.use('/api/history', createHistoryRoutes(historyModel));
  app.use('/api/runs', createRunRoutes(runController, historyModel, config.delivery.configDir));
  app.use('/api/connection', createConnectionRoutes(connectionService, connectionLog, runController));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      device: `${config.device.host}:${config.device.port}`,
      connected: transport.isConnected(),
      runActive: runController.isActive(),
    });
  });

  return { app, db, config, transport, runner, runController };
}

if (require.main === module) {
  const context = createApp();
  const server = http.createServer(context.app);
  const wsService = new WebSocketService(server);
  context.runner.onProgress((event) => wsService.broadcastProgress(event));

  server.listen(context.config.port, context.config.host, () => {
    console.log(`Testbridge running on http://${context.config.host}:${context.config.port}`);
    console.log(`Delivering to ${context.config.device.username}@${context.config.device.host}:${context.config.delivery.configDir}`);
  });

  const shutdown = () => {
    console.log('Shutting down...');
    context.runController.cancel();
    wsService.close();
    server.close();
    context.runController.waitForIdle()
      .then(() => context.transport.disconnect())
      .catch((err) => console.error('Error during shutdown:', err))
      .finally(() => context.db.close());
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
