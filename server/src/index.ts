import http from 'http';
import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import authRouter from './routes/auth';
import { healthRouter } from './routes/health';
import { attachGame, createSocketServer, socketOutbox } from './socket/index';
import { SocketPresenter } from './socket/presenter';
import { SessionRegistry } from './services/sessionRegistry';
import { GameController } from './services/gameController';

const registry = new SessionRegistry({ timeoutMs: env.sessionTimeoutMs });

const app = express();

app.use(cors({ origin: env.corsOrigin }));
app.use(express.json());

app.use('/', healthRouter(registry));
app.use('/', authRouter);

const server = http.createServer(app);
const io = createSocketServer(server);
const controller = new GameController(registry, new SocketPresenter(socketOutbox(io)));
attachGame(io, controller);

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, stopping`);
  registry.stopSweeper();
  io.close(() => {
    process.exit(0);
  });
}

function start() {
  registry.startSweeper(env.sweepIntervalMs, ({ removed, remaining }) => {
    console.log(`[sessions] in memory: ${remaining} (evicted ${removed.length})`);
  });

  server.listen(env.port, () => {
    console.log(`[server] listening on http://localhost:${env.port}`);
  });

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

start();

export { app, server, io };
