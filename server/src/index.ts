import http from 'http';
import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import { createHealthRouter } from './routes/health';
import authRouter from './routes/auth';
import { createGameRouter } from './routes/game';
import { createSocketServer } from './socket/index';
import { GameService } from './services/gameService';
import { SessionStore } from './services/sessionStore';

const sessions = new SessionStore(env.sessionIdleTtlSeconds * 1000);
const games = new GameService({ store: sessions, defaultMode: env.defaultMode });

const app = express();

app.use(cors({ origin: env.corsOrigin }));
app.use(express.json());

app.use('/', createHealthRouter(sessions));
app.use('/', authRouter);
app.use('/', createGameRouter(games));

const server = http.createServer(app);
const io = createSocketServer(server, games);

const sweep = setInterval(() => {
  const evicted = sessions.evictIdle();
  if (evicted.length > 0) {
    console.log(`[session] evicted ${evicted.length} idle session(s), ${sessions.size} active`);
  }
}, env.sessionSweepIntervalSeconds * 1000);
sweep.unref();

function start() {
  server.listen(env.port, () => {
    console.log(`[server] listening on http://localhost:${env.port} (default mode: ${env.defaultMode})`);
  });
  server.on('error', (err) => {
    console.error('[server] failed to start', err);
    process.exitCode = 1;
  });
}

start();

export { app, server, io };
