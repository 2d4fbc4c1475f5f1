import type { Server as HTTPServer } from 'http';
import { Server, type Socket } from 'socket.io';
import { env } from '../config/env';
import { bearerToken, verifyToken } from '../lib/jwt';
import type { GameService } from '../services/gameService';
import {
  handleGet,
  handleMove,
  handleNewGame,
  handleReset,
  handleSides,
  type ClientToServerEvents,
  type Outbound,
  type ServerToClientEvents,
} from './handlers';

export type { ClientToServerEvents, ServerToClientEvents } from './handlers';

export interface SocketUser {
  id: string;
  username: string;
}

type InterServerEvents = Record<string, never>;

interface SocketData {
  user: SocketUser;
}

type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export function guestUser(socketId: string): SocketUser {
  return { id: `guest:${socketId}`, username: `guest_${socketId.slice(0, 4)}` };
}

export function identify(token: string | undefined): SocketUser | null {
  const payload = token ? verifyToken(token) : null;
  return payload ? { id: payload.id, username: payload.username } : null;
}

function handshakeToken(socket: GameSocket): string | undefined {
  const fromAuth: unknown = socket.handshake.auth['token'];
  if (typeof fromAuth === 'string' && fromAuth.length > 0) return fromAuth;
  return bearerToken(socket.handshake.headers['authorization']);
}

function emitAll(socket: GameSocket, messages: Outbound[]) {
  for (const m of messages) {
    switch (m.event) {
      case 'game:state':
        socket.emit(m.event, m.data);
        break;
      case 'game:moved':
        socket.emit(m.event, m.data);
        break;
      case 'game:ended':
        socket.emit(m.event, m.data);
        break;
      case 'game:error':
        socket.emit(m.event, m.data);
        break;
    }
  }
}

export function createSocketServer(httpServer: HTTPServer, games: GameService) {
  const io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(httpServer, {
    cors: {
      origin: env.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  // Require a JWT; development falls back to a guest identity
  io.use((socket, next) => {
    const user = identify(handshakeToken(socket));
    if (user) {
      socket.data.user = user;
      return next();
    }
    if (env.nodeEnv === 'development') {
      console.warn('[socket-auth] no valid token, allowing guest in development for', socket.id);
      socket.data.user = guestUser(socket.id);
      return next();
    }
    console.warn('[socket-auth] missing or invalid token, rejecting', socket.id);
    return next(new Error('unauthorized'));
  });

  io.on('connection', (socket) => {
    const sid = socket.id;
    const user = socket.data.user;
    console.log(`[socket] connected: ${sid} user=${user.username}`);

    socket.on('disconnect', (reason) => {
      console.log(`[socket] disconnected: ${sid} reason=${reason}`);
    });

    socket.on('game:new', (payload) => emitAll(socket, handleNewGame(games, user.id, payload)));
    socket.on('game:move', (payload) => emitAll(socket, handleMove(games, user.id, payload)));
    socket.on('game:sides', () => emitAll(socket, handleSides(games, user.id)));
    socket.on('game:reset', () => emitAll(socket, handleReset(games, user.id)));
    socket.on('game:get', () => emitAll(socket, handleGet(games, user.id)));
  });

  return io;
}
