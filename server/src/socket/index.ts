import type { Server as HTTPServer } from 'http';
import { Server, Socket } from 'socket.io';
import { z } from 'zod';
import { env } from '../config/env';
import { verifyToken } from '../lib/jwt';
import { PlayerInfo } from '../types/game';
import { GameController } from '../services/gameController';
import { ChatOutbox } from './presenter';
import { ClientToServerEvents, InterServerEvents, ServerToClientEvents, SocketData } from './events';

export type ChatServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
type ChatSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

const messageSchema = z.object({ text: z.string().max(4096).optional() }).optional();
const choiceSchema = z.object({
  choice: z.string().min(1).max(64),
  queryId: z.string().max(128).optional(),
});

export function guestIdentity(socketId: string): PlayerInfo {
  return { id: `guest:${socketId}`, username: `guest_${socketId.slice(0, 4)}` };
}

/**
 * Resolves the player behind a connection. Without a valid token, development
 * gets a per-socket guest and every other environment gets null.
 */
export function resolveIdentity(token: string | undefined, socketId: string, nodeEnv: string = env.nodeEnv): PlayerInfo | null {
  const payload = token ? verifyToken(token) : null;
  if (payload) return payload;
  if (nodeEnv === 'development') return guestIdentity(socketId);
  return null;
}

function handshakeToken(socket: ChatSocket): string | undefined {
  const auth: unknown = socket.handshake.auth;
  if (typeof auth === 'object' && auth !== null && 'token' in auth && typeof auth.token === 'string') {
    return auth.token;
  }
  const header = socket.handshake.headers['authorization'];
  return typeof header === 'string' && header.startsWith('Bearer ') ? header.slice(7) : undefined;
}

export function socketOutbox(io: ChatServer): ChatOutbox {
  return {
    message: (chatId, payload) => {
      io.to(chatId).emit('chat:message', payload);
    },
    edit: (chatId, payload) => {
      io.to(chatId).emit('chat:edit', payload);
    },
    notice: (chatId, payload) => {
      io.to(chatId).emit('chat:notice', payload);
    },
  };
}

export function createSocketServer(httpServer: HTTPServer): ChatServer {
  return new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(httpServer, {
    cors: {
      origin: env.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });
}

export function attachGame(io: ChatServer, controller: Pick<GameController, 'handle'>): void {
  io.use((socket, next) => {
    const user = resolveIdentity(handshakeToken(socket), socket.id);
    if (!user) {
      console.warn('[socket-auth] missing or invalid token, rejecting', socket.id);
      return next(new Error('unauthorized'));
    }
    if (user.id.startsWith('guest:')) {
      console.warn('[socket-auth] no valid token, allowing guest in development for', socket.id);
    }
    socket.data.user = user;
    return next();
  });

  io.on('connection', (socket) => {
    const sid = socket.id;
    console.log(`[socket] connected: ${sid}`);

    socket.on('disconnect', (reason) => {
      console.log(`[socket] disconnected: ${sid} reason=${reason}`);
    });

    socket.on('chat:message', async (payload: unknown) => {
      const user = socket.data.user;
      if (!user) return socket.emit('chat:error', { error: 'unauthorized' });
      if (!messageSchema.safeParse(payload).success) return socket.emit('chat:error', { error: 'invalid_payload' });
      try {
        await controller.handle({ kind: 'message', playerId: user.id, chatId: sid });
      } catch (err) {
        console.error('[socket] chat:message failed', err);
        socket.emit('chat:error', { error: 'internal_error' });
      }
    });

    socket.on('chat:choice', async (payload: unknown) => {
      const user = socket.data.user;
      if (!user) return socket.emit('chat:error', { error: 'unauthorized' });
      const parsed = choiceSchema.safeParse(payload);
      if (!parsed.success) return socket.emit('chat:error', { error: 'invalid_payload' });
      try {
        await controller.handle({
          kind: 'choice',
          playerId: user.id,
          chatId: sid,
          choiceToken: parsed.data.choice,
          queryId: parsed.data.queryId,
        });
      } catch (err) {
        console.error('[socket] chat:choice failed', err);
        socket.emit('chat:error', { error: 'internal_error' });
      }
    });
  });
}
