import { Keyboard, PlayerInfo } from '../types/game';

export interface RenderedMessage {
  messageId: string;
  text: string;
  keyboard: Keyboard;
}

export interface NoticePayload {
  queryId?: string;
  text: string;
}

export interface ServerToClientEvents {
  'chat:message': (payload: RenderedMessage) => void;
  'chat:edit': (payload: RenderedMessage) => void;
  'chat:notice': (payload: NoticePayload) => void;
  'chat:error': (payload: { error: string }) => void;
}

// Payloads are validated with zod before use.
export interface ClientToServerEvents {
  'chat:message': (payload: unknown) => void;
  'chat:choice': (payload: unknown) => void;
}

export type InterServerEvents = Record<string, never>;

export interface SocketData {
  user?: PlayerInfo;
}
