import { v4 as uuid } from 'uuid';
import { PresentationPort, RenderContent } from '../types/game';
import type { GameSession } from '../services/gameSession';
import { NoticePayload, RenderedMessage } from './events';
import { buildKeyboard } from './keyboards';

/** Outbound side of the chat transport, addressed by chat id. */
export interface ChatOutbox {
  message(chatId: string, payload: RenderedMessage): void;
  edit(chatId: string, payload: RenderedMessage): void;
  notice(chatId: string, payload: NoticePayload): void;
}

export class SocketPresenter implements PresentationPort {
  constructor(private readonly outbox: ChatOutbox, private readonly newId: () => string = () => uuid()) {}

  async render(session: GameSession, content: RenderContent, chatId: string): Promise<void> {
    const keyboard = buildKeyboard(content.menu, session.board);
    const signature = JSON.stringify({ text: content.text, keyboard });
    const handle = session.presentationHandle;

    // A player who comes back on another chat gets a new message there.
    if (!handle || handle.chatId !== chatId) {
      const messageId = this.newId();
      this.outbox.message(chatId, { messageId, text: content.text, keyboard });
      session.presentationHandle = { chatId, messageId, signature };
      return;
    }

    if (handle.signature === signature) return; // not modified
    try {
      this.outbox.edit(handle.chatId, { messageId: handle.messageId, text: content.text, keyboard });
      handle.signature = signature;
    } catch (err) {
      console.warn('[presenter] edit failed', handle.messageId, err instanceof Error ? err.message : err);
    }
  }

  async notify(chatId: string, text: string, queryId?: string): Promise<void> {
    this.outbox.notice(chatId, queryId === undefined ? { text } : { queryId, text });
  }
}
