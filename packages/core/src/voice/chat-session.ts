import { generateId, now, type ChatMessage } from '@receipt-voice/shared';
import { silentLogger } from '../logger';
import type { ChatSessionBridge, VoiceLogger } from './types';

/** Sends user text to the backend query flow */
export type QueryHandler = (text: string) => void | Promise<void>;

export interface ChatSessionOptions {
  query?: QueryHandler;
  logger?: VoiceLogger;
}

/**
 * In-memory chat message list. Transcripts arrive through `submit` exactly as
 * typed input would; backend replies are added with `addAssistantMessage`.
 */
export class ChatSession implements ChatSessionBridge {
  private messages: ChatMessage[] = [];
  private query?: QueryHandler;
  private logger: VoiceLogger;

  constructor(options: ChatSessionOptions = {}) {
    this.query = options.query;
    this.logger = options.logger ?? silentLogger;
  }

  async submit(text: string): Promise<void> {
    const message: ChatMessage = {
      id: generateId(),
      text,
      isUser: true,
      timestamp: now(),
    };
    this.messages.push(message);
    this.logger.debug('User message added', { id: message.id, length: text.length });

    if (this.query) {
      await this.query(text);
    }
  }

  addAssistantMessage(text: string, walletLink?: string): ChatMessage {
    const message: ChatMessage = {
      id: generateId(),
      text,
      isUser: false,
      timestamp: now(),
    };
    if (walletLink) {
      message.walletLink = walletLink;
    }
    this.messages.push(message);
    return message;
  }

  getMessages(): ChatMessage[] {
    return this.messages.map((message) => ({ ...message }));
  }

  /**
   * Only assistant replies can be spoken
   */
  getAssistantText(messageId: string): string | null {
    const message = this.messages.find((entry) => entry.id === messageId);
    if (!message || message.isUser) return null;
    return message.text;
  }

  clear(): void {
    this.messages = [];
  }
}
