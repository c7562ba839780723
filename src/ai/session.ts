import type { ChatMessage } from './types';

export const DEFAULT_THREAD_LIMIT = 40;

/**
 * Conversation threads kept across turns, one per provider. The caller owns
 * the session and passes it into each arbitration; nothing is global.
 */
export class ConversationSession {
  private readonly threads = new Map<string, ChatMessage[]>();

  constructor(
    readonly id: string = 'default',
    private readonly maxMessages: number = DEFAULT_THREAD_LIMIT
  ) {}

  history(providerId: string): readonly ChatMessage[] {
    return this.threads.get(providerId) ?? [];
  }

  /** Appends, dropping the oldest messages past the limit. */
  append(providerId: string, ...messages: ChatMessage[]): void {
    const thread = [...this.history(providerId), ...messages];
    this.threads.set(providerId, thread.slice(Math.max(0, thread.length - this.maxMessages)));
  }

  reset(providerId?: string): void {
    if (providerId === undefined) this.threads.clear();
    else this.threads.delete(providerId);
  }

  providerIds(): string[] {
    return [...this.threads.keys()];
  }
}
