import {
  HISTORY_DEFAULTS,
  PersistedStateCorruptError,
  SessionHistory,
  SessionNotLoadedError,
  serializeChatMessage,
  type ChatMessage,
  type FileStoragePort,
  type Logger
} from '@worksheetbot/core';
import { PersistedHistorySchema, decodePersistedMessage } from './persistedMessage';

export interface SessionHistoryStoreOptions {
  /** Where `<sessionId>_history.json` files live. */
  storage: FileStoragePort;
  /** Messages kept when hydrating from storage. */
  retention?: number;
  logger?: Logger;
}

export function historyFileName(sessionId: string): string {
  return `${sessionId}_history.json`;
}

/**
 * File-backed session histories with an in-process cache.
 *
 * Construct one per process and pass it to whoever needs session access. Once
 * a session is loaded the cached object is returned for the rest of the
 * store's life, and nothing is persisted until `save` is called. Truncation to
 * the retention window happens only on hydration; a live history can grow past
 * it and `save` writes everything.
 */
export class SessionHistoryStore {
  private readonly cache = new Map<string, SessionHistory>();
  private readonly retention: number;
  private readonly logger: Logger | undefined;

  public constructor(private readonly options: SessionHistoryStoreOptions) {
    this.retention = options.retention ?? HISTORY_DEFAULTS.RETENTION;
    this.logger = options.logger?.child({ component: 'history-store' });

    if (!Number.isInteger(this.retention) || this.retention < 1) {
      throw new RangeError(`retention must be a positive integer, got ${this.retention}`);
    }
  }

  public async get(sessionId: string): Promise<SessionHistory> {
    const cached = this.cache.get(sessionId);
    if (cached) return cached;

    const history = new SessionHistory(sessionId, await this.hydrate(sessionId));
    this.cache.set(sessionId, history);
    return history;
  }

  public async append(sessionId: string, message: ChatMessage): Promise<void> {
    const history = await this.get(sessionId);
    history.append(message);
  }

  public async save(sessionId: string): Promise<void> {
    const history = this.cache.get(sessionId);
    if (!history) {
      throw new SessionNotLoadedError(sessionId);
    }

    const serialized = history.messages.map(serializeChatMessage);
    await this.options.storage.put(historyFileName(sessionId), JSON.stringify(serialized, null, 2));
    this.logger?.debug({ sessionId, messages: serialized.length }, 'history saved');
  }

  private async hydrate(sessionId: string): Promise<ChatMessage[]> {
    const path = historyFileName(sessionId);
    const { storage } = this.options;

    if (!(await storage.exists(path))) {
      return [];
    }

    const content = (await storage.get(path)).toString('utf8').trim();
    if (!content) {
      return [];
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new PersistedStateCorruptError(sessionId, path, 'not valid JSON', { cause: error });
    }

    const records = PersistedHistorySchema.safeParse(document);
    if (!records.success) {
      throw new PersistedStateCorruptError(sessionId, path, 'expected a JSON array of messages');
    }

    const messages: ChatMessage[] = [];
    records.data.forEach((record, index) => {
      const decoded = decodePersistedMessage(record);
      if (!decoded.ok) {
        throw new PersistedStateCorruptError(sessionId, path, `message ${index}: ${decoded.reason}`);
      }
      messages.push(decoded.message);
    });

    const retained = messages.slice(-this.retention);
    this.logger?.debug({ sessionId, persisted: messages.length, retained: retained.length }, 'history hydrated');
    return retained;
  }
}
