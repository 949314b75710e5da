import { getConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import type { ConversationMessage, SessionContext } from "../types.js";
import { KeyedMutex } from "./keyed-mutex.js";

export type SessionSeed = {
  userId: string;
  projectId: string;
};

const DEFAULT_SEED: SessionSeed = { userId: "default_user", projectId: "default_project" };

/**
 * Conversation and session state, owned outside the engine. Implementations
 * serialize every read-modify-write per session id.
 */
export interface SessionStore {
  initialize(): Promise<void>;
  close(): Promise<void>;
  /** Existing context, or undefined. Never creates. */
  get(sessionId: string): Promise<SessionContext | undefined>;
  /** Existing context, or a new one created from `seed`. */
  load(sessionId: string, seed?: SessionSeed): Promise<SessionContext>;
  save(context: SessionContext): Promise<void>;
  /** Atomic read-modify-write. Creates the session when missing. */
  update(sessionId: string, fn: (context: SessionContext) => SessionContext | undefined): Promise<SessionContext>;
  /** Stores the message and bumps the session's counters in one step. */
  appendMessage(sessionId: string, message: ConversationMessage): Promise<SessionContext>;
  /** Most recent messages, oldest first. */
  history(sessionId: string, limit?: number): Promise<ConversationMessage[]>;
  /** Number of sessions with activity at or after `since` (epoch ms). */
  countActive(since: number): Promise<number>;
}

export function newSessionContext(sessionId: string, seed: SessionSeed = DEFAULT_SEED): SessionContext {
  const now = Date.now();
  return {
    sessionId,
    userId: seed.userId,
    projectId: seed.projectId,
    createdAt: now,
    lastActivity: now,
    messageCount: 0,
    activeCapabilities: [],
    contextData: {},
  };
}

/**
 * Shared locking and bookkeeping. Subclasses supply raw reads and writes;
 * every public method runs under the per-session lock.
 */
export abstract class BaseSessionStore implements SessionStore {
  private locks = new KeyedMutex();

  abstract initialize(): Promise<void>;
  abstract close(): Promise<void>;

  protected abstract readContext(sessionId: string): Promise<SessionContext | undefined>;
  protected abstract writeContext(context: SessionContext): Promise<void>;
  protected abstract insertMessage(message: ConversationMessage): Promise<void>;
  protected abstract readMessages(sessionId: string, limit: number): Promise<ConversationMessage[]>;
  abstract countActive(since: number): Promise<number>;

  get(sessionId: string): Promise<SessionContext | undefined> {
    return this.locks.runExclusive(sessionId, () => this.readContext(sessionId));
  }

  load(sessionId: string, seed?: SessionSeed): Promise<SessionContext> {
    return this.locks.runExclusive(sessionId, async () => {
      const existing = await this.readContext(sessionId);
      if (existing) return existing;
      const created = newSessionContext(sessionId, seed);
      await this.writeContext(created);
      return created;
    });
  }

  save(context: SessionContext): Promise<void> {
    return this.locks.runExclusive(context.sessionId, () => this.writeContext(context));
  }

  update(sessionId: string, fn: (context: SessionContext) => SessionContext | undefined): Promise<SessionContext> {
    return this.locks.runExclusive(sessionId, async () => {
      const current = (await this.readContext(sessionId)) ?? newSessionContext(sessionId);
      const next = fn(current) ?? current;
      await this.writeContext(next);
      return next;
    });
  }

  appendMessage(sessionId: string, message: ConversationMessage): Promise<SessionContext> {
    if (message.content.trim().length === 0) {
      return Promise.reject(new ValidationError("VALIDATION_FAILED", "Message content must not be empty"));
    }
    return this.locks.runExclusive(sessionId, async () => {
      const current = (await this.readContext(sessionId)) ?? newSessionContext(sessionId);
      await this.insertMessage({ ...message, sessionId });
      const next: SessionContext = {
        ...current,
        messageCount: current.messageCount + 1,
        lastActivity: Math.max(current.lastActivity, message.timestamp),
      };
      await this.writeContext(next);
      return next;
    });
  }

  history(sessionId: string, limit?: number): Promise<ConversationMessage[]> {
    const n = limit ?? getConfig().limits.historyLimit;
    return this.locks.runExclusive(sessionId, () => this.readMessages(sessionId, n));
  }
}

/** Process-local store. Contents are lost on exit. */
export class MemorySessionStore extends BaseSessionStore {
  private contexts = new Map<string, SessionContext>();
  private messages = new Map<string, ConversationMessage[]>();

  async initialize(): Promise<void> {}

  async close(): Promise<void> {
    this.contexts.clear();
    this.messages.clear();
  }

  protected async readContext(sessionId: string): Promise<SessionContext | undefined> {
    const ctx = this.contexts.get(sessionId);
    return ctx ? structuredClone(ctx) : undefined;
  }

  protected async writeContext(context: SessionContext): Promise<void> {
    this.contexts.set(context.sessionId, structuredClone(context));
  }

  protected async insertMessage(message: ConversationMessage): Promise<void> {
    const list = this.messages.get(message.sessionId) ?? [];
    list.push(structuredClone(message));
    this.messages.set(message.sessionId, list);
  }

  protected async readMessages(sessionId: string, limit: number): Promise<ConversationMessage[]> {
    const list = this.messages.get(sessionId) ?? [];
    return structuredClone(limit > 0 ? list.slice(-limit) : []);
  }

  async countActive(since: number): Promise<number> {
    let n = 0;
    for (const ctx of this.contexts.values()) {
      if (ctx.lastActivity >= since) n++;
    }
    return n;
  }
}
