import type Database from "better-sqlite3";
import { z } from "zod";
import { openDatabase, parseJsonColumn } from "../persistence/database.js";
import type { ConversationMessage, SessionContext } from "../types.js";
import { CAPABILITY_TYPES, MESSAGE_ROLES } from "../types.js";
import { BaseSessionStore } from "./store.js";

type SessionRow = {
  session_id: string;
  user_id: string;
  project_id: string;
  created_at: number;
  last_activity: number;
  message_count: number;
  active_capabilities: string;
  context_data: string;
};

type MessageRow = {
  id: string;
  session_id: string;
  role: string;
  content: string;
  payload: string;
  timestamp: number;
};

const CapabilitiesColumn = z.array(z.enum(CAPABILITY_TYPES));
const RecordColumn = z.record(z.unknown());
const RoleColumn = z.enum(MESSAGE_ROLES);

/** Session store on better-sqlite3. Opens its database in `initialize()`. */
export class SqliteSessionStore extends BaseSessionStore {
  private db?: Database.Database;

  constructor(private dbPath?: string) {
    super();
  }

  async initialize(): Promise<void> {
    if (this.db) return;
    const db = openDatabase(this.dbPath);
    db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id          TEXT PRIMARY KEY,
        user_id             TEXT NOT NULL,
        project_id          TEXT NOT NULL,
        created_at          INTEGER NOT NULL,
        last_activity       INTEGER NOT NULL,
        message_count       INTEGER NOT NULL DEFAULT 0,
        active_capabilities TEXT NOT NULL DEFAULT '[]',
        context_data        TEXT NOT NULL DEFAULT '{}'
      );
      CREATE TABLE IF NOT EXISTS messages (
        seq        INTEGER PRIMARY KEY AUTOINCREMENT,
        id         TEXT NOT NULL UNIQUE,
        session_id TEXT NOT NULL,
        role       TEXT NOT NULL,
        content    TEXT NOT NULL,
        payload    TEXT NOT NULL DEFAULT '{}',
        timestamp  INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, seq DESC);
    `);
    this.db = db;
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = undefined;
  }

  private get database(): Database.Database {
    if (!this.db) throw new Error("SqliteSessionStore used before initialize()");
    return this.db;
  }

  protected async readContext(sessionId: string): Promise<SessionContext | undefined> {
    const row = this.database
      .prepare<[string], SessionRow>("SELECT * FROM sessions WHERE session_id = ?")
      .get(sessionId);
    return row ? rowToSession(row) : undefined;
  }

  protected async writeContext(context: SessionContext): Promise<void> {
    this.database.prepare(`
      INSERT OR REPLACE INTO sessions
        (session_id, user_id, project_id, created_at, last_activity, message_count, active_capabilities, context_data)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      context.sessionId,
      context.userId,
      context.projectId,
      context.createdAt,
      context.lastActivity,
      context.messageCount,
      JSON.stringify(context.activeCapabilities),
      JSON.stringify(context.contextData),
    );
  }

  protected async insertMessage(message: ConversationMessage): Promise<void> {
    this.database.prepare(`
      INSERT INTO messages (id, session_id, role, content, payload, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      message.id,
      message.sessionId,
      message.role,
      message.content,
      JSON.stringify(message.payload),
      message.timestamp,
    );
  }

  protected async readMessages(sessionId: string, limit: number): Promise<ConversationMessage[]> {
    if (limit <= 0) return [];
    const rows = this.database
      .prepare<[string, number], MessageRow>(
        "SELECT * FROM messages WHERE session_id = ? ORDER BY seq DESC LIMIT ?",
      )
      .all(sessionId, limit);
    return rows.reverse().map(rowToMessage);
  }

  async countActive(since: number): Promise<number> {
    const row = this.database
      .prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM sessions WHERE last_activity >= ?")
      .get(since);
    return row?.n ?? 0;
  }
}

function rowToSession(row: SessionRow): SessionContext {
  return {
    sessionId: row.session_id,
    userId: row.user_id,
    projectId: row.project_id,
    createdAt: row.created_at,
    lastActivity: row.last_activity,
    messageCount: row.message_count,
    activeCapabilities: parseJsonColumn(CapabilitiesColumn, row.active_capabilities, []),
    contextData: parseJsonColumn(RecordColumn, row.context_data, {}),
  };
}

function rowToMessage(row: MessageRow): ConversationMessage {
  const role = RoleColumn.safeParse(row.role);
  return {
    id: row.id,
    sessionId: row.session_id,
    role: role.success ? role.data : "system",
    content: row.content,
    payload: parseJsonColumn(RecordColumn, row.payload, {}),
    timestamp: row.timestamp,
  };
}
