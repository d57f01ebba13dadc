import Database from 'better-sqlite3';
import { z } from 'zod';
import type { IThreadStore } from '../../../core/interfaces/IThreadStore.js';
import { FinalizedMessageSchema } from '../../../core/entities/Message.js';
import type {
  CompletedTurn,
  StoredTurnState,
  ThreadMessage,
  ThreadMetadata,
  ThreadSummary,
  TurnRecord,
} from '../../../core/entities/Thread.js';

interface ThreadRow {
  thread_id: string;
  thread_name: string;
  origin_application: string;
  created_on: number;
  updated_on: number;
}

interface ThreadSummaryRow extends ThreadRow {
  message_count: number;
  last_activity: string | null;
}

interface TurnRow {
  request_id: string;
  thread_id: string;
  user_text: string;
  state: string;
  error: string | null;
  started_at: string;
  finished_at: string | null;
}

interface MessageRow {
  thread_id: string;
  message_index: number;
  role: string;
  request_id: string;
  remote_message_id: number | null;
  payload: string;
  created_at: string;
}

const UserPayloadSchema = z.object({ text: z.string() });

function toThread(row: ThreadRow): ThreadMetadata {
  return {
    threadId: row.thread_id,
    threadName: row.thread_name,
    originApplication: row.origin_application,
    createdOn: row.created_on,
    updatedOn: row.updated_on,
  };
}

function toTurnState(state: string): StoredTurnState {
  return state === 'done' || state === 'errored' ? state : 'receiving';
}

function toTurn(row: TurnRow): TurnRecord {
  return {
    requestId: row.request_id,
    threadId: row.thread_id,
    userText: row.user_text,
    state: toTurnState(row.state),
    error: row.error,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

/**
 * SQLite implementation of the thread store
 */
export class ThreadRepository implements IThreadStore {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date()
  ) {}

  saveThread(thread: ThreadMetadata): void {
    this.db
      .prepare(
        `
      INSERT INTO threads (thread_id, thread_name, origin_application, created_on, updated_on)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(thread_id) DO UPDATE SET
        thread_name = excluded.thread_name,
        origin_application = excluded.origin_application,
        created_on = excluded.created_on,
        updated_on = excluded.updated_on
    `
      )
      .run(thread.threadId, thread.threadName, thread.originApplication, thread.createdOn, thread.updatedOn);
  }

  getThread(threadId: string): ThreadMetadata | null {
    const row = this.db
      .prepare<[string], ThreadRow>('SELECT * FROM threads WHERE thread_id = ?')
      .get(threadId);
    return row ? toThread(row) : null;
  }

  listThreads(): ThreadSummary[] {
    const rows = this.db
      .prepare<[], ThreadSummaryRow>(
        `
      SELECT
        t.*,
        COUNT(m.id) as message_count,
        MAX(m.created_at) as last_activity
      FROM threads t
      LEFT JOIN thread_messages m ON m.thread_id = t.thread_id
      GROUP BY t.thread_id
      ORDER BY t.updated_on DESC, t.created_on DESC
    `
      )
      .all();

    return rows.map((row) => ({
      ...toThread(row),
      messageCount: row.message_count,
      lastActivity: row.last_activity,
    }));
  }

  renameThread(threadId: string, threadName: string): void {
    this.db
      .prepare('UPDATE threads SET thread_name = ?, updated_on = ? WHERE thread_id = ?')
      .run(threadName, this.now().getTime(), threadId);
  }

  deleteThread(threadId: string): void {
    // Turns and messages go with it (ON DELETE CASCADE)
    this.db.prepare('DELETE FROM threads WHERE thread_id = ?').run(threadId);
  }

  createTurn(threadId: string, requestId: string, userText: string): TurnRecord {
    const startedAt = this.now().toISOString();
    this.db.transaction(() => {
      this.ensureThread(threadId);
      this.db
        .prepare(
          `
        INSERT INTO turns (request_id, thread_id, user_text, state, started_at)
        VALUES (?, ?, ?, 'receiving', ?)
      `
        )
        .run(requestId, threadId, userText, startedAt);
    })();

    return {
      requestId,
      threadId,
      userText,
      state: 'receiving',
      error: null,
      startedAt,
      finishedAt: null,
    };
  }

  completeTurn(requestId: string, state: Exclude<StoredTurnState, 'receiving'>, error?: string): void {
    this.db
      .prepare('UPDATE turns SET state = ?, error = ?, finished_at = ? WHERE request_id = ?')
      .run(state, error ?? null, this.now().toISOString(), requestId);
  }

  getTurn(requestId: string): TurnRecord | null {
    const row = this.db
      .prepare<[string], TurnRow>('SELECT * FROM turns WHERE request_id = ?')
      .get(requestId);
    return row ? toTurn(row) : null;
  }

  appendFinalizedMessage(threadId: string, turn: CompletedTurn): void {
    const createdAt = this.now().toISOString();

    this.db.transaction(() => {
      const existing = this.db
        .prepare<[string], { count: number }>('SELECT COUNT(*) as count FROM thread_messages WHERE request_id = ?')
        .get(turn.requestId);
      if (existing && existing.count > 0) {
        return;
      }

      this.ensureThread(threadId);
      const last = this.db
        .prepare<[string], { last_index: number | null }>(
          'SELECT MAX(message_index) as last_index FROM thread_messages WHERE thread_id = ?'
        )
        .get(threadId);
      const nextIndex = (last?.last_index ?? -1) + 1;

      const insert = this.db.prepare(`
        INSERT INTO thread_messages (thread_id, message_index, role, request_id, remote_message_id, payload, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      insert.run(
        threadId,
        nextIndex,
        'user',
        turn.requestId,
        turn.message.userMessageId,
        JSON.stringify({ text: turn.userText }),
        createdAt
      );
      insert.run(
        threadId,
        nextIndex + 1,
        'assistant',
        turn.requestId,
        turn.message.assistantMessageId,
        JSON.stringify(turn.message),
        createdAt
      );

      this.db
        .prepare('UPDATE threads SET updated_on = ? WHERE thread_id = ?')
        .run(this.now().getTime(), threadId);
    })();
  }

  listMessages(threadId: string): ThreadMessage[] {
    const rows = this.db
      .prepare<[string], MessageRow>(
        `
      SELECT thread_id, message_index, role, request_id, remote_message_id, payload, created_at
      FROM thread_messages
      WHERE thread_id = ?
      ORDER BY message_index
    `
      )
      .all(threadId);

    const messages: ThreadMessage[] = [];
    for (const row of rows) {
      const message = this.toMessage(row);
      if (message) {
        messages.push(message);
      }
    }
    return messages;
  }

  getLastAssistantMessageId(threadId: string): number | null {
    const row = this.db
      .prepare<[string], { remote_message_id: number }>(
        `
      SELECT remote_message_id FROM thread_messages
      WHERE thread_id = ? AND role = 'assistant' AND remote_message_id IS NOT NULL
      ORDER BY message_index DESC
      LIMIT 1
    `
      )
      .get(threadId);
    return row ? row.remote_message_id : null;
  }

  /**
   * Insert a placeholder row for a thread first seen through a turn
   */
  private ensureThread(threadId: string): void {
    const now = this.now().getTime();
    this.db
      .prepare('INSERT OR IGNORE INTO threads (thread_id, created_on, updated_on) VALUES (?, ?, ?)')
      .run(threadId, now, now);
  }

  private toMessage(row: MessageRow): ThreadMessage | null {
    const base = {
      threadId: row.thread_id,
      messageIndex: row.message_index,
      requestId: row.request_id,
      remoteMessageId: row.remote_message_id,
      createdAt: row.created_at,
    };

    try {
      const payload: unknown = JSON.parse(row.payload);
      if (row.role === 'user') {
        return { ...base, role: 'user', payload: UserPayloadSchema.parse(payload) };
      }
      return { ...base, role: 'assistant', payload: FinalizedMessageSchema.parse(payload) };
    } catch (error) {
      console.error(
        `[ThreadRepository] Skipping unreadable message ${row.message_index} of thread ${row.thread_id}:`,
        error instanceof Error ? error.message : error
      );
      return null;
    }
  }
}
