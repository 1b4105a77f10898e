/**
 * SQLite-backed outbox for enrichment messages.
 *
 * The primary key is the message id (hash of the payload), so a resend of the
 * same payload after a crash or retry never produces a second row.
 */
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { EnrichmentPayloadSchema, PrioritySchema } from '../shared/schemas.js';
import type { MessageQueue } from './collaborators.js';
import type { EnqueueResult, QueueMessage } from './types.js';

const QueueRowSchema = z.object({
  id: z.string(),
  priority: PrioritySchema,
  payload_json: z.string(),
  enqueued_at: z.string(),
});

function rowToMessage(row: unknown): QueueMessage {
  const parsed = QueueRowSchema.parse(row);
  return {
    id: parsed.id,
    priority: parsed.priority,
    enqueued_at: parsed.enqueued_at,
    payload: EnrichmentPayloadSchema.parse(JSON.parse(parsed.payload_json)),
  };
}

export class SqliteMessageQueue implements MessageQueue {
  constructor(private readonly db: Database.Database) {}

  async send(message: QueueMessage): Promise<EnqueueResult> {
    const info = this.db
      .prepare(
        `INSERT OR IGNORE INTO queue_messages (id, url, priority, payload_json, enqueued_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        message.id,
        message.payload.url,
        message.priority,
        JSON.stringify(message.payload),
        message.enqueued_at,
      );
    const inserted = info.changes > 0;
    logger.info(inserted ? 'Message enqueued' : 'Message already enqueued', {
      message_id: message.id,
      url: message.payload.url,
      priority: message.priority,
    });
    return { message_id: message.id, inserted };
  }

  list(limit = 50): QueueMessage[] {
    return this.db
      .prepare(`SELECT id, priority, payload_json, enqueued_at FROM queue_messages ORDER BY enqueued_at DESC, id LIMIT ?`)
      .all(limit)
      .map(rowToMessage);
  }

  get(id: string): QueueMessage | null {
    const row = this.db
      .prepare(`SELECT id, priority, payload_json, enqueued_at FROM queue_messages WHERE id = ?`)
      .get(id);
    return row === undefined ? null : rowToMessage(row);
  }

  count(): number {
    const row = z
      .object({ n: z.number() })
      .parse(this.db.prepare(`SELECT COUNT(*) AS n FROM queue_messages`).get());
    return row.n;
  }
}
