import type pg from 'pg';
import type { Message, MessageStatus, MessageType } from './lifecycle.js';

export type MessageFilter = {
  status?: MessageStatus | MessageStatus[];
  /** Only messages flagged as reusable templates */
  templatesOnly?: boolean;
  /** Only messages with a cached feature vector */
  withVector?: boolean;
  limit?: number;
};

export type StatusCounts = Record<MessageStatus, number> & { total: number };

/**
 * Raw persistence for messages. No business rules live here; the
 * MessageStore decides what may be written.
 */
export interface MessageRepository {
  insert(message: Message): Promise<void>;
  findById(id: string): Promise<Message | null>;
  update(message: Message): Promise<void>;
  /** Newest first */
  list(filter?: MessageFilter): Promise<Message[]>;
  countByStatus(): Promise<StatusCounts>;
  delete(ids: string[]): Promise<number>;
}

export function emptyCounts(): StatusCounts {
  return { pending: 0, processing: 0, completed: 0, sent: 0, dismissed: 0, failed: 0, total: 0 };
}

type MessageRow = {
  id: string;
  text: string;
  channel_id: string;
  channel_name: string | null;
  user_id: string;
  user_name: string | null;
  thread_id: string | null;
  source_ts: string;
  message_type: MessageType;
  status: MessageStatus;
  generated_reply: string | null;
  edited_reply: string | null;
  error: string | null;
  note: string | null;
  is_template: boolean;
  feature_vector: number[] | null;
  feature_model: string | null;
  feature_computed_at: Date | null;
  matched_template_id: string | null;
  match_confidence: number | null;
  received_at: Date;
  processed_at: Date | null;
  sent_at: Date | null;
};

const COLUMNS = [
  'id',
  'text',
  'channel_id',
  'channel_name',
  'user_id',
  'user_name',
  'thread_id',
  'source_ts',
  'message_type',
  'status',
  'generated_reply',
  'edited_reply',
  'error',
  'note',
  'is_template',
  'feature_vector',
  'feature_model',
  'feature_computed_at',
  'matched_template_id',
  'match_confidence',
  'received_at',
  'processed_at',
  'sent_at'
] as const;

function fromRow(r: MessageRow): Message {
  return {
    id: r.id,
    text: r.text,
    channelId: r.channel_id,
    channelName: r.channel_name,
    userId: r.user_id,
    userName: r.user_name,
    threadId: r.thread_id,
    sourceTimestamp: r.source_ts,
    messageType: r.message_type,
    status: r.status,
    generatedReply: r.generated_reply,
    editedReply: r.edited_reply,
    error: r.error,
    note: r.note,
    isTemplate: r.is_template,
    featureVector: r.feature_vector,
    featureModel: r.feature_model,
    featureComputedAt: r.feature_computed_at,
    matchedTemplateId: r.matched_template_id,
    matchConfidence: r.match_confidence,
    receivedAt: r.received_at,
    processedAt: r.processed_at,
    sentAt: r.sent_at
  };
}

function toParams(m: Message): unknown[] {
  return [
    m.id,
    m.text,
    m.channelId,
    m.channelName,
    m.userId,
    m.userName,
    m.threadId,
    m.sourceTimestamp,
    m.messageType,
    m.status,
    m.generatedReply,
    m.editedReply,
    m.error,
    m.note,
    m.isTemplate,
    m.featureVector,
    m.featureModel,
    m.featureComputedAt,
    m.matchedTemplateId,
    m.matchConfidence,
    m.receivedAt,
    m.processedAt,
    m.sentAt
  ];
}

export class PgMessageRepository implements MessageRepository {
  constructor(private readonly pool: pg.Pool) {}

  async insert(message: Message): Promise<void> {
    const placeholders = COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
    await this.pool.query(`insert into messages (${COLUMNS.join(', ')}) values (${placeholders})`, toParams(message));
  }

  async findById(id: string): Promise<Message | null> {
    const r = await this.pool.query<MessageRow>(`select ${COLUMNS.join(', ')} from messages where id = $1`, [id]);
    return r.rows[0] ? fromRow(r.rows[0]) : null;
  }

  async update(message: Message): Promise<void> {
    // id and the provenance columns are immutable; only lifecycle columns are written
    const mutable = COLUMNS.slice(COLUMNS.indexOf('status'));
    const params = toParams(message).slice(COLUMNS.indexOf('status'));
    const sets = mutable.map((c, i) => `${c} = $${i + 2}`).join(', ');
    await this.pool.query(`update messages set ${sets} where id = $1`, [message.id, ...params]);
  }

  async list(filter: MessageFilter = {}): Promise<Message[]> {
    const where: string[] = [];
    const params: unknown[] = [];
    if (filter.status !== undefined) {
      params.push(Array.isArray(filter.status) ? filter.status : [filter.status]);
      where.push(`status = any($${params.length}::text[])`);
    }
    if (filter.templatesOnly) where.push('is_template');
    if (filter.withVector) where.push('feature_vector is not null');
    let sql = `select ${COLUMNS.join(', ')} from messages`;
    if (where.length) sql += ` where ${where.join(' and ')}`;
    sql += ' order by received_at desc';
    if (filter.limit !== undefined) {
      params.push(filter.limit);
      sql += ` limit $${params.length}`;
    }
    const r = await this.pool.query<MessageRow>(sql, params);
    return r.rows.map(fromRow);
  }

  async countByStatus(): Promise<StatusCounts> {
    const r = await this.pool.query<{ status: MessageStatus; n: string }>(
      'select status, count(*) as n from messages group by status'
    );
    const counts = emptyCounts();
    for (const row of r.rows) {
      counts[row.status] = Number(row.n);
      counts.total += Number(row.n);
    }
    return counts;
  }

  async delete(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const r = await this.pool.query('delete from messages where id = any($1::uuid[])', [ids]);
    return r.rowCount ?? 0;
  }
}
