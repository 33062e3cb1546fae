import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { AppError, InvalidTransitionError, MessageNotFoundError, StoreError } from '../lib/errors.js';
import { PerKeyLock } from '../lib/perKeyLock.js';
import { silentLogger } from '../lib/logger.js';
import type { Message, MessageStatus } from './lifecycle.js';
import { applyTransition, canTransition, isTerminal } from './lifecycle.js';
import type { MessageFilter, MessageRepository, StatusCounts } from './messageRepository.js';
import type { MessageNotifier } from './notifier.js';
import { noopNotifier } from './notifier.js';

export type NewMessage = {
  text: string;
  channelId: string;
  channelName?: string | null;
  userId: string;
  userName?: string | null;
  threadId?: string | null;
  sourceTimestamp: string;
};

/** Fields other components may propose; status goes through transition(). */
export type MessagePatch = Partial<
  Pick<
    Message,
    | 'generatedReply'
    | 'editedReply'
    | 'error'
    | 'note'
    | 'isTemplate'
    | 'featureVector'
    | 'featureModel'
    | 'featureComputedAt'
    | 'matchedTemplateId'
    | 'matchConfidence'
  >
>;

const PATCH_KEYS = [
  'generatedReply',
  'editedReply',
  'error',
  'note',
  'isTemplate',
  'featureVector',
  'featureModel',
  'featureComputedAt',
  'matchedTemplateId',
  'matchConfidence'
] as const satisfies readonly (keyof MessagePatch)[];

type StoreOptions = {
  notifier?: MessageNotifier;
  logger?: Logger;
  now?: () => Date;
  newId?: () => string;
};

type Mutation = (current: Message) => Message | null;

/**
 * Owns message persistence. Every change to an existing message goes through
 * mutate(), which is serialized per message id and persists before it
 * resolves.
 */
export class MessageStore {
  private readonly lock = new PerKeyLock<string>();
  private readonly notifier: MessageNotifier;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly repo: MessageRepository,
    opts: StoreOptions = {}
  ) {
    this.notifier = opts.notifier ?? noopNotifier;
    this.log = (opts.logger ?? silentLogger).child({ component: 'store' });
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
  }

  async create(input: NewMessage): Promise<Message> {
    const message: Message = {
      id: this.newId(),
      text: input.text,
      channelId: input.channelId,
      channelName: input.channelName ?? null,
      userId: input.userId,
      userName: input.userName ?? null,
      threadId: input.threadId ?? null,
      sourceTimestamp: input.sourceTimestamp,
      messageType: input.channelId.startsWith('D') ? 'dm' : 'mention',
      status: 'pending',
      generatedReply: null,
      editedReply: null,
      error: null,
      note: null,
      isTemplate: false,
      featureVector: null,
      featureModel: null,
      featureComputedAt: null,
      matchedTemplateId: null,
      matchConfidence: null,
      receivedAt: this.now(),
      processedAt: null,
      sentAt: null
    };
    await this.guard('insert', () => this.repo.insert(message));
    this.notifier.updated(message);
    return message;
  }

  async find(id: string): Promise<Message | null> {
    return this.guard('read', () => this.repo.findById(id));
  }

  async get(id: string): Promise<Message> {
    const message = await this.find(id);
    if (!message) throw new MessageNotFoundError(id);
    return message;
  }

  async list(filter: MessageFilter = {}): Promise<Message[]> {
    return this.guard('list', () => this.repo.list(filter));
  }

  /** Templates usable for matching: flagged and with a cached vector. */
  async listTemplates(): Promise<Message[]> {
    return this.list({ templatesOnly: true, withVector: true });
  }

  async counts(): Promise<StatusCounts> {
    return this.guard('count', () => this.repo.countByStatus());
  }

  /**
   * Moves a message to `to`, optionally applying a patch in the same write.
   * Asking for the current status is a no-op.
   */
  async transition(id: string, to: MessageStatus, patch: MessagePatch = {}): Promise<Message> {
    return this.mutate(id, (current) => {
      if (current.status === to) return null;
      if (!canTransition(current.status, to)) {
        throw new InvalidTransitionError(id, current.status, to);
      }
      return applyTransition(this.applyPatch(current, patch), to, this.now());
    });
  }

  /**
   * Atomically takes a pending message into processing. Returns null when
   * the message was not pending, so only one caller ever wins.
   */
  async claim(id: string): Promise<Message | null> {
    const { message, changed } = await this.commit(id, (current) => {
      if (current.status !== 'pending') return null;
      return applyTransition(current, 'processing', this.now());
    });
    return changed ? message : null;
  }

  /** Writes non-status fields without touching the lifecycle. */
  async update(id: string, patch: MessagePatch): Promise<Message> {
    return this.mutate(id, (current) => {
      const next = this.applyPatch(current, patch);
      return next === current ? null : next;
    });
  }

  async editReply(id: string, text: string): Promise<Message> {
    return this.mutate(id, (current) => {
      if (isTerminal(current.status)) {
        throw new AppError(`Message ${id} is ${current.status}; its reply can no longer be edited`, 409);
      }
      const editedReply = text.trim() === '' ? null : text;
      if (editedReply === current.editedReply) return null;
      return { ...current, editedReply };
    });
  }

  async setTemplate(id: string, isTemplate: boolean): Promise<Message> {
    return this.update(id, { isTemplate });
  }

  async dismiss(id: string): Promise<Message> {
    return this.transition(id, 'dismissed');
  }

  async retry(id: string): Promise<Message> {
    return this.transition(id, 'pending');
  }

  async dismissAllPending(): Promise<number> {
    return this.bulkTransition('pending', 'dismissed');
  }

  async retryAllFailed(): Promise<Message[]> {
    const failed = await this.list({ status: 'failed' });
    const retried: Message[] = [];
    for (const m of failed) {
      const next = await this.transition(m.id, 'pending').catch((e: unknown) => this.skipRaced(e));
      if (next?.status === 'pending') retried.push(next);
    }
    return retried;
  }

  async remove(id: string): Promise<void> {
    await this.lock.runExclusive(id, async () => {
      const n = await this.guard('delete', () => this.repo.delete([id]));
      if (n === 0) throw new MessageNotFoundError(id);
    });
    this.notifier.deleted(id);
  }

  /** Deletes every sent or dismissed message. */
  async clearProcessed(): Promise<number> {
    const done = await this.list({ status: ['sent', 'dismissed'] });
    const ids = done.map((m) => m.id);
    const n = await this.guard('delete', () => this.repo.delete(ids));
    for (const id of ids) this.notifier.deleted(id);
    return n;
  }

  private async bulkTransition(from: MessageStatus, to: MessageStatus): Promise<number> {
    const rows = await this.list({ status: from });
    let n = 0;
    for (const m of rows) {
      const next = await this.transition(m.id, to).catch((e: unknown) => this.skipRaced(e));
      if (next?.status === to) n += 1;
    }
    return n;
  }

  // A bulk operation may race a worker that moved the message meanwhile.
  private skipRaced(e: unknown): null {
    if (e instanceof InvalidTransitionError) {
      this.log.debug({ messageId: e.messageId, from: e.from, to: e.to }, 'bulk transition skipped');
      return null;
    }
    throw e;
  }

  private applyPatch(current: Message, patch: MessagePatch): Message {
    const next: Message = { ...current };
    let changed = false;
    for (const key of PATCH_KEYS) {
      const value = patch[key];
      if (value === undefined) continue;
      // the vector is derived from immutable text: first write wins
      if (key === 'featureVector' && current.featureVector !== null) continue;
      if ((key === 'featureModel' || key === 'featureComputedAt') && current.featureVector !== null) continue;
      if (next[key] !== value) {
        Object.assign(next, { [key]: value });
        changed = true;
      }
    }
    return changed ? next : current;
  }

  private async mutate(id: string, fn: Mutation): Promise<Message> {
    const { message } = await this.commit(id, fn);
    return message;
  }

  private async commit(id: string, fn: Mutation): Promise<{ message: Message; changed: boolean }> {
    const result = await this.lock.runExclusive(id, async () => {
      const current = await this.guard('read', () => this.repo.findById(id));
      if (!current) throw new MessageNotFoundError(id);
      const next = fn(current);
      if (!next) return { message: current, changed: false };
      await this.guard('update', () => this.repo.update(next));
      return { message: next, changed: true };
    });
    if (result.changed) {
      this.log.debug({ messageId: id, status: result.message.status }, 'message updated');
      this.notifier.updated(result.message);
    }
    return result;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw new StoreError(operation, e);
    }
  }
}
