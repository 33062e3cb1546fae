import type { Logger } from 'pino';
import { InvalidTransitionError } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/result.js';
import type { Message } from './lifecycle.js';
import { replyText } from './lifecycle.js';
import type { MessageStore } from './messages.js';
import type { ResponseOrchestrator } from './orchestrator.js';
import { BoundedQueue } from './queue.js';
import type { OutboundRelay } from './relay.js';
import type { SettingsStore } from './settings.js';
import type { SimilarityEngine, SimilarityMatch, SimilarityResult } from './similarity/engine.js';
import { bestAutoResponse, formatConfidence } from './similarity/engine.js';

export type DispatchOutcome =
  | 'skipped'
  | 'auto-responded'
  | 'auto-response-failed'
  | 'generated'
  | 'generation-failed'
  | 'awaiting-operator';

type DispatcherOptions = {
  store: MessageStore;
  similarity: SimilarityEngine;
  orchestrator: ResponseOrchestrator;
  relay: OutboundRelay;
  settings: SettingsStore;
  capacity: number;
  concurrency?: number;
  logger?: Logger;
};

const HIDDEN_MATCH_LIMIT = 500;

/**
 * Consumes "new message" events. For each message it decides once, under the
 * store's claim, whether a template answers it or the model has to.
 */
export class Dispatcher {
  private readonly store: MessageStore;
  private readonly similarity: SimilarityEngine;
  private readonly orchestrator: ResponseOrchestrator;
  private readonly relay: OutboundRelay;
  private readonly settings: SettingsStore;
  private readonly queue: BoundedQueue<string>;
  private readonly concurrency: number;
  private readonly log: Logger;
  // templates an operator ruled out, per message
  private readonly hidden = new Map<string, Set<string>>();
  private workers: Promise<void>[] = [];

  constructor(opts: DispatcherOptions) {
    this.store = opts.store;
    this.similarity = opts.similarity;
    this.orchestrator = opts.orchestrator;
    this.relay = opts.relay;
    this.settings = opts.settings;
    this.queue = new BoundedQueue<string>(opts.capacity);
    this.concurrency = Math.max(1, opts.concurrency ?? 2);
    this.log = (opts.logger ?? silentLogger).child({ component: 'dispatcher' });
  }

  get depth(): number {
    return this.queue.size;
  }

  get running(): boolean {
    return this.workers.length > 0;
  }

  /** Returns false when the event was dropped; the message stays pending. */
  enqueue(messageId: string): boolean {
    const accepted = this.queue.offer(messageId);
    if (!accepted) {
      this.log.warn({ messageId, depth: this.queue.size }, 'dispatch queue full or closed, event dropped');
    }
    return accepted;
  }

  start(): void {
    if (this.running) return;
    for (let i = 0; i < this.concurrency; i++) this.workers.push(this.work(i));
    this.log.info({ workers: this.concurrency }, 'dispatcher started');
  }

  /** Stops accepting events and waits for queued ones to finish. */
  async stop(): Promise<void> {
    this.queue.close();
    await Promise.all(this.workers);
    this.workers = [];
    this.log.info('dispatcher stopped');
  }

  async process(messageId: string): Promise<DispatchOutcome> {
    const message = await this.store.find(messageId);
    if (!message || message.status !== 'pending') return 'skipped';

    const settings = this.settings.get();
    const match = await this.matchFor(message);
    if (match.autoResponse) return this.autoRespond(message, match.autoResponse);

    if (!settings.autoGenerate) return 'awaiting-operator';
    const generated = await this.orchestrator.generate(messageId);
    if (generated.ok) return 'generated';
    return generated.error.code === 'NotPending' ? 'skipped' : 'generation-failed';
  }

  /** Templates shown beside a message, scored against the current template set. */
  async similarFor(messageId: string): Promise<SimilarityResult[]> {
    const message = await this.store.get(messageId);
    return (await this.matchFor(message)).similar;
  }

  /** Rules one template out for a message; returns what is still shown. */
  async hideMatch(messageId: string, templateId: string): Promise<SimilarityResult[]> {
    const message = await this.store.get(messageId);
    const hidden = this.hidden.get(messageId) ?? new Set<string>();
    hidden.add(templateId);
    this.remember(messageId, hidden);
    return (await this.matchFor(message)).similar;
  }

  /**
   * Answers `target` with the template's stored reply. The message still
   * walks processing → completed → sent so the lifecycle stays intact.
   */
  async autoRespond(target: Message, candidate: SimilarityResult): Promise<DispatchOutcome> {
    const claimed = await this.store.claim(target.id);
    if (!claimed) return 'skipped';

    const text = replyText(candidate.template);
    const confidence = formatConfidence(candidate.confidence);
    let completed: Message;
    try {
      completed = await this.store.transition(target.id, 'completed', {
        generatedReply: text,
        note: `Auto-responded using template ${candidate.template.id} (confidence: ${confidence})`,
        matchedTemplateId: candidate.template.id,
        matchConfidence: candidate.confidence
      });
    } catch (e) {
      if (e instanceof InvalidTransitionError) return 'skipped';
      throw e;
    }

    const delivered = await this.relay.send(completed, text);
    if (delivered.ok) {
      this.log.info({ messageId: target.id, templateId: candidate.template.id, confidence }, 'auto-responded');
      return 'auto-responded';
    }
    this.log.warn({ messageId: target.id, code: delivered.error.code }, delivered.error.message);
    await this.store.update(target.id, { error: `Auto-response failed: ${delivered.error.message}` });
    return 'auto-response-failed';
  }

  private async matchFor(message: Message): Promise<SimilarityMatch> {
    const { displayThreshold, autoResponseThreshold } = this.settings.get();
    let match: SimilarityMatch;
    try {
      match = await this.similarity.match(message, { displayThreshold, autoResponseThreshold });
    } catch (e) {
      this.log.warn({ messageId: message.id, error: errorMessage(e) }, 'similarity scoring failed');
      return { similar: [], autoResponse: null };
    }
    const hidden = this.hidden.get(message.id);
    if (!hidden) return match;
    const similar = match.similar.filter((r) => !hidden.has(r.template.id));
    return { similar, autoResponse: bestAutoResponse(similar, autoResponseThreshold) };
  }

  private remember(messageId: string, hidden: Set<string>): void {
    this.hidden.delete(messageId);
    this.hidden.set(messageId, hidden);
    while (this.hidden.size > HIDDEN_MATCH_LIMIT) {
      const oldest = this.hidden.keys().next();
      if (oldest.done) break;
      this.hidden.delete(oldest.value);
    }
  }

  private async work(worker: number): Promise<void> {
    for (;;) {
      const messageId = await this.queue.take();
      if (messageId === null) return;
      try {
        const outcome = await this.process(messageId);
        this.log.debug({ worker, messageId, outcome }, 'event processed');
      } catch (e) {
        this.log.error({ worker, messageId, error: errorMessage(e) }, 'event processing failed');
      }
    }
  }
}
