import type { Logger } from 'pino';
import { GenerationError, InvalidTransitionError } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import type { Result } from '../lib/result.js';
import { err, errorMessage, ok } from '../lib/result.js';
import type { Message } from './lifecycle.js';
import type { MessageStore } from './messages.js';
import type { ChatBackend, ChatRequest } from './ollama.js';
import type { SettingsStore } from './settings.js';
import type { ThinkMarkers } from './thinkFilter.js';
import { DEFAULT_THINK_MARKERS, ThinkBlockFilter } from './thinkFilter.js';

export function buildPrompt(systemPrompt: string, message: Message): string {
  return [
    systemPrompt,
    '',
    'Context:',
    `- User: ${message.userName ?? 'Someone'}`,
    `- Channel: #${message.channelName ?? 'unknown'}`,
    `- Timestamp: ${message.receivedAt.toISOString()}`,
    '',
    'Message to respond to:',
    message.text,
    '',
    'Please provide a professional, helpful response appropriate for this chat message.'
  ].join('\n');
}

type OrchestratorOptions = {
  store: MessageStore;
  backend: ChatBackend;
  settings: SettingsStore;
  timeoutMs: number;
  markers?: ThinkMarkers;
  logger?: Logger;
};

/**
 * Drives one generation attempt per call. Every failure leaves the message in
 * `failed` with a readable error; nothing is retried here.
 */
export class ResponseOrchestrator {
  private readonly store: MessageStore;
  private readonly backend: ChatBackend;
  private readonly settings: SettingsStore;
  private readonly timeoutMs: number;
  private readonly markers: ThinkMarkers;
  private readonly log: Logger;

  constructor(opts: OrchestratorOptions) {
    this.store = opts.store;
    this.backend = opts.backend;
    this.settings = opts.settings;
    this.timeoutMs = opts.timeoutMs;
    this.markers = opts.markers ?? DEFAULT_THINK_MARKERS;
    this.log = (opts.logger ?? silentLogger).child({ component: 'orchestrator' });
  }

  async generate(id: string): Promise<Result<Message, GenerationError>> {
    const message = await this.store.claim(id);
    if (!message) {
      const current = await this.store.get(id);
      return err(new GenerationError('NotPending', `Message ${id} is ${current.status}, not pending`));
    }

    if (!(await this.backend.reachable())) {
      return this.fail(id, new GenerationError('BackendUnreachable', 'Generation backend is unreachable'));
    }

    const { model, systemPrompt, temperature, topP, topK } = this.settings.get();
    if (!model.trim()) {
      return this.fail(id, new GenerationError('NoModelConfigured', 'No generation model configured'));
    }

    const request: ChatRequest = {
      model,
      messages: [{ role: 'user', content: buildPrompt(systemPrompt, message) }],
      options: { temperature, top_p: topP, top_k: topK }
    };

    let reply: string;
    try {
      reply = (await this.stream(request)).trim();
    } catch (e) {
      const failure =
        e instanceof GenerationError
          ? e
          : new GenerationError('BackendFailed', `Generation failed: ${errorMessage(e)}`, { cause: e });
      return this.fail(id, failure);
    }

    if (!reply) {
      return this.fail(id, new GenerationError('EmptyResponse', 'Model returned an empty reply'));
    }

    try {
      const done = await this.store.transition(id, 'completed', { generatedReply: reply });
      this.log.info({ messageId: id, chars: reply.length }, 'reply generated');
      return ok(done);
    } catch (e) {
      if (e instanceof InvalidTransitionError) {
        // dismissed while the model was still writing
        this.log.info({ messageId: id, status: e.from }, 'generated reply discarded');
        return err(new GenerationError('NotPending', `Message ${id} is ${e.from}; reply discarded`));
      }
      throw e;
    }
  }

  /**
   * Consumes the stream through the think-block filter. On timeout the
   * request is aborted and anything that still arrives is ignored.
   */
  private async stream(request: ChatRequest): Promise<string> {
    const controller = new AbortController();
    const filter = new ThinkBlockFilter(this.markers);
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(
          new GenerationError('GenerationTimeout', `Generation timed out after ${Math.round(this.timeoutMs / 1000)}s`)
        );
      }, this.timeoutMs);
    });

    const consume = async () => {
      for await (const chunk of this.backend.chat(request, controller.signal)) {
        if (timedOut) break;
        filter.push(chunk.content);
        if (chunk.done) break;
      }
      if (filter.insideSpan) this.log.warn('stream ended inside an unterminated think block');
      return filter.text();
    };

    try {
      return await Promise.race([consume(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fail(id: string, error: GenerationError): Promise<Result<Message, GenerationError>> {
    this.log.warn({ messageId: id, code: error.code }, error.message);
    try {
      await this.store.transition(id, 'failed', { error: error.message });
    } catch (e) {
      if (!(e instanceof InvalidTransitionError)) throw e;
      this.log.info({ messageId: id, status: e.from }, 'failure not recorded, message already moved on');
    }
    return err(error);
  }
}
