import { randomUUID } from 'node:crypto';
import fetch from 'node-fetch';
import type { Logger } from 'pino';
import { DeliveryError, InvalidTransitionError } from '../lib/errors.js';
import { silentLogger } from '../lib/logger.js';
import type { Result } from '../lib/result.js';
import { err, errorMessage, ok } from '../lib/result.js';
import type { Message } from './lifecycle.js';
import type { MessageStore } from './messages.js';
import type { SettingsStore } from './settings.js';

/** Body posted to the relay service, which forwards it into the chat. */
export type RelayPayload = {
  message_id: string;
  response_text: string;
  channel: string;
  thread_id: string | null;
  original_message_text: string;
  user_id_mention: string;
  timestamp: string;
};

const USER_AGENT = 'reply-desk-relay/1.0';

export function buildRelayPayload(message: Message, replyText: string, now: Date = new Date()): RelayPayload {
  return {
    message_id: message.id,
    response_text: replyText,
    channel: message.channelId,
    thread_id: message.threadId,
    original_message_text: message.text,
    user_id_mention: message.userId,
    timestamp: now.toISOString()
  };
}

export const TEST_PAYLOAD_TEXT = 'This is a test response from the reply desk. The relay integration is working.';

type RelayOptions = {
  store: MessageStore;
  settings: SettingsStore;
  timeoutMs: number;
  logger?: Logger;
};

export class OutboundRelay {
  private readonly store: MessageStore;
  private readonly settings: SettingsStore;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly inFlight = new Set<string>();

  constructor(opts: RelayOptions) {
    this.store = opts.store;
    this.settings = opts.settings;
    this.timeoutMs = opts.timeoutMs;
    this.log = (opts.logger ?? silentLogger).child({ component: 'relay' });
  }

  get configured(): boolean {
    return this.settings.get().relayUrl !== null;
  }

  /**
   * Posts one reply. On a 2xx the message moves to `sent`; any other
   * outcome leaves it where it was and is returned to the caller. A message
   * is posted at most once at a time, and only while its stored status is
   * `completed`.
   */
  async send(message: Message, replyText: string): Promise<Result<Message, DeliveryError>> {
    if (this.inFlight.has(message.id)) {
      return err(new DeliveryError('NotSendable', `Message ${message.id} is already being delivered`));
    }
    this.inFlight.add(message.id);
    try {
      return await this.deliver(message.id, replyText);
    } finally {
      this.inFlight.delete(message.id);
    }
  }

  private async deliver(id: string, replyText: string): Promise<Result<Message, DeliveryError>> {
    const current = await this.store.get(id);
    if (current.status !== 'completed') {
      return err(new DeliveryError('NotSendable', `Message ${id} is ${current.status}, not completed`));
    }
    const posted = await this.post(buildRelayPayload(current, replyText));
    if (!posted.ok) return posted;

    try {
      const sent = await this.store.transition(id, 'sent');
      this.log.info({ messageId: id }, 'reply delivered');
      return ok(sent);
    } catch (e) {
      if (e instanceof InvalidTransitionError) {
        return err(new DeliveryError('NotSendable', `Delivered, but message ${id} is now ${e.from}`));
      }
      throw e;
    }
  }

  /**
   * Reconciles a delivery report from the relay service. `sent` finishes a
   * completed message; any other report is recorded on the message without
   * changing its status.
   */
  async confirm(messageId: string, reported: string): Promise<Message> {
    if (reported === 'sent') {
      const current = await this.store.get(messageId);
      if (current.status === 'sent') return current;
      return this.store.transition(messageId, 'sent');
    }
    this.log.warn({ messageId, reported }, 'relay reported a failed delivery');
    return this.store.update(messageId, { error: `Relay reported delivery status "${reported}"` });
  }

  /** Posts a canned payload to check the relay end to end. */
  async sendTest(): Promise<Result<void, DeliveryError>> {
    return this.post({
      message_id: `test-${randomUUID()}`,
      response_text: TEST_PAYLOAD_TEXT,
      channel: 'C0000000000',
      thread_id: null,
      original_message_text: 'Test message for webhook validation',
      user_id_mention: 'U0000000000',
      timestamp: new Date().toISOString()
    });
  }

  private async post(payload: RelayPayload): Promise<Result<void, DeliveryError>> {
    const url = this.settings.get().relayUrl;
    if (!url) return err(new DeliveryError('RelayNotConfigured', 'Relay webhook URL is not configured'));

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const r = await fetch(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json', 'user-agent': USER_AGENT },
        body: JSON.stringify(payload),
        signal: controller.signal
      });
      const body = await r.text().catch(() => '');
      if (!r.ok) {
        this.log.warn({ messageId: payload.message_id, status: r.status, body: body.slice(0, 200) }, 'relay rejected reply');
        return err(new DeliveryError('DeliveryFailed', `Relay returned HTTP ${r.status}`, r.status));
      }
      return ok(undefined);
    } catch (e) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(e);
      this.log.warn({ messageId: payload.message_id, reason }, 'relay request failed');
      return err(new DeliveryError('DeliveryFailed', `Relay request failed: ${reason}`, undefined, { cause: e }));
    } finally {
      clearTimeout(t);
    }
  }
}
