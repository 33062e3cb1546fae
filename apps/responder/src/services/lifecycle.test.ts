import { describe, expect, it } from 'vitest';
import { makeMessage } from '../testing/fixtures.js';
import type { MessageStatus } from './lifecycle.js';
import { MESSAGE_STATUSES, applyTransition, canSend, canTransition, isMessageStatus, isTerminal, replyText } from './lifecycle.js';

const now = new Date('2024-06-10T10:00:00.000Z');

describe('canTransition', () => {
  it('allows exactly the lifecycle moves', () => {
    const allowed: [MessageStatus, MessageStatus][] = [];
    for (const from of MESSAGE_STATUSES) {
      for (const to of MESSAGE_STATUSES) if (canTransition(from, to)) allowed.push([from, to]);
    }
    expect(allowed).toEqual([
      ['pending', 'processing'],
      ['pending', 'dismissed'],
      ['processing', 'completed'],
      ['processing', 'dismissed'],
      ['processing', 'failed'],
      ['completed', 'sent'],
      ['completed', 'dismissed'],
      ['failed', 'pending'],
      ['failed', 'dismissed']
    ]);
  });

  it('treats sent and dismissed as terminal', () => {
    expect(MESSAGE_STATUSES.filter(isTerminal)).toEqual(['sent', 'dismissed']);
  });
});

describe('applyTransition', () => {
  it('stamps processedAt when processing ends', () => {
    const done = applyTransition(makeMessage({ status: 'processing' }), 'completed', now);
    expect(done.status).toBe('completed');
    expect(done.processedAt).toEqual(now);

    const failed = applyTransition(makeMessage({ status: 'processing' }), 'failed', now);
    expect(failed.processedAt).toEqual(now);
  });

  it('sets sentAt only when sent', () => {
    const completed = makeMessage({ status: 'completed' });
    expect(applyTransition(completed, 'sent', now).sentAt).toEqual(now);
    expect(applyTransition(completed, 'dismissed', now).sentAt).toBeNull();
  });

  it('clears the error and processedAt on retry', () => {
    const failed = makeMessage({ status: 'failed', error: 'Generation backend is unreachable', processedAt: now });
    const retried = applyTransition(failed, 'pending', now);
    expect(retried).toMatchObject({ status: 'pending', error: null, processedAt: null });
  });

  it('does not modify its input', () => {
    const original = makeMessage({ status: 'processing' });
    applyTransition(original, 'completed', now);
    expect(original.status).toBe('processing');
    expect(original.processedAt).toBeNull();
  });
});

describe('replyText', () => {
  it('prefers the edited reply', () => {
    expect(replyText({ editedReply: 'edited', generatedReply: 'generated' })).toBe('edited');
    expect(replyText({ editedReply: null, generatedReply: 'generated' })).toBe('generated');
    expect(replyText({ editedReply: null, generatedReply: null })).toBe('');
  });
});

describe('canSend', () => {
  it('needs a completed message with a non-blank reply', () => {
    expect(canSend(makeMessage({ status: 'completed', generatedReply: 'Sure.' }))).toBe(true);
    expect(canSend(makeMessage({ status: 'completed', generatedReply: '   ' }))).toBe(false);
    expect(canSend(makeMessage({ status: 'pending', generatedReply: 'Sure.' }))).toBe(false);
  });
});

describe('isMessageStatus', () => {
  it('accepts only known statuses', () => {
    expect(isMessageStatus('failed')).toBe(true);
    expect(isMessageStatus('error')).toBe(false);
    expect(isMessageStatus(3)).toBe(false);
  });
});
