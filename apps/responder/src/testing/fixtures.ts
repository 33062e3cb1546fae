import { randomUUID } from 'node:crypto';
import type { Message } from '../services/lifecycle.js';

export function makeMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: randomUUID(),
    text: 'Can you help with the API docs?',
    channelId: 'C1',
    channelName: 'general',
    userId: 'U1',
    userName: 'Dana',
    threadId: null,
    sourceTimestamp: '1718000000.000100',
    messageType: 'mention',
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
    receivedAt: new Date('2024-06-10T09:00:00.000Z'),
    processedAt: null,
    sentAt: null,
    ...overrides
  };
}

export function inboundEvent(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    text: 'Can you help with the API docs?',
    channel: { id: 'C1', name: 'general' },
    user: { id: 'U1', name: 'dana', real_name: 'Dana Reyes', is_bot: false },
    ts: '1718000000.000100',
    permalink: 'https://chat.example.test/archives/C1/p1718000000000100',
    ...overrides
  };
}
