export const MESSAGE_STATUSES = ['pending', 'processing', 'completed', 'sent', 'dismissed', 'failed'] as const;

export type MessageStatus = (typeof MESSAGE_STATUSES)[number];

export type MessageType = 'mention' | 'dm';

export type Message = {
  id: string;
  text: string;
  channelId: string;
  channelName: string | null;
  userId: string;
  userName: string | null;
  threadId: string | null;
  sourceTimestamp: string;
  messageType: MessageType;
  status: MessageStatus;
  /** Reply produced by the model (or copied from a template on auto-response) */
  generatedReply: string | null;
  /** Operator override; always wins over generatedReply when sending */
  editedReply: string | null;
  error: string | null;
  /** Audit note, e.g. which template answered this message and how confidently */
  note: string | null;
  isTemplate: boolean;
  featureVector: number[] | null;
  featureModel: string | null;
  featureComputedAt: Date | null;
  matchedTemplateId: string | null;
  matchConfidence: number | null;
  receivedAt: Date;
  processedAt: Date | null;
  sentAt: Date | null;
};

/**
 * Allowed moves. Anything not listed is rejected; asking for the current
 * status is a no-op and handled by the caller before this table is read.
 */
const TRANSITIONS: Record<MessageStatus, readonly MessageStatus[]> = {
  pending: ['processing', 'dismissed'],
  processing: ['completed', 'failed', 'dismissed'],
  completed: ['sent', 'dismissed'],
  failed: ['pending', 'dismissed'],
  sent: [],
  dismissed: []
};

export function isMessageStatus(value: unknown): value is MessageStatus {
  return typeof value === 'string' && MESSAGE_STATUSES.some((s) => s === value);
}

export function canTransition(from: MessageStatus, to: MessageStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: MessageStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Applies a status change to a copy of the message and maintains the
 * lifecycle timestamps. The caller has already checked canTransition.
 */
export function applyTransition(message: Message, to: MessageStatus, now: Date): Message {
  const next: Message = { ...message, status: to };
  if (message.status === 'processing' && (to === 'completed' || to === 'failed')) {
    next.processedAt = now;
  }
  if (to === 'sent') next.sentAt = now;
  if (message.status === 'failed' && to === 'pending') {
    // retry
    next.error = null;
    next.processedAt = null;
  }
  return next;
}

/** Text that would be sent for this message, editedReply first. */
export function replyText(message: Pick<Message, 'editedReply' | 'generatedReply'>): string {
  return message.editedReply ?? message.generatedReply ?? '';
}

export function canSend(message: Message): boolean {
  return message.status === 'completed' && replyText(message).trim().length > 0;
}
