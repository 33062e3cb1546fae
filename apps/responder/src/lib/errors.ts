import type { MessageStatus } from '../services/lifecycle.js';

/** Base class so routers can map domain failures to HTTP statuses. */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class MessageNotFoundError extends AppError {
  constructor(readonly messageId: string) {
    super(`Message ${messageId} not found`, 404);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(
    readonly messageId: string,
    readonly from: MessageStatus,
    readonly to: MessageStatus
  ) {
    super(`Message ${messageId} cannot move from ${from} to ${to}`, 409);
  }
}

/** A persistence failure. Already committed rows are untouched. */
export class StoreError extends AppError {
  constructor(operation: string, cause: unknown) {
    super(`Store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, 500, { cause });
  }
}

export type GenerationErrorCode =
  | 'BackendUnreachable'
  | 'NoModelConfigured'
  | 'GenerationTimeout'
  | 'EmptyResponse'
  | 'BackendFailed'
  | 'NotPending';

export class GenerationError extends AppError {
  constructor(
    readonly code: GenerationErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, code === 'NotPending' ? 409 : 502, options);
  }
}

export type DeliveryErrorCode = 'RelayNotConfigured' | 'DeliveryFailed' | 'NotSendable';

export class DeliveryError extends AppError {
  constructor(
    readonly code: DeliveryErrorCode,
    message: string,
    readonly httpStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, code === 'NotSendable' ? 409 : code === 'RelayNotConfigured' ? 503 : 502, options);
  }
}
