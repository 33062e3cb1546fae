import type { Server as SocketIoServer } from 'socket.io';
import type { Message } from './lifecycle.js';

/**
 * Receives every committed change to a message. The operator UI listens to
 * these over socket.io; tests use a recording notifier or none at all.
 */
export interface MessageNotifier {
  updated(message: Message): void;
  deleted(id: string): void;
}

export const noopNotifier: MessageNotifier = {
  updated: () => undefined,
  deleted: () => undefined
};

/**
 * Emits over socket.io once a server is attached. The store is built before
 * the HTTP server exists, so events before attach() are dropped.
 */
export class SocketNotifier implements MessageNotifier {
  private io: SocketIoServer | null = null;

  attach(io: SocketIoServer): void {
    this.io = io;
  }

  updated(message: Message): void {
    this.io?.emit('message.updated', message);
  }

  deleted(id: string): void {
    this.io?.emit('message.deleted', { id });
  }
}
