import { describe, expect, it } from 'vitest';
import { ServerStats } from './stats.js';

describe('ServerStats', () => {
  it('tracks requests and received messages separately', () => {
    let now = new Date('2024-06-10T09:00:00.000Z');
    const stats = new ServerStats(() => now);

    now = new Date('2024-06-10T09:00:42.500Z');
    stats.recordRequest();

    expect(stats.lastRequestAt?.toISOString()).toBe('2024-06-10T09:00:42.500Z');
    expect(stats.messagesReceived).toBe(0);
    expect(stats.uptimeSeconds()).toBe(42);

    stats.recordReceived();
    expect(stats.messagesReceived).toBe(1);
  });
});
