/**
 * In-process stand-in for a dgram socket
 */

import { EventEmitter } from 'events';
import { setImmediate as yieldToLoop } from 'timers/promises';
import type { DatagramSocket } from '../server/receiver-loop.js';

export const FAKE_REMOTE = { address: '127.0.0.1', port: 40000, family: 'IPv4', size: 0 };

export class FakeSocket extends EventEmitter implements DatagramSocket {
  bindError: Error | null = null;
  closeCount = 0;
  sent: Array<{ msg: Uint8Array; port: number; address: string }> = [];

  bind(_port: number, _address: string, callback: () => void): void {
    setImmediate(() => {
      if (this.bindError) {
        this.emit('error', this.bindError);
      } else {
        callback();
      }
    });
  }

  close(): void {
    this.closeCount++;
  }

  send(msg: Uint8Array, port: number, address: string): void {
    this.sent.push({ msg, port, address });
  }

  /**
   * Emit a datagram and let the receiver process it
   */
  async deliver(payload: string | Uint8Array): Promise<void> {
    this.emit('message', typeof payload === 'string' ? Buffer.from(payload) : payload, FAKE_REMOTE);
    await yieldToLoop();
  }

  /**
   * Text of every reply sent so far
   */
  replies(): string[] {
    return this.sent.map(({ msg }) => Buffer.from(msg).toString('utf8'));
  }
}
