/**
 * UDP receive loop with cooperative cancellation
 */

import { createSocket } from 'dgram';
import { on, type EventEmitter } from 'events';
import { createLogger } from '../utils/logger.js';
import { StartupError } from '../utils/errors.js';

const logger = createLogger('receiver');

/**
 * Sender of a datagram
 */
export interface RemoteEndpoint {
  address: string;
  port: number;
}

/**
 * The part of a dgram socket the loop relies on
 */
export interface DatagramSocket extends EventEmitter {
  bind(port: number, address: string, callback: () => void): void;
  close(callback?: () => void): void;
  send(msg: Uint8Array, port: number, address: string): void;
}

/**
 * Handles one datagram synchronously. A returned payload is sent back to the
 * sender.
 */
export type DatagramHandler = (datagram: Uint8Array, remote: RemoteEndpoint) => Uint8Array | string | null;

export interface ReceiverLoopOptions {
  name: string;
  host: string;
  port: number;
  handler: DatagramHandler;
  socketFactory?: () => DatagramSocket;
}

function isRemoteEndpoint(value: unknown): value is RemoteEndpoint {
  return typeof value === 'object' && value !== null &&
    'address' in value && typeof value.address === 'string' &&
    'port' in value && typeof value.port === 'number';
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Bind a socket, rejecting on the first socket error
 */
function bindSocket(socket: DatagramSocket, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    socket.once('error', onError);
    socket.bind(port, host, () => {
      socket.removeListener('error', onError);
      resolve();
    });
  });
}

/**
 * Owns one UDP socket and pulls datagrams from it one at a time.
 *
 * Datagrams are queued by the event iterator while one is being handled, and
 * the pending receive is the only suspension point. `stop()` aborts it, waits
 * for the loop to finish and the socket is closed exactly once.
 */
export class ReceiverLoop {
  readonly name: string;
  private host: string;
  private port: number;
  private handler: DatagramHandler;
  private socketFactory: () => DatagramSocket;

  private socket: DatagramSocket | null = null;
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private starting: Promise<void> | null = null;

  // Statistics
  private stats = {
    received: 0,
    failed: 0,
    transportErrors: 0,
    repliesSent: 0
  };

  constructor(options: ReceiverLoopOptions) {
    this.name = options.name;
    this.host = options.host;
    this.port = options.port;
    this.handler = options.handler;
    this.socketFactory = options.socketFactory ?? (() => createSocket('udp4'));
  }

  /**
   * Bind the socket and start receiving. Bind failures are fatal.
   */
  async start(): Promise<void> {
    if (this.running || this.starting) {
      logger.warn({ receiver: this.name }, 'Receiver already running');
      return;
    }

    this.starting = this.bindAndRun();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  private async bindAndRun(): Promise<void> {
    const socket = this.socketFactory();

    try {
      await bindSocket(socket, this.port, this.host);
    } catch (error) {
      this.closeQuietly(socket);
      throw new StartupError(`Cannot bind ${this.name} socket on ${this.host}:${this.port}`, error);
    }

    this.socket = socket;
    this.controller = new AbortController();
    this.running = this.run(socket, this.controller.signal);

    logger.info({ receiver: this.name, host: this.host, port: this.port }, 'Receiver listening');
  }

  /**
   * Signal the loop to stop and wait until the socket is released
   */
  async stop(): Promise<void> {
    if (this.starting) {
      try {
        await this.starting;
      } catch (error) {
        // start() already rejected to its own caller; nothing is bound
        logger.debug({ receiver: this.name, error }, 'Stop requested during failed start');
      }
    }

    if (!this.controller || !this.running) return;

    this.controller.abort();
    await this.running;

    this.controller = null;
    this.running = null;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  getStats() {
    return { ...this.stats, running: this.isRunning() };
  }

  private async run(socket: DatagramSocket, signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        try {
          for await (const args of on(socket, 'message', { signal })) {
            this.dispatch(socket, args);
          }
        } catch (error) {
          if (signal.aborted || isAbortError(error)) break;

          // an 'error' event ends the iterator; subscribe again
          this.stats.transportErrors++;
          logger.error({ receiver: this.name, error }, 'Datagram receive failed');
        }
      }
    } finally {
      this.release(socket);
    }
  }

  private dispatch(socket: DatagramSocket, args: unknown[]): void {
    const [datagram, remote] = args;

    if (!(datagram instanceof Uint8Array) || !isRemoteEndpoint(remote)) {
      this.stats.failed++;
      logger.warn({ receiver: this.name }, 'Unexpected message event payload');
      return;
    }

    this.stats.received++;

    try {
      const reply = this.handler(datagram, remote);

      if (reply !== null) {
        socket.send(typeof reply === 'string' ? Buffer.from(reply, 'utf8') : reply, remote.port, remote.address);
        this.stats.repliesSent++;
      }
    } catch (error) {
      this.stats.failed++;
      logger.error({
        receiver: this.name,
        error,
        bytes: datagram.length,
        from: `${remote.address}:${remote.port}`
      }, 'Failed to handle datagram');
    }
  }

  private release(socket: DatagramSocket): void {
    if (this.socket !== socket) return;
    this.socket = null;

    this.closeQuietly(socket);
    logger.info({ receiver: this.name, ...this.stats }, 'Receiver stopped, socket released');
  }

  private closeQuietly(socket: DatagramSocket): void {
    try {
      socket.close();
    } catch (error) {
      logger.warn({ receiver: this.name, error }, 'Socket close failed');
    }
  }
}
