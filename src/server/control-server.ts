/**
 * Control channel: plain-text commands over UDP
 */

import { createLogger } from '../utils/logger.js';
import { ControlCommand, type ScanStatus } from '../models/messages.js';
import { Mode } from '../models/point-cloud.js';
import type { ScanState } from '../processing/scan-state.js';
import {
  ReceiverLoop,
  type DatagramSocket,
  type RemoteEndpoint
} from './receiver-loop.js';

const logger = createLogger('control');

/**
 * Parse a command, ignoring surrounding whitespace. Case-sensitive.
 */
export function parseControlCommand(text: string): ControlCommand | null {
  const trimmed = text.trim();
  for (const command of Object.values(ControlCommand)) {
    if (command === trimmed) return command;
  }
  return null;
}

/**
 * STATUS reply payload
 */
export function formatStatus(status: ScanStatus): string {
  return `MODE:${status.modeLabel};POINTS:${status.pointCount}`;
}

/**
 * Apply a command to the scan state and build the reply text
 */
export function executeControlCommand(scan: ScanState, command: ControlCommand): string {
  switch (command) {
    case ControlCommand.PERSISTENT:
      scan.setMode(Mode.PERSISTENT);
      return `OK ${command}`;

    case ControlCommand.LIVE_ONLY:
      scan.setMode(Mode.LIVE_ONLY);
      return `OK ${command}`;

    case ControlCommand.CLEAR:
      scan.clear();
      return `OK ${command}`;

    case ControlCommand.STATUS:
      return formatStatus(scan.getStatus());
  }
}

export interface ControlServerOptions {
  host: string;
  port: number;
  socketFactory?: () => DatagramSocket;
}

/**
 * Receives control commands on their own UDP port and replies to the sender
 */
export class ControlServer {
  private scan: ScanState;
  private loop: ReceiverLoop;

  constructor(scan: ScanState, options: ControlServerOptions) {
    this.scan = scan;
    this.loop = new ReceiverLoop({
      name: 'control',
      host: options.host,
      port: options.port,
      socketFactory: options.socketFactory,
      handler: (datagram, remote) => this.handleDatagram(datagram, remote)
    });
  }

  start(): Promise<void> {
    return this.loop.start();
  }

  stop(): Promise<void> {
    return this.loop.stop();
  }

  getStats() {
    return this.loop.getStats();
  }

  private handleDatagram(datagram: Uint8Array, remote: RemoteEndpoint): string {
    const text = Buffer.from(datagram.buffer, datagram.byteOffset, datagram.byteLength).toString('utf8');
    const command = parseControlCommand(text);

    if (!command) {
      logger.warn({
        from: `${remote.address}:${remote.port}`,
        command: text.slice(0, 32)
      }, 'Unknown control command');
      return 'ERR unknown command';
    }

    const reply = executeControlCommand(this.scan, command);
    logger.info({ command, from: `${remote.address}:${remote.port}`, reply }, 'Control command handled');
    return reply;
  }
}
