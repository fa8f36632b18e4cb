/**
 * Relay datagram processor
 */

import { createLogger } from '../utils/logger.js';
import { decodeFrame } from '../protocol/frame-decoder.js';
import { DecodeErrorKind } from '../models/frame.js';
import type { IngestionStateMachine } from './ingestion-state-machine.js';
import type { ScanState } from './scan-state.js';

const logger = createLogger('processor');

/**
 * Decodes relay datagrams and feeds the frames to the state machine
 */
export class RelayProcessor {
  private ingestion: IngestionStateMachine;
  private scan: ScanState;

  // Statistics
  private stats = {
    received: 0,
    bytes: 0,
    decoded: 0,
    rejected: {
      [DecodeErrorKind.TRUNCATED_POINT_PAYLOAD]: 0,
      [DecodeErrorKind.INVALID_POSE_LENGTH]: 0
    },
    startTime: Date.now()
  };

  constructor(ingestion: IngestionStateMachine, scan: ScanState) {
    this.ingestion = ingestion;
    this.scan = scan;

    logger.info('RelayProcessor initialized');
  }

  /**
   * Decode one datagram and apply it. Malformed datagrams are dropped.
   */
  ingest(datagram: Uint8Array): boolean {
    this.stats.received++;
    this.stats.bytes += datagram.length;

    const result = decodeFrame(datagram);

    if (!result.ok) {
      this.stats.rejected[result.error.kind]++;
      logger.debug({
        kind: result.error.kind,
        bytes: result.error.byteLength
      }, result.error.message);
      return false;
    }

    this.stats.decoded++;
    this.ingestion.handle(result.frame);
    return true;
  }

  /**
   * Get processor statistics
   */
  getStats() {
    const uptime = Date.now() - this.stats.startTime;
    const seconds = uptime / 1000;

    return {
      processor: {
        ...this.stats,
        rejected: { ...this.stats.rejected },
        uptime,
        uptimeFormatted: this.formatUptime(uptime),
        throughput: {
          datagramsPerSecond: seconds > 0 ? this.stats.received / seconds : 0,
          bytesPerSecond: seconds > 0 ? this.stats.bytes / seconds : 0
        }
      },
      ingestion: this.ingestion.getStats(),
      scan: this.scan.getStatus()
    };
  }

  /**
   * Format uptime to human-readable string
   */
  private formatUptime(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) return `${days}d ${hours % 24}h`;
    if (hours > 0) return `${hours}h ${minutes % 60}m`;
    if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
    return `${seconds}s`;
  }
}
