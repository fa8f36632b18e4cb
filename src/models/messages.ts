/**
 * Control channel and viewer stream messages
 */

import type { Mode } from './point-cloud.js';

/**
 * Plain-text commands accepted on the control channel and from viewers
 */
export enum ControlCommand {
  PERSISTENT = 'PERSISTENT',
  LIVE_ONLY = 'LIVE_ONLY',
  CLEAR = 'CLEAR',
  STATUS = 'STATUS'
}

export interface ScanStatus {
  mode: Mode;
  modeLabel: string;
  pointCount: number;
  maxPoints: number;
  pathLength: number;
  hasPose: boolean;
}

/**
 * Viewer WebSocket message types
 */
export enum MessageType {
  SNAPSHOT = 'snapshot',
  COMMAND = 'command',
  ACK = 'ack',
  ERROR = 'error'
}

/**
 * JSON message exchanged with viewers
 */
export interface WSMessage {
  type: MessageType;
  command?: string;
  data?: ScanStatus | { message: string; viewerId: string; serverTime: number };
  error?: string;
}

/**
 * MessagePack-encoded scan snapshot pushed to viewers.
 * `points` and `path` are little-endian float32 xyz triples.
 */
export interface SnapshotMessage {
  type: MessageType.SNAPSHOT;
  revision: number;
  mode: Mode;
  modeLabel: string;
  pointCount: number;
  maxPoints: number;
  points: Uint8Array;
  pose: {
    position: [number, number, number];
    rotation: [number, number, number, number];
  } | null;
  path: Uint8Array;
}
