/**
 * MessagePack snapshots for viewers
 */

import { decode, encode } from '@msgpack/msgpack';
import { MessageType, type SnapshotMessage } from '../models/messages.js';
import { Mode, type Point3, type Vector3 } from '../models/point-cloud.js';
import type { ScanState } from '../processing/scan-state.js';
import { decodePointPayload } from './frame-decoder.js';
import { encodePointPayload } from './frame-encoder.js';

/**
 * Capture the current scan state as a snapshot message
 */
export function buildSnapshotMessage(scan: ScanState): SnapshotMessage {
  const status = scan.getStatus();
  const pose = scan.getPose();

  return {
    type: MessageType.SNAPSHOT,
    revision: scan.getRevision(),
    mode: status.mode,
    modeLabel: status.modeLabel,
    pointCount: status.pointCount,
    maxPoints: status.maxPoints,
    points: encodePointPayload(scan.getSnapshot()),
    pose: pose
      ? {
          position: [pose.position.x, pose.position.y, pose.position.z],
          rotation: [pose.rotation.w, pose.rotation.x, pose.rotation.y, pose.rotation.z]
        }
      : null,
    path: encodePointPayload(scan.getPath())
  };
}

export function encodeSnapshot(message: SnapshotMessage): Uint8Array {
  return encode(message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMode(value: unknown): value is Mode {
  return value === Mode.PERSISTENT || value === Mode.LIVE_ONLY;
}

function toTuple3(value: unknown): [number, number, number] | null {
  if (!Array.isArray(value) || value.length !== 3) return null;
  const [a, b, c]: unknown[] = value;
  return typeof a === 'number' && typeof b === 'number' && typeof c === 'number' ? [a, b, c] : null;
}

function toTuple4(value: unknown): [number, number, number, number] | null {
  if (!Array.isArray(value) || value.length !== 4) return null;
  const [a, b, c, d]: unknown[] = value;
  return typeof a === 'number' && typeof b === 'number' && typeof c === 'number' && typeof d === 'number'
    ? [a, b, c, d]
    : null;
}

/**
 * Decode and validate a snapshot received from the viewer stream
 */
export function decodeSnapshot(bytes: Uint8Array): SnapshotMessage | null {
  const raw = decode(bytes);

  if (!isRecord(raw) || raw.type !== MessageType.SNAPSHOT) return null;

  const { revision, mode, modeLabel, pointCount, maxPoints, points, path, pose } = raw;

  if (
    typeof revision !== 'number' ||
    !isMode(mode) ||
    typeof modeLabel !== 'string' ||
    typeof pointCount !== 'number' ||
    typeof maxPoints !== 'number' ||
    !(points instanceof Uint8Array) ||
    !(path instanceof Uint8Array)
  ) {
    return null;
  }

  let decodedPose: SnapshotMessage['pose'] = null;
  if (pose !== null) {
    if (!isRecord(pose)) return null;
    const position = toTuple3(pose.position);
    const rotation = toTuple4(pose.rotation);
    if (!position || !rotation) return null;
    decodedPose = { position, rotation };
  }

  return {
    type: MessageType.SNAPSHOT,
    revision,
    mode,
    modeLabel,
    pointCount,
    maxPoints,
    points,
    pose: decodedPose,
    path
  };
}

/**
 * Unpack the point payload of a snapshot
 */
export function snapshotPoints(message: SnapshotMessage): Point3[] {
  return decodePointPayload(message.points) ?? [];
}

/**
 * Unpack the scanner path of a snapshot
 */
export function snapshotPath(message: SnapshotMessage): Vector3[] {
  return decodePointPayload(message.path) ?? [];
}
