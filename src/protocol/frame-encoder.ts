/**
 * Relay protocol encoder
 *
 * Builds datagrams the decoder understands. Used by the test client and the
 * viewer snapshot codec.
 */

import type { Point3, Quaternion, Vector3 } from '../models/point-cloud.js';
import {
  END_MARKER,
  LIVE_PREFIX,
  MODE_PREFIX,
  POINTS_PREFIX,
  POINT_STRIDE,
  POSE_DATAGRAM_LENGTH,
  POSE_MARKER
} from './frame-decoder.js';

/**
 * Points per POINTS: datagram; 250 points keep a datagram at 3007 bytes
 */
export const DEFAULT_CHUNK_SIZE = 250;

const utf8 = new TextEncoder();

function withPrefix(prefix: string, payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(prefix.length + payload.length);
  out.set(utf8.encode(prefix), 0);
  out.set(payload, prefix.length);
  return out;
}

/**
 * Encode points as consecutive little-endian float32 xyz triples
 */
export function encodePointPayload(points: readonly Point3[]): Uint8Array {
  const out = new Uint8Array(points.length * POINT_STRIDE);
  const data = new DataView(out.buffer);

  points.forEach((point, i) => {
    const base = i * POINT_STRIDE;
    data.setFloat32(base, point.x, true);
    data.setFloat32(base + 4, point.y, true);
    data.setFloat32(base + 8, point.z, true);
  });

  return out;
}

export function encodeLiveBatch(points: readonly Point3[]): Uint8Array {
  return withPrefix(LIVE_PREFIX, encodePointPayload(points));
}

export function encodeModeAnnounce(label: string): Uint8Array {
  return withPrefix(MODE_PREFIX, utf8.encode(label));
}

export function encodePointsChunk(points: readonly Point3[]): Uint8Array {
  return withPrefix(POINTS_PREFIX, encodePointPayload(points));
}

export function encodeEndOfFrame(): Uint8Array {
  return utf8.encode(END_MARKER);
}

export function encodeLegacyBatch(points: readonly Point3[]): Uint8Array {
  return encodePointPayload(points);
}

export function encodePose(position: Vector3, rotation: Quaternion): Uint8Array {
  const out = new Uint8Array(POSE_DATAGRAM_LENGTH);
  const data = new DataView(out.buffer);
  const fields = [position.x, position.y, position.z, rotation.w, rotation.x, rotation.y, rotation.z];

  out.set(utf8.encode(POSE_MARKER), 0);
  fields.forEach((value, i) => data.setFloat32(POSE_MARKER.length + i * 4, value, true));

  return out;
}

/**
 * Split a scan into MODE, POINTS x N and END datagrams
 */
export function encodeFramedScan(
  points: readonly Point3[],
  label: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Uint8Array[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const datagrams = [encodeModeAnnounce(label)];

  for (let i = 0; i < points.length; i += chunkSize) {
    datagrams.push(encodePointsChunk(points.slice(i, i + chunkSize)));
  }

  datagrams.push(encodeEndOfFrame());
  return datagrams;
}
