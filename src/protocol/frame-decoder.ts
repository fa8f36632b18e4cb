/**
 * Relay protocol decoder
 *
 * Classifies a datagram by its ASCII prefix and decodes the payload into a
 * typed frame. Pure: no logging, no state, never throws.
 */

import {
  DecodeErrorKind,
  FrameType,
  type DecodeResult,
  type Frame
} from '../models/frame.js';
import type { Point3 } from '../models/point-cloud.js';

export const LIVE_PREFIX = 'LIVE:';
export const MODE_PREFIX = 'MODE:';
export const POINTS_PREFIX = 'POINTS:';
export const END_MARKER = 'END';
export const POSE_MARKER = 'POSE';

/** x, y, z as little-endian float32 */
export const POINT_STRIDE = 12;

/** Marker plus seven float32 fields */
export const POSE_DATAGRAM_LENGTH = 32;

const utf8 = new TextDecoder('utf-8');

function hasPrefix(bytes: Uint8Array, prefix: string): boolean {
  if (bytes.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix.charCodeAt(i)) return false;
  }
  return true;
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decode a contiguous run of xyz float32 triples starting at `offset`.
 * Returns null when the payload length is not a whole number of points.
 */
export function decodePointPayload(bytes: Uint8Array, offset = 0): Point3[] | null {
  const length = bytes.length - offset;
  if (length < 0 || length % POINT_STRIDE !== 0) return null;

  const data = view(bytes);
  const count = length / POINT_STRIDE;
  const points: Point3[] = new Array(count);

  for (let i = 0; i < count; i++) {
    const base = offset + i * POINT_STRIDE;
    points[i] = {
      x: data.getFloat32(base, true),
      y: data.getFloat32(base + 4, true),
      z: data.getFloat32(base + 8, true)
    };
  }

  return points;
}

function pointFrame(
  bytes: Uint8Array,
  offset: number,
  build: (points: Point3[]) => Frame
): DecodeResult {
  const points = decodePointPayload(bytes, offset);

  if (!points) {
    return {
      ok: false,
      error: {
        kind: DecodeErrorKind.TRUNCATED_POINT_PAYLOAD,
        message: `Point payload of ${bytes.length - offset} bytes is not a multiple of ${POINT_STRIDE}`,
        byteLength: bytes.length
      }
    };
  }

  return { ok: true, frame: build(points) };
}

function decodePose(bytes: Uint8Array): DecodeResult {
  if (bytes.length < POSE_DATAGRAM_LENGTH) {
    return {
      ok: false,
      error: {
        kind: DecodeErrorKind.INVALID_POSE_LENGTH,
        message: `Pose datagram needs ${POSE_DATAGRAM_LENGTH} bytes, got ${bytes.length}`,
        byteLength: bytes.length
      }
    };
  }

  const data = view(bytes);
  const field = (index: number) => data.getFloat32(POSE_MARKER.length + index * 4, true);

  return {
    ok: true,
    frame: {
      type: FrameType.POSE,
      position: { x: field(0), y: field(1), z: field(2) },
      rotation: { w: field(3), x: field(4), y: field(5), z: field(6) }
    }
  };
}

/**
 * Decode one relay datagram
 */
export function decodeFrame(bytes: Uint8Array): DecodeResult {
  if (hasPrefix(bytes, LIVE_PREFIX)) {
    return pointFrame(bytes, LIVE_PREFIX.length, (points) => ({ type: FrameType.LIVE, points }));
  }

  if (hasPrefix(bytes, MODE_PREFIX)) {
    return {
      ok: true,
      frame: {
        type: FrameType.MODE,
        label: utf8.decode(bytes.subarray(MODE_PREFIX.length))
      }
    };
  }

  if (hasPrefix(bytes, POINTS_PREFIX)) {
    return pointFrame(bytes, POINTS_PREFIX.length, (points) => ({ type: FrameType.POINTS, points }));
  }

  if (hasPrefix(bytes, END_MARKER)) {
    return { ok: true, frame: { type: FrameType.END } };
  }

  if (hasPrefix(bytes, POSE_MARKER)) {
    return decodePose(bytes);
  }

  return pointFrame(bytes, 0, (points) => ({ type: FrameType.LEGACY, points }));
}
