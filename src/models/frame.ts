/**
 * Relay protocol frame models
 */

import type { Point3, Quaternion, Vector3 } from './point-cloud.js';

/**
 * Logical unit decoded from one datagram
 */
export enum FrameType {
  LIVE = 'live',
  MODE = 'mode',
  POINTS = 'points',
  END = 'end',
  POSE = 'pose',
  LEGACY = 'legacy'
}

/** Full replacement that bypasses frame assembly */
export interface LiveBatchFrame {
  type: FrameType.LIVE;
  points: Point3[];
}

/** Opens a multi-datagram frame */
export interface ModeAnnounceFrame {
  type: FrameType.MODE;
  label: string;
}

/** Partial payload of the open frame */
export interface PointsChunkFrame {
  type: FrameType.POINTS;
  points: Point3[];
}

/** Closes the open frame */
export interface EndOfFrameFrame {
  type: FrameType.END;
}

export interface PoseFrame {
  type: FrameType.POSE;
  position: Vector3;
  rotation: Quaternion;
}

/** Unframed point payload, merged with the current mode */
export interface LegacyBatchFrame {
  type: FrameType.LEGACY;
  points: Point3[];
}

export type Frame =
  | LiveBatchFrame
  | ModeAnnounceFrame
  | PointsChunkFrame
  | EndOfFrameFrame
  | PoseFrame
  | LegacyBatchFrame;

export enum DecodeErrorKind {
  TRUNCATED_POINT_PAYLOAD = 'TruncatedPointPayload',
  INVALID_POSE_LENGTH = 'InvalidPoseLength'
}

export interface DecodeError {
  kind: DecodeErrorKind;
  message: string;
  byteLength: number;
}

export type DecodeResult =
  | { ok: true; frame: Frame }
  | { ok: false; error: DecodeError };
