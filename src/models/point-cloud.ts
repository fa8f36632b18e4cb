/**
 * Point cloud and scanner pose data models
 */

/**
 * Single-precision 3D point. Two points are the same point only when all
 * three float32 components have identical bit patterns.
 */
export interface Point3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Orientation quaternion, scalar part first
 */
export interface Quaternion {
  readonly w: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Latest scanner pose
 */
export interface PoseSample {
  readonly position: Vector3;
  readonly rotation: Quaternion;
}

/**
 * Merge policy for incoming point batches
 */
export enum Mode {
  PERSISTENT = 'PERSISTENT',
  LIVE_ONLY = 'LIVE_ONLY'
}

/**
 * Map a mode label to its merge policy. Only the exact label `LIVE_ONLY`
 * replaces; every other label accumulates.
 */
export function modeFromLabel(label: string): Mode {
  return label === Mode.LIVE_ONLY ? Mode.LIVE_ONLY : Mode.PERSISTENT;
}

/**
 * Build a point rounded to float32 precision
 */
export function point3(x: number, y: number, z: number): Point3 {
  return { x: Math.fround(x), y: Math.fround(y), z: Math.fround(z) };
}

const keyFloats = new Float32Array(3);
const keyBits = new Uint32Array(keyFloats.buffer);

/**
 * Dedup key built from the raw float32 bits of the three components
 */
export function pointKey(point: Point3): string {
  keyFloats[0] = point.x;
  keyFloats[1] = point.y;
  keyFloats[2] = point.z;
  return `${keyBits[0]}:${keyBits[1]}:${keyBits[2]}`;
}
