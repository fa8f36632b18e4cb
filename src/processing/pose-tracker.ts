/**
 * Scanner pose and decimated path
 */

import type { PoseSample, Quaternion, Vector3 } from '../models/point-cloud.js';

function distance(a: Vector3, b: Vector3): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const dz = b.z - a.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

/**
 * Keeps the latest pose and an append-only path of waypoints spaced by at
 * least `pathPointInterval` of travelled distance.
 */
export class PoseTracker {
  private latest: PoseSample | null = null;
  private path: Vector3[] = [];
  private lastPosition: Vector3 | null = null;
  private travelled = 0;
  readonly pathPointInterval: number;

  constructor(pathPointInterval: number) {
    if (!(pathPointInterval > 0)) {
      throw new RangeError(`pathPointInterval must be greater than 0, got ${pathPointInterval}`);
    }
    this.pathPointInterval = pathPointInterval;
  }

  /**
   * Record a pose sample. Returns true when the position became a waypoint.
   */
  update(position: Vector3, rotation: Quaternion): boolean {
    this.latest = {
      position: { x: position.x, y: position.y, z: position.z },
      rotation: { w: rotation.w, x: rotation.x, y: rotation.y, z: rotation.z }
    };

    const previous = this.lastPosition;
    this.lastPosition = this.latest.position;

    if (!previous) {
      this.path.push(this.latest.position);
      this.travelled = 0;
      return true;
    }

    const step = distance(previous, this.latest.position);
    if (Number.isFinite(step)) {
      this.travelled += step;
    }

    if (this.travelled >= this.pathPointInterval) {
      this.path.push(this.latest.position);
      this.travelled = 0;
      return true;
    }

    return false;
  }

  getPose(): PoseSample | null {
    return this.latest;
  }

  /**
   * Copy of the recorded waypoints
   */
  getPath(): Vector3[] {
    return this.path.slice();
  }

  pathLength(): number {
    return this.path.length;
  }

  /**
   * Drop the path; the next pose starts a new one. The latest pose is kept.
   */
  clearPath(): void {
    this.path = [];
    this.lastPosition = null;
    this.travelled = 0;
  }
}
