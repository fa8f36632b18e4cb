/**
 * Shared scan state and its query surface
 */

import { createLogger } from '../utils/logger.js';
import { PointStore } from './point-store.js';
import { PoseTracker } from './pose-tracker.js';
import {
  Mode,
  modeFromLabel,
  type Point3,
  type PoseSample,
  type Quaternion,
  type Vector3
} from '../models/point-cloud.js';
import type { ScanStatus } from '../models/messages.js';

const logger = createLogger('scan-state');

export interface ScanStateOptions {
  maxPoints: number;
  pathPointInterval: number;
  clearPathOnClear: boolean;
  initialMode?: Mode;
}

/**
 * Owns the point store, the pose tracker and the current mode.
 *
 * Every method is synchronous, so each mutation and each snapshot copy runs
 * to completion on the event loop before any other caller sees the state.
 * Readers get copies only.
 */
export class ScanState {
  private readonly store: PointStore;
  private readonly poseTracker: PoseTracker;
  private readonly clearPathOnClear: boolean;
  private mode: Mode;
  private modeLabel: string;
  private revision = 0;
  private capacityLogged = false;

  constructor(options: ScanStateOptions) {
    this.store = new PointStore(options.maxPoints);
    this.poseTracker = new PoseTracker(options.pathPointInterval);
    this.clearPathOnClear = options.clearPathOnClear;
    this.mode = options.initialMode ?? Mode.PERSISTENT;
    this.modeLabel = this.mode;
  }

  // Query surface

  getSnapshot(): Point3[] {
    return this.store.snapshot();
  }

  getPointCount(): number {
    return this.store.size();
  }

  getMode(): Mode {
    return this.mode;
  }

  /**
   * Mode label as last announced, verbatim
   */
  getModeLabel(): string {
    return this.modeLabel;
  }

  getPose(): PoseSample | null {
    return this.poseTracker.getPose();
  }

  getPath(): Vector3[] {
    return this.poseTracker.getPath();
  }

  /**
   * Increases on every change a reader could observe
   */
  getRevision(): number {
    return this.revision;
  }

  getStatus(): ScanStatus {
    return {
      mode: this.mode,
      modeLabel: this.modeLabel,
      pointCount: this.store.size(),
      maxPoints: this.store.capacity,
      pathLength: this.poseTracker.pathLength(),
      hasPose: this.poseTracker.getPose() !== null
    };
  }

  // Control commands

  /**
   * Switch mode by command. Switching to LIVE_ONLY clears the store.
   */
  setMode(mode: Mode): void {
    const previous = this.mode;
    this.mode = mode;
    this.modeLabel = mode;

    if (mode === Mode.LIVE_ONLY) {
      this.clearPoints();
    }

    this.revision++;
    logger.info({ from: previous, to: mode }, 'Mode changed');
  }

  /**
   * Clear points, and the scanner path when configured to
   */
  clear(): void {
    const cleared = this.store.size();
    this.clearPoints();

    if (this.clearPathOnClear) {
      this.poseTracker.clearPath();
    }

    this.revision++;
    logger.info({ cleared, pathCleared: this.clearPathOnClear }, 'Scan state cleared');
  }

  // Ingestion

  /**
   * Record the mode a sender announced for its frame
   */
  announceMode(label: string): Mode {
    const mode = modeFromLabel(label);

    if (label !== this.modeLabel || mode !== this.mode) {
      this.modeLabel = label;
      this.mode = mode;
      this.revision++;
    }

    return this.mode;
  }

  /**
   * Apply a batch with the merge policy of `mode`.
   * Returns the number of points stored from the batch.
   */
  commit(points: readonly Point3[], mode: Mode): number {
    const added = mode === Mode.LIVE_ONLY
      ? this.replacePoints(points)
      : this.store.insertMany(points);

    this.revision++;
    this.noteCapacity(points.length, added);
    return added;
  }

  /**
   * Live fast path: replace everything and force LIVE_ONLY
   */
  replaceLive(points: readonly Point3[]): number {
    this.mode = Mode.LIVE_ONLY;
    this.modeLabel = Mode.LIVE_ONLY;
    return this.commit(points, Mode.LIVE_ONLY);
  }

  updatePose(position: Vector3, rotation: Quaternion): boolean {
    const waypoint = this.poseTracker.update(position, rotation);
    this.revision++;
    return waypoint;
  }

  private replacePoints(points: readonly Point3[]): number {
    this.capacityLogged = false;
    return this.store.replace(points);
  }

  private clearPoints(): void {
    this.store.clear();
    this.capacityLogged = false;
  }

  private noteCapacity(offered: number, added: number): void {
    if (!this.store.isFull() || this.capacityLogged) return;

    this.capacityLogged = true;
    logger.info({
      maxPoints: this.store.capacity,
      offered,
      added
    }, 'Point store reached capacity, further points are skipped');
  }
}
