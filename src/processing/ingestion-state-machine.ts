/**
 * Frame assembly state machine
 */

import { createLogger } from '../utils/logger.js';
import { FrameType, type Frame } from '../models/frame.js';
import { Mode, type Point3 } from '../models/point-cloud.js';
import type { ScanState } from './scan-state.js';

const logger = createLogger('ingestion');

export type IngestionState =
  | { phase: 'idle' }
  | { phase: 'assembling'; label: string; mode: Mode; points: Point3[] };

export interface IngestionStats {
  frames: Record<FrameType, number>;
  committedFrames: number;
  orphanChunks: number;
  orphanEnds: number;
  discardedAssemblies: number;
  overflowPoints: number;
}

/**
 * Drives the scan state from decoded frames.
 *
 * MODE opens a frame, POINTS chunks are buffered here (never in the store),
 * END commits the buffer with the announced mode. LIVE replaces the store at
 * once and abandons any open frame. LEGACY commits immediately with the
 * current mode. POSE goes straight to the pose tracker.
 */
export class IngestionStateMachine {
  private state: IngestionState = { phase: 'idle' };
  private readonly scan: ScanState;
  private readonly maxFramePoints: number;

  private stats: IngestionStats = {
    frames: {
      [FrameType.LIVE]: 0,
      [FrameType.MODE]: 0,
      [FrameType.POINTS]: 0,
      [FrameType.END]: 0,
      [FrameType.POSE]: 0,
      [FrameType.LEGACY]: 0
    },
    committedFrames: 0,
    orphanChunks: 0,
    orphanEnds: 0,
    discardedAssemblies: 0,
    overflowPoints: 0
  };

  constructor(scan: ScanState, maxFramePoints: number) {
    this.scan = scan;
    this.maxFramePoints = maxFramePoints;
  }

  handle(frame: Frame): void {
    this.stats.frames[frame.type]++;

    switch (frame.type) {
      case FrameType.LIVE:
        this.abandonAssembly('live batch');
        this.scan.replaceLive(frame.points);
        break;

      case FrameType.MODE:
        this.abandonAssembly('new mode announcement');
        this.state = {
          phase: 'assembling',
          label: frame.label,
          mode: this.scan.announceMode(frame.label),
          points: []
        };
        break;

      case FrameType.POINTS:
        this.appendChunk(frame.points);
        break;

      case FrameType.END:
        this.commitAssembly();
        break;

      case FrameType.LEGACY:
        this.scan.commit(frame.points, this.scan.getMode());
        break;

      case FrameType.POSE:
        this.scan.updatePose(frame.position, frame.rotation);
        break;
    }
  }

  getState(): { phase: IngestionState['phase']; label: string | null; pendingPoints: number } {
    if (this.state.phase === 'idle') {
      return { phase: 'idle', label: null, pendingPoints: 0 };
    }
    return {
      phase: 'assembling',
      label: this.state.label,
      pendingPoints: this.state.points.length
    };
  }

  getStats(): IngestionStats {
    return { ...this.stats, frames: { ...this.stats.frames } };
  }

  private appendChunk(points: Point3[]): void {
    if (this.state.phase === 'idle') {
      this.stats.orphanChunks++;
      logger.warn({ points: points.length }, 'Points chunk outside a frame, dropped');
      return;
    }

    const room = this.maxFramePoints - this.state.points.length;
    const accepted = points.length <= room ? points : points.slice(0, Math.max(0, room));

    if (accepted.length < points.length) {
      const overflow = points.length - accepted.length;
      this.stats.overflowPoints += overflow;
      logger.warn({
        label: this.state.label,
        overflow,
        maxFramePoints: this.maxFramePoints
      }, 'Frame buffer full, chunk points dropped');
    }

    for (const point of accepted) {
      this.state.points.push(point);
    }
  }

  private commitAssembly(): void {
    if (this.state.phase === 'idle') {
      this.stats.orphanEnds++;
      logger.debug('End of frame while idle, ignored');
      return;
    }

    const { label, mode, points } = this.state;
    this.state = { phase: 'idle' };

    const added = this.scan.commit(points, mode);
    this.stats.committedFrames++;

    logger.debug({
      label,
      mode,
      points: points.length,
      added,
      total: this.scan.getPointCount()
    }, 'Frame committed');
  }

  private abandonAssembly(reason: string): void {
    if (this.state.phase === 'idle') return;

    this.stats.discardedAssemblies++;
    logger.debug({
      label: this.state.label,
      pendingPoints: this.state.points.length,
      reason
    }, 'Open frame discarded');

    this.state = { phase: 'idle' };
  }
}
