import { describe, it, expect } from 'vitest';
import { setImmediate as yieldToLoop } from 'timers/promises';
import { ScanState } from './scan-state.js';
import { Mode, point3, type Point3 } from '../models/point-cloud.js';

const A = point3(1, 0, 0);
const B = point3(0, 1, 0);
const C = point3(0, 0, 1);

const IDENTITY = { w: 1, x: 0, y: 0, z: 0 };

function createState(maxPoints = 10, clearPathOnClear = true): ScanState {
  return new ScanState({ maxPoints, pathPointInterval: 1, clearPathOnClear });
}

describe('ScanState', () => {
  it('starts persistent and empty', () => {
    const scan = createState();

    expect(scan.getStatus()).toEqual({
      mode: Mode.PERSISTENT,
      modeLabel: 'PERSISTENT',
      pointCount: 0,
      maxPoints: 10,
      pathLength: 0,
      hasPose: false
    });
    expect(scan.getPose()).toBeNull();
  });

  it('clears points when switched to LIVE_ONLY', () => {
    const scan = createState();
    scan.commit([A, B], Mode.PERSISTENT);

    scan.setMode(Mode.LIVE_ONLY);

    expect(scan.getPointCount()).toBe(0);
    expect(scan.getMode()).toBe(Mode.LIVE_ONLY);
  });

  it('keeps points when switched to PERSISTENT', () => {
    const scan = createState();
    scan.replaceLive([A, B]);

    scan.setMode(Mode.PERSISTENT);

    expect(scan.getSnapshot()).toEqual([A, B]);
    expect(scan.getModeLabel()).toBe('PERSISTENT');
  });

  it('clears points and path on CLEAR', () => {
    const scan = createState();
    scan.commit([A], Mode.PERSISTENT);
    scan.updatePose({ x: 0, y: 0, z: 0 }, IDENTITY);

    scan.clear();

    expect(scan.getPointCount()).toBe(0);
    expect(scan.getPath()).toEqual([]);
    expect(scan.getPose()).not.toBeNull();
  });

  it('keeps the path on CLEAR when configured to', () => {
    const scan = createState(10, false);
    scan.updatePose({ x: 0, y: 0, z: 0 }, IDENTITY);

    scan.clear();

    expect(scan.getPath()).toHaveLength(1);
  });

  it('maps announced labels to merge modes', () => {
    const scan = createState();

    expect(scan.announceMode('LIVE_ONLY')).toBe(Mode.LIVE_ONLY);
    expect(scan.announceMode('whatever')).toBe(Mode.PERSISTENT);
    expect(scan.getModeLabel()).toBe('whatever');
  });

  it('returns the number of stored points from commit', () => {
    const scan = createState(2);

    expect(scan.commit([A, A, B, C], Mode.PERSISTENT)).toBe(2);
    expect(scan.commit([C], Mode.PERSISTENT)).toBe(0);
    expect(scan.getPointCount()).toBe(2);
  });

  it('bumps the revision on every observable change', () => {
    const scan = createState();
    const revisions = [scan.getRevision()];

    scan.commit([A], Mode.PERSISTENT);
    revisions.push(scan.getRevision());
    scan.updatePose({ x: 0, y: 0, z: 0 }, IDENTITY);
    revisions.push(scan.getRevision());
    scan.setMode(Mode.LIVE_ONLY);
    revisions.push(scan.getRevision());
    scan.clear();
    revisions.push(scan.getRevision());
    scan.announceMode('SLAM');
    revisions.push(scan.getRevision());

    expect(revisions).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('bumps the revision when an announcement changes the mode or label', () => {
    const scan = createState();

    scan.announceMode('LIVE_ONLY');
    expect(scan.getRevision()).toBe(1);

    scan.announceMode('LIVE_ONLY');
    expect(scan.getRevision()).toBe(1);

    scan.announceMode('SLAM');
    expect(scan.getRevision()).toBe(2);
    expect(scan.getMode()).toBe(Mode.PERSISTENT);
  });

  it('leaves the revision alone when PERSISTENT is announced again', () => {
    const scan = createState();

    scan.announceMode('PERSISTENT');

    expect(scan.getRevision()).toBe(0);
  });

  it('gives concurrent readers whole snapshots of inserted points', async () => {
    const maxPoints = 64;
    const scan = createState(maxPoints);
    const inserted = new Set<string>();
    const key = (p: Point3) => `${p.x},${p.y},${p.z}`;
    const snapshots: Point3[][] = [];
    let writing = true;

    const writer = async () => {
      for (let batch = 0; batch < 40; batch++) {
        const points = Array.from({ length: 5 }, (_, i) => point3(batch + 0.25, i * 0.5, batch * i));
        points.forEach((p) => inserted.add(key(p)));

        if (batch % 10 === 9) {
          scan.replaceLive(points);
        } else {
          scan.commit(points, batch % 2 === 0 ? Mode.PERSISTENT : scan.getMode());
        }
        await yieldToLoop();
      }
      writing = false;
    };

    const reader = async () => {
      while (writing) {
        snapshots.push(scan.getSnapshot());
        await yieldToLoop();
      }
    };

    await Promise.all([writer(), reader()]);

    expect(snapshots.length).toBeGreaterThan(0);
    for (const snapshot of snapshots) {
      expect(snapshot.length).toBeLessThanOrEqual(maxPoints);
      for (const point of snapshot) {
        expect(inserted.has(key(point))).toBe(true);
      }
    }
  });
});
