import { describe, it, expect } from 'vitest';
import { encode } from '@msgpack/msgpack';
import {
  buildSnapshotMessage,
  decodeSnapshot,
  encodeSnapshot,
  snapshotPath,
  snapshotPoints
} from './snapshot-codec.js';
import { MessageType } from '../models/messages.js';
import { Mode, point3 } from '../models/point-cloud.js';
import { ScanState } from '../processing/scan-state.js';

function createScan(): ScanState {
  return new ScanState({ maxPoints: 10, pathPointInterval: 1, clearPathOnClear: true });
}

describe('buildSnapshotMessage', () => {
  it('captures an empty scan with no pose', () => {
    const message = buildSnapshotMessage(createScan());

    expect(message.type).toBe(MessageType.SNAPSHOT);
    expect(message.revision).toBe(0);
    expect(message.pointCount).toBe(0);
    expect(message.points.byteLength).toBe(0);
    expect(message.path.byteLength).toBe(0);
    expect(message.pose).toBeNull();
  });

  it('packs points, pose and path', () => {
    const scan = createScan();
    scan.commit([point3(1, 2, 3), point3(0.5, -1, 4)], Mode.PERSISTENT);
    scan.updatePose({ x: 1, y: 2, z: 3 }, { w: 1, x: 0, y: 0, z: 0 });

    const message = buildSnapshotMessage(scan);

    expect(message.revision).toBe(2);
    expect(message.points.byteLength).toBe(24);
    expect(message.pose).toEqual({ position: [1, 2, 3], rotation: [1, 0, 0, 0] });
    expect(snapshotPoints(message)).toEqual([point3(1, 2, 3), point3(0.5, -1, 4)]);
    expect(snapshotPath(message)).toEqual([{ x: 1, y: 2, z: 3 }]);
  });
});

describe('decodeSnapshot', () => {
  it('reads back an encoded snapshot', () => {
    const scan = createScan();
    scan.announceMode('SLAM');
    scan.commit([point3(1, 2, 3)], Mode.PERSISTENT);
    scan.updatePose({ x: 0.5, y: 0, z: 0 }, { w: 0, x: 0, y: 1, z: 0 });

    const decoded = decodeSnapshot(encodeSnapshot(buildSnapshotMessage(scan)));

    expect(decoded).not.toBeNull();
    expect(decoded?.mode).toBe(Mode.PERSISTENT);
    expect(decoded?.modeLabel).toBe('SLAM');
    expect(decoded?.pointCount).toBe(1);
    expect(decoded?.maxPoints).toBe(10);
    expect(decoded?.pose).toEqual({ position: [0.5, 0, 0], rotation: [0, 0, 1, 0] });
    expect(decoded && snapshotPoints(decoded)).toEqual([point3(1, 2, 3)]);
  });

  it('rejects messages of another type', () => {
    expect(decodeSnapshot(encode({ type: MessageType.ACK }))).toBeNull();
    expect(decodeSnapshot(encode('snapshot'))).toBeNull();
  });

  it('rejects snapshots with missing or malformed fields', () => {
    const valid = buildSnapshotMessage(createScan());

    expect(decodeSnapshot(encode({ ...valid, mode: 'SLAM' }))).toBeNull();
    expect(decodeSnapshot(encode({ ...valid, points: [1, 2, 3] }))).toBeNull();
    expect(decodeSnapshot(encode({ ...valid, pose: { position: [1, 2], rotation: [1, 0, 0, 0] } }))).toBeNull();
  });
});
