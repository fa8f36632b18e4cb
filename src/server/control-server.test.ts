import { describe, it, expect, beforeEach } from 'vitest';
import {
  ControlServer,
  executeControlCommand,
  formatStatus,
  parseControlCommand
} from './control-server.js';
import { ControlCommand } from '../models/messages.js';
import { Mode, point3 } from '../models/point-cloud.js';
import { ScanState } from '../processing/scan-state.js';
import { FakeSocket } from '../test-utils/fake-socket.js';

const A = point3(1, 0, 0);
const B = point3(0, 1, 0);

function createScan(): ScanState {
  return new ScanState({ maxPoints: 100, pathPointInterval: 1, clearPathOnClear: true });
}

describe('parseControlCommand', () => {
  it('accepts each command with surrounding whitespace', () => {
    expect(parseControlCommand('PERSISTENT')).toBe(ControlCommand.PERSISTENT);
    expect(parseControlCommand('  LIVE_ONLY\n')).toBe(ControlCommand.LIVE_ONLY);
    expect(parseControlCommand('\tCLEAR ')).toBe(ControlCommand.CLEAR);
    expect(parseControlCommand('STATUS\r\n')).toBe(ControlCommand.STATUS);
  });

  it('is case-sensitive', () => {
    expect(parseControlCommand('status')).toBeNull();
    expect(parseControlCommand('Clear')).toBeNull();
  });

  it('rejects unknown and empty input', () => {
    expect(parseControlCommand('RESET')).toBeNull();
    expect(parseControlCommand('')).toBeNull();
    expect(parseControlCommand('STATUS NOW')).toBeNull();
  });
});

describe('executeControlCommand', () => {
  let scan: ScanState;

  beforeEach(() => {
    scan = createScan();
    scan.commit([A, B], Mode.PERSISTENT);
  });

  it('reports mode and point count on STATUS', () => {
    expect(executeControlCommand(scan, ControlCommand.STATUS)).toBe('MODE:PERSISTENT;POINTS:2');
  });

  it('clears the store on LIVE_ONLY', () => {
    expect(executeControlCommand(scan, ControlCommand.LIVE_ONLY)).toBe('OK LIVE_ONLY');
    expect(scan.getPointCount()).toBe(0);
    expect(executeControlCommand(scan, ControlCommand.STATUS)).toBe('MODE:LIVE_ONLY;POINTS:0');
  });

  it('keeps points on PERSISTENT', () => {
    expect(executeControlCommand(scan, ControlCommand.PERSISTENT)).toBe('OK PERSISTENT');
    expect(scan.getPointCount()).toBe(2);
  });

  it('empties the store on CLEAR without changing mode', () => {
    expect(executeControlCommand(scan, ControlCommand.CLEAR)).toBe('OK CLEAR');
    expect(scan.getPointCount()).toBe(0);
    expect(scan.getMode()).toBe(Mode.PERSISTENT);
  });
});

describe('formatStatus', () => {
  it('uses the announced label verbatim', () => {
    expect(formatStatus({
      mode: Mode.PERSISTENT,
      modeLabel: 'SLAM',
      pointCount: 7,
      maxPoints: 10,
      pathLength: 0,
      hasPose: false
    })).toBe('MODE:SLAM;POINTS:7');
  });
});

describe('ControlServer', () => {
  it('replies to each command datagram', async () => {
    const scan = createScan();
    scan.commit([A], Mode.PERSISTENT);
    const socket = new FakeSocket();
    const server = new ControlServer(scan, {
      host: '127.0.0.1',
      port: 5006,
      socketFactory: () => socket
    });

    await server.start();
    await socket.deliver('STATUS');
    await socket.deliver('CLEAR\n');
    await socket.deliver('STATUS');
    await socket.deliver('bogus');
    await server.stop();

    expect(socket.replies()).toEqual([
      'MODE:PERSISTENT;POINTS:1',
      'OK CLEAR',
      'MODE:PERSISTENT;POINTS:0',
      'ERR unknown command'
    ]);
    expect(server.getStats().repliesSent).toBe(4);
    expect(socket.closeCount).toBe(1);
  });
});
