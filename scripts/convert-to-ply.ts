/**
 * Export the current point cloud to PLY format
 *
 * Connects to the viewer stream, waits for one snapshot and writes it out.
 *
 * Usage: npx tsx scripts/convert-to-ply.ts [outputPath]
 */

import { writeFileSync } from 'fs';
import { WebSocket, type RawData } from 'ws';
import { decodeSnapshot, snapshotPath, snapshotPoints } from '../src/protocol/snapshot-codec.js';
import type { Point3, Vector3 } from '../src/models/point-cloud.js';
import type { SnapshotMessage } from '../src/models/messages.js';

const WS_URL = process.env.WS_URL || 'ws://localhost:8080';
const API_KEY = process.env.API_KEY || '';
const TIMEOUT_MS = parseInt(process.env.TIMEOUT_MS || '5000');

/**
 * Convert points to PLY format
 */
function convertToPLY(points: Point3[], options: { includePath?: Vector3[] } = {}): string {
  const path = options.includePath ?? [];
  const header = `ply
format ascii 1.0
comment exported from lidar-relay-receiver
element vertex ${points.length + path.length}
property float x
property float y
property float z
property uchar red
property uchar green
property uchar blue
end_header
`;

  // Cloud in white, scanner path in red
  const vertices = [
    ...points.map(p => `${p.x} ${p.y} ${p.z} 255 255 255`),
    ...path.map(p => `${p.x} ${p.y} ${p.z} 255 0 0`)
  ].join('\n');

  return header + vertices + '\n';
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

function receiveSnapshot(): Promise<SnapshotMessage> {
  const url = API_KEY ? `${WS_URL}?apiKey=${encodeURIComponent(API_KEY)}` : WS_URL;
  const ws = new WebSocket(url, { headers: { 'x-viewer-id': 'ply-export' } });

  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      ws.close();
      reject(new Error(`No snapshot within ${TIMEOUT_MS}ms`));
    }, TIMEOUT_MS);

    ws.on('message', (data, isBinary) => {
      if (!isBinary) return;

      const snapshot = decodeSnapshot(toBytes(data));
      if (!snapshot) return;

      clearTimeout(timer);
      ws.close();
      resolve(snapshot);
    });

    ws.on('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });
  });
}

async function main() {
  const outputPath = process.argv[2] || `./pointcloud-${Date.now()}.ply`;

  console.log(`Connecting to ${WS_URL}...`);
  const snapshot = await receiveSnapshot();

  const points = snapshotPoints(snapshot);
  const path = snapshotPath(snapshot);

  writeFileSync(outputPath, convertToPLY(points, { includePath: path }));

  console.log(`Mode:   ${snapshot.modeLabel}`);
  console.log(`Points: ${points.length}`);
  console.log(`Path:   ${path.length} waypoints`);
  console.log(`✓ Written ${outputPath}`);
}

main().catch((error) => {
  console.error('Export failed:', error);
  process.exitCode = 1;
});
