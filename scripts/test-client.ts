/**
 * UDP Test Client for the LiDAR Relay Receiver
 *
 * Sends synthetic scans as framed, live and legacy relay traffic, plus a pose
 * walking a circle, then asks the control channel for STATUS.
 *
 * Usage: npx tsx scripts/test-client.ts
 */

import { createSocket } from 'dgram';
import {
  encodeFramedScan,
  encodeLegacyBatch,
  encodeLiveBatch,
  encodePose
} from '../src/protocol/frame-encoder.js';
import { point3, type Point3 } from '../src/models/point-cloud.js';

// Configuration
const HOST = process.env.RELAY_HOST || '127.0.0.1';
const DATA_PORT = parseInt(process.env.DATA_PORT || '5005');
const CONTROL_PORT = parseInt(process.env.CONTROL_PORT || '5006');
const MODE = process.env.MODE || 'PERSISTENT';
const NUM_SCANS = parseInt(process.env.NUM_SCANS || '10');
const SCAN_INTERVAL_MS = parseInt(process.env.SCAN_INTERVAL_MS || '100');

const socket = createSocket('udp4');

function send(datagram: Uint8Array, port: number = DATA_PORT): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(datagram, port, HOST, (error) => (error ? reject(error) : resolve()));
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * One 2D sweep (z = 0) seen from a scanner at `heading`
 */
function generateSweep(index: number, numPoints: number = 720): Point3[] {
  const points: Point3[] = [];
  const heading = index * 0.05;

  for (let i = 0; i < numPoints; i++) {
    const theta = heading + (i / numPoints) * Math.PI * 2;
    const range = 3 + Math.sin(theta * 4) + Math.random() * 0.05;
    points.push(point3(range * Math.cos(theta), range * Math.sin(theta), 0));
  }

  return points;
}

function requestStatus(): Promise<string> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error('No STATUS reply within 2s')), 2000);

    socket.once('message', (message) => {
      clearTimeout(timer);
      resolve(message.toString('utf8'));
    });

    send(Buffer.from('STATUS'), CONTROL_PORT).catch(reject);
  });
}

/**
 * Main test function
 */
async function runTest() {
  console.log('========================================');
  console.log('LiDAR Relay Receiver - UDP Test Client');
  console.log('========================================');
  console.log('');
  console.log(`Target:    ${HOST}:${DATA_PORT} (control ${CONTROL_PORT})`);
  console.log(`Mode:      ${MODE}`);
  console.log(`Scans:     ${NUM_SCANS}`);
  console.log(`Interval:  ${SCAN_INTERVAL_MS}ms`);
  console.log('');

  for (let i = 0; i < NUM_SCANS; i++) {
    const sweep = generateSweep(i);
    const angle = i * 0.1;

    await send(encodePose(
      { x: Math.cos(angle), y: Math.sin(angle), z: 0 },
      { w: Math.cos(angle / 2), x: 0, y: 0, z: Math.sin(angle / 2) }
    ));

    if (MODE === 'LIVE') {
      await send(encodeLiveBatch(sweep));
    } else if (MODE === 'LEGACY') {
      await send(encodeLegacyBatch(sweep.slice(0, 250)));
    } else {
      for (const datagram of encodeFramedScan(sweep, MODE)) {
        await send(datagram);
      }
    }

    console.log(`[${i + 1}/${NUM_SCANS}] Sent sweep (${sweep.length} points)`);
    await sleep(SCAN_INTERVAL_MS);
  }

  console.log('');
  console.log(`Status: ${await requestStatus()}`);
}

// Run test
runTest()
  .catch((error) => {
    console.error('Test client failed:', error);
    process.exitCode = 1;
  })
  .finally(() => socket.close());
