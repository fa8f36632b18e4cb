/**
 * WebSocket server streaming scan snapshots to viewers
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage } from 'http';
import { createLogger } from '../utils/logger.js';
import { StartupError } from '../utils/errors.js';
import { authenticateViewer } from './auth.js';
import { executeControlCommand, parseControlCommand } from './control-server.js';
import { buildSnapshotMessage, encodeSnapshot } from '../protocol/snapshot-codec.js';
import { MessageType, type WSMessage } from '../models/messages.js';
import type { ScanState } from '../processing/scan-state.js';

const logger = createLogger('websocket');

/**
 * WebSocket client wrapper
 */
interface Viewer {
  ws: WebSocket;
  viewerId: string;
  connectedAt: number;
  snapshotsSent: number;
  commandsReceived: number;
}

export interface SnapshotServerOptions {
  host: string;
  port: number;
  apiKey: string;
  snapshotIntervalMs: number;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Pushes MessagePack snapshots to every connected viewer on a fixed tick and
 * accepts control commands as JSON.
 */
export class SnapshotServer {
  private wss: WebSocketServer | null = null;
  private scan: ScanState;
  private options: SnapshotServerOptions;
  private viewers = new Set<Viewer>();
  private viewerIds = new WeakMap<IncomingMessage, string>();
  private tickTimer: NodeJS.Timeout | null = null;
  private lastRevision = -1;
  private broadcasts = 0;

  constructor(scan: ScanState, options: SnapshotServerOptions) {
    this.scan = scan;
    this.options = options;
  }

  /**
   * Listen for viewers and start the snapshot tick
   */
  async start(): Promise<void> {
    if (this.wss) {
      logger.warn('Snapshot server already running');
      return;
    }

    const wss = new WebSocketServer({
      port: this.options.port,
      host: this.options.host,
      perMessageDeflate: {
        zlibDeflateOptions: {
          level: 3 // Compression level (1-9, lower = faster)
        },
        threshold: 1024 // Only compress messages > 1KB
      },
      maxPayload: 64 * 1024, // viewers only send commands
      verifyClient: this.verifyClient.bind(this)
    });

    try {
      await new Promise<void>((resolve, reject) => {
        wss.once('listening', () => resolve());
        wss.once('error', reject);
      });
    } catch (error) {
      wss.close();
      throw new StartupError(`Cannot listen for viewers on ${this.options.host}:${this.options.port}`, error);
    }

    this.wss = wss;
    this.setupEventHandlers(wss);

    // viewers get the current state on connect, so only later changes are broadcast
    this.lastRevision = this.scan.getRevision();
    this.tickTimer = setInterval(() => this.tick(), this.options.snapshotIntervalMs);

    logger.info({
      host: this.options.host,
      port: this.options.port,
      intervalMs: this.options.snapshotIntervalMs
    }, 'Snapshot server listening');
  }

  /**
   * Port the server is bound to, or null when not listening
   */
  getPort(): number | null {
    const address = this.wss?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * Verify viewer authentication before connection
   */
  private verifyClient(
    info: { req: IncomingMessage },
    callback: (result: boolean, code?: number, message?: string) => void
  ): void {
    const auth = authenticateViewer(info.req, this.options.apiKey);

    if (!auth.authenticated || !auth.viewerId) {
      logger.warn({
        ip: info.req.socket.remoteAddress,
        error: auth.error
      }, 'Viewer verification failed');

      callback(false, 401, auth.error || 'Unauthorized');
      return;
    }

    this.viewerIds.set(info.req, auth.viewerId);
    callback(true);
  }

  /**
   * Setup WebSocket event handlers
   */
  private setupEventHandlers(wss: WebSocketServer): void {
    wss.on('connection', (ws, request) => {
      this.handleConnection(ws, request);
    });

    wss.on('error', (error) => {
      logger.error({ error }, 'WebSocket server error');
    });
  }

  /**
   * Handle new viewer connection
   */
  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const viewer: Viewer = {
      ws,
      viewerId: this.viewerIds.get(request) ?? request.socket.remoteAddress ?? 'anonymous',
      connectedAt: Date.now(),
      snapshotsSent: 0,
      commandsReceived: 0
    };

    this.viewers.add(viewer);

    logger.info({
      viewerId: viewer.viewerId,
      ip: request.socket.remoteAddress,
      totalViewers: this.viewers.size
    }, 'Viewer connected');

    ws.on('message', (data, isBinary) => {
      this.handleMessage(viewer, data, isBinary);
    });

    ws.on('close', () => {
      this.handleDisconnect(viewer);
    });

    ws.on('error', (error) => {
      logger.error({
        viewerId: viewer.viewerId,
        error
      }, 'Viewer WebSocket error');
    });

    this.sendMessage(ws, {
      type: MessageType.ACK,
      data: {
        message: 'Connected to LiDAR relay receiver',
        viewerId: viewer.viewerId,
        serverTime: Date.now()
      }
    });

    // New viewers get the current state without waiting for a change
    this.sendSnapshot(viewer, encodeSnapshot(buildSnapshotMessage(this.scan)));
  }

  /**
   * Handle a command from a viewer
   */
  private handleMessage(viewer: Viewer, data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.sendError(viewer.ws, 'Binary messages are not accepted');
      return;
    }

    let message: unknown;
    try {
      message = JSON.parse(rawToString(data));
    } catch (error) {
      logger.debug({ viewerId: viewer.viewerId, error }, 'Invalid JSON from viewer');
      this.sendError(viewer.ws, 'Invalid JSON');
      return;
    }

    const command =
      typeof message === 'object' && message !== null &&
      'type' in message && message.type === MessageType.COMMAND &&
      'command' in message && typeof message.command === 'string'
        ? parseControlCommand(message.command)
        : null;

    if (!command) {
      this.sendError(viewer.ws, 'Unknown command');
      return;
    }

    viewer.commandsReceived++;
    executeControlCommand(this.scan, command);

    logger.info({ viewerId: viewer.viewerId, command }, 'Viewer command handled');

    this.sendMessage(viewer.ws, {
      type: MessageType.ACK,
      command,
      data: this.scan.getStatus()
    });
  }

  /**
   * Handle viewer disconnect
   */
  private handleDisconnect(viewer: Viewer): void {
    this.viewers.delete(viewer);

    const duration = Date.now() - viewer.connectedAt;

    logger.info({
      viewerId: viewer.viewerId,
      snapshotsSent: viewer.snapshotsSent,
      duration: `${(duration / 1000).toFixed(1)}s`,
      totalViewers: this.viewers.size
    }, 'Viewer disconnected');
  }

  /**
   * Broadcast a snapshot when the scan state changed since the last tick
   */
  private tick(): void {
    const revision = this.scan.getRevision();
    if (revision === this.lastRevision) return;
    this.lastRevision = revision;

    if (this.viewers.size === 0) return;

    const payload = encodeSnapshot(buildSnapshotMessage(this.scan));
    this.viewers.forEach(viewer => this.sendSnapshot(viewer, payload));
    this.broadcasts++;
  }

  private sendSnapshot(viewer: Viewer, payload: Uint8Array): void {
    try {
      if (viewer.ws.readyState === WebSocket.OPEN) {
        viewer.ws.send(payload, { binary: true });
        viewer.snapshotsSent++;
      }
    } catch (error) {
      logger.error({ viewerId: viewer.viewerId, error }, 'Failed to send snapshot');
    }
  }

  /**
   * Send message to viewer
   */
  private sendMessage(ws: WebSocket, message: WSMessage): void {
    try {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(message));
      }
    } catch (error) {
      logger.error({ error }, 'Failed to send message');
    }
  }

  /**
   * Send error to viewer
   */
  private sendError(ws: WebSocket, error: string): void {
    this.sendMessage(ws, {
      type: MessageType.ERROR,
      error
    });
  }

  /**
   * Close server
   */
  async close(): Promise<void> {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }

    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    return new Promise((resolve, reject) => {
      logger.info('Closing snapshot server');

      // Close all viewer connections
      this.viewers.forEach(viewer => {
        viewer.ws.close(1000, 'Server shutting down');
      });

      wss.close((error) => {
        if (error) {
          logger.error({ error }, 'Error closing snapshot server');
          reject(error);
        } else {
          logger.info('Snapshot server closed');
          resolve();
        }
      });
    });
  }

  /**
   * Get server statistics
   */
  getStats() {
    const viewers = Array.from(this.viewers.values()).map(viewer => ({
      viewerId: viewer.viewerId,
      connectedAt: viewer.connectedAt,
      snapshotsSent: viewer.snapshotsSent,
      commandsReceived: viewer.commandsReceived
    }));

    return {
      connectedViewers: viewers.length,
      broadcasts: this.broadcasts,
      viewers
    };
  }
}
