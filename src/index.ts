/**
 * LiDAR Relay Receiver - Main Entry Point
 */

import { env, assertValidConfig, printConfig, type RelayConfig } from './config/env.js';
import { logger, createLogger } from './utils/logger.js';
import { ScanState } from './processing/scan-state.js';
import { IngestionStateMachine } from './processing/ingestion-state-machine.js';
import { RelayProcessor } from './processing/relay-processor.js';
import { ReceiverLoop } from './server/receiver-loop.js';
import { ControlServer } from './server/control-server.js';
import { SnapshotServer } from './server/websocket.js';

const appLogger = createLogger('app');

/**
 * Application instance
 */
class RelayReceiverApp {
  private config: RelayConfig;
  private scan!: ScanState;
  private processor!: RelayProcessor;
  private dataReceiver!: ReceiverLoop;
  private control!: ControlServer;
  private snapshots!: SnapshotServer;
  private statsTimer: NodeJS.Timeout | null = null;

  constructor(config: RelayConfig) {
    this.config = config;
  }

  /**
   * Initialize application
   */
  initialize(): void {
    appLogger.info('Initializing LiDAR Relay Receiver');

    // Validate configuration
    assertValidConfig(this.config);

    // Print configuration
    printConfig(this.config);

    // Initialize components
    this.scan = new ScanState({
      maxPoints: this.config.MAX_POINTS,
      pathPointInterval: this.config.PATH_POINT_INTERVAL,
      clearPathOnClear: this.config.CLEAR_PATH_ON_CLEAR
    });

    const ingestion = new IngestionStateMachine(this.scan, this.config.MAX_FRAME_POINTS);
    this.processor = new RelayProcessor(ingestion, this.scan);

    this.dataReceiver = new ReceiverLoop({
      name: 'relay',
      host: this.config.UDP_HOST,
      port: this.config.DATA_PORT,
      handler: (datagram) => {
        this.processor.ingest(datagram);
        return null;
      }
    });

    this.control = new ControlServer(this.scan, {
      host: this.config.UDP_HOST,
      port: this.config.CONTROL_PORT
    });

    this.snapshots = new SnapshotServer(this.scan, {
      host: this.config.WS_HOST,
      port: this.config.WS_PORT,
      apiKey: this.config.API_KEY,
      snapshotIntervalMs: this.config.SNAPSHOT_INTERVAL_MS
    });

    appLogger.info('All components initialized');
  }

  /**
   * Start application
   */
  async start(): Promise<void> {
    appLogger.info('Starting LiDAR Relay Receiver');

    try {
      await this.dataReceiver.start();
      await this.control.start();
      await this.snapshots.start();
    } catch (error) {
      await this.stopComponents();
      throw error;
    }

    // Setup graceful shutdown handlers
    this.setupShutdownHandlers();

    appLogger.info('LiDAR Relay Receiver started successfully');

    // Log stats periodically
    this.startStatsLogger();
  }

  private async stopComponents(): Promise<void> {
    if (this.statsTimer) {
      clearInterval(this.statsTimer);
      this.statsTimer = null;
    }

    await this.snapshots.close();
    await this.control.stop();
    await this.dataReceiver.stop();
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(): void {
    let shuttingDown = false;

    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;

      appLogger.info({ signal }, 'Received shutdown signal');

      try {
        await this.stopComponents();

        appLogger.info({ final: this.scan.getStatus() }, 'Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        appLogger.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    // Handle uncaught errors
    process.on('uncaughtException', (error) => {
      appLogger.fatal({ error }, 'Uncaught exception');
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      appLogger.fatal({ reason }, 'Unhandled rejection');
      process.exit(1);
    });
  }

  /**
   * Log statistics periodically
   */
  private startStatsLogger(): void {
    this.statsTimer = setInterval(() => {
      const stats = this.processor.getStats();
      const relayStats = this.dataReceiver.getStats();
      const controlStats = this.control.getStats();
      const viewerStats = this.snapshots.getStats();

      appLogger.info({
        processor: {
          received: stats.processor.received,
          decoded: stats.processor.decoded,
          rejected: stats.processor.rejected,
          uptime: stats.processor.uptimeFormatted,
          throughput: stats.processor.throughput
        },
        ingestion: {
          frames: stats.ingestion.frames,
          committedFrames: stats.ingestion.committedFrames,
          orphanChunks: stats.ingestion.orphanChunks,
          discardedAssemblies: stats.ingestion.discardedAssemblies
        },
        scan: stats.scan,
        sockets: {
          relay: relayStats,
          control: controlStats
        },
        viewers: {
          connected: viewerStats.connectedViewers,
          broadcasts: viewerStats.broadcasts
        }
      }, 'System statistics');
    }, this.config.STATS_INTERVAL_MS);
  }
}

/**
 * Main entry point
 */
async function main() {
  try {
    const app = new RelayReceiverApp(env);
    app.initialize();
    await app.start();
  } catch (error) {
    logger.fatal({ error }, 'Failed to start application');
    process.exit(1);
  }
}

// Start application
void main();
