/**
 * Pet Alert Escalation Worker - Entry Point
 *
 * Consumes behaviour observations from NATS JetStream, escalates unusual
 * behaviour through the intervention tiers and serves the owner-facing API.
 */

import type { Server } from 'node:http';
import { getConfig } from './config.js';
import { createLogger } from './utils/logger.js';
import { closeDatabase, getDatabase, initDatabase, migrate } from './data/database.js';
import { PostgresAlertHistoryStore } from './repositories/PostgresAlertHistoryStore.js';
import { buildConsumerConfigs, createNatsClient, type NatsClient } from './services/NatsClient.js';
import {
  NatsNotificationChannel,
  NatsPlaybackChannel,
  ObservationPublisher,
} from './services/NatsInterventionChannels.js';
import { EscalationPolicy } from './services/EscalationPolicy.js';
import { InterventionExecutor } from './services/InterventionExecutor.js';
import { ResolutionMonitor } from './services/ResolutionMonitor.js';
import { AlertIngestionGate } from './services/AlertIngestionGate.js';
import { OwnerResponseService } from './services/OwnerResponseService.js';
import { QueueDepthMonitor } from './services/QueueDepthMonitor.js';
import { createObservationNatsConsumer, type ObservationNatsConsumer } from './consumers/index.js';
import { createApp } from './api/server.js';

const config = getConfig();
const logger = createLogger({ level: config.logLevel, pretty: config.nodeEnv === 'development' });

const startTime = Date.now();

let natsClient: NatsClient | null = null;
let consumer: ObservationNatsConsumer | null = null;
let queueMonitor: QueueDepthMonitor | null = null;
let httpServer: Server | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  logger.info({ env: config.nodeEnv }, 'Starting pet alert escalation worker');

  // Alert history (PostgreSQL)
  initDatabase(config, logger);
  await migrate(logger);
  const store = new PostgresAlertHistoryStore(getDatabase(), logger);

  // Broker
  natsClient = createNatsClient(
    config.natsUrl,
    buildConsumerConfigs({
      maxAckPending: config.consumerMaxAckPending,
      ackWaitMs: config.consumerAckWaitMs,
      maxDeliver: config.consumerMaxDeliver,
    }),
    logger
  );
  await natsClient.connect();
  await natsClient.ensureStreams();
  await natsClient.ensureConsumers();
  logger.info('NATS streams and consumers initialized');

  // Escalation engine
  const playback = new NatsPlaybackChannel(natsClient);
  const notifications = new NatsNotificationChannel(natsClient);
  const policy = new EscalationPolicy({
    moderateAt: config.moderateAt,
    notifyAt: config.notifyAt,
    criticalAt: config.criticalAt,
    minEscalationSeverity: config.minEscalationSeverity,
  });
  const executor = new InterventionExecutor(
    {
      store,
      playback,
      notifications,
      config: {
        deliveryMaxAttempts: config.deliveryMaxAttempts,
        deliveryRetryDelayMs: config.deliveryRetryDelayMs,
        channelTimeoutMs: config.channelTimeoutMs,
        dashboardUrl: config.dashboardUrl,
      },
    },
    logger
  );
  const monitor = new ResolutionMonitor(store, { monitoringWindowMs: config.monitoringWindowMs }, logger);
  const gate = new AlertIngestionGate({ store, policy, executor, monitor }, logger);
  const owner = new OwnerResponseService(
    store,
    notifications,
    {
      deliveryMaxAttempts: config.deliveryMaxAttempts,
      deliveryRetryDelayMs: config.deliveryRetryDelayMs,
      channelTimeoutMs: config.channelTimeoutMs,
    },
    logger
  );

  // Consumer
  consumer = createObservationNatsConsumer(
    { gate },
    {
      maxAckPending: config.consumerMaxAckPending,
      ackWait: config.consumerAckWaitMs,
      maxDeliver: config.consumerMaxDeliver,
      batchSize: config.consumerBatchSize,
      maxInFlight: config.consumerMaxInFlight,
    },
    logger
  );
  await consumer.start(natsClient.getJetStream());

  queueMonitor = new QueueDepthMonitor(natsClient, config.queueDepthIntervalMs, logger);
  queueMonitor.start();

  // HTTP API
  const app = createApp({
    store,
    owner,
    monitor,
    publisher: new ObservationPublisher(natsClient, logger),
    logger,
    health: {
      getNatsStatus: () => ({ connected: natsClient?.isConnected() ?? false }),
      getConsumerStats: () => consumer?.getStats() ?? { processed: 0, errored: 0, running: false },
      getStoreStatus: () => store.isHealthy(),
      getStartTime: () => startTime,
    },
  });
  httpServer = app.listen(config.httpPort, () => {
    logger.info({ port: config.httpPort }, 'HTTP server listening');
  });

  logger.info('Escalation worker fully initialized and ready');
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received, starting graceful shutdown');

  if (httpServer) {
    const server = httpServer;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    logger.info('HTTP server closed');
  }

  queueMonitor?.stop();

  // Let in-flight observations settle before the connections go away
  if (consumer) {
    await consumer.stop();
  }

  await natsClient?.close();
  await closeDatabase(logger);

  logger.info('All connections closed, worker shutdown complete');
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.fatal({ error }, 'Graceful shutdown failed');
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection, shutting down');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start escalation worker');
  process.exit(1);
});
