/**
 * NATS JetStream Client
 *
 * Connection management plus stream and consumer provisioning for the
 * observation, intervention and notification subjects.
 */

import {
  connect,
  type NatsConnection,
  type JetStreamClient,
  type JetStreamManager,
  StringCodec,
  RetentionPolicy,
  StorageType,
  AckPolicy,
  DeliverPolicy,
} from 'nats';
import type { Logger } from 'pino';

// --------------------------------------------------------------------------
// Subjects
// --------------------------------------------------------------------------

export const SUBJECTS = {
  observation: (petId: string) => `observations.pet.${petId}`,
  playback: (petId: string) => `interventions.playback.${petId}`,
  ownerNotification: (petId: string) => `notifications.alert.${petId}`,
  quickAction: (contactId: number) => `notifications.quick_action.${contactId}`,
} as const;

// --------------------------------------------------------------------------
// Stream Configurations
// --------------------------------------------------------------------------

export interface StreamConfig {
  name: string;
  subjects: string[];
  retention: RetentionPolicy;
  storage: StorageType;
  maxAge: number; // nanoseconds
  maxMsgs?: number;
  /** Window in which a repeated message id is dropped, nanoseconds */
  duplicateWindow?: number;
  replicas: number;
  description?: string;
}

const SECOND_NS = 1_000_000_000;

/**
 * - OBSERVATIONS: analysis results, consumed once, file storage
 * - INTERVENTIONS: playback signals for the in-home device, 5 min retention
 * - NOTIFICATIONS: owner and contact messages for the delivery gateway, 1 day
 */
export const STREAM_CONFIGS: StreamConfig[] = [
  {
    name: 'OBSERVATIONS',
    subjects: ['observations.>'],
    retention: RetentionPolicy.Workqueue, // Messages removed after ACK
    storage: StorageType.File,
    maxAge: 24 * 60 * 60 * SECOND_NS,
    maxMsgs: 1_000_000,
    duplicateWindow: 2 * 60 * SECOND_NS,
    replicas: 1,
    description: 'Pet behaviour observations from video analysis',
  },
  {
    name: 'INTERVENTIONS',
    subjects: ['interventions.>'],
    retention: RetentionPolicy.Limits,
    storage: StorageType.Memory,
    maxAge: 5 * 60 * SECOND_NS,
    maxMsgs: 100_000,
    replicas: 1,
    description: 'Audio playback signals for pet devices',
  },
  {
    name: 'NOTIFICATIONS',
    subjects: ['notifications.>'],
    retention: RetentionPolicy.Limits,
    storage: StorageType.File,
    maxAge: 24 * 60 * 60 * SECOND_NS,
    maxMsgs: 500_000,
    replicas: 1,
    description: 'Owner alerts and emergency contact quick actions',
  },
];

// --------------------------------------------------------------------------
// Consumer Configurations
// --------------------------------------------------------------------------

export interface ConsumerConfig {
  streamName: string;
  consumerName: string;
  filterSubjects: string[];
  ackPolicy: AckPolicy;
  maxAckPending: number;
  ackWait: number; // milliseconds
  maxDeliver: number;
  description?: string;
}

export const OBSERVATION_CONSUMER = 'escalation-worker';

export function buildConsumerConfigs(options: {
  maxAckPending: number;
  ackWaitMs: number;
  maxDeliver: number;
}): ConsumerConfig[] {
  return [
    {
      streamName: 'OBSERVATIONS',
      consumerName: OBSERVATION_CONSUMER,
      filterSubjects: ['observations.pet.*'],
      ackPolicy: AckPolicy.Explicit,
      maxAckPending: options.maxAckPending,
      ackWait: options.ackWaitMs,
      maxDeliver: options.maxDeliver,
      description: 'Admits unusual behaviour alerts and resolves them',
    },
  ];
}

// --------------------------------------------------------------------------
// NATS Client
// --------------------------------------------------------------------------

export interface NatsClientConfig {
  servers: string[];
  name?: string;
  maxReconnectAttempts?: number;
  reconnectTimeWait?: number;
  /** If true, require TLS for all connections (enforced in production) */
  requireTLS?: boolean;
  consumers: ConsumerConfig[];
}

export interface PublishOptions {
  /** JetStream message id, deduplicated within the stream's window */
  msgID?: string;
}

export class NatsClient {
  private connection: NatsConnection | null = null;
  private jetstream: JetStreamClient | null = null;
  private jsm: JetStreamManager | null = null;
  private readonly codec = StringCodec();
  private readonly log: Logger;
  private readonly config: NatsClientConfig;

  constructor(config: NatsClientConfig, logger: Logger) {
    this.config = config;
    this.log = logger.child({ component: 'NatsClient' });
  }

  private hasTLSServers(): boolean {
    return this.config.servers.some(
      (s) => s.startsWith('tls://') || s.startsWith('nats+tls://') || s.startsWith('wss://')
    );
  }

  /**
   * Connect to NATS and initialize JetStream
   */
  async connect(): Promise<void> {
    const podName = process.env['POD_NAME'] || process.env['HOSTNAME'] || 'local';
    const isProduction = process.env['NODE_ENV'] === 'production';

    if ((isProduction || this.config.requireTLS) && !this.hasTLSServers()) {
      throw new Error(
        'NATS TLS required in production. Use tls:// or nats+tls:// URL scheme. ' +
          'Current servers: ' +
          this.config.servers.join(', ')
      );
    }

    this.log.info({ servers: this.config.servers, tls: this.hasTLSServers() }, 'Connecting to NATS');

    const connection = await connect({
      servers: this.config.servers,
      name: this.config.name || `escalation-worker-${podName}`,
      reconnect: true,
      maxReconnectAttempts: this.config.maxReconnectAttempts ?? -1,
      reconnectTimeWait: this.config.reconnectTimeWait ?? 1000,
    });
    this.connection = connection;

    void connection.closed().then((err) => {
      if (err) {
        this.log.error({ error: err }, 'NATS connection closed with error');
      } else {
        this.log.info('NATS connection closed');
      }
    });

    void (async () => {
      for await (const s of connection.status()) {
        this.log.info({ type: s.type, data: s.data }, 'NATS status');
      }
    })().catch((error: unknown) => {
      this.log.warn({ error }, 'NATS status monitor stopped');
    });

    this.jetstream = connection.jetstream();
    this.jsm = await connection.jetstreamManager();

    this.log.info('Connected to NATS JetStream');
  }

  isConnected(): boolean {
    return this.connection !== null && !this.connection.isClosed();
  }

  getJetStream(): JetStreamClient {
    if (!this.jetstream) {
      throw new Error('NATS not connected - call connect() first');
    }
    return this.jetstream;
  }

  getJetStreamManager(): JetStreamManager {
    if (!this.jsm) {
      throw new Error('NATS not connected - call connect() first');
    }
    return this.jsm;
  }

  /**
   * Initialize all streams (run once at startup)
   */
  async ensureStreams(): Promise<void> {
    const jsm = this.getJetStreamManager();

    for (const streamConfig of STREAM_CONFIGS) {
      try {
        const info = await jsm.streams.info(streamConfig.name);
        this.log.debug({ stream: streamConfig.name, state: info.state }, 'Stream already exists');
      } catch {
        this.log.info({ stream: streamConfig.name }, 'Creating stream');

        await jsm.streams.add({
          name: streamConfig.name,
          subjects: streamConfig.subjects,
          retention: streamConfig.retention,
          storage: streamConfig.storage,
          max_age: streamConfig.maxAge,
          max_msgs: streamConfig.maxMsgs,
          duplicate_window: streamConfig.duplicateWindow,
          num_replicas: streamConfig.replicas,
          description: streamConfig.description,
        });

        this.log.info({ stream: streamConfig.name }, 'Stream created');
      }
    }

    this.log.info('All streams initialized');
  }

  /**
   * Initialize consumers (run once at startup)
   */
  async ensureConsumers(): Promise<void> {
    const jsm = this.getJetStreamManager();

    for (const consumerConfig of this.config.consumers) {
      const ids = { stream: consumerConfig.streamName, consumer: consumerConfig.consumerName };
      try {
        await jsm.consumers.info(consumerConfig.streamName, consumerConfig.consumerName);
        this.log.debug(ids, 'Consumer already exists');
      } catch {
        this.log.info(ids, 'Creating consumer');

        await jsm.consumers.add(consumerConfig.streamName, {
          durable_name: consumerConfig.consumerName,
          filter_subjects: consumerConfig.filterSubjects,
          ack_policy: consumerConfig.ackPolicy,
          max_ack_pending: consumerConfig.maxAckPending,
          ack_wait: consumerConfig.ackWait * 1_000_000, // Convert to nanoseconds
          max_deliver: consumerConfig.maxDeliver,
          deliver_policy: DeliverPolicy.All,
          description: consumerConfig.description,
        });

        this.log.info(ids, 'Consumer created');
      }
    }

    this.log.info('All consumers initialized');
  }

  /**
   * Publish a JSON message to a subject
   */
  async publish(subject: string, data: unknown, options: PublishOptions = {}): Promise<void> {
    const js = this.getJetStream();

    const payload = this.codec.encode(JSON.stringify(data));
    const ack = await js.publish(subject, payload, options.msgID ? { msgID: options.msgID } : undefined);

    this.log.debug({ subject, stream: ack.stream, seq: ack.seq, duplicate: ack.duplicate }, 'Message published');
  }

  /**
   * Get consumer lag statistics
   */
  async getConsumerLag(): Promise<Record<string, { pending: number; waiting: number }>> {
    const jsm = this.getJetStreamManager();
    const lag: Record<string, { pending: number; waiting: number }> = {};

    for (const consumerConfig of this.config.consumers) {
      try {
        const info = await jsm.consumers.info(consumerConfig.streamName, consumerConfig.consumerName);
        lag[consumerConfig.consumerName] = {
          pending: info.num_pending,
          waiting: info.num_waiting,
        };
      } catch (error) {
        this.log.warn({ error, consumer: consumerConfig.consumerName }, 'Consumer info unavailable');
        lag[consumerConfig.consumerName] = { pending: 0, waiting: 0 };
      }
    }

    return lag;
  }

  /**
   * Graceful shutdown
   */
  async close(): Promise<void> {
    if (this.connection) {
      this.log.info('Draining NATS connection');
      await this.connection.drain();
      this.log.info('NATS connection drained');
    }
  }
}

// --------------------------------------------------------------------------
// Factory function
// --------------------------------------------------------------------------

export function createNatsClient(
  natsUrl: string,
  consumers: ConsumerConfig[],
  logger: Logger
): NatsClient {
  return new NatsClient(
    {
      servers: natsUrl.split(','),
      name: `escalation-worker-${process.env['POD_NAME'] || 'local'}`,
      consumers,
    },
    logger
  );
}
