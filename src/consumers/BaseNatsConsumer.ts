/**
 * Base JetStream pull consumer
 *
 * Decodes JSON payloads, bounds the number of messages in flight and maps a
 * ProcessResult onto ack / nak (with backoff) / term. Subclasses implement
 * `processMessage` only.
 */

import type { ConsumerMessages, JetStreamClient } from 'nats';
import type { Logger } from 'pino';
import { recordMessageProcessed, startActiveMessage } from '../infrastructure/metrics.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface BaseConsumerConfig {
  streamName: string;
  consumerName: string;
  filterSubjects: string[];
  maxAckPending: number;
  ackWait: number; // milliseconds
  maxDeliver: number;
  batchSize: number;
  /** Messages processed concurrently by this process */
  maxInFlight: number;
}

export interface ProcessResult {
  success: boolean;
  retryable?: boolean;
  error?: Error;
  /** Label for the processed-messages metric */
  command?: string;
}

export interface ConsumerStats {
  processed: number;
  errored: number;
  running: boolean;
}

/**
 * The parts of a JetStream message the consumer uses
 */
export interface ConsumedMessage {
  subject: string;
  data: Uint8Array;
  info: { redeliveryCount: number };
  ack(): void;
  nak(millis?: number): void;
  term(reason?: string): void;
}

const MAX_NAK_DELAY_MS = 30_000;
const BASE_NAK_DELAY_MS = 1_000;

export function nakDelay(redeliveryCount: number): number {
  const exponent = Math.max(0, redeliveryCount - 1);
  return Math.min(BASE_NAK_DELAY_MS * 2 ** exponent, MAX_NAK_DELAY_MS);
}

// --------------------------------------------------------------------------
// Base class
// --------------------------------------------------------------------------

export abstract class BaseNatsConsumer<TPayload = unknown> {
  protected readonly log: Logger;
  protected readonly config: BaseConsumerConfig;
  private messages: ConsumerMessages | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private running = false;
  private processed = 0;
  private errored = 0;

  constructor(config: BaseConsumerConfig, logger: Logger) {
    this.config = config;
    this.log = logger.child({ component: this.constructor.name, consumer: config.consumerName });
  }

  abstract processMessage(payload: TPayload, msg: ConsumedMessage): Promise<ProcessResult>;

  /** Narrow the decoded JSON; return null to terminate the message */
  protected abstract decode(raw: unknown): TPayload | null;

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): ConsumerStats {
    return { processed: this.processed, errored: this.errored, running: this.running };
  }

  /**
   * Pull messages until `stop()` is called
   */
  async start(js: JetStreamClient): Promise<void> {
    const consumer = await js.consumers.get(this.config.streamName, this.config.consumerName);
    const messages = await consumer.consume({ max_messages: this.config.batchSize });
    this.messages = messages;
    this.running = true;

    this.log.info({ stream: this.config.streamName }, 'Consumer started');

    void (async () => {
      for await (const msg of messages) {
        if (this.inFlight.size >= this.config.maxInFlight) {
          await Promise.race(this.inFlight);
        }
        const task = this.handleMessage(msg).finally(() => {
          this.inFlight.delete(task);
        });
        this.inFlight.add(task);
      }
    })().catch((error: unknown) => {
      this.running = false;
      this.log.error({ error }, 'Consumer loop terminated');
    });
  }

  /**
   * Stop pulling and wait for in-flight messages
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.messages) {
      await this.messages.close();
      this.messages = null;
    }
    await Promise.allSettled([...this.inFlight]);
    this.log.info('Consumer stopped');
  }

  /**
   * Decode, process and settle one message. Never rejects. Work is handed to
   * `processMessage` before the first await so per-key ordering set up there
   * follows delivery order.
   */
  async handleMessage(msg: ConsumedMessage): Promise<void> {
    const startedAt = process.hrtime.bigint();
    const done = startActiveMessage(this.config.consumerName);

    let result: ProcessResult;
    try {
      const payload = this.decode(this.parseJson(msg));
      if (payload === null) {
        result = { success: false, retryable: false, error: new Error('Undecodable payload'), command: 'unknown' };
      } else {
        result = await this.processMessage(payload, msg);
      }
    } catch (error) {
      result = {
        success: false,
        retryable: true,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    } finally {
      done();
    }

    const seconds = Number(process.hrtime.bigint() - startedAt) / 1e9;
    const command = result.command ?? 'unknown';
    recordMessageProcessed(this.config.consumerName, command, result.success ? 'success' : 'error', seconds);
    if (!result.success) this.errored++;

    if (result.success) {
      this.processed++;
      msg.ack();
      return;
    }

    if (result.retryable) {
      const delay = nakDelay(msg.info.redeliveryCount);
      this.log.warn(
        { subject: msg.subject, error: result.error, redeliveryCount: msg.info.redeliveryCount, delay },
        'Message processing failed, will redeliver'
      );
      msg.nak(delay);
      return;
    }

    this.log.error({ subject: msg.subject, error: result.error }, 'Message processing failed, terminating');
    msg.term(result.error?.message);
  }

  private parseJson(msg: ConsumedMessage): unknown {
    try {
      return JSON.parse(new TextDecoder().decode(msg.data));
    } catch (error) {
      this.log.warn({ subject: msg.subject, error }, 'Message is not valid JSON');
      return null;
    }
  }
}
