/**
 * Observation Consumer
 *
 * Subscribes to `observations.pet.*` on the OBSERVATIONS stream and feeds
 * every message through the ingestion gate. Acks after the alert history
 * commit; redeliveries are absorbed by the gate's alert-id idempotency.
 */

import type { Logger } from 'pino';
import { BaseNatsConsumer, type BaseConsumerConfig, type ConsumedMessage, type ProcessResult } from './BaseNatsConsumer.js';
import type { AlertIngestionGate } from '../services/AlertIngestionGate.js';
import { OBSERVATION_CONSUMER } from '../services/NatsClient.js';
import { EscalationError, InconsistentStateError, InvalidObservationError } from '../utils/errors.js';
import { inconsistentState } from '../infrastructure/metrics.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface ObservationConsumerDeps {
  gate: AlertIngestionGate;
}

export type ObservationConsumerConfig = Pick<
  BaseConsumerConfig,
  'maxAckPending' | 'ackWait' | 'maxDeliver' | 'batchSize' | 'maxInFlight'
>;

// --------------------------------------------------------------------------
// Consumer
// --------------------------------------------------------------------------

export class ObservationNatsConsumer extends BaseNatsConsumer<object> {
  private readonly gate: AlertIngestionGate;

  constructor(deps: ObservationConsumerDeps, options: ObservationConsumerConfig, logger: Logger) {
    super(
      {
        streamName: 'OBSERVATIONS',
        consumerName: OBSERVATION_CONSUMER,
        filterSubjects: ['observations.pet.*'],
        ...options,
      },
      logger
    );
    this.gate = deps.gate;
  }

  protected decode(raw: unknown): object | null {
    return typeof raw === 'object' && raw !== null ? raw : null;
  }

  async processMessage(payload: object, msg: ConsumedMessage): Promise<ProcessResult> {
    try {
      const result = await this.gate.ingest(payload);
      const command = result.status === 'resolved' || result.status === 'no_change' ? 'normal' : 'unusual';

      this.log.debug({ subject: msg.subject, status: result.status }, 'Observation processed');
      return { success: true, command };
    } catch (error) {
      return this.classify(error, msg);
    }
  }

  private classify(error: unknown, msg: ConsumedMessage): ProcessResult {
    const err = error instanceof Error ? error : new Error(String(error));

    if (error instanceof InvalidObservationError) {
      this.log.warn({ subject: msg.subject, issues: error.issues }, 'Invalid observation, terminal (will not retry)');
      return { success: false, retryable: false, error: err, command: 'invalid' };
    }

    if (error instanceof InconsistentStateError) {
      inconsistentState.inc();
      this.log.error({ subject: msg.subject, petId: error.petId, error }, 'Pet alert state is inconsistent');
      return { success: false, retryable: false, error: err, command: 'unusual' };
    }

    const retryable = error instanceof EscalationError ? error.retryable : true;
    return { success: false, retryable, error: err, command: 'unusual' };
  }
}

// --------------------------------------------------------------------------
// Factory
// --------------------------------------------------------------------------

export function createObservationNatsConsumer(
  deps: ObservationConsumerDeps,
  options: ObservationConsumerConfig,
  logger: Logger
): ObservationNatsConsumer {
  return new ObservationNatsConsumer(deps, options, logger);
}
