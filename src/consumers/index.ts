/**
 * Consumer exports
 */

export {
  BaseNatsConsumer,
  nakDelay,
  type BaseConsumerConfig,
  type ConsumedMessage,
  type ConsumerStats,
  type ProcessResult,
} from './BaseNatsConsumer.js';
export {
  ObservationNatsConsumer,
  createObservationNatsConsumer,
  type ObservationConsumerConfig,
  type ObservationConsumerDeps,
} from './ObservationNatsConsumer.js';
