/**
 * Escalation Worker Metrics
 *
 * Prometheus-compatible metrics. `unusual_events_total`, `critical_alerts_total`
 * and `queue_depth` keep the names existing dashboards scrape.
 */

import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import type { Tier } from '../types.js';

// Create a dedicated registry
export const registry = new Registry();

// Collect default Node.js metrics
collectDefaultMetrics({ register: registry });

// ==============================================================================
// Message Processing Metrics
// ==============================================================================

export const messagesProcessed = new Counter({
  name: 'worker_messages_processed_total',
  help: 'Total messages processed',
  labelNames: ['consumer', 'status', 'command'] as const,
  registers: [registry],
});

export const messageProcessingDuration = new Histogram({
  name: 'worker_message_processing_duration_seconds',
  help: 'Message processing duration in seconds',
  labelNames: ['consumer', 'command'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const activeMessages = new Gauge({
  name: 'worker_active_messages',
  help: 'Currently processing messages',
  labelNames: ['consumer'] as const,
  registers: [registry],
});

// ==============================================================================
// Escalation Metrics
// ==============================================================================

export const unusualEvents = new Counter({
  name: 'unusual_events_total',
  help: 'Unusual behaviour observations admitted as alerts',
  labelNames: ['pet_id'] as const,
  registers: [registry],
});

export const criticalAlerts = new Counter({
  name: 'critical_alerts_total',
  help: 'Alerts handled at the critical tier',
  registers: [registry],
});

export const interventions = new Counter({
  name: 'escalation_interventions_total',
  help: 'Interventions executed by tier',
  labelNames: ['tier'] as const,
  registers: [registry],
});

export const notifications = new Counter({
  name: 'escalation_notifications_total',
  help: 'Owner and contact notifications by outcome',
  labelNames: ['channel', 'status'] as const,
  registers: [registry],
});

export const playbackFailures = new Counter({
  name: 'escalation_playback_failures_total',
  help: 'Playback signals that exhausted the retry budget',
  registers: [registry],
});

export const alertsResolved = new Counter({
  name: 'escalation_alerts_resolved_total',
  help: 'Alerts resolved by reason',
  labelNames: ['reason'] as const,
  registers: [registry],
});

export const inconsistentState = new Counter({
  name: 'escalation_inconsistent_state_total',
  help: 'Pets whose open-alert state failed the invariant check',
  registers: [registry],
});

export const acknowledgmentDuration = new Histogram({
  name: 'escalation_alert_acknowledgment_duration_seconds',
  help: 'Time from owner notification to acknowledgement',
  buckets: [10, 30, 60, 120, 300, 600, 1800, 3600],
  registers: [registry],
});

// ==============================================================================
// Queue Metrics
// ==============================================================================

export const queueDepth = new Gauge({
  name: 'queue_depth',
  help: 'Messages waiting in a queue',
  labelNames: ['queue'] as const,
  registers: [registry],
});

// ==============================================================================
// Helper Functions
// ==============================================================================

/**
 * Record message processing
 */
export function recordMessageProcessed(
  consumer: string,
  command: string,
  status: 'success' | 'error',
  durationSeconds: number,
): void {
  messagesProcessed.labels(consumer, status, command).inc();
  messageProcessingDuration.labels(consumer, command).observe(durationSeconds);
}

/**
 * Start tracking active message
 */
export function startActiveMessage(consumer: string): () => void {
  activeMessages.labels(consumer).inc();
  return () => activeMessages.labels(consumer).dec();
}

export function recordIntervention(tier: Tier): void {
  interventions.labels(tier).inc();
}

export function recordNotification(channel: string, status: 'sent' | 'failed'): void {
  notifications.labels(channel, status).inc();
}

/**
 * Collect all metrics as string
 */
export async function collectMetrics(): Promise<string> {
  return registry.metrics();
}
