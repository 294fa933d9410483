/**
 * Alert Ingestion Gate
 *
 * Entry point for every observation. Validates the wire payload, serializes
 * work per pet in arrival order and drives admission, the policy decision,
 * execution and resolution.
 *
 * Delivery is at-least-once: a redelivered observation is recognised by its
 * alert id and only resumes whatever work did not finish the first time.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { IAlertHistoryStore } from '../ports/alert-history-store.js';
import { ALERT_TYPES, SEVERITY_LEVELS } from '../types.js';
import type { Alert, Decision, Observation, PetAlertState } from '../types.js';
import { InconsistentStateError, InvalidObservationError } from '../utils/errors.js';
import { KeyedSerializer } from '../utils/KeyedSerializer.js';
import { unusualEvents } from '../infrastructure/metrics.js';
import { effectiveSeverity, floorSeverity, type EscalationPolicy } from './EscalationPolicy.js';
import type { ExecutionResult, InterventionExecutor } from './InterventionExecutor.js';
import type { Resolved, ResolutionMonitor } from './ResolutionMonitor.js';

// =============================================================================
// Wire Schema
// =============================================================================

const severitySchema = z.enum(SEVERITY_LEVELS);
const stringList = z.array(z.string());

/** Pet ids become one NATS subject token, so `.`, `*`, `>` and spaces are refused */
export const PET_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export const observationPayloadSchema = z.object({
  alert_id: z.string().min(1).max(128).optional(),
  pet_id: z
    .union([
      z.string().regex(PET_ID_PATTERN, 'Pet id must be 1-64 letters, digits, "_" or "-"'),
      z.number().int().nonnegative(),
    ])
    .transform(String),
  is_unusual: z.boolean(),
  severity_level: severitySchema.optional(),
  alert_type: z.enum(ALERT_TYPES).optional(),
  critical_indicators: stringList.optional(),
  recommended_actions: stringList.optional(),
  message: z.string().max(2000).nullish(),
  video_id: z.union([z.string(), z.number()]).nullish(),
  timestamp: z.string().datetime({ offset: true }),
  context: z
    .object({
      severity_level: severitySchema.optional(),
      critical_indicators: stringList.optional(),
      recommended_actions: stringList.optional(),
    })
    .passthrough()
    .optional(),
});

export type ObservationPayload = z.output<typeof observationPayloadSchema>;

/**
 * Stable id for payloads that arrive without one, so redeliveries collide.
 */
export function deriveAlertId(petId: string, timestamp: string, videoId: string | null): string {
  return createHash('sha256')
    .update(`${petId}|${timestamp}|${videoId ?? ''}`)
    .digest('hex')
    .slice(0, 32);
}

/**
 * Validate the wire shape. Throws InvalidObservationError listing every
 * problem found.
 */
export function parsePayload(raw: unknown): ObservationPayload {
  const result = observationPayloadSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidObservationError('Invalid observation payload', issues);
  }
  return result.data;
}

/**
 * Normalize a validated payload, lifting fields from `context` where the
 * top level omits them.
 */
export function toObservation(p: ObservationPayload): Observation {
  const severityLevel = p.severity_level ?? p.context?.severity_level;
  if (!severityLevel) {
    throw new InvalidObservationError('Invalid observation payload', ['severity_level: Required']);
  }

  const videoId = p.video_id === null || p.video_id === undefined ? null : String(p.video_id);

  return {
    alertId: p.alert_id ?? deriveAlertId(p.pet_id, p.timestamp, videoId),
    petId: p.pet_id,
    isUnusual: p.is_unusual,
    severityLevel,
    alertType: p.alert_type ?? 'unusual_behavior',
    indicators: [...new Set(p.critical_indicators ?? p.context?.critical_indicators ?? [])],
    recommendedActions: [...new Set(p.recommended_actions ?? p.context?.recommended_actions ?? [])],
    message: p.message ?? null,
    videoId,
    observedAt: new Date(p.timestamp),
  };
}

export function parseObservation(raw: unknown): Observation {
  return toObservation(parsePayload(raw));
}

/**
 * open_alert_id is null exactly when the count is zero
 */
export function assertPetInvariant(pet: PetAlertState): void {
  const hasOpen = pet.openAlertId !== null;
  const hasCount = pet.consecutiveUnusualCount > 0;
  if (hasOpen !== hasCount || pet.consecutiveUnusualCount < 0) {
    throw new InconsistentStateError(
      pet.petId,
      `open alert ${pet.openAlertId ?? 'null'} with count ${pet.consecutiveUnusualCount}`
    );
  }
}

// =============================================================================
// Gate
// =============================================================================

export type IngestResult =
  | { status: 'admitted'; alertId: string; decision: Decision; execution: ExecutionResult }
  | { status: 'duplicate'; alertId: string; decision: Decision; execution: ExecutionResult }
  | { status: 'resolved'; petId: string; resolved: Resolved }
  | { status: 'no_change'; petId: string };

interface Admission {
  duplicate: boolean;
  alert: Alert;
  pet: PetAlertState;
}

export interface AlertIngestionGateDeps {
  store: IAlertHistoryStore;
  policy: EscalationPolicy;
  executor: InterventionExecutor;
  monitor: ResolutionMonitor;
  serializer?: KeyedSerializer;
}

export class AlertIngestionGate {
  private readonly log: Logger;
  private readonly store: IAlertHistoryStore;
  private readonly policy: EscalationPolicy;
  private readonly executor: InterventionExecutor;
  private readonly monitor: ResolutionMonitor;
  private readonly serializer: KeyedSerializer;

  constructor(deps: AlertIngestionGateDeps, logger: Logger) {
    this.store = deps.store;
    this.policy = deps.policy;
    this.executor = deps.executor;
    this.monitor = deps.monitor;
    this.serializer = deps.serializer ?? new KeyedSerializer();
    this.log = logger.child({ component: 'AlertIngestionGate' });
  }

  /**
   * Parse and process a raw payload. Parsing happens before the first await,
   * so calls for the same pet are queued in the order they were made.
   */
  ingest(raw: unknown): Promise<IngestResult> {
    let observation: Observation;
    try {
      observation = parseObservation(raw);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.ingestObservation(observation);
  }

  ingestObservation(observation: Observation): Promise<IngestResult> {
    return this.serializer.run(observation.petId, () => this.process(observation));
  }

  private async process(observation: Observation): Promise<IngestResult> {
    if (!observation.isUnusual) {
      const resolved = await this.monitor.observeNormal(observation.petId, observation.observedAt);
      return resolved
        ? { status: 'resolved', petId: observation.petId, resolved }
        : { status: 'no_change', petId: observation.petId };
    }

    const admission = await this.admit(observation);
    const { alert, pet } = admission;

    if (admission.duplicate) {
      this.log.info({ alertId: alert.id, petId: alert.petId }, 'Duplicate observation, resuming unfinished work');
    } else {
      unusualEvents.labels(alert.petId).inc();
      this.log.info(
        { alertId: alert.id, petId: alert.petId, escalationCount: alert.escalationCount, severity: alert.severity },
        'Unusual behaviour alert admitted'
      );
    }

    const decision = this.policy.decide(pet, alert);
    const execution = await this.executor.execute(alert.id, decision);

    return {
      status: admission.duplicate ? 'duplicate' : 'admitted',
      alertId: alert.id,
      decision,
      execution,
    };
  }

  private admit(observation: Observation): Promise<Admission> {
    const { petId } = observation;

    return this.store.withPetTransaction(petId, async (tx) => {
      const pet = await tx.loadPet();
      if (!pet) {
        throw new InvalidObservationError(`Unknown pet: ${petId}`, ['pet_id: unknown pet']);
      }
      assertPetInvariant(pet);

      const existing = await tx.findAlert(observation.alertId);
      if (existing) {
        if (existing.petId !== petId) {
          throw new InvalidObservationError(`Alert ${observation.alertId} belongs to another pet`, ['alert_id']);
        }
        return { duplicate: true, alert: existing, pet };
      }

      let count = 1;
      if (pet.openAlertId) {
        const open = await tx.findAlert(pet.openAlertId);
        if (!open) {
          throw new InconsistentStateError(petId, `open alert ${pet.openAlertId} does not exist`);
        }
        if (open.outcome === 'pending') {
          await tx.updateAlert(open.id, { outcome: 'escalated' });
        }
        count = pet.consecutiveUnusualCount + 1;
      }

      const thresholds = this.policy.config;
      const alert: Alert = {
        id: observation.alertId,
        petId,
        alertType: observation.alertType,
        severity: effectiveSeverity(observation.severityLevel, count, thresholds),
        severityLevel: floorSeverity(observation.severityLevel),
        message: observation.message,
        indicators: observation.indicators,
        recommendedActions: observation.recommendedActions,
        videoId: observation.videoId,
        escalationCount: count,
        tier: null,
        interventionAction: null,
        interventionTime: null,
        outcome: 'pending',
        notificationSent: false,
        notificationChannels: [],
        userNotifiedAt: null,
        userAcknowledgedAt: null,
        userResponse: null,
        deliveryDegraded: false,
        resolvedAt: null,
        createdAt: observation.observedAt,
      };

      await tx.insertAlert(alert);
      const next: PetAlertState = { ...pet, consecutiveUnusualCount: count, openAlertId: alert.id };
      await tx.savePetState(next);

      return { duplicate: false, alert, pet: next };
    });
  }
}
