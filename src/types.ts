/**
 * Domain types shared by the escalation engine, its stores and its channels.
 */

// --------------------------------------------------------------------------
// Severity
// --------------------------------------------------------------------------

/** Ordered from least to most severe */
export const SEVERITY_LEVELS = ['info', 'low', 'medium', 'high', 'critical'] as const;

export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

export function severityRank(level: SeverityLevel): number {
  return SEVERITY_LEVELS.indexOf(level);
}

export function isAtLeast(level: SeverityLevel, floor: SeverityLevel): boolean {
  return severityRank(level) >= severityRank(floor);
}

/**
 * Behaviour categories reported by the analysis step.
 * Only `unusual_behavior` is produced by the video worker today.
 */
export const ALERT_TYPES = [
  'pacing',
  'vocalization',
  'position_changes',
  'door_proximity',
  'restlessness',
  'attention_seeking',
  'unusual_behavior',
] as const;

export type AlertType = (typeof ALERT_TYPES)[number];

// --------------------------------------------------------------------------
// Observation
// --------------------------------------------------------------------------

/**
 * A single analysis result for one uploaded video (normalized)
 */
export interface Observation {
  /** Idempotency key; becomes the Alert id for unusual observations */
  alertId: string;
  petId: string;
  isUnusual: boolean;
  severityLevel: SeverityLevel;
  alertType: AlertType;
  indicators: string[];
  recommendedActions: string[];
  message: string | null;
  videoId: string | null;
  observedAt: Date;
}

// --------------------------------------------------------------------------
// Escalation
// --------------------------------------------------------------------------

export const TIERS = ['mild', 'moderate', 'notify', 'critical'] as const;

export type Tier = (typeof TIERS)[number];

export type InterventionAction =
  | 'play_calming_audio'
  | 'play_owner_voice'
  | 'play_owner_voice_urgent'
  | 'send_critical_notification';

export interface Decision {
  tier: Tier;
  action: InterventionAction;
  notify: boolean;
  quickAction: boolean;
  /** N used for the decision (the pet's consecutive unusual count) */
  escalationCount: number;
  severityLevel: SeverityLevel;
}

// --------------------------------------------------------------------------
// Persistence records
// --------------------------------------------------------------------------

export type AlertOutcome = 'pending' | 'escalated' | 'resolved' | 'quick_action_taken';

export interface Alert {
  id: string;
  petId: string;
  alertType: AlertType;
  /** Effective severity after repetition escalation */
  severity: SeverityLevel;
  severityLevel: SeverityLevel;
  message: string | null;
  indicators: string[];
  recommendedActions: string[];
  videoId: string | null;
  escalationCount: number;
  tier: Tier | null;
  interventionAction: InterventionAction | null;
  interventionTime: Date | null;
  outcome: AlertOutcome;
  notificationSent: boolean;
  notificationChannels: string[];
  userNotifiedAt: Date | null;
  userAcknowledgedAt: Date | null;
  userResponse: string | null;
  deliveryDegraded: boolean;
  resolvedAt: Date | null;
  createdAt: Date;
}

export type AlertPatch = Partial<
  Pick<
    Alert,
    | 'tier'
    | 'interventionAction'
    | 'interventionTime'
    | 'outcome'
    | 'notificationSent'
    | 'notificationChannels'
    | 'userNotifiedAt'
    | 'userAcknowledgedAt'
    | 'userResponse'
    | 'deliveryDegraded'
    | 'resolvedAt'
  >
>;

/**
 * The alert-related view of a pet
 */
export interface PetAlertState {
  petId: string;
  userId: string;
  name: string;
  consecutiveUnusualCount: number;
  openAlertId: string | null;
}

export interface ExecutionMarker {
  alertId: string;
  tier: Tier;
  action: InterventionAction;
  executedAt: Date;
}

export type QuickActionStatus = 'pending' | 'sent' | 'acknowledged' | 'cancelled' | 'failed';

export type QuickActionOrigin = 'automatic' | 'manual';

export interface QuickAction {
  id: string;
  alertId: string;
  emergencyContactId: number;
  actionType: string;
  message: string;
  videoClipIds: string[];
  status: QuickActionStatus;
  origin: QuickActionOrigin;
  sentAt: Date | null;
  acknowledgedAt: Date | null;
  errorMessage: string | null;
  createdAt: Date;
}

export type QuickActionPatch = Partial<
  Pick<QuickAction, 'status' | 'sentAt' | 'acknowledgedAt' | 'errorMessage'>
>;

export interface EmergencyContact {
  id: number;
  userId: string;
  contactType: string;
  name: string;
  phone: string;
  email: string | null;
  /** Ascending: 1 is contacted first */
  priority: number;
  isActive: boolean;
}
