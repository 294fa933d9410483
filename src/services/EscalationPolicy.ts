/**
 * Escalation Policy Engine
 *
 * Maps (escalation count, severity) to an intervention tier through an
 * ordered rule table. First matching rule wins. Pure: no I/O, no clock.
 */

import type { Alert, Decision, InterventionAction, PetAlertState, SeverityLevel, Tier } from '../types.js';
import { isAtLeast } from '../types.js';
import { InconsistentStateError } from '../utils/errors.js';

export interface PolicyThresholds {
  moderateAt: number;
  notifyAt: number;
  criticalAt: number;
  minEscalationSeverity: SeverityLevel;
}

export const DEFAULT_POLICY: PolicyThresholds = {
  moderateAt: 3,
  notifyAt: 4,
  criticalAt: 5,
  minEscalationSeverity: 'low',
};

export interface PolicyRule {
  name: string;
  matches: (count: number, severity: SeverityLevel, t: PolicyThresholds) => boolean;
  tier: Tier;
  action: InterventionAction;
  notify: boolean;
  quickAction: boolean;
}

export const POLICY_RULES: readonly PolicyRule[] = [
  {
    name: 'critical-severity',
    matches: (_n, severity) => severity === 'critical',
    tier: 'critical',
    action: 'send_critical_notification',
    notify: true,
    quickAction: true,
  },
  {
    name: 'critical-repetition',
    matches: (n, _s, t) => n >= t.criticalAt,
    tier: 'critical',
    action: 'send_critical_notification',
    notify: true,
    quickAction: true,
  },
  {
    name: 'notify',
    matches: (n, s, t) => n >= t.notifyAt && isAtLeast(s, t.minEscalationSeverity),
    tier: 'notify',
    action: 'play_owner_voice_urgent',
    notify: true,
    quickAction: false,
  },
  {
    name: 'moderate',
    matches: (n, s, t) => n >= t.moderateAt && isAtLeast(s, t.minEscalationSeverity),
    tier: 'moderate',
    action: 'play_owner_voice',
    notify: false,
    quickAction: false,
  },
  {
    name: 'mild',
    matches: (n) => n >= 1,
    tier: 'mild',
    action: 'play_calming_audio',
    notify: false,
    quickAction: false,
  },
];

export function validateThresholds(t: PolicyThresholds): void {
  if (!(1 < t.moderateAt && t.moderateAt < t.notifyAt && t.notifyAt < t.criticalAt)) {
    throw new Error(
      `Invalid escalation thresholds: require 1 < moderateAt (${t.moderateAt}) < notifyAt (${t.notifyAt}) < criticalAt (${t.criticalAt})`
    );
  }
}

/**
 * Severity floored to `low`; info-level observations still escalate as low.
 */
export function floorSeverity(level: SeverityLevel): SeverityLevel {
  return level === 'info' ? 'low' : level;
}

/**
 * Severity persisted on the alert row: critical stays critical, repetition at
 * the critical threshold raises the alert to high.
 */
export function effectiveSeverity(level: SeverityLevel, count: number, t: PolicyThresholds): SeverityLevel {
  if (level === 'critical') {
    return 'critical';
  }
  const floored = floorSeverity(level);
  if (count >= t.criticalAt && !isAtLeast(floored, 'high')) {
    return 'high';
  }
  return floored;
}

export class EscalationPolicy {
  private readonly thresholds: PolicyThresholds;

  constructor(thresholds: Partial<PolicyThresholds> = {}) {
    this.thresholds = { ...DEFAULT_POLICY, ...thresholds };
    validateThresholds(this.thresholds);
  }

  get config(): Readonly<PolicyThresholds> {
    return this.thresholds;
  }

  /**
   * Decide the intervention for a newly admitted alert.
   *
   * `pet` is the state read in the admission transaction (or later, on a
   * resumed redelivery). Only `alert.escalationCount` and
   * `alert.severityLevel` drive the outcome.
   */
  decide(pet: PetAlertState, alert: Pick<Alert, 'id' | 'escalationCount' | 'severityLevel'>): Decision {
    const count = alert.escalationCount;

    if (!Number.isInteger(count) || count < 1) {
      throw new InconsistentStateError(pet.petId, `alert ${alert.id} has escalation count ${count}`);
    }
    if (pet.openAlertId === alert.id && pet.consecutiveUnusualCount !== count) {
      throw new InconsistentStateError(
        pet.petId,
        `open alert ${alert.id} has escalation count ${count} but pet count is ${pet.consecutiveUnusualCount}`
      );
    }

    const severity = floorSeverity(alert.severityLevel);
    const rule = POLICY_RULES.find((r) => r.matches(count, severity, this.thresholds));
    if (!rule) {
      throw new InconsistentStateError(pet.petId, `no policy rule matched count ${count}`);
    }

    return {
      tier: rule.tier,
      action: rule.action,
      notify: rule.notify,
      quickAction: rule.quickAction,
      escalationCount: count,
      severityLevel: severity,
    };
  }
}
