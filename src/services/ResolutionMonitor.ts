/**
 * Resolution Monitor
 *
 * Closes a pet's open alert when behaviour returns to normal inside the
 * monitoring window, and handles manual resolution.
 */

import type { Logger } from 'pino';
import type { IAlertHistoryStore, PetTransaction } from '../ports/alert-history-store.js';
import type { Alert, PetAlertState } from '../types.js';
import { InconsistentStateError, InvalidObservationError, NotFoundError } from '../utils/errors.js';
import { alertsResolved } from '../infrastructure/metrics.js';

export interface ResolutionMonitorConfig {
  monitoringWindowMs: number;
}

export interface Resolved {
  alertId: string;
  resolvedAt: Date;
}

export type ResolutionReason = 'normal_observation' | 'manual';

export class ResolutionMonitor {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: IAlertHistoryStore,
    private readonly config: ResolutionMonitorConfig,
    logger: Logger,
    now?: () => Date
  ) {
    this.log = logger.child({ component: 'ResolutionMonitor' });
    this.now = now ?? (() => new Date());
  }

  /**
   * A normal observation arrived for `petId`. Resolves the open alert when it
   * is still pending and `observedAt` falls inside its monitoring window.
   * Throws InvalidObservationError for a pet that does not exist.
   */
  async observeNormal(petId: string, observedAt: Date): Promise<Resolved | null> {
    const resolved = await this.store.withPetTransaction(petId, async (tx) => {
      const pet = await tx.loadPet();
      if (!pet) {
        throw new InvalidObservationError(`Unknown pet: ${petId}`, ['pet_id: unknown pet']);
      }
      if (!pet.openAlertId) {
        return null;
      }

      const alert = await this.openAlert(tx, pet);
      if (alert.outcome !== 'pending') {
        this.log.debug({ petId, alertId: alert.id, outcome: alert.outcome }, 'Open alert awaits manual resolution');
        return null;
      }

      const opened = alert.createdAt.getTime();
      const at = observedAt.getTime();
      if (at < opened || at > opened + this.config.monitoringWindowMs) {
        this.log.debug({ petId, alertId: alert.id }, 'Normal observation outside monitoring window');
        return null;
      }

      return this.close(tx, pet, alert);
    });

    if (resolved) {
      alertsResolved.labels('normal_observation').inc();
      this.log.info({ petId, alertId: resolved.alertId }, 'Resolution: Pet behavior returned to normal. Alert resolved.');
    }
    return resolved;
  }

  /**
   * Resolve an alert on request. Idempotent: an already resolved alert is
   * returned unchanged.
   */
  async resolveAlert(alertId: string): Promise<Alert> {
    const existing = await this.store.getAlert(alertId);
    if (!existing) {
      throw new NotFoundError('Alert', alertId);
    }

    const result = await this.store.withPetTransaction(existing.petId, async (tx) => {
      const alert = await tx.findAlert(alertId);
      if (!alert) {
        throw new NotFoundError('Alert', alertId);
      }
      if (alert.outcome === 'resolved') {
        return { alert, changed: false };
      }

      const pet = await tx.loadPet();
      if (pet && pet.openAlertId === alertId) {
        await this.close(tx, pet, alert);
      } else {
        await tx.updateAlert(alertId, { outcome: 'resolved', resolvedAt: this.now() });
      }

      const updated = await tx.findAlert(alertId);
      return { alert: updated ?? alert, changed: true };
    });

    if (result.changed) {
      alertsResolved.labels('manual').inc();
      this.log.info({ alertId, petId: existing.petId }, 'Alert resolved manually');
    }
    return result.alert;
  }

  private async openAlert(tx: PetTransaction, pet: PetAlertState): Promise<Alert> {
    const openAlertId = pet.openAlertId;
    const alert = openAlertId ? await tx.findAlert(openAlertId) : null;
    if (!alert) {
      throw new InconsistentStateError(pet.petId, `open alert ${openAlertId ?? 'null'} does not exist`);
    }
    if (pet.consecutiveUnusualCount < 1) {
      throw new InconsistentStateError(pet.petId, 'open alert recorded with a zero count');
    }
    return alert;
  }

  private async close(tx: PetTransaction, pet: PetAlertState, alert: Alert): Promise<Resolved> {
    const resolvedAt = this.now();
    await tx.updateAlert(alert.id, { outcome: 'resolved', resolvedAt });
    await tx.savePetState({ consecutiveUnusualCount: 0, openAlertId: null });
    this.log.debug({ petId: pet.petId, previousCount: pet.consecutiveUnusualCount }, 'Escalation count reset');
    return { alertId: alert.id, resolvedAt };
  }
}
