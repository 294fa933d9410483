/**
 * Intervention Executor
 *
 * Carries out a Decision for one alert, at most once. The execution marker,
 * the tier/action fields and any automatic quick action are written in a
 * single pet transaction; side effects (playback, notification) run after
 * the commit and only degrade the alert when they fail.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { IAlertHistoryStore } from '../ports/alert-history-store.js';
import type { NotificationChannel, PlaybackChannel } from '../ports/intervention-channels.js';
import type { Alert, AlertPatch, Decision, EmergencyContact, PetAlertState, QuickAction } from '../types.js';
import { NotFoundError, deliver } from '../utils/errors.js';
import { criticalAlerts, playbackFailures, recordIntervention, recordNotification } from '../infrastructure/metrics.js';
import { alertEmailBody, alertSubject, quickActionMessage, videoLink, type AlertTemplateInput } from './templates.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type PlaybackOutcome = 'delivered' | 'degraded' | 'skipped';
export type NotificationOutcome = 'sent' | 'suppressed' | 'failed' | 'skipped';

export interface ExecutionResult {
  alertId: string;
  tier: Decision['tier'];
  action: Decision['action'];
  status: 'executed' | 'already_executed';
  playback: PlaybackOutcome;
  notification: NotificationOutcome;
  quickActionId: string | null;
}

export interface ExecutorConfig {
  deliveryMaxAttempts: number;
  deliveryRetryDelayMs: number;
  channelTimeoutMs: number;
  dashboardUrl: string;
}

export interface InterventionExecutorDeps {
  store: IAlertHistoryStore;
  playback: PlaybackChannel;
  notifications: NotificationChannel;
  config: ExecutorConfig;
  /** Clock, injectable for tests */
  now?: () => Date;
}

interface CommittedExecution {
  firstRun: boolean;
  alert: Alert;
  pet: PetAlertState;
  quickAction: QuickAction | null;
}

const QUICK_ACTION_TYPE = 'message';

// --------------------------------------------------------------------------
// Executor
// --------------------------------------------------------------------------

export class InterventionExecutor {
  private readonly log: Logger;
  private readonly store: IAlertHistoryStore;
  private readonly playback: PlaybackChannel;
  private readonly notifications: NotificationChannel;
  private readonly config: ExecutorConfig;
  private readonly now: () => Date;

  constructor(deps: InterventionExecutorDeps, logger: Logger) {
    this.store = deps.store;
    this.playback = deps.playback;
    this.notifications = deps.notifications;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
    this.log = logger.child({ component: 'InterventionExecutor' });
  }

  async execute(alertId: string, decision: Decision): Promise<ExecutionResult> {
    const existing = await this.store.getAlert(alertId);
    if (!existing) {
      throw new NotFoundError('Alert', alertId);
    }

    const committed = await this.commit(existing.petId, alertId, decision);
    const { alert, pet } = committed;
    const patch: AlertPatch = {};

    let playback: PlaybackOutcome = 'skipped';
    if (committed.firstRun) {
      this.log.info({ alertId, petId: alert.petId, tier: decision.tier }, `Action: ${decision.action}`);
      recordIntervention(decision.tier);

      if (decision.tier === 'critical') {
        this.log.warn({ alertId, petId: alert.petId }, `HANDLING CRITICAL ALERT: ${alertId}`);
        criticalAlerts.inc();
      } else {
        playback = await this.deliverPlayback(alert, decision);
        if (playback === 'degraded') {
          patch.deliveryDegraded = true;
        }
      }
    }

    let notification: NotificationOutcome = 'skipped';
    if (decision.notify) {
      if (alert.notificationSent) {
        notification = 'suppressed';
        this.log.debug({ alertId }, 'Owner already notified, suppressing duplicate');
      } else if (await this.notifyOwner(alert, pet, decision)) {
        notification = 'sent';
        patch.notificationSent = true;
        patch.notificationChannels = [...this.notifications.channels];
        patch.userNotifiedAt = this.now();
      } else {
        notification = 'failed';
        patch.deliveryDegraded = true;
      }
    }

    if (Object.keys(patch).length > 0) {
      await this.store.withPetTransaction(alert.petId, (tx) => tx.updateAlert(alertId, patch));
    }

    return {
      alertId,
      tier: decision.tier,
      action: decision.action,
      status: committed.firstRun ? 'executed' : 'already_executed',
      playback,
      notification,
      quickActionId: committed.quickAction?.id ?? null,
    };
  }

  // --------------------------------------------------------------------------
  // Transactional part
  // --------------------------------------------------------------------------

  private commit(petId: string, alertId: string, decision: Decision): Promise<CommittedExecution> {
    return this.store.withPetTransaction(petId, async (tx) => {
      const pet = await tx.loadPet();
      if (!pet) {
        throw new NotFoundError('Pet', petId);
      }
      const alert = await tx.findAlert(alertId);
      if (!alert) {
        throw new NotFoundError('Alert', alertId);
      }

      const marker = await tx.findExecution(alertId);
      if (marker) {
        this.log.debug({ alertId, executedAt: marker.executedAt }, 'Intervention already executed');
        return { firstRun: false, alert, pet, quickAction: null };
      }

      const executedAt = this.now();
      const patch: AlertPatch = {
        tier: decision.tier,
        interventionAction: decision.action,
        interventionTime: executedAt,
      };

      let quickAction: QuickAction | null = null;
      if (decision.quickAction) {
        const contacts = await tx.listEmergencyContacts(pet.userId);
        const contact = contacts[0];
        if (contact) {
          quickAction = await tx.findPendingQuickAction(contact.id);
          if (quickAction) {
            this.log.info(
              { alertId, quickActionId: quickAction.id, contactId: contact.id },
              'Contact already has a pending quick action, not creating another'
            );
          } else {
            quickAction = this.buildQuickAction(alert, pet, contact, executedAt);
            await tx.insertQuickAction(quickAction);
            this.log.info({ alertId, quickActionId: quickAction.id, contactId: contact.id }, 'Quick action queued');
          }
          if (alert.outcome === 'pending') {
            patch.outcome = 'escalated';
          }
        } else {
          this.log.warn({ alertId, userId: pet.userId }, 'No active emergency contact, alert left pending');
        }
      }

      const updated = await tx.updateAlert(alertId, patch);
      await tx.insertExecution({ alertId, tier: decision.tier, action: decision.action, executedAt });

      return { firstRun: true, alert: updated, pet, quickAction };
    });
  }

  private buildQuickAction(alert: Alert, pet: PetAlertState, contact: EmergencyContact, at: Date): QuickAction {
    const clips = alert.videoId ? [alert.videoId] : [];
    return {
      id: randomUUID(),
      alertId: alert.id,
      emergencyContactId: contact.id,
      actionType: QUICK_ACTION_TYPE,
      message: quickActionMessage(this.templateInput(alert, pet, 'critical')),
      videoClipIds: clips,
      status: 'pending',
      origin: 'automatic',
      sentAt: null,
      acknowledgedAt: null,
      errorMessage: null,
      createdAt: at,
    };
  }

  // --------------------------------------------------------------------------
  // Side effects
  // --------------------------------------------------------------------------

  private async deliverPlayback(alert: Alert, decision: Decision): Promise<PlaybackOutcome> {
    const signal = {
      alertId: alert.id,
      petId: alert.petId,
      action: decision.action,
      tier: decision.tier,
      issuedAt: this.now(),
    };

    try {
      await this.retrying(() => this.playback.play(signal), 'playback');
      return 'delivered';
    } catch (error) {
      this.log.warn({ error, alertId: alert.id, action: decision.action }, 'Playback delivery failed, alert degraded');
      playbackFailures.inc();
      return 'degraded';
    }
  }

  private async notifyOwner(alert: Alert, pet: PetAlertState, decision: Decision): Promise<boolean> {
    const input = this.templateInput(alert, pet, decision.tier);
    try {
      await this.retrying(
        () =>
          this.notifications.notifyOwner({
            alertId: alert.id,
            petId: alert.petId,
            userId: pet.userId,
            petName: pet.name,
            severity: alert.severity,
            tier: decision.tier,
            subject: alertSubject(pet.name, decision.tier),
            body: alertEmailBody(input),
          }),
        'owner notification'
      );
      for (const channel of this.notifications.channels) recordNotification(channel, 'sent');
      this.log.info({ alertId: alert.id, userId: pet.userId }, 'Owner notified');
      return true;
    } catch (error) {
      for (const channel of this.notifications.channels) recordNotification(channel, 'failed');
      this.log.warn({ error, alertId: alert.id }, 'Owner notification failed, alert degraded');
      return false;
    }
  }

  private retrying(fn: () => Promise<void>, channel: string): Promise<void> {
    return deliver(
      fn,
      channel,
      {
        maxAttempts: this.config.deliveryMaxAttempts,
        retryDelayMs: this.config.deliveryRetryDelayMs,
        timeoutMs: this.config.channelTimeoutMs,
      },
      this.log
    );
  }

  private templateInput(alert: Alert, pet: PetAlertState, tier: Decision['tier']): AlertTemplateInput {
    return {
      petName: pet.name,
      severity: alert.severity,
      tier,
      description: alert.message ?? 'Unusual behaviour detected',
      indicators: alert.indicators,
      recommendedActions: alert.recommendedActions,
      videoLink: videoLink(this.config.dashboardUrl, alert.videoId),
    };
  }
}
