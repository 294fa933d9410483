/**
 * Owner Response Service
 *
 * What a pet owner can do about an alert: send a quick action to one of
 * their emergency contacts, list or cancel quick actions, acknowledge the
 * alert. Every operation checks that the alert's pet belongs to the caller.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { IAlertHistoryStore, QuickActionView } from '../ports/alert-history-store.js';
import type { NotificationChannel } from '../ports/intervention-channels.js';
import type { Alert, PetAlertState, QuickAction } from '../types.js';
import { ConflictError, ForbiddenError, NotFoundError, deliver } from '../utils/errors.js';
import { acknowledgmentDuration, recordNotification } from '../infrastructure/metrics.js';

export interface CreateQuickActionInput {
  emergencyContactId: number;
  actionType: string;
  message: string;
  videoClipIds?: string[];
}

export interface OwnerResponseConfig {
  deliveryMaxAttempts: number;
  deliveryRetryDelayMs: number;
  channelTimeoutMs: number;
}

const QUICK_ACTION_CHANNEL = 'quick_action';

export class OwnerResponseService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: IAlertHistoryStore,
    private readonly notifications: NotificationChannel,
    private readonly config: OwnerResponseConfig,
    logger: Logger,
    now?: () => Date
  ) {
    this.log = logger.child({ component: 'OwnerResponseService' });
    this.now = now ?? (() => new Date());
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  async listAlerts(userId: string, petId: string, limit?: number): Promise<Alert[]> {
    await this.ownedPet(userId, petId);
    return this.store.listAlertsForPet(petId, limit === undefined ? {} : { limit });
  }

  async getAlert(userId: string, alertId: string): Promise<Alert> {
    const { alert } = await this.ownedAlert(userId, alertId);
    return alert;
  }

  async listQuickActions(userId: string, alertId: string): Promise<QuickActionView[]> {
    await this.ownedAlert(userId, alertId);
    return this.store.listQuickActions(alertId);
  }

  // --------------------------------------------------------------------------
  // Commands
  // --------------------------------------------------------------------------

  async createQuickAction(userId: string, alertId: string, input: CreateQuickActionInput): Promise<QuickAction> {
    const { alert } = await this.ownedAlert(userId, alertId);

    const contact = await this.store.getEmergencyContact(input.emergencyContactId);
    if (!contact) {
      throw new NotFoundError('Emergency contact', String(input.emergencyContactId));
    }
    if (contact.userId !== userId) {
      throw new ForbiddenError('Emergency contact does not belong to you');
    }

    const action: QuickAction = {
      id: randomUUID(),
      alertId,
      emergencyContactId: contact.id,
      actionType: input.actionType,
      message: input.message,
      videoClipIds: input.videoClipIds ?? [],
      status: 'pending',
      origin: 'manual',
      sentAt: null,
      acknowledgedAt: null,
      errorMessage: null,
      createdAt: this.now(),
    };

    await this.store.withPetTransaction(alert.petId, async (tx) => {
      await tx.insertQuickAction(action);
      const current = await tx.findAlert(alertId);
      if (current && current.outcome !== 'resolved') {
        await tx.updateAlert(alertId, { outcome: 'quick_action_taken' });
      }
    });

    let patch: Pick<QuickAction, 'status' | 'sentAt' | 'errorMessage'>;
    try {
      await deliver(
        () =>
          this.notifications.dispatchQuickAction({
            quickActionId: action.id,
            alertId,
            emergencyContactId: contact.id,
            actionType: action.actionType,
            contactName: contact.name,
            phone: contact.phone,
            email: contact.email,
            message: action.message,
            videoClipIds: action.videoClipIds,
          }),
        QUICK_ACTION_CHANNEL,
        {
          maxAttempts: this.config.deliveryMaxAttempts,
          retryDelayMs: this.config.deliveryRetryDelayMs,
          timeoutMs: this.config.channelTimeoutMs,
        },
        this.log
      );
      patch = { status: 'sent', sentAt: this.now(), errorMessage: null };
      recordNotification(QUICK_ACTION_CHANNEL, 'sent');
      this.log.info({ alertId, quickActionId: action.id, contactId: contact.id }, 'Quick action sent');
    } catch (error) {
      patch = {
        status: 'failed',
        sentAt: null,
        errorMessage: error instanceof Error ? error.message : String(error),
      };
      recordNotification(QUICK_ACTION_CHANNEL, 'failed');
      this.log.warn({ error, alertId, quickActionId: action.id }, 'Quick action dispatch failed');
    }

    return this.store.withPetTransaction(alert.petId, (tx) => tx.updateQuickAction(action.id, patch));
  }

  async cancelQuickAction(userId: string, quickActionId: string): Promise<QuickAction> {
    const action = await this.store.getQuickAction(quickActionId);
    if (!action) {
      throw new NotFoundError('Quick action', quickActionId);
    }
    const { alert } = await this.ownedAlert(userId, action.alertId);

    const cancelled = await this.store.withPetTransaction(alert.petId, async (tx) => {
      const current = await tx.findQuickAction(quickActionId);
      if (!current) {
        throw new NotFoundError('Quick action', quickActionId);
      }
      if (current.status !== 'pending') {
        throw new ConflictError(`Quick action ${quickActionId} is ${current.status}, only pending actions can be cancelled`);
      }
      return tx.updateQuickAction(quickActionId, { status: 'cancelled' });
    });

    this.log.info({ quickActionId, alertId: alert.id }, 'Quick action cancelled');
    return cancelled;
  }

  async acknowledgeAlert(userId: string, alertId: string, response: string | null): Promise<Alert> {
    const { alert } = await this.ownedAlert(userId, alertId);
    if (alert.userAcknowledgedAt) {
      return alert;
    }

    const acknowledgedAt = this.now();
    const updated = await this.store.withPetTransaction(alert.petId, (tx) =>
      tx.updateAlert(alertId, { userAcknowledgedAt: acknowledgedAt, userResponse: response })
    );

    const since = alert.userNotifiedAt ?? alert.createdAt;
    const seconds = Math.max(0, (acknowledgedAt.getTime() - since.getTime()) / 1000);
    acknowledgmentDuration.observe(seconds);

    this.log.info({ alertId, userId, seconds }, 'Alert acknowledged');
    return updated;
  }

  // --------------------------------------------------------------------------
  // Ownership
  // --------------------------------------------------------------------------

  private async ownedPet(userId: string, petId: string): Promise<PetAlertState> {
    const pet = await this.store.getPet(petId);
    if (!pet) {
      throw new NotFoundError('Pet', petId);
    }
    if (pet.userId !== userId) {
      throw new ForbiddenError('Pet does not belong to you');
    }
    return pet;
  }

  private async ownedAlert(userId: string, alertId: string): Promise<{ alert: Alert; pet: PetAlertState }> {
    const alert = await this.store.getAlert(alertId);
    if (!alert) {
      throw new NotFoundError('Alert', alertId);
    }
    const pet = await this.ownedPet(userId, alert.petId);
    return { alert, pet };
  }
}
