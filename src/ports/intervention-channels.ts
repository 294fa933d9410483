/**
 * Outbound intervention channels.
 *
 * Implementations publish to the broker; tests substitute recording fakes.
 * A rejected promise counts as one failed delivery attempt.
 */

import type { InterventionAction, SeverityLevel, Tier } from '../types.js';

export interface PlaybackSignal {
  alertId: string;
  petId: string;
  action: InterventionAction;
  tier: Tier;
  issuedAt: Date;
}

export interface OwnerNotification {
  alertId: string;
  petId: string;
  userId: string;
  petName: string;
  severity: SeverityLevel;
  tier: Tier;
  subject: string;
  body: string;
}

export interface QuickActionDispatch {
  quickActionId: string;
  alertId: string;
  emergencyContactId: number;
  actionType: string;
  contactName: string;
  phone: string;
  email: string | null;
  message: string;
  videoClipIds: string[];
}

export interface PlaybackChannel {
  play(signal: PlaybackSignal): Promise<void>;
}

export interface NotificationChannel {
  /** Channel names reported on the alert's `notificationChannels` */
  readonly channels: string[];

  notifyOwner(notification: OwnerNotification): Promise<void>;

  dispatchQuickAction(dispatch: QuickActionDispatch): Promise<void>;
}
