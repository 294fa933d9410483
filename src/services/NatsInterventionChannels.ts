/**
 * Broker-backed intervention channels and the observation publisher used by
 * the HTTP ingress. Downstream gateways turn these messages into audio
 * playback, e-mail and SMS.
 */

import type { Logger } from 'pino';
import type {
  NotificationChannel,
  OwnerNotification,
  PlaybackChannel,
  PlaybackSignal,
  QuickActionDispatch,
} from '../ports/intervention-channels.js';
import type { ObservationPayload } from './AlertIngestionGate.js';
import { SUBJECTS, type NatsClient } from './NatsClient.js';

export type MessagePublisher = Pick<NatsClient, 'publish'>;

/** Delivery channels the notification gateway fans out to */
export const OWNER_CHANNELS = ['email', 'sms'] as const;

export class NatsPlaybackChannel implements PlaybackChannel {
  constructor(private readonly publisher: MessagePublisher) {}

  async play(signal: PlaybackSignal): Promise<void> {
    await this.publisher.publish(
      SUBJECTS.playback(signal.petId),
      {
        alert_id: signal.alertId,
        pet_id: signal.petId,
        action: signal.action,
        tier: signal.tier,
        issued_at: signal.issuedAt.toISOString(),
      },
      { msgID: `playback:${signal.alertId}` }
    );
  }
}

export class NatsNotificationChannel implements NotificationChannel {
  readonly channels: string[] = [...OWNER_CHANNELS];

  constructor(private readonly publisher: MessagePublisher) {}

  async notifyOwner(n: OwnerNotification): Promise<void> {
    await this.publisher.publish(
      SUBJECTS.ownerNotification(n.petId),
      {
        alert_id: n.alertId,
        pet_id: n.petId,
        user_id: n.userId,
        pet_name: n.petName,
        severity: n.severity,
        tier: n.tier,
        channels: this.channels,
        subject: n.subject,
        body: n.body,
      },
      { msgID: `notify:${n.alertId}` }
    );
  }

  async dispatchQuickAction(d: QuickActionDispatch): Promise<void> {
    await this.publisher.publish(
      SUBJECTS.quickAction(d.emergencyContactId),
      {
        quick_action_id: d.quickActionId,
        alert_id: d.alertId,
        emergency_contact_id: d.emergencyContactId,
        action_type: d.actionType,
        contact_name: d.contactName,
        phone: d.phone,
        email: d.email,
        message: d.message,
        video_clip_ids: d.videoClipIds,
      },
      { msgID: `quick-action:${d.quickActionId}` }
    );
  }
}

/**
 * Puts observations received over HTTP onto the OBSERVATIONS stream.
 */
export class ObservationPublisher {
  private readonly log: Logger;

  constructor(
    private readonly publisher: MessagePublisher,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'ObservationPublisher' });
  }

  async publish(petId: string, alertId: string, payload: ObservationPayload): Promise<void> {
    await this.publisher.publish(SUBJECTS.observation(petId), { ...payload, alert_id: alertId }, { msgID: alertId });
    this.log.debug({ petId, alertId }, 'Observation queued');
  }
}
