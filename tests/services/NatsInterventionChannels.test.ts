import { describe, it, expect, beforeEach } from 'vitest';
import type { PublishOptions } from '../../src/services/NatsClient.js';
import {
  NatsNotificationChannel,
  NatsPlaybackChannel,
  ObservationPublisher,
  type MessagePublisher,
} from '../../src/services/NatsInterventionChannels.js';
import { parsePayload } from '../../src/services/AlertIngestionGate.js';
import { silentLogger } from '../helpers/engine.js';

interface Published {
  subject: string;
  data: unknown;
  options: PublishOptions | undefined;
}

class RecordingPublisher implements MessagePublisher {
  readonly published: Published[] = [];

  async publish(subject: string, data: unknown, options?: PublishOptions): Promise<void> {
    this.published.push({ subject, data, options });
  }
}

describe('NATS intervention channels', () => {
  let publisher: RecordingPublisher;

  beforeEach(() => {
    publisher = new RecordingPublisher();
  });

  it('should publish playback signals per pet', async () => {
    await new NatsPlaybackChannel(publisher).play({
      alertId: 'a-1',
      petId: 'pet-1',
      action: 'play_owner_voice',
      tier: 'moderate',
      issuedAt: new Date('2026-03-01T10:00:00.000Z'),
    });

    expect(publisher.published).toEqual([
      {
        subject: 'interventions.playback.pet-1',
        data: {
          alert_id: 'a-1',
          pet_id: 'pet-1',
          action: 'play_owner_voice',
          tier: 'moderate',
          issued_at: '2026-03-01T10:00:00.000Z',
        },
        options: { msgID: 'playback:a-1' },
      },
    ]);
  });

  it('should publish owner notifications with the delivery channels', async () => {
    const channel = new NatsNotificationChannel(publisher);
    await channel.notifyOwner({
      alertId: 'a-1',
      petId: 'pet-1',
      userId: 'user-1',
      petName: 'Biscuit',
      severity: 'high',
      tier: 'notify',
      subject: 'Biscuit is still unsettled',
      body: 'body',
    });

    expect(channel.channels).toEqual(['email', 'sms']);
    expect(publisher.published[0]?.subject).toBe('notifications.alert.pet-1');
    expect(publisher.published[0]?.options).toEqual({ msgID: 'notify:a-1' });
    expect(publisher.published[0]?.data).toMatchObject({ user_id: 'user-1', channels: ['email', 'sms'] });
  });

  it('should publish quick actions per contact', async () => {
    await new NatsNotificationChannel(publisher).dispatchQuickAction({
      quickActionId: 'qa-1',
      alertId: 'a-1',
      emergencyContactId: 7,
      actionType: 'message',
      contactName: 'Sam',
      phone: '+1 555 0101',
      email: null,
      message: 'hello',
      videoClipIds: [],
    });

    expect(publisher.published[0]?.subject).toBe('notifications.quick_action.7');
    expect(publisher.published[0]?.options).toEqual({ msgID: 'quick-action:qa-1' });
  });

  it('should queue observations with the alert id as message id', async () => {
    const payload = parsePayload({
      pet_id: 'pet-1',
      is_unusual: true,
      severity_level: 'low',
      timestamp: '2026-03-01T10:00:00Z',
    });

    await new ObservationPublisher(publisher, silentLogger).publish('pet-1', 'derived-id', payload);

    expect(publisher.published).toEqual([
      {
        subject: 'observations.pet.pet-1',
        data: {
          pet_id: 'pet-1',
          is_unusual: true,
          severity_level: 'low',
          timestamp: '2026-03-01T10:00:00Z',
          alert_id: 'derived-id',
        },
        options: { msgID: 'derived-id' },
      },
    ]);
  });
});
