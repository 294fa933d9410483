/**
 * Tests for intervention execution and delivery degradation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { playbackFailures, registry } from '../../src/infrastructure/metrics.js';
import type { Alert, Decision } from '../../src/types.js';
import { NotFoundError, StateUnavailableError } from '../../src/utils/errors.js';
import { BASE_TIME, createEngine, type Engine } from '../helpers/engine.js';

const MILD: Decision = {
  tier: 'mild',
  action: 'play_calming_audio',
  notify: false,
  quickAction: false,
  escalationCount: 1,
  severityLevel: 'medium',
};

const NOTIFY: Decision = {
  tier: 'notify',
  action: 'play_owner_voice_urgent',
  notify: true,
  quickAction: false,
  escalationCount: 4,
  severityLevel: 'medium',
};

const CRITICAL: Decision = {
  tier: 'critical',
  action: 'send_critical_notification',
  notify: true,
  quickAction: true,
  escalationCount: 1,
  severityLevel: 'critical',
};

function seededAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    id: 'alert-1',
    petId: 'pet-1',
    alertType: 'unusual_behavior',
    severity: 'medium',
    severityLevel: 'medium',
    message: 'Scratching at the door',
    indicators: ['scratching'],
    recommendedActions: ['check on the pet'],
    videoId: 'vid-1',
    escalationCount: 1,
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
    createdAt: BASE_TIME,
    ...overrides,
  };
}

describe('InterventionExecutor', () => {
  let engine: Engine;

  beforeEach(() => {
    registry.resetMetrics();
    engine = createEngine();
    engine.store.addPet({ petId: 'pet-1', userId: 'user-1', name: 'Biscuit' });
    engine.store.addAlert(seededAlert());
    engine.store.setPetState('pet-1', { consecutiveUnusualCount: 1, openAlertId: 'alert-1' });
  });

  it('should record the tier and action and send the playback signal', async () => {
    const result = await engine.executor.execute('alert-1', MILD);

    expect(result).toEqual({
      alertId: 'alert-1',
      tier: 'mild',
      action: 'play_calming_audio',
      status: 'executed',
      playback: 'delivered',
      notification: 'skipped',
      quickActionId: null,
    });
    expect(engine.playback.signals).toEqual([
      { alertId: 'alert-1', petId: 'pet-1', action: 'play_calming_audio', tier: 'mild', issuedAt: BASE_TIME },
    ]);

    const alert = await engine.store.getAlert('alert-1');
    expect(alert?.tier).toBe('mild');
    expect(alert?.interventionAction).toBe('play_calming_audio');
    expect(alert?.interventionTime).toEqual(BASE_TIME);
    expect(engine.store.getExecution('alert-1')).toEqual({
      alertId: 'alert-1',
      tier: 'mild',
      action: 'play_calming_audio',
      executedAt: BASE_TIME,
    });
  });

  it('should not execute twice', async () => {
    await engine.executor.execute('alert-1', MILD);
    const second = await engine.executor.execute('alert-1', MILD);

    expect(second.status).toBe('already_executed');
    expect(second.playback).toBe('skipped');
    expect(engine.playback.signals).toHaveLength(1);
  });

  it('should retry playback within the attempt budget', async () => {
    engine.playback.failures = 2;

    const result = await engine.executor.execute('alert-1', MILD);

    expect(result.playback).toBe('delivered');
    expect((await engine.store.getAlert('alert-1'))?.deliveryDegraded).toBe(false);
  });

  it('should degrade the alert when playback keeps failing', async () => {
    engine.playback.failures = 3;

    const result = await engine.executor.execute('alert-1', MILD);

    expect(result.status).toBe('executed');
    expect(result.playback).toBe('degraded');
    const alert = await engine.store.getAlert('alert-1');
    expect(alert?.deliveryDegraded).toBe(true);
    expect(alert?.tier).toBe('mild');
    expect((await playbackFailures.get()).values[0]?.value).toBe(1);
  });

  it('should not retry playback on a later run', async () => {
    engine.playback.failures = 3;
    await engine.executor.execute('alert-1', MILD);
    const again = await engine.executor.execute('alert-1', MILD);

    expect(again.playback).toBe('skipped');
    expect(engine.playback.signals).toHaveLength(0);
  });

  it('should build the owner notification from the alert', async () => {
    await engine.executor.execute('alert-1', NOTIFY);

    expect(engine.notifications.notifications).toHaveLength(1);
    const sent = engine.notifications.notifications[0];
    expect(sent).toMatchObject({
      alertId: 'alert-1',
      petId: 'pet-1',
      userId: 'user-1',
      petName: 'Biscuit',
      severity: 'medium',
      tier: 'notify',
      subject: 'Biscuit is still unsettled',
    });
    expect(sent?.body.split('\n')).toEqual([
      'Biscuit needs your attention.',
      '',
      'Severity: MEDIUM',
      'Escalation tier: notify',
      'What we saw: Scratching at the door',
      '',
      'Indicators:',
      '- scratching',
      '',
      'Recommended actions:',
      '- check on the pet',
      '',
      'Watch the clip: https://dashboard.test/videos/vid-1',
    ]);
  });

  it('should mark the alert degraded when the owner cannot be notified', async () => {
    engine.notifications.notifyFailures = 3;

    const result = await engine.executor.execute('alert-1', NOTIFY);

    expect(result.notification).toBe('failed');
    const alert = await engine.store.getAlert('alert-1');
    expect(alert?.notificationSent).toBe(false);
    expect(alert?.deliveryDegraded).toBe(true);
  });

  it('should roll back when the marker cannot be written', async () => {
    engine.store.failNext('insertExecution');

    await expect(engine.executor.execute('alert-1', MILD)).rejects.toThrow(StateUnavailableError);

    const alert = await engine.store.getAlert('alert-1');
    expect(alert?.tier).toBeNull();
    expect(engine.store.getExecution('alert-1')).toBeNull();
    expect(engine.playback.signals).toHaveLength(0);
  });

  it('should keep the alert pending when the quick action cannot be stored', async () => {
    engine.store.addEmergencyContact({
      userId: 'user-1',
      contactType: 'neighbor',
      name: 'Sam',
      phone: '+1 555 0101',
      email: null,
      priority: 1,
    });
    engine.store.failNext('insertQuickAction');

    await expect(engine.executor.execute('alert-1', CRITICAL)).rejects.toThrow(StateUnavailableError);

    const alert = await engine.store.getAlert('alert-1');
    expect(alert?.outcome).toBe('pending');
    expect(alert?.tier).toBeNull();
    expect(engine.store.getExecution('alert-1')).toBeNull();
    expect(engine.store.listAllQuickActions()).toHaveLength(0);
    expect(engine.notifications.notifications).toHaveLength(0);

    await engine.executor.execute('alert-1', CRITICAL);

    const retried = await engine.store.getAlert('alert-1');
    expect(retried?.outcome).toBe('escalated');
    expect(retried?.tier).toBe('critical');
    expect(engine.store.getExecution('alert-1')).not.toBeNull();
    expect(engine.store.listAllQuickActions()).toHaveLength(1);
    expect(engine.store.listAllQuickActions()[0]?.status).toBe('pending');
  });

  it('should reject an unknown alert', async () => {
    await expect(engine.executor.execute('missing', MILD)).rejects.toThrow(NotFoundError);
  });
});
