/**
 * Tests for observation parsing and alert admission
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  assertPetInvariant,
  deriveAlertId,
  parseObservation,
  parsePayload,
  toObservation,
} from '../../src/services/AlertIngestionGate.js';
import { InconsistentStateError, InvalidObservationError, StateUnavailableError } from '../../src/utils/errors.js';
import { createEngine, observation, type Engine } from '../helpers/engine.js';

describe('observation parsing', () => {
  it('should normalize a complete payload', () => {
    const parsed = parseObservation({
      alert_id: 'a-1',
      pet_id: 'pet-1',
      is_unusual: true,
      severity_level: 'high',
      alert_type: 'pacing',
      critical_indicators: ['pacing', 'pacing', 'whining'],
      recommended_actions: ['check water'],
      message: 'Pacing by the door',
      video_id: 'vid-9',
      timestamp: '2026-03-01T10:00:00Z',
    });

    expect(parsed).toEqual({
      alertId: 'a-1',
      petId: 'pet-1',
      isUnusual: true,
      severityLevel: 'high',
      alertType: 'pacing',
      indicators: ['pacing', 'whining'],
      recommendedActions: ['check water'],
      message: 'Pacing by the door',
      videoId: 'vid-9',
      observedAt: new Date('2026-03-01T10:00:00Z'),
    });
  });

  it('should default the alert type and empty lists', () => {
    const parsed = parseObservation(observation('pet-1', 0));
    expect(parsed.alertType).toBe('unusual_behavior');
    expect(parsed.indicators).toEqual([]);
    expect(parsed.recommendedActions).toEqual([]);
    expect(parsed.message).toBeNull();
    expect(parsed.videoId).toBeNull();
  });

  it('should accept numeric pet and video ids', () => {
    const parsed = parseObservation({ ...observation('x', 0), pet_id: 42, video_id: 7 });
    expect(parsed.petId).toBe('42');
    expect(parsed.videoId).toBe('7');
  });

  it('should lift severity and indicators from context', () => {
    const { severity_level: _omitted, ...rest } = observation('pet-1', 0);
    const parsed = parseObservation({
      ...rest,
      context: { severity_level: 'critical', critical_indicators: ['panting'], camera: 'hall' },
    });
    expect(parsed.severityLevel).toBe('critical');
    expect(parsed.indicators).toEqual(['panting']);
  });

  it('should prefer top-level fields over context', () => {
    const parsed = parseObservation({
      ...observation('pet-1', 0, { severity_level: 'low' }),
      context: { severity_level: 'critical' },
    });
    expect(parsed.severityLevel).toBe('low');
  });

  it('should derive a stable alert id when none is given', () => {
    const { alert_id: _omitted, ...rest } = observation('pet-1', 0, { video_id: 'vid-1' });
    const first = parseObservation(rest);
    const second = parseObservation(rest);

    expect(first.alertId).toMatch(/^[0-9a-f]{32}$/);
    expect(first.alertId).toBe(second.alertId);
    expect(first.alertId).toBe(deriveAlertId('pet-1', '2026-03-01T10:00:00.000Z', 'vid-1'));
  });

  it('should list every problem with an invalid payload', () => {
    try {
      parsePayload({ severity_level: 'severe' });
      expect.fail('expected parsePayload to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidObservationError);
      if (error instanceof InvalidObservationError) {
        expect(error.issues).toContain('is_unusual: Required');
        expect(error.issues).toContain('timestamp: Required');
        expect(error.issues.some((i) => i.startsWith('severity_level:'))).toBe(true);
      }
    }
  });

  it('should require a severity somewhere', () => {
    const { severity_level: _omitted, ...rest } = observation('pet-1', 0);
    try {
      toObservation(parsePayload(rest));
      expect.fail('expected toObservation to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidObservationError);
      if (error instanceof InvalidObservationError) {
        expect(error.issues).toEqual(['severity_level: Required']);
      }
    }
  });

  it.each(['cat.1', '*', '>', 'two words', ''])('should reject the pet id %j', (petId) => {
    try {
      parsePayload(observation(petId, 0));
      expect.fail('expected parsePayload to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidObservationError);
      if (error instanceof InvalidObservationError) {
        expect(error.issues).toEqual(['pet_id: Pet id must be 1-64 letters, digits, "_" or "-"']);
      }
    }
  });

  it('should accept pet ids made of letters, digits, underscores and dashes', () => {
    expect(parseObservation(observation('Cat_01-b', 0)).petId).toBe('Cat_01-b');
  });

  it('should reject a timestamp that is not ISO 8601', () => {
    expect(() => parseObservation(observation('pet-1', 0, { timestamp: 'yesterday' }))).toThrow(InvalidObservationError);
  });
});

describe('assertPetInvariant', () => {
  const base = { petId: 'pet-1', userId: 'user-1', name: 'Biscuit' };

  it('should accept a calm pet and a pet with an open alert', () => {
    expect(() => assertPetInvariant({ ...base, consecutiveUnusualCount: 0, openAlertId: null })).not.toThrow();
    expect(() => assertPetInvariant({ ...base, consecutiveUnusualCount: 2, openAlertId: 'a' })).not.toThrow();
  });

  it('should reject a count without an open alert and the reverse', () => {
    expect(() => assertPetInvariant({ ...base, consecutiveUnusualCount: 2, openAlertId: null })).toThrow(
      InconsistentStateError
    );
    expect(() => assertPetInvariant({ ...base, consecutiveUnusualCount: 0, openAlertId: 'a' })).toThrow(
      InconsistentStateError
    );
  });
});

describe('AlertIngestionGate', () => {
  let engine: Engine;

  beforeEach(() => {
    engine = createEngine();
    engine.store.addPet({ petId: 'pet-1', userId: 'user-1', name: 'Biscuit' });
  });

  it('should admit the first unusual observation with count 1', async () => {
    const result = await engine.gate.ingest(observation('pet-1', 0));

    expect(result.status).toBe('admitted');
    const pet = await engine.store.getPet('pet-1');
    expect(pet?.consecutiveUnusualCount).toBe(1);
    expect(pet?.openAlertId).toBe('pet-1-obs-0');

    const alert = await engine.store.getAlert('pet-1-obs-0');
    expect(alert?.escalationCount).toBe(1);
    expect(alert?.outcome).toBe('pending');
    expect(alert?.tier).toBe('mild');
    expect(alert?.createdAt).toEqual(new Date('2026-03-01T10:00:00.000Z'));
  });

  it('should mark the previous open alert escalated', async () => {
    await engine.gate.ingest(observation('pet-1', 0));
    await engine.gate.ingest(observation('pet-1', 60));

    expect((await engine.store.getAlert('pet-1-obs-0'))?.outcome).toBe('escalated');
    const second = await engine.store.getAlert('pet-1-obs-60');
    expect(second?.outcome).toBe('pending');
    expect(second?.escalationCount).toBe(2);
  });

  it('should process concurrent observations for a pet in call order', async () => {
    const results = await Promise.all([
      engine.gate.ingest(observation('pet-1', 0)),
      engine.gate.ingest(observation('pet-1', 60)),
      engine.gate.ingest(observation('pet-1', 120)),
    ]);

    const counts = results.map((r) => (r.status === 'admitted' ? r.decision.escalationCount : 0));
    expect(counts).toEqual([1, 2, 3]);
    expect((await engine.store.getPet('pet-1'))?.openAlertId).toBe('pet-1-obs-120');
  });

  it('should keep counts per pet', async () => {
    engine.store.addPet({ petId: 'pet-2', userId: 'user-2', name: 'Mochi' });

    await Promise.all([
      engine.gate.ingest(observation('pet-1', 0)),
      engine.gate.ingest(observation('pet-2', 0)),
      engine.gate.ingest(observation('pet-1', 60)),
    ]);

    expect((await engine.store.getPet('pet-1'))?.consecutiveUnusualCount).toBe(2);
    expect((await engine.store.getPet('pet-2'))?.consecutiveUnusualCount).toBe(1);
  });

  it('should report a redelivered observation as a duplicate without counting it', async () => {
    await engine.gate.ingest(observation('pet-1', 0));
    const again = await engine.gate.ingest(observation('pet-1', 0));

    expect(again.status).toBe('duplicate');
    if (again.status === 'duplicate') {
      expect(again.execution.status).toBe('already_executed');
      expect(again.execution.playback).toBe('skipped');
    }
    expect((await engine.store.getPet('pet-1'))?.consecutiveUnusualCount).toBe(1);
    expect(engine.playback.signals).toHaveLength(1);
  });

  it('should reject an alert id reused by another pet', async () => {
    engine.store.addPet({ petId: 'pet-2', userId: 'user-2', name: 'Mochi' });
    await engine.gate.ingest(observation('pet-1', 0, { alert_id: 'shared' }));

    await expect(engine.gate.ingest(observation('pet-2', 0, { alert_id: 'shared' }))).rejects.toThrow(
      'Alert shared belongs to another pet'
    );
  });

  it('should reject an unknown pet', async () => {
    await expect(engine.gate.ingest(observation('ghost', 0))).rejects.toThrow(InvalidObservationError);
  });

  it('should reject a normal observation for an unknown pet', async () => {
    await expect(engine.gate.ingest(observation('ghost', 0, { is_unusual: false }))).rejects.toThrow(
      InvalidObservationError
    );
  });

  it('should reject an invalid payload before touching the store', async () => {
    engine.store.setAvailable(false);
    await expect(engine.gate.ingest({ pet_id: 'pet-1' })).rejects.toThrow(InvalidObservationError);
  });

  it('should stop on a broken pet invariant', async () => {
    engine.store.setPetState('pet-1', { consecutiveUnusualCount: 2, openAlertId: null });

    await expect(engine.gate.ingest(observation('pet-1', 0))).rejects.toThrow(InconsistentStateError);
    expect(await engine.store.getAlert('pet-1-obs-0')).toBeNull();
  });

  it('should surface an unavailable store as retryable', async () => {
    engine.store.setAvailable(false);

    const failure = engine.gate.ingest(observation('pet-1', 0));
    await expect(failure).rejects.toThrow(StateUnavailableError);
    await expect(failure).rejects.toMatchObject({ retryable: true, statusCode: 503 });
  });

  it('should leave nothing behind when admission fails part way', async () => {
    engine.store.failNext('savePetState');

    await expect(engine.gate.ingest(observation('pet-1', 0))).rejects.toThrow(StateUnavailableError);
    expect(await engine.store.getAlert('pet-1-obs-0')).toBeNull();
    expect((await engine.store.getPet('pet-1'))?.consecutiveUnusualCount).toBe(0);
  });
});
