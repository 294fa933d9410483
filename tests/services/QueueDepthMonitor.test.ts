import { describe, it, expect, beforeEach } from 'vitest';
import { queueDepth, registry } from '../../src/infrastructure/metrics.js';
import { QueueDepthMonitor, type LagSource } from '../../src/services/QueueDepthMonitor.js';
import { silentLogger } from '../helpers/engine.js';

describe('QueueDepthMonitor', () => {
  beforeEach(() => {
    registry.resetMetrics();
  });

  it('should record pending messages per queue', async () => {
    const source: LagSource = {
      getConsumerLag: async () => ({ 'escalation-worker': { pending: 12, waiting: 1 } }),
    };

    const depths = await new QueueDepthMonitor(source, 1000, silentLogger).collect();

    expect(depths).toEqual({ 'escalation-worker': 12 });
    const gauge = await queueDepth.get();
    expect(gauge.values.find((v) => v.labels['queue'] === 'escalation-worker')?.value).toBe(12);
  });

  it('should surface lag lookup failures to the caller', async () => {
    const source: LagSource = {
      getConsumerLag: async () => {
        throw new Error('JetStream not initialized');
      },
    };

    await expect(new QueueDepthMonitor(source, 1000, silentLogger).collect()).rejects.toThrow(
      'JetStream not initialized'
    );
  });

  it('should sample immediately on start and stop cleanly', async () => {
    let calls = 0;
    const source: LagSource = {
      getConsumerLag: async () => {
        calls++;
        return {};
      },
    };
    const monitor = new QueueDepthMonitor(source, 60_000, silentLogger);

    monitor.start();
    monitor.start();
    monitor.stop();

    expect(calls).toBe(1);
  });
});
