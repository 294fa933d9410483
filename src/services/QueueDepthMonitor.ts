/**
 * Polls consumer lag into the `queue_depth{queue}` gauge.
 */

import type { Logger } from 'pino';
import { queueDepth } from '../infrastructure/metrics.js';
import type { NatsClient } from './NatsClient.js';

export type LagSource = Pick<NatsClient, 'getConsumerLag'>;

export class QueueDepthMonitor {
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly source: LagSource,
    private readonly intervalMs: number,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'QueueDepthMonitor' });
  }

  /**
   * Take one sample. Returns the depth recorded per queue.
   */
  async collect(): Promise<Record<string, number>> {
    const lag = await this.source.getConsumerLag();
    const depths: Record<string, number> = {};
    for (const [queue, stats] of Object.entries(lag)) {
      queueDepth.labels(queue).set(stats.pending);
      depths[queue] = stats.pending;
    }
    return depths;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    const tick = (): void => {
      this.collect().then(
        (depths) => this.log.debug({ depths }, 'Queue depth sampled'),
        (error: unknown) => this.log.warn({ error }, 'Queue depth sample failed')
      );
    };
    tick();
    this.timer = setInterval(tick, this.intervalMs);
    this.timer.unref();
    this.log.info({ intervalMs: this.intervalMs }, 'Queue depth monitor started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
