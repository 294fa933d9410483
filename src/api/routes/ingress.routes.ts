/**
 * Observation Ingress Routes
 *
 * POST /alert            analysis result (unusual or normal)
 * POST /alert/critical   critical alert; forces is_unusual and critical severity
 *
 * Both validate synchronously and queue the observation on the broker.
 * Processing happens in the consumer, so the response is 202.
 */

import { Router, type Request, type Response } from 'express';
import type { Logger } from 'pino';
import { parsePayload, toObservation } from '../../services/AlertIngestionGate.js';
import type { ObservationPublisher } from '../../services/NatsInterventionChannels.js';
import { EscalationError, StateUnavailableError } from '../../utils/errors.js';
import { asyncHandler, ingressRateLimiter } from '../middleware.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface IngressDeps {
  publisher: Pick<ObservationPublisher, 'publish'>;
  logger: Logger;
}

// --------------------------------------------------------------------------
// Router
// --------------------------------------------------------------------------

export function createIngressRouter(deps: IngressDeps): Router {
  const router = Router();
  const log = deps.logger.child({ component: 'IngressRoutes' });

  const queue = async (body: unknown, res: Response): Promise<void> => {
    const payload = parsePayload(body);
    const observation = toObservation(payload);

    try {
      await deps.publisher.publish(observation.petId, observation.alertId, payload);
    } catch (error) {
      if (error instanceof EscalationError) throw error;
      log.error({ error, petId: observation.petId }, 'Failed to queue observation');
      throw new StateUnavailableError('Observation queue unavailable', { cause: error });
    }

    log.info(
      { petId: observation.petId, alertId: observation.alertId, unusual: observation.isUnusual },
      'Observation queued'
    );
    res.status(202).json({ status: 'queued', alert_id: observation.alertId });
  };

  router.post(
    '/alert',
    ingressRateLimiter,
    asyncHandler(async (req: Request, res: Response) => {
      await queue(req.body, res);
    })
  );

  router.post(
    '/alert/critical',
    ingressRateLimiter,
    asyncHandler(async (req: Request, res: Response) => {
      const body: unknown = req.body;
      const base = typeof body === 'object' && body !== null ? body : {};
      await queue({ ...base, is_unusual: true, severity_level: 'critical' }, res);
    })
  );

  return router;
}
