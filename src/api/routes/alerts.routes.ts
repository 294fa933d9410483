/**
 * Alert and Quick Action Routes
 *
 * GET  /alerts/critical                  recent critical alerts (dashboard)
 * GET  /alerts/:alertId                  one alert (owner)
 * GET  /pets/:petId/alerts               alert history (owner)
 * POST /alerts/:alertId/acknowledge      owner saw the alert
 * POST /alerts/:alertId/resolve          close the alert and reset the pet
 * POST /alerts/:alertId/quick-actions    message an emergency contact
 * GET  /alerts/:alertId/quick-actions
 * POST /quick-actions/:id/cancel
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { IAlertHistoryStore, QuickActionView } from '../../ports/alert-history-store.js';
import type { OwnerResponseService } from '../../services/OwnerResponseService.js';
import type { ResolutionMonitor } from '../../services/ResolutionMonitor.js';
import type { Alert, QuickAction } from '../../types.js';
import { EscalationError } from '../../utils/errors.js';
import { asyncHandler, ownerRateLimiter, requireUserId } from '../middleware.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface AlertRoutesDeps {
  store: Pick<IAlertHistoryStore, 'listCriticalAlerts'>;
  owner: OwnerResponseService;
  monitor: Pick<ResolutionMonitor, 'resolveAlert'>;
}

const limitSchema = z.coerce.number().int().min(1).max(200).optional();

const acknowledgeSchema = z
  .object({
    response: z.string().max(500).nullish(),
  })
  .default({});

const createQuickActionSchema = z.object({
  emergency_contact_id: z.number().int().positive(),
  action_type: z.string().min(1).max(50),
  message: z.string().min(1).max(2000),
  video_clip_ids: z.array(z.string()).max(20).optional(),
});

class BadRequestError extends EscalationError {
  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid request: ${issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`,
      'VALIDATION_ERROR',
      400
    );
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestError(result.error.issues);
  }
  return result.data;
}

function param(req: Request, name: string): string {
  return req.params[name] ?? '';
}

// --------------------------------------------------------------------------
// Serialization (snake_case on the wire)
// --------------------------------------------------------------------------

export function serializeAlert(a: Alert): Record<string, unknown> {
  return {
    id: a.id,
    pet_id: a.petId,
    alert_type: a.alertType,
    severity: a.severity,
    severity_level: a.severityLevel,
    message: a.message,
    critical_indicators: a.indicators,
    recommended_actions: a.recommendedActions,
    video_id: a.videoId,
    escalation_count: a.escalationCount,
    tier: a.tier,
    intervention_action: a.interventionAction,
    intervention_time: a.interventionTime?.toISOString() ?? null,
    outcome: a.outcome,
    notification_sent: a.notificationSent,
    notification_channels: a.notificationChannels,
    user_notified_at: a.userNotifiedAt?.toISOString() ?? null,
    user_acknowledged_at: a.userAcknowledgedAt?.toISOString() ?? null,
    user_response: a.userResponse,
    delivery_degraded: a.deliveryDegraded,
    resolved_at: a.resolvedAt?.toISOString() ?? null,
    created_at: a.createdAt.toISOString(),
  };
}

export function serializeQuickAction(q: QuickAction | QuickActionView): Record<string, unknown> {
  const base: Record<string, unknown> = {
    id: q.id,
    alert_id: q.alertId,
    emergency_contact_id: q.emergencyContactId,
    action_type: q.actionType,
    message: q.message,
    video_clip_ids: q.videoClipIds,
    status: q.status,
    origin: q.origin,
    sent_at: q.sentAt?.toISOString() ?? null,
    acknowledged_at: q.acknowledgedAt?.toISOString() ?? null,
    error_message: q.errorMessage,
    created_at: q.createdAt.toISOString(),
  };
  if ('contactName' in q) {
    base['contact_name'] = q.contactName;
    base['contact_phone'] = q.contactPhone;
  }
  return base;
}

// --------------------------------------------------------------------------
// Router
// --------------------------------------------------------------------------

export function createAlertsRouter(deps: AlertRoutesDeps): Router {
  const router = Router();
  const { store, owner, monitor } = deps;

  router.use(ownerRateLimiter);

  router.get(
    '/alerts/critical',
    asyncHandler(async (req: Request, res: Response) => {
      const limit = parse(limitSchema, req.query['limit']);
      const alerts = await store.listCriticalAlerts(limit === undefined ? {} : { limit });
      res.json({ alerts: alerts.map(serializeAlert) });
    })
  );

  router.get(
    '/alerts/:alertId',
    asyncHandler(async (req: Request, res: Response) => {
      const alert = await owner.getAlert(requireUserId(req), param(req, 'alertId'));
      res.json(serializeAlert(alert));
    })
  );

  router.get(
    '/pets/:petId/alerts',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = requireUserId(req);
      const limit = parse(limitSchema, req.query['limit']);
      const alerts = await owner.listAlerts(userId, param(req, 'petId'), limit);
      res.json({ alerts: alerts.map(serializeAlert) });
    })
  );

  router.post(
    '/alerts/:alertId/acknowledge',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = requireUserId(req);
      const body = parse(acknowledgeSchema, req.body);
      const alert = await owner.acknowledgeAlert(userId, param(req, 'alertId'), body.response ?? null);
      res.json(serializeAlert(alert));
    })
  );

  router.post(
    '/alerts/:alertId/resolve',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = requireUserId(req);
      const alertId = param(req, 'alertId');
      await owner.getAlert(userId, alertId);
      const alert = await monitor.resolveAlert(alertId);
      res.json(serializeAlert(alert));
    })
  );

  router.post(
    '/alerts/:alertId/quick-actions',
    asyncHandler(async (req: Request, res: Response) => {
      const userId = requireUserId(req);
      const body = parse(createQuickActionSchema, req.body);
      const action = await owner.createQuickAction(userId, param(req, 'alertId'), {
        emergencyContactId: body.emergency_contact_id,
        actionType: body.action_type,
        message: body.message,
        videoClipIds: body.video_clip_ids ?? [],
      });
      res.status(201).json(serializeQuickAction(action));
    })
  );

  router.get(
    '/alerts/:alertId/quick-actions',
    asyncHandler(async (req: Request, res: Response) => {
      const actions = await owner.listQuickActions(requireUserId(req), param(req, 'alertId'));
      res.json({ quick_actions: actions.map(serializeQuickAction) });
    })
  );

  router.post(
    '/quick-actions/:id/cancel',
    asyncHandler(async (req: Request, res: Response) => {
      const action = await owner.cancelQuickAction(requireUserId(req), param(req, 'id'));
      res.json(serializeQuickAction(action));
    })
  );

  return router;
}
