/**
 * PostgreSQL Alert History Store
 *
 * Drizzle implementation of IAlertHistoryStore. Pet transactions take a
 * `SELECT ... FOR UPDATE` row lock on the pet so that admissions, executions
 * and resolutions for one pet are serialized across worker processes.
 */

import { and, asc, desc, eq, gte, or, type SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { Logger } from 'pino';
import type {
  AlertQueryOptions,
  IAlertHistoryStore,
  PetTransaction,
  QuickActionView,
} from '../ports/alert-history-store.js';
import type {
  Alert,
  AlertPatch,
  EmergencyContact,
  ExecutionMarker,
  PetAlertState,
  QuickAction,
  QuickActionPatch,
} from '../types.js';
import { NotFoundError, toStateError } from '../utils/errors.js';
import * as schema from '../data/schema.js';

/** Either the pooled database or an open transaction */
type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

const DEFAULT_LIMIT = 50;

function toPetState(row: schema.PetRow): PetAlertState {
  return {
    petId: row.id,
    userId: row.userId,
    name: row.name,
    consecutiveUnusualCount: row.consecutiveUnusualCount,
    openAlertId: row.openAlertId,
  };
}

// =============================================================================
// Transaction Scope
// =============================================================================

class PostgresPetTransaction implements PetTransaction {
  constructor(
    private readonly tx: Executor,
    private readonly petId: string
  ) {}

  async loadPet(): Promise<PetAlertState | null> {
    const result = await this.tx
      .select()
      .from(schema.pets)
      .where(eq(schema.pets.id, this.petId))
      .for('update');

    const row = result[0];
    return row ? toPetState(row) : null;
  }

  async savePetState(state: Pick<PetAlertState, 'consecutiveUnusualCount' | 'openAlertId'>): Promise<void> {
    await this.tx
      .update(schema.pets)
      .set({
        consecutiveUnusualCount: state.consecutiveUnusualCount,
        openAlertId: state.openAlertId,
      })
      .where(eq(schema.pets.id, this.petId));
  }

  async findAlert(alertId: string): Promise<Alert | null> {
    const result = await this.tx.select().from(schema.alerts).where(eq(schema.alerts.id, alertId)).limit(1);
    return result[0] ?? null;
  }

  async insertAlert(alert: Alert): Promise<void> {
    await this.tx.insert(schema.alerts).values(alert);
  }

  async updateAlert(alertId: string, patch: AlertPatch): Promise<Alert> {
    const result = await this.tx.update(schema.alerts).set(patch).where(eq(schema.alerts.id, alertId)).returning();
    const row = result[0];
    if (!row) {
      throw new NotFoundError('Alert', alertId);
    }
    return row;
  }

  async findExecution(alertId: string): Promise<ExecutionMarker | null> {
    const result = await this.tx
      .select()
      .from(schema.alertExecutions)
      .where(eq(schema.alertExecutions.alertId, alertId))
      .limit(1);
    return result[0] ?? null;
  }

  async insertExecution(marker: ExecutionMarker): Promise<void> {
    await this.tx.insert(schema.alertExecutions).values(marker);
  }

  async listEmergencyContacts(userId: string): Promise<EmergencyContact[]> {
    return this.tx
      .select()
      .from(schema.emergencyContacts)
      .where(and(eq(schema.emergencyContacts.userId, userId), eq(schema.emergencyContacts.isActive, true)))
      .orderBy(asc(schema.emergencyContacts.priority), asc(schema.emergencyContacts.id));
  }

  async findQuickAction(id: string): Promise<QuickAction | null> {
    const result = await this.tx.select().from(schema.quickActions).where(eq(schema.quickActions.id, id)).limit(1);
    return result[0] ?? null;
  }

  async findPendingQuickAction(emergencyContactId: number): Promise<QuickAction | null> {
    const result = await this.tx
      .select()
      .from(schema.quickActions)
      .where(
        and(
          eq(schema.quickActions.emergencyContactId, emergencyContactId),
          eq(schema.quickActions.status, 'pending'),
          eq(schema.quickActions.origin, 'automatic')
        )
      )
      .orderBy(asc(schema.quickActions.createdAt))
      .limit(1);
    return result[0] ?? null;
  }

  async insertQuickAction(action: QuickAction): Promise<void> {
    await this.tx.insert(schema.quickActions).values(action);
  }

  async updateQuickAction(id: string, patch: QuickActionPatch): Promise<QuickAction> {
    const result = await this.tx
      .update(schema.quickActions)
      .set(patch)
      .where(eq(schema.quickActions.id, id))
      .returning();
    const row = result[0];
    if (!row) {
      throw new NotFoundError('Quick action', id);
    }
    return row;
  }
}

// =============================================================================
// Store
// =============================================================================

export class PostgresAlertHistoryStore implements IAlertHistoryStore {
  private readonly log: Logger;

  constructor(
    private readonly db: Executor,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'PostgresAlertHistoryStore' });
  }

  async withPetTransaction<T>(petId: string, fn: (tx: PetTransaction) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => fn(new PostgresPetTransaction(tx, petId)));
    } catch (error) {
      const wrapped = toStateError(error, `Pet transaction failed for ${petId}`);
      if (wrapped !== error) {
        this.log.error({ error, petId }, 'Alert history transaction failed');
      }
      throw wrapped;
    }
  }

  async getAlert(alertId: string): Promise<Alert | null> {
    return this.read('getAlert', async () => {
      const result = await this.db.select().from(schema.alerts).where(eq(schema.alerts.id, alertId)).limit(1);
      return result[0] ?? null;
    });
  }

  async getPet(petId: string): Promise<PetAlertState | null> {
    return this.read('getPet', async () => {
      const result = await this.db.select().from(schema.pets).where(eq(schema.pets.id, petId)).limit(1);
      const row = result[0];
      return row ? toPetState(row) : null;
    });
  }

  async listAlertsForPet(petId: string, options: AlertQueryOptions = {}): Promise<Alert[]> {
    return this.read('listAlertsForPet', () => {
      const conditions: SQL[] = [eq(schema.alerts.petId, petId)];
      if (options.since) {
        conditions.push(gte(schema.alerts.createdAt, options.since));
      }
      return this.db
        .select()
        .from(schema.alerts)
        .where(and(...conditions))
        .orderBy(desc(schema.alerts.createdAt))
        .limit(options.limit ?? DEFAULT_LIMIT);
    });
  }

  async listCriticalAlerts(options: AlertQueryOptions = {}): Promise<Alert[]> {
    return this.read('listCriticalAlerts', () => {
      const critical = or(eq(schema.alerts.severity, 'critical'), eq(schema.alerts.tier, 'critical'));
      const conditions: SQL[] = critical ? [critical] : [];
      if (options.since) {
        conditions.push(gte(schema.alerts.createdAt, options.since));
      }
      return this.db
        .select()
        .from(schema.alerts)
        .where(and(...conditions))
        .orderBy(desc(schema.alerts.createdAt))
        .limit(options.limit ?? DEFAULT_LIMIT);
    });
  }

  async getQuickAction(id: string): Promise<QuickAction | null> {
    return this.read('getQuickAction', async () => {
      const result = await this.db.select().from(schema.quickActions).where(eq(schema.quickActions.id, id)).limit(1);
      return result[0] ?? null;
    });
  }

  async listQuickActions(alertId: string): Promise<QuickActionView[]> {
    return this.read('listQuickActions', async () => {
      const rows = await this.db
        .select({
          action: schema.quickActions,
          contactName: schema.emergencyContacts.name,
          contactPhone: schema.emergencyContacts.phone,
        })
        .from(schema.quickActions)
        .innerJoin(schema.emergencyContacts, eq(schema.quickActions.emergencyContactId, schema.emergencyContacts.id))
        .where(eq(schema.quickActions.alertId, alertId))
        .orderBy(desc(schema.quickActions.createdAt));

      return rows.map((r) => ({ ...r.action, contactName: r.contactName, contactPhone: r.contactPhone }));
    });
  }

  async getEmergencyContact(id: number): Promise<EmergencyContact | null> {
    return this.read('getEmergencyContact', async () => {
      const result = await this.db
        .select()
        .from(schema.emergencyContacts)
        .where(eq(schema.emergencyContacts.id, id))
        .limit(1);
      return result[0] ?? null;
    });
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.db.select({ id: schema.pets.id }).from(schema.pets).limit(1);
      return true;
    } catch (error) {
      this.log.warn({ error }, 'Alert history health check failed');
      return false;
    }
  }

  private async read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toStateError(error, `Alert history ${operation} failed`);
    }
  }
}
