/**
 * In-memory Alert History Store
 *
 * Same contract as the PostgreSQL store: pet transactions are serialized per
 * pet, writes are buffered and applied only when the callback resolves.
 * Used by the tests and by local runs without a database.
 */

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
import { NotFoundError, StateUnavailableError, toStateError } from '../utils/errors.js';
import { KeyedSerializer } from '../utils/KeyedSerializer.js';

const DEFAULT_LIMIT = 50;

type TransactionOperation = keyof PetTransaction;

interface Tables {
  pets: Map<string, PetAlertState>;
  alerts: Map<string, Alert>;
  executions: Map<string, ExecutionMarker>;
  quickActions: Map<string, QuickAction>;
  contacts: Map<number, EmergencyContact>;
}

function newestFirst(a: Alert, b: Alert): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

// =============================================================================
// Transaction Scope
// =============================================================================

class InMemoryPetTransaction implements PetTransaction {
  petWrite: PetAlertState | null = null;
  readonly alertWrites = new Map<string, Alert>();
  readonly executionWrites = new Map<string, ExecutionMarker>();
  readonly quickActionWrites = new Map<string, QuickAction>();

  constructor(
    private readonly tables: Tables,
    private readonly petId: string,
    private readonly guard: (operation: TransactionOperation) => void
  ) {}

  async loadPet(): Promise<PetAlertState | null> {
    this.guard('loadPet');
    const pet = this.petWrite ?? this.tables.pets.get(this.petId);
    return pet ? structuredClone(pet) : null;
  }

  async savePetState(state: Pick<PetAlertState, 'consecutiveUnusualCount' | 'openAlertId'>): Promise<void> {
    this.guard('savePetState');
    const current = this.petWrite ?? this.tables.pets.get(this.petId);
    if (!current) {
      throw new NotFoundError('Pet', this.petId);
    }
    this.petWrite = { ...current, ...state };
  }

  async findAlert(alertId: string): Promise<Alert | null> {
    this.guard('findAlert');
    const alert = this.alertWrites.get(alertId) ?? this.tables.alerts.get(alertId);
    return alert ? structuredClone(alert) : null;
  }

  async insertAlert(alert: Alert): Promise<void> {
    this.guard('insertAlert');
    if (this.alertWrites.has(alert.id) || this.tables.alerts.has(alert.id)) {
      throw new Error(`duplicate key value violates unique constraint "alerts_pkey" (${alert.id})`);
    }
    this.alertWrites.set(alert.id, structuredClone(alert));
  }

  async updateAlert(alertId: string, patch: AlertPatch): Promise<Alert> {
    this.guard('updateAlert');
    const current = this.alertWrites.get(alertId) ?? this.tables.alerts.get(alertId);
    if (!current) {
      throw new NotFoundError('Alert', alertId);
    }
    const updated = { ...structuredClone(current), ...patch };
    this.alertWrites.set(alertId, updated);
    return structuredClone(updated);
  }

  async findExecution(alertId: string): Promise<ExecutionMarker | null> {
    this.guard('findExecution');
    const marker = this.executionWrites.get(alertId) ?? this.tables.executions.get(alertId);
    return marker ? structuredClone(marker) : null;
  }

  async insertExecution(marker: ExecutionMarker): Promise<void> {
    this.guard('insertExecution');
    if (this.executionWrites.has(marker.alertId) || this.tables.executions.has(marker.alertId)) {
      throw new Error(`duplicate key value violates unique constraint "alert_executions_pkey" (${marker.alertId})`);
    }
    this.executionWrites.set(marker.alertId, structuredClone(marker));
  }

  async listEmergencyContacts(userId: string): Promise<EmergencyContact[]> {
    this.guard('listEmergencyContacts');
    return [...this.tables.contacts.values()]
      .filter((c) => c.userId === userId && c.isActive)
      .sort((a, b) => a.priority - b.priority || a.id - b.id)
      .map((c) => structuredClone(c));
  }

  async findQuickAction(id: string): Promise<QuickAction | null> {
    this.guard('findQuickAction');
    const action = this.quickActionWrites.get(id) ?? this.tables.quickActions.get(id);
    return action ? structuredClone(action) : null;
  }

  async findPendingQuickAction(emergencyContactId: number): Promise<QuickAction | null> {
    this.guard('findPendingQuickAction');
    const merged = new Map([...this.tables.quickActions, ...this.quickActionWrites]);
    const pending = [...merged.values()]
      .filter((q) => q.emergencyContactId === emergencyContactId && q.status === 'pending' && q.origin === 'automatic')
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    const first = pending[0];
    return first ? structuredClone(first) : null;
  }

  async insertQuickAction(action: QuickAction): Promise<void> {
    this.guard('insertQuickAction');
    if (this.quickActionWrites.has(action.id) || this.tables.quickActions.has(action.id)) {
      throw new Error(`duplicate key value violates unique constraint "quick_actions_pkey" (${action.id})`);
    }
    this.quickActionWrites.set(action.id, structuredClone(action));
  }

  async updateQuickAction(id: string, patch: QuickActionPatch): Promise<QuickAction> {
    this.guard('updateQuickAction');
    const current = this.quickActionWrites.get(id) ?? this.tables.quickActions.get(id);
    if (!current) {
      throw new NotFoundError('Quick action', id);
    }
    const updated = { ...structuredClone(current), ...patch };
    this.quickActionWrites.set(id, updated);
    return structuredClone(updated);
  }

  commit(): void {
    if (this.petWrite) {
      this.tables.pets.set(this.petId, this.petWrite);
    }
    for (const [id, alert] of this.alertWrites) this.tables.alerts.set(id, alert);
    for (const [id, marker] of this.executionWrites) this.tables.executions.set(id, marker);
    for (const [id, action] of this.quickActionWrites) this.tables.quickActions.set(id, action);
  }
}

// =============================================================================
// Store
// =============================================================================

export class InMemoryAlertHistoryStore implements IAlertHistoryStore {
  private readonly tables: Tables = {
    pets: new Map(),
    alerts: new Map(),
    executions: new Map(),
    quickActions: new Map(),
    contacts: new Map(),
  };
  private readonly locks = new KeyedSerializer();
  private nextContactId = 1;
  private available = true;
  private readonly failures = new Set<TransactionOperation>();

  // ---------------------------------------------------------------------------
  // Seeding and fault injection
  // ---------------------------------------------------------------------------

  addPet(pet: { petId: string; userId: string; name: string }): PetAlertState {
    const state: PetAlertState = { ...pet, consecutiveUnusualCount: 0, openAlertId: null };
    this.tables.pets.set(pet.petId, state);
    return structuredClone(state);
  }

  /** Overwrite a pet's alert fields directly, bypassing the invariant */
  setPetState(petId: string, state: Pick<PetAlertState, 'consecutiveUnusualCount' | 'openAlertId'>): void {
    const current = this.tables.pets.get(petId);
    if (!current) {
      throw new NotFoundError('Pet', petId);
    }
    this.tables.pets.set(petId, { ...current, ...state });
  }

  addEmergencyContact(contact: Omit<EmergencyContact, 'id' | 'isActive'> & { isActive?: boolean }): EmergencyContact {
    const record: EmergencyContact = { isActive: true, ...contact, id: this.nextContactId++ };
    this.tables.contacts.set(record.id, record);
    return structuredClone(record);
  }

  addAlert(alert: Alert): void {
    this.tables.alerts.set(alert.id, structuredClone(alert));
  }

  /** While unavailable every operation fails with StateUnavailableError */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Make the next call of a transaction operation throw, once */
  failNext(operation: TransactionOperation): void {
    this.failures.add(operation);
  }

  listAllQuickActions(): QuickAction[] {
    return [...this.tables.quickActions.values()].map((q) => structuredClone(q));
  }

  getExecution(alertId: string): ExecutionMarker | null {
    const marker = this.tables.executions.get(alertId);
    return marker ? structuredClone(marker) : null;
  }

  // ---------------------------------------------------------------------------
  // IAlertHistoryStore
  // ---------------------------------------------------------------------------

  async withPetTransaction<T>(petId: string, fn: (tx: PetTransaction) => Promise<T>): Promise<T> {
    this.assertAvailable();
    return this.locks.run(petId, async () => {
      const tx = new InMemoryPetTransaction(this.tables, petId, (operation) => this.guard(operation));
      try {
        const result = await fn(tx);
        this.assertAvailable();
        tx.commit();
        return result;
      } catch (error) {
        throw toStateError(error, `Pet transaction failed for ${petId}`);
      }
    });
  }

  async getAlert(alertId: string): Promise<Alert | null> {
    this.assertAvailable();
    const alert = this.tables.alerts.get(alertId);
    return alert ? structuredClone(alert) : null;
  }

  async getPet(petId: string): Promise<PetAlertState | null> {
    this.assertAvailable();
    const pet = this.tables.pets.get(petId);
    return pet ? structuredClone(pet) : null;
  }

  async listAlertsForPet(petId: string, options: AlertQueryOptions = {}): Promise<Alert[]> {
    this.assertAvailable();
    return this.query((a) => a.petId === petId, options);
  }

  async listCriticalAlerts(options: AlertQueryOptions = {}): Promise<Alert[]> {
    this.assertAvailable();
    return this.query((a) => a.severity === 'critical' || a.tier === 'critical', options);
  }

  async getQuickAction(id: string): Promise<QuickAction | null> {
    this.assertAvailable();
    const action = this.tables.quickActions.get(id);
    return action ? structuredClone(action) : null;
  }

  async listQuickActions(alertId: string): Promise<QuickActionView[]> {
    this.assertAvailable();
    const views: QuickActionView[] = [];
    for (const action of this.tables.quickActions.values()) {
      const contact = this.tables.contacts.get(action.emergencyContactId);
      if (action.alertId === alertId && contact) {
        views.push({ ...structuredClone(action), contactName: contact.name, contactPhone: contact.phone });
      }
    }
    return views.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async getEmergencyContact(id: number): Promise<EmergencyContact | null> {
    this.assertAvailable();
    const contact = this.tables.contacts.get(id);
    return contact ? structuredClone(contact) : null;
  }

  async isHealthy(): Promise<boolean> {
    return this.available;
  }

  private query(predicate: (alert: Alert) => boolean, options: AlertQueryOptions): Alert[] {
    const since = options.since?.getTime();
    return [...this.tables.alerts.values()]
      .filter((a) => predicate(a) && (since === undefined || a.createdAt.getTime() >= since))
      .sort(newestFirst)
      .slice(0, options.limit ?? DEFAULT_LIMIT)
      .map((a) => structuredClone(a));
  }

  private guard(operation: TransactionOperation): void {
    this.assertAvailable();
    if (this.failures.delete(operation)) {
      throw new Error(`Injected failure in ${operation}`);
    }
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new StateUnavailableError('Alert history store unavailable');
    }
  }
}
