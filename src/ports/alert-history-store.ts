/**
 * IAlertHistoryStore Interface
 *
 * Port for the durable alert history. Every read-modify-write for a pet runs
 * inside `withPetTransaction`, which holds the pet row lock for the duration
 * of the callback and commits only if the callback resolves.
 */

import type {
  Alert,
  AlertPatch,
  EmergencyContact,
  ExecutionMarker,
  PetAlertState,
  QuickAction,
  QuickActionPatch,
} from '../types.js';

// =============================================================================
// Transaction Scope
// =============================================================================

/**
 * Operations available while a pet is locked.
 */
export interface PetTransaction {
  /** Row-lock and read the pet; null when the pet does not exist */
  loadPet(): Promise<PetAlertState | null>;

  savePetState(state: Pick<PetAlertState, 'consecutiveUnusualCount' | 'openAlertId'>): Promise<void>;

  findAlert(alertId: string): Promise<Alert | null>;

  insertAlert(alert: Alert): Promise<void>;

  updateAlert(alertId: string, patch: AlertPatch): Promise<Alert>;

  findExecution(alertId: string): Promise<ExecutionMarker | null>;

  insertExecution(marker: ExecutionMarker): Promise<void>;

  /** Active contacts of a user, highest priority (lowest number) first */
  listEmergencyContacts(userId: string): Promise<EmergencyContact[]>;

  findQuickAction(id: string): Promise<QuickAction | null>;

  /** The pending automatic quick action already queued for a contact, if any */
  findPendingQuickAction(emergencyContactId: number): Promise<QuickAction | null>;

  insertQuickAction(action: QuickAction): Promise<void>;

  updateQuickAction(id: string, patch: QuickActionPatch): Promise<QuickAction>;
}

// =============================================================================
// Query Options
// =============================================================================

export interface AlertQueryOptions {
  /** Limit results */
  limit?: number;
  /** Only alerts created at or after this instant */
  since?: Date;
}

/**
 * A quick action joined with its contact's display fields.
 */
export interface QuickActionView extends QuickAction {
  contactName: string;
  contactPhone: string;
}

// =============================================================================
// IAlertHistoryStore Interface
// =============================================================================

export interface IAlertHistoryStore {
  /**
   * Run `fn` with the pet row locked. Rolls back when `fn` throws.
   * Driver failures surface as StateUnavailableError.
   */
  withPetTransaction<T>(petId: string, fn: (tx: PetTransaction) => Promise<T>): Promise<T>;

  getAlert(alertId: string): Promise<Alert | null>;

  getPet(petId: string): Promise<PetAlertState | null>;

  /** Newest first */
  listAlertsForPet(petId: string, options?: AlertQueryOptions): Promise<Alert[]>;

  /** Alerts with critical severity or handled at the critical tier, newest first */
  listCriticalAlerts(options?: AlertQueryOptions): Promise<Alert[]>;

  getQuickAction(id: string): Promise<QuickAction | null>;

  listQuickActions(alertId: string): Promise<QuickActionView[]>;

  getEmergencyContact(id: number): Promise<EmergencyContact | null>;

  isHealthy(): Promise<boolean>;
}
