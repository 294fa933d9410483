/**
 * Database Schema
 *
 * Drizzle definitions for the alert history. `pets` and `emergency_contacts`
 * are owned by the surrounding application; this service only touches the
 * alert-related pet columns and reads contacts.
 */

import { pgTable, text, timestamp, integer, boolean, jsonb, serial, index, uuid } from 'drizzle-orm/pg-core';
import type {
  AlertOutcome,
  AlertType,
  InterventionAction,
  QuickActionOrigin,
  QuickActionStatus,
  SeverityLevel,
  Tier,
} from '../types.js';

// =============================================================================
// Pets Table
// =============================================================================

export const pets = pgTable('pets', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull(),
  name: text('name').notNull(),
  consecutiveUnusualCount: integer('consecutive_unusual_count').notNull().default(0),
  openAlertId: text('open_alert_id'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export type PetRow = typeof pets.$inferSelect;

// =============================================================================
// Alerts Table
// =============================================================================

export const alerts = pgTable(
  'alerts',
  {
    id: text('id').primaryKey(),
    petId: text('pet_id')
      .notNull()
      .references(() => pets.id),
    alertType: text('alert_type').$type<AlertType>().notNull(),
    severity: text('severity').$type<SeverityLevel>().notNull(),
    severityLevel: text('severity_level').$type<SeverityLevel>().notNull(),
    message: text('message'),
    indicators: jsonb('indicators').$type<string[]>().notNull().default([]),
    recommendedActions: jsonb('recommended_actions').$type<string[]>().notNull().default([]),
    videoId: text('video_id'),
    escalationCount: integer('escalation_count').notNull(),
    tier: text('tier').$type<Tier>(),
    interventionAction: text('intervention_action').$type<InterventionAction>(),
    interventionTime: timestamp('intervention_time', { withTimezone: true }),
    outcome: text('outcome').$type<AlertOutcome>().notNull().default('pending'),
    notificationSent: boolean('notification_sent').notNull().default(false),
    notificationChannels: jsonb('notification_channels').$type<string[]>().notNull().default([]),
    userNotifiedAt: timestamp('user_notified_at', { withTimezone: true }),
    userAcknowledgedAt: timestamp('user_acknowledged_at', { withTimezone: true }),
    userResponse: text('user_response'),
    deliveryDegraded: boolean('delivery_degraded').notNull().default(false),
    resolvedAt: timestamp('resolved_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    petCreatedIdx: index('idx_alerts_pet_created').on(table.petId, table.createdAt),
    severityIdx: index('idx_alerts_severity').on(table.severity, table.createdAt),
  })
);

export type AlertRow = typeof alerts.$inferSelect;

// =============================================================================
// Alert Executions Table
// =============================================================================

export const alertExecutions = pgTable('alert_executions', {
  alertId: text('alert_id')
    .primaryKey()
    .references(() => alerts.id),
  tier: text('tier').$type<Tier>().notNull(),
  action: text('action').$type<InterventionAction>().notNull(),
  executedAt: timestamp('executed_at', { withTimezone: true }).notNull(),
});

// =============================================================================
// Emergency Contacts Table
// =============================================================================

export const emergencyContacts = pgTable(
  'emergency_contacts',
  {
    id: serial('id').primaryKey(),
    userId: text('user_id').notNull(),
    contactType: text('contact_type').notNull(),
    name: text('name').notNull(),
    phone: text('phone').notNull(),
    email: text('email'),
    priority: integer('priority').notNull().default(1),
    isActive: boolean('is_active').notNull().default(true),
  },
  (table) => ({
    userPriorityIdx: index('idx_emergency_contacts_user').on(table.userId, table.priority),
  })
);

export type EmergencyContactRow = typeof emergencyContacts.$inferSelect;

// =============================================================================
// Quick Actions Table
// =============================================================================

export const quickActions = pgTable(
  'quick_actions',
  {
    id: uuid('id').primaryKey(),
    alertId: text('alert_id')
      .notNull()
      .references(() => alerts.id),
    emergencyContactId: integer('emergency_contact_id')
      .notNull()
      .references(() => emergencyContacts.id),
    actionType: text('action_type').notNull(),
    message: text('message').notNull(),
    videoClipIds: jsonb('video_clip_ids').$type<string[]>().notNull().default([]),
    status: text('status').$type<QuickActionStatus>().notNull().default('pending'),
    origin: text('origin').$type<QuickActionOrigin>().notNull(),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    acknowledgedAt: timestamp('acknowledged_at', { withTimezone: true }),
    errorMessage: text('error_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    alertIdx: index('idx_quick_actions_alert').on(table.alertId),
    contactStatusIdx: index('idx_quick_actions_contact_status').on(table.emergencyContactId, table.status),
  })
);

export type QuickActionRow = typeof quickActions.$inferSelect;
