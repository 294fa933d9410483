import { z } from 'zod';
import { SEVERITY_LEVELS } from './types.js';

/**
 * Configuration schema with validation
 */
const configSchema = z
  .object({
    // Message broker (NATS JetStream URL(s), comma-separated)
    natsUrl: z.string().min(1, 'NATS_URL is required'),

    // Database (PostgreSQL)
    databaseUrl: z.string().url('DATABASE_URL must be a valid PostgreSQL URL'),
    statementTimeoutMs: z.number().int().min(100).max(60_000).default(5000),

    // HTTP API
    httpPort: z.number().int().min(1).max(65535).default(3002),

    // Consumer configuration
    consumerMaxAckPending: z.number().int().min(1).max(1000).default(50),
    consumerAckWaitMs: z.number().int().min(1000).max(300_000).default(30_000),
    consumerMaxDeliver: z.number().int().min(1).max(20).default(5),
    consumerBatchSize: z.number().int().min(1).max(100).default(10),
    consumerMaxInFlight: z.number().int().min(1).max(256).default(16),

    // Escalation policy
    moderateAt: z.number().int().min(2).default(3),
    notifyAt: z.number().int().min(3).default(4),
    criticalAt: z.number().int().min(4).default(5),
    minEscalationSeverity: z.enum(SEVERITY_LEVELS).default('low'),
    monitoringWindowMs: z.number().int().min(1000).default(45_000),

    // Intervention delivery
    deliveryMaxAttempts: z.number().int().min(1).max(10).default(3),
    deliveryRetryDelayMs: z.number().int().min(0).max(60_000).default(500),
    channelTimeoutMs: z.number().int().min(100).max(60_000).default(5000),

    // Queue depth monitor
    queueDepthIntervalMs: z.number().int().min(1000).default(15_000),

    // Links in notifications
    dashboardUrl: z.string().url().default('http://localhost:3000'),

    // Environment
    nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  })
  .refine((c) => c.moderateAt < c.notifyAt && c.notifyAt < c.criticalAt, {
    message: 'Escalation thresholds must satisfy moderateAt < notifyAt < criticalAt',
    path: ['moderateAt'],
  });

export type Config = z.infer<typeof configSchema>;

function intFromEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    natsUrl: env['NATS_URL'],
    databaseUrl: env['DATABASE_URL'],
    statementTimeoutMs: intFromEnv(env['STATEMENT_TIMEOUT_MS']),
    httpPort: intFromEnv(env['PORT']),
    consumerMaxAckPending: intFromEnv(env['CONSUMER_MAX_ACK_PENDING']),
    consumerAckWaitMs: intFromEnv(env['CONSUMER_ACK_WAIT_MS']),
    consumerMaxDeliver: intFromEnv(env['CONSUMER_MAX_DELIVER']),
    consumerBatchSize: intFromEnv(env['CONSUMER_BATCH_SIZE']),
    consumerMaxInFlight: intFromEnv(env['CONSUMER_MAX_IN_FLIGHT']),
    moderateAt: intFromEnv(env['ESCALATION_MODERATE_AT']),
    notifyAt: intFromEnv(env['ESCALATION_NOTIFY_AT']),
    criticalAt: intFromEnv(env['ESCALATION_CRITICAL_AT']),
    minEscalationSeverity: env['ESCALATION_MIN_SEVERITY'] || undefined,
    monitoringWindowMs: intFromEnv(env['MONITORING_WINDOW_MS']),
    deliveryMaxAttempts: intFromEnv(env['DELIVERY_MAX_ATTEMPTS']),
    deliveryRetryDelayMs: intFromEnv(env['DELIVERY_RETRY_DELAY_MS']),
    channelTimeoutMs: intFromEnv(env['CHANNEL_TIMEOUT_MS']),
    queueDepthIntervalMs: intFromEnv(env['QUEUE_DEPTH_INTERVAL_MS']),
    dashboardUrl: env['DASHBOARD_URL'] || undefined,
    nodeEnv: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
