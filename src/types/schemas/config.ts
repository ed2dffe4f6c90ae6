/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml configuration.
 *
 * @module schemas/config
 */

import { z } from 'zod';

/**
 * Model names double as directory names and supervisor group prefixes.
 */
export const ModelNameSchema = z
  .string()
  .min(1, 'Model name cannot be empty')
  .max(64, 'Model name must be at most 64 characters')
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
    'Model name may only contain letters, digits, ".", "_" and "-", and must start with a letter or digit'
  );

const PortSchema = z.number().int().min(1, 'must be >= 1').max(65535, 'must be <= 65535');

/**
 * HTTP Server Configuration
 */
export const ServerConfigSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty'),
  port: z.number().int().min(0, 'must be >= 0').max(65535, 'must be <= 65535'),
  max_artifact_bytes: z.number().int().positive('must be positive'),
  cors_origin: z.string().min(1, 'CORS origin cannot be empty'),
});

/**
 * Supervisor Gateway Configuration
 */
export const SupervisorConfigSchema = z.object({
  command: z.string().min(1, 'Supervisor command cannot be empty'),
  server_url: z.string().min(1, 'Supervisor server URL cannot be empty'),
  username: z.string().optional(),
  password: z.string().optional(),
  web_url: z.string().url('must be a URL'),
  command_timeout_ms: z.number().int().positive('must be positive'),
  group_template: z
    .string()
    .refine((value) => value.includes('{model}') && value.includes('{slot}'), {
      message: 'must contain {model} and {slot} placeholders',
    }),
});

/**
 * Worker Process Configuration
 */
export const WorkersConfigSchema = z.object({
  host: z.string().min(1, 'Worker host cannot be empty'),
  base_port: PortSchema,
  inference_path: z.string().startsWith('/', 'must start with "/"'),
  health_path: z.string().startsWith('/', 'must start with "/"'),
  probe_timeout_ms: z.number().int().positive('must be positive'),
  forward_timeout_ms: z.number().int().positive('must be positive'),
  ports: z
    .record(ModelNameSchema, z.object({ A: PortSchema, B: PortSchema }))
    .optional(),
});

/**
 * Lifecycle Controller Configuration
 */
export const LifecycleConfigSchema = z
  .object({
    readiness_timeout_ms: z.number().int().min(1000, 'must be >= 1000ms'),
    readiness_poll_interval_ms: z.number().int().positive('must be positive'),
    drain_timeout_ms: z.number().int().positive('must be positive'),
    unhealthy_threshold: z.number().int().min(1, 'must be >= 1'),
    health_check_interval_ms: z.number().int().min(0, 'must be >= 0'),
    max_restarts: z.number().int().min(0, 'must be >= 0'),
  })
  .refine((data) => data.readiness_timeout_ms > data.readiness_poll_interval_ms, {
    message: 'must be greater than readiness_poll_interval_ms',
    path: ['readiness_timeout_ms'],
  });

/**
 * Request Queue Configuration
 */
export const QueueConfigSchema = z.object({
  max_hold_ms: z.number().int().min(0, 'must be >= 0'),
  max_depth: z.number().int().min(0, 'must be >= 0'),
});

/**
 * Artifact Store Configuration
 */
export const ArtifactsConfigSchema = z.object({
  root_dir: z.string().min(1, 'Artifact root cannot be empty'),
  artifact_file_name: z
    .string()
    .min(1, 'Artifact file name cannot be empty')
    .refine((value) => !value.includes('/') && !value.includes('\\'), {
      message: 'must be a bare file name',
    }),
  restore_on_startup: z.boolean(),
});

/**
 * Telemetry Configuration
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean(),
  service_name: z.string().min(1, 'Service name cannot be empty'),
  prometheus_port: PortSchema,
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Complete runtime configuration (runtime.yaml after environment merge)
 */
export const RuntimeConfigSchema = z.object({
  server: ServerConfigSchema,
  supervisor: SupervisorConfigSchema,
  workers: WorkersConfigSchema,
  lifecycle: LifecycleConfigSchema,
  queue: QueueConfigSchema,
  artifacts: ArtifactsConfigSchema,
  telemetry: TelemetryConfigSchema,
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
