import { z } from 'zod';
import { ConfigurationError } from './errors';

type Env = Record<string, string | undefined>;

const region = z.string().min(1).default('us-east-1');

const ingestSchema = z
  .object({
    AWS_REGION: region,
    QUEUE_URL: z.string().url(),
    ENQUEUE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
    ENQUEUE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
    WEBHOOK_SECRET_ARN: z.string().min(1).optional(),
    WEBHOOK_SECRET: z.string().min(1).optional(),
  })
  .refine(env => env.WEBHOOK_SECRET_ARN !== undefined || env.WEBHOOK_SECRET !== undefined, {
    message: 'WEBHOOK_SECRET_ARN or WEBHOOK_SECRET is required',
    path: ['WEBHOOK_SECRET_ARN'],
  });

const workerSchema = z.object({
  AWS_REGION: region,
  TABLE_NAME: z.string().min(1),
  DEAD_LETTER_QUEUE_URL: z.string().url().optional(),
});

const logsApiSchema = z.object({
  AWS_REGION: region,
  TABLE_NAME: z.string().min(1),
});

export type IngestConfig = z.infer<typeof ingestSchema>;
export type WorkerConfig = z.infer<typeof workerSchema>;
export type LogsApiConfig = z.infer<typeof logsApiSchema>;

/**
 * Blank variables count as unset
 */
function compact(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

function parse<S extends z.ZodTypeAny>(schema: S, env: Env): z.infer<S> {
  const result = schema.safeParse(compact(env));
  if (!result.success) {
    const keys = result.error.issues.map(issue => issue.path.join('.') || issue.message);
    throw new ConfigurationError(
      `Invalid configuration: ${[...new Set(keys)].join(', ')}`,
      result.error
    );
  }
  return result.data;
}

export function loadIngestConfig(env: Env = process.env): IngestConfig {
  return parse(ingestSchema, env);
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  return parse(workerSchema, env);
}

export function loadLogsApiConfig(env: Env = process.env): LogsApiConfig {
  return parse(logsApiSchema, env);
}
