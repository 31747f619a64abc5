import { z } from 'zod';
import { MalformedMessage } from '../errors';
import { isJsonText, jsonValueSchema } from '../json';
import type { QueuedMessage } from '../types';

/**
 * Producers send ISO-8601 strings; epoch milliseconds are accepted too.
 */
const MAX_EPOCH_MS = 8_640_000_000_000_000;

const receivedAtSchema = z
  .union([
    z.string().datetime({ offset: true }),
    z.number().int().nonnegative().max(MAX_EPOCH_MS),
  ])
  .transform(value => new Date(value).toISOString());

/**
 * The payload travels as JSON text. A producer that embeds the document
 * instead gets it serialised here.
 */
const payloadSchema = z
  .union([z.string(), jsonValueSchema])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === null) {
      return null;
    }
    if (typeof value !== 'string') {
      return JSON.stringify(value);
    }
    if (!isJsonText(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Payload is not JSON text' });
      return z.NEVER;
    }
    return value;
  });

const queuedMessageSchema = z.object({
  log_id: z.string().min(1),
  received_at: receivedAtSchema,
  event_type: z
    .string()
    .nullish()
    .transform(value => (value ? value : null)),
  payload: payloadSchema,
  signature: z
    .string()
    .nullish()
    .transform(value => value ?? null),
});

export type ParsedMessage = Omit<QueuedMessage, 'payload' | 'signature'> & {
  payload: string | null;
  signature: string | null;
};

/**
 * Parses a queue message body. Throws MalformedMessage for anything that
 * lacks the fields a LogRecord needs.
 */
export function parseQueuedMessage(body: string): ParsedMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new MalformedMessage('Message body is not valid JSON');
  }

  const result = queuedMessageSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new MalformedMessage('Message does not match the queue schema', issues);
  }
  return result.data;
}
