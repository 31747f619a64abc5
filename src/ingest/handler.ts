import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import { loadIngestConfig } from '../config';
import { toError } from '../errors';
import { getHeader, jsonResponse, rawBody } from '../http';
import { tryParseJson } from '../json';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { SqsMessageQueue, createSqsClient } from '../queue/sqs';
import { loadWebhookSecret } from '../secrets';
import { verify } from '../signature';
import type { JsonValue, MessageQueue, QueuedMessage } from '../types';

export const SIGNATURE_HEADER = 'X-Webhook-Signature';

export interface IngestDeps {
  secret: Buffer;
  queue: MessageQueue;
  logger: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export type IngestHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

function eventTypeOf(payload: JsonValue): string | null {
  if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
    const value = payload.event_type;
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return null;
}

/**
 * Verifies, enqueues and answers. Never touches storage.
 */
export function createIngestHandler(deps: IngestDeps): IngestHandler {
  const { secret, queue, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const generateId = deps.generateId ?? (() => uuidv4());

  return async event => {
    try {
      const body = rawBody(event);
      const signature = getHeader(event, SIGNATURE_HEADER);

      if (!signature) {
        logger.warn('Missing signature header');
        return jsonResponse(401, { error: 'invalid_signature' });
      }

      if (!verify(body, signature, secret)) {
        logger.warn('Invalid signature', { signature });
        return jsonResponse(401, { error: 'invalid_signature' });
      }

      const text = body.toString('utf8');
      const parsed = tryParseJson(text);
      if (!parsed) {
        logger.warn('Rejected non-JSON payload', { bytes: body.length });
        return jsonResponse(400, { error: 'invalid_json' });
      }

      const message: QueuedMessage = {
        log_id: generateId(),
        received_at: now().toISOString(),
        event_type: eventTypeOf(parsed.value),
        payload: text,
        signature,
      };

      try {
        await queue.enqueue(message);
      } catch (error) {
        // No durability is claimed until the queue accepts the message
        logger.error('Enqueue failed', { log_id: message.log_id, error: toError(error) });
        return jsonResponse(500, { error: 'enqueue_failed' });
      }

      logger.info('Webhook accepted', {
        log_id: message.log_id,
        event_type: message.event_type,
      });
      return jsonResponse(200, { status: 'received', log_id: message.log_id });
    } catch (error) {
      logger.error('Unexpected error', { error: toError(error) });
      return jsonResponse(500, { error: 'internal_error' });
    }
  };
}

const logger = createLogger('webhook-receiver');

let ready: Promise<IngestHandler> | undefined;

/**
 * Secret and queue client are resolved once per container
 */
function getIngestHandler(): Promise<IngestHandler> {
  if (!ready) {
    ready = (async () => {
      const config = loadIngestConfig();
      const secret = await loadWebhookSecret(config, logger);
      const client = createSqsClient({
        region: config.AWS_REGION,
        timeoutMs: config.ENQUEUE_TIMEOUT_MS,
        maxAttempts: config.ENQUEUE_MAX_ATTEMPTS,
      });
      return createIngestHandler({
        secret,
        queue: new SqsMessageQueue(client, config.QUEUE_URL),
        logger,
      });
    })();
  }
  return ready;
}

export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  let ingest: IngestHandler;
  try {
    ingest = await getIngestHandler();
  } catch (error) {
    ready = undefined;
    logger.error('Configuration error', { error: toError(error) });
    return jsonResponse(500, { error: 'configuration_error' });
  }
  return ingest(event);
};
