import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError } from './errors';
import type { IngestConfig } from './config';
import type { Logger } from './logger';

type SecretsClient = Pick<SecretsManagerClient, 'send'>;

const SECRET_KEY_FIELD = 'SECRET_KEY';

/**
 * Secret strings are stored either as the raw key or as a JSON object
 * holding it under SECRET_KEY.
 */
export function extractSecretKey(secretString: string): string {
  const trimmed = secretString.trim();
  if (!trimmed.startsWith('{')) {
    return trimmed;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    throw new ConfigurationError('Webhook secret is not valid JSON', error);
  }

  if (typeof parsed === 'object' && parsed !== null && SECRET_KEY_FIELD in parsed) {
    const value: unknown = Reflect.get(parsed, SECRET_KEY_FIELD);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  throw new ConfigurationError(`${SECRET_KEY_FIELD} not found in webhook secret`);
}

/**
 * Resolves the HMAC key once at cold start. An inline WEBHOOK_SECRET wins
 * over the Secrets Manager lookup.
 */
export async function loadWebhookSecret(
  config: Pick<IngestConfig, 'AWS_REGION' | 'WEBHOOK_SECRET' | 'WEBHOOK_SECRET_ARN'>,
  logger: Logger,
  client: SecretsClient = new SecretsManagerClient({ region: config.AWS_REGION })
): Promise<Buffer> {
  if (config.WEBHOOK_SECRET !== undefined) {
    return Buffer.from(config.WEBHOOK_SECRET, 'utf8');
  }
  if (config.WEBHOOK_SECRET_ARN === undefined) {
    throw new ConfigurationError('WEBHOOK_SECRET_ARN or WEBHOOK_SECRET is required');
  }

  logger.info('Fetching webhook secret', { secretId: config.WEBHOOK_SECRET_ARN });
  const response = await client.send(
    new GetSecretValueCommand({ SecretId: config.WEBHOOK_SECRET_ARN })
  );
  if (!response.SecretString) {
    throw new ConfigurationError('Webhook secret has no SecretString');
  }
  return Buffer.from(extractSecretKey(response.SecretString), 'utf8');
}
