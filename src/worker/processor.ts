import type { SQSBatchResponse } from 'aws-lambda';
import {
  MalformedMessage,
  PermanentStorageFailure,
  TransientStorageFailure,
  toError,
} from '../errors';
import type { Logger } from '../logger';
import type {
  BatchMessage,
  DeadLetterSink,
  LogRecord,
  LogStore,
  MessageOutcome,
} from '../types';
import { parseQueuedMessage } from './message';

export interface BatchProcessorDeps {
  store: LogStore;
  logger: Logger;
  deadLetter?: DeadLetterSink;
  now?: () => Date;
}

export interface BatchProcessor {
  processBatch(messages: readonly BatchMessage[]): Promise<MessageOutcome[]>;
}

export interface BatchSummary {
  persisted: number;
  duplicates: number;
  rejected: number;
  retried: number;
}

export function summarize(outcomes: readonly MessageOutcome[]): BatchSummary {
  const summary: BatchSummary = { persisted: 0, duplicates: 0, rejected: 0, retried: 0 };
  for (const outcome of outcomes) {
    if (outcome.status === 'persisted') {
      if (outcome.write === 'created') summary.persisted++;
      else summary.duplicates++;
    } else if (outcome.status === 'rejected') {
      summary.rejected++;
    } else {
      summary.retried++;
    }
  }
  return summary;
}

/**
 * Only messages marked for retry are reported; everything else is deleted
 * from the queue when the invocation returns.
 */
export function toBatchResponse(outcomes: readonly MessageOutcome[]): SQSBatchResponse {
  return {
    batchItemFailures: outcomes
      .filter(outcome => outcome.status === 'retry')
      .map(outcome => ({ itemIdentifier: outcome.messageId })),
  };
}

export function createBatchProcessor(deps: BatchProcessorDeps): BatchProcessor {
  const { store, logger, deadLetter } = deps;
  const now = deps.now ?? (() => new Date());

  async function reject(message: BatchMessage, error: Error): Promise<MessageOutcome> {
    if (error instanceof PermanentStorageFailure) {
      logger.error('Rejected unstorable message', {
        messageId: message.messageId,
        reason: error.message,
        error: error.cause === undefined ? undefined : toError(error.cause),
      });
    } else {
      logger.error('Rejected malformed message', {
        messageId: message.messageId,
        reason: error.message,
        issues: error instanceof MalformedMessage ? error.issues : [],
      });
    }

    if (deadLetter) {
      try {
        await deadLetter.forward(message.body, error.message);
      } catch (forwardError) {
        // Keep the message on the queue rather than drop it unrecorded
        logger.error('Dead-letter forwarding failed', {
          messageId: message.messageId,
          error: toError(forwardError),
        });
        return {
          messageId: message.messageId,
          status: 'retry',
          logId: null,
          reason: 'dead_letter_failed',
        };
      }
    }

    return { messageId: message.messageId, status: 'rejected', reason: error.message };
  }

  async function processMessage(message: BatchMessage): Promise<MessageOutcome> {
    let record: LogRecord;
    try {
      const parsed = parseQueuedMessage(message.body);
      record = { ...parsed, processed_at: now().toISOString() };
    } catch (error) {
      return reject(message, toError(error));
    }

    logger.debug('Processing message', {
      messageId: message.messageId,
      log_id: record.log_id,
      event_type: record.event_type,
    });

    try {
      const write = await store.upsertIfAbsent(record);
      logger.info(write === 'created' ? 'Saved log' : 'Log already stored', {
        log_id: record.log_id,
      });
      return { messageId: message.messageId, status: 'persisted', logId: record.log_id, write };
    } catch (error) {
      if (error instanceof PermanentStorageFailure) {
        return reject(message, error);
      }
      const retryable = error instanceof TransientStorageFailure ? error.retryable : true;
      const context = {
        messageId: message.messageId,
        log_id: record.log_id,
        retryable,
        error: toError(error),
      };
      if (retryable) {
        logger.warn('Storage write failed, leaving for redelivery', context);
      } else {
        logger.error('Storage write failed, leaving for redelivery', context);
      }
      return {
        messageId: message.messageId,
        status: 'retry',
        logId: record.log_id,
        reason: toError(error).message,
      };
    }
  }

  return {
    async processBatch(messages) {
      logger.info('Received batch', { size: messages.length });
      const outcomes = await Promise.all(messages.map(message => processMessage(message)));
      logger.info('Batch complete', { ...summarize(outcomes) });
      return outcomes;
    },
  };
}
