import type { SQSBatchResponse, SQSEvent } from 'aws-lambda';
import { SQSClient } from '@aws-sdk/client-sqs';
import { loadWorkerConfig } from '../config';
import { createLogger } from '../logger';
import { SqsDeadLetterSink } from '../queue/sqs';
import { DynamoLogStore, createDocumentClient } from '../store/dynamo';
import { createBatchProcessor, toBatchResponse } from './processor';
import type { BatchProcessor } from './processor';

const logger = createLogger('webhook-worker');

let processor: BatchProcessor | undefined;

/**
 * Clients are built once per container and reused across invocations
 */
function getProcessor(): BatchProcessor {
  if (!processor) {
    const config = loadWorkerConfig();
    const deadLetter = config.DEAD_LETTER_QUEUE_URL
      ? new SqsDeadLetterSink(
          new SQSClient({ region: config.AWS_REGION }),
          config.DEAD_LETTER_QUEUE_URL
        )
      : undefined;
    processor = createBatchProcessor({
      store: new DynamoLogStore(createDocumentClient(config.AWS_REGION), config.TABLE_NAME),
      logger,
      deadLetter,
    });
  }
  return processor;
}

export const handler = async (event: SQSEvent): Promise<SQSBatchResponse> => {
  const outcomes = await getProcessor().processBatch(
    event.Records.map(record => ({ messageId: record.messageId, body: record.body }))
  );
  return toBatchResponse(outcomes);
};
