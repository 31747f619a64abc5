import { SQSClient, SendMessageCommand } from '@aws-sdk/client-sqs';
import type { MessageAttributeValue } from '@aws-sdk/client-sqs';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { EnqueueFailure } from '../errors';
import type { DeadLetterSink, MessageQueue, QueuedMessage } from '../types';

export type SqsSender = Pick<SQSClient, 'send'>;

export interface SqsClientOptions {
  region: string;
  timeoutMs: number;
  maxAttempts: number;
}

/**
 * SQS client whose calls give up after `timeoutMs` instead of holding the
 * sender's request open.
 */
export function createSqsClient(options: SqsClientOptions): SQSClient {
  return new SQSClient({
    region: options.region,
    maxAttempts: options.maxAttempts,
    requestHandler: new NodeHttpHandler({
      connectionTimeout: options.timeoutMs,
      requestTimeout: options.timeoutMs,
    }),
  });
}

export class SqsMessageQueue implements MessageQueue {
  constructor(
    private readonly client: SqsSender,
    private readonly queueUrl: string
  ) {}

  async enqueue(message: QueuedMessage): Promise<{ messageId: string }> {
    const attributes: Record<string, MessageAttributeValue> = {
      log_id: { DataType: 'String', StringValue: message.log_id },
    };
    if (message.event_type !== null && message.event_type !== '') {
      attributes.event_type = { DataType: 'String', StringValue: message.event_type };
    }

    let messageId: string | undefined;
    try {
      const output = await this.client.send(
        new SendMessageCommand({
          QueueUrl: this.queueUrl,
          MessageBody: JSON.stringify(message),
          MessageAttributes: attributes,
        })
      );
      messageId = output.MessageId;
    } catch (error) {
      throw new EnqueueFailure(`Failed to enqueue ${message.log_id}`, error);
    }

    if (!messageId) {
      throw new EnqueueFailure(`Queue returned no MessageId for ${message.log_id}`);
    }
    return { messageId };
  }
}

/**
 * Forwards poison message bodies, untouched, to a dead-letter queue
 */
export class SqsDeadLetterSink implements DeadLetterSink {
  constructor(
    private readonly client: SqsSender,
    private readonly queueUrl: string
  ) {}

  async forward(body: string, reason: string): Promise<void> {
    await this.client.send(
      new SendMessageCommand({
        QueueUrl: this.queueUrl,
        MessageBody: body,
        MessageAttributes: {
          rejection_reason: { DataType: 'String', StringValue: reason.slice(0, 1024) },
        },
      })
    );
  }
}
