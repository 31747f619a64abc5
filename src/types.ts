/**
 * JSON value as it travels inside a queue message or a stored record
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Message format sent from the Ingest Lambda to the Worker Lambda over SQS
 */
export interface QueuedMessage {
  log_id: string;
  received_at: string; // ISO-8601, UTC
  event_type: string | null;
  payload: string; // JSON text exactly as received
  signature: string;
}

/**
 * DynamoDB record structure, keyed by log_id. The payload is kept as JSON
 * text so numbers outside the double range survive untouched.
 */
export interface LogRecord {
  log_id: string;
  received_at: string;
  event_type: string | null;
  payload: string | null;
  signature: string | null;
  processed_at: string | null;
}

export type WriteResult = 'created' | 'already_existed';

export interface LogQuery {
  eventType?: string;
  limit: number;
  cursor?: string;
}

export interface LogPage {
  records: LogRecord[];
  nextCursor: string | null;
}

/**
 * Port to the durable queue between admission and persistence
 */
export interface MessageQueue {
  enqueue(message: QueuedMessage): Promise<{ messageId: string }>;
}

/**
 * Port to the dead-letter destination for messages that can never be stored
 */
export interface DeadLetterSink {
  forward(body: string, reason: string): Promise<void>;
}

/**
 * Port to the log table
 */
export interface LogStore {
  upsertIfAbsent(record: LogRecord): Promise<WriteResult>;
  queryByFilter(query: LogQuery): Promise<LogPage>;
}

/**
 * One message of a batch as handed to the processor
 */
export interface BatchMessage {
  messageId: string;
  body: string;
}

export type MessageOutcome =
  | { messageId: string; status: 'persisted'; logId: string; write: WriteResult }
  | { messageId: string; status: 'rejected'; reason: string }
  | { messageId: string; status: 'retry'; logId: string | null; reason: string };
