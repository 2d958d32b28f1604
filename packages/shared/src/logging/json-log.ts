export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Optional fields that tie a log line to a delivery, an image or an object. */
export interface LogTraceFields {
  messageId?: string;
  routingKey?: string;
  queue?: string;
  imageId?: string;
  objectKey?: string;
  bucket?: string;
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface JsonLogEntry extends LogTraceFields {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  metadata?: Record<string, unknown>;
  error?: SerializedError;
}

export interface CreateJsonLogEntryInput extends Omit<JsonLogEntry, 'timestamp' | 'error'> {
  timestamp?: string;
  error?: unknown;
}

export function serializeError(error: unknown): SerializedError | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: describeValue(error) };
  }

  const code: unknown = Reflect.get(error, 'code');
  const serialized: SerializedError = { name: error.name, message: error.message, stack: error.stack };
  if (typeof code === 'string') {
    serialized.code = code;
  }
  return serialized;
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function createJsonLogEntry({ timestamp, error, ...fields }: CreateJsonLogEntryInput): JsonLogEntry {
  return {
    timestamp: timestamp ?? new Date().toISOString(),
    ...fields,
    error: serializeError(error),
  };
}

/** One log line: the entry as a single JSON document. */
export function createJsonLogLine(input: CreateJsonLogEntryInput): string {
  return JSON.stringify(createJsonLogEntry(input));
}
