export type ThumbnailPipelineErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'DECODE_FAILED'
  | 'WRITE_FAILED'
  | 'METADATA_WRITE_FAILED';

export interface ThumbnailPipelineErrorContext {
  objectKey: string;
  /** Bucket or metadata table addressed by the failing stage. */
  target: string;
  cause?: unknown;
}

export abstract class ThumbnailPipelineError extends Error {
  abstract readonly code: ThumbnailPipelineErrorCode;
  readonly objectKey: string;
  readonly target: string;

  protected constructor(message: string, context: ThumbnailPipelineErrorContext) {
    super(`${message}: ${describeCause(context.cause)}`, { cause: context.cause });
    this.name = new.target.name;
    this.objectKey = context.objectKey;
    this.target = context.target;
  }
}

export class SourceNotFoundError extends ThumbnailPipelineError {
  readonly code = 'SOURCE_NOT_FOUND';

  constructor(context: ThumbnailPipelineErrorContext) {
    super(`Source object "${context.objectKey}" could not be read from bucket "${context.target}"`, context);
  }
}

export class DecodeError extends ThumbnailPipelineError {
  readonly code = 'DECODE_FAILED';

  constructor(context: ThumbnailPipelineErrorContext) {
    super(`Source object "${context.objectKey}" is not a decodable image`, context);
  }
}

export class WriteError extends ThumbnailPipelineError {
  readonly code = 'WRITE_FAILED';

  constructor(context: ThumbnailPipelineErrorContext) {
    super(`Resized object "${context.objectKey}" could not be written to bucket "${context.target}"`, context);
  }
}

export class MetadataWriteError extends ThumbnailPipelineError {
  readonly code = 'METADATA_WRITE_FAILED';

  constructor(context: ThumbnailPipelineErrorContext) {
    super(`Metadata for "${context.objectKey}" could not be written to table "${context.target}"`, context);
  }
}

/**
 * Runs one pipeline stage and maps any failure that is not already a pipeline
 * error onto the stage's error type.
 */
export async function runPipelineStage<T>(
  operation: () => Promise<T>,
  toError: (cause: unknown) => ThumbnailPipelineError,
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof ThumbnailPipelineError) {
      throw error;
    }
    throw toError(error);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown cause' : String(cause);
}
