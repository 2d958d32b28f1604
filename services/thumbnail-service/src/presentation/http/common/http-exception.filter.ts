import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { createJsonLogLine, ensureCorrelationId } from '@thumbnail-pipeline/shared';
import {
  ThumbnailPipelineError,
  type ThumbnailPipelineErrorCode,
} from '../../../domain/thumbnail/thumbnail-pipeline-errors';

interface HttpRequestLike {
  headers: Record<string, string | string[] | undefined>;
  originalUrl?: string;
  url?: string;
  method: string;
}

interface HttpResponseLike {
  setHeader(name: string, value: string): void;
  status(code: number): HttpResponseLike;
  json(body: unknown): void;
}

export interface NormalizedHttpError {
  statusCode: number;
  code: string;
  message: string;
}

interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
  };
  statusCode: number;
  path: string;
  method: string;
  timestamp: string;
  correlationId: string;
}

const PIPELINE_ERROR_STATUS: Record<ThumbnailPipelineErrorCode, HttpStatus> = {
  SOURCE_NOT_FOUND: HttpStatus.NOT_FOUND,
  DECODE_FAILED: HttpStatus.UNPROCESSABLE_ENTITY,
  WRITE_FAILED: HttpStatus.BAD_GATEWAY,
  METADATA_WRITE_FAILED: HttpStatus.BAD_GATEWAY,
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const response = ctx.getResponse<HttpResponseLike>();

    const correlationId = ensureCorrelationId(firstHeaderValue(request.headers['x-correlation-id']));
    const normalized = normalizeHttpException(exception);
    const body: ErrorResponseBody = {
      error: {
        code: normalized.code,
        message: normalized.message,
      },
      statusCode: normalized.statusCode,
      path: request.originalUrl ?? request.url ?? '/',
      method: request.method,
      timestamp: new Date().toISOString(),
      correlationId,
    };

    response.setHeader('x-correlation-id', correlationId);
    response.status(normalized.statusCode).json(body);

    const level = normalized.statusCode >= 500 || exception instanceof ThumbnailPipelineError ? 'error' : 'warn';
    const logLine = createJsonLogLine({
      level,
      service: 'thumbnail-service',
      message: 'HTTP request failed.',
      correlationId,
      objectKey: exception instanceof ThumbnailPipelineError ? exception.objectKey : undefined,
      metadata: {
        method: body.method,
        path: body.path,
        statusCode: body.statusCode,
        errorCode: body.error.code,
      },
      error: level === 'error' ? exception : undefined,
    });

    if (level === 'error') {
      this.logger.error(logLine);
    } else {
      this.logger.warn(logLine);
    }
  }
}

export function normalizeHttpException(exception: unknown): NormalizedHttpError {
  if (exception instanceof ThumbnailPipelineError) {
    return {
      statusCode: PIPELINE_ERROR_STATUS[exception.code],
      code: exception.code,
      message: exception.message,
    };
  }

  if (exception instanceof HttpException) {
    const statusCode = exception.getStatus();
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return { statusCode, code: defaultCodeForStatus(statusCode), message: response };
    }

    const body: Record<string, unknown> = isRecord(response) ? response : {};
    return {
      statusCode,
      code: typeof body.code === 'string' ? body.code : defaultCodeForStatus(statusCode),
      message: typeof body.message === 'string' && body.message.trim()
        ? body.message
        : exception.message || 'Request failed.',
    };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Unexpected server error.',
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstHeaderValue(header: string | string[] | undefined): string | undefined {
  return Array.isArray(header) ? header[0] : header;
}

function defaultCodeForStatus(statusCode: number): string {
  switch (statusCode) {
    case HttpStatus.BAD_REQUEST:
      return 'BAD_REQUEST';
    case HttpStatus.NOT_FOUND:
      return 'NOT_FOUND';
    case HttpStatus.PAYLOAD_TOO_LARGE:
      return 'PAYLOAD_TOO_LARGE';
    default:
      return statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'HTTP_ERROR';
  }
}
