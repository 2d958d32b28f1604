import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

export function generateCorrelationId(): string {
  return generateId();
}

export function ensureCorrelationId(correlationId?: unknown): string {
  return typeof correlationId === 'string' && correlationId.trim().length > 0
    ? correlationId.trim()
    : generateCorrelationId();
}
