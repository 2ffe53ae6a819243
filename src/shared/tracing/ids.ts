import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

export function ensureCorrelationId(correlationId?: string): string {
  return correlationId && correlationId.trim().length > 0 ? correlationId.trim() : generateId();
}
