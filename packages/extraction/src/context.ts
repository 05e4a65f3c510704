/**
 * AsyncLocalStorage Context Management
 *
 * Carries a correlation ID and the document's source reference across one
 * extraction call so every log line can be tied back to its document.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  sourceRef?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Build a context for one document, generating a correlation ID.
 */
export function createDocumentContext(sourceRef?: string): RequestContext {
  return { correlationId: ulid(), sourceRef };
}
