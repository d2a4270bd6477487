/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the document being parsed across the
 * pipeline and worker jobs.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';
import type { DocumentKind } from './types';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  documentType?: DocumentKind;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

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
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}
