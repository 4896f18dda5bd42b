/**
 * Provider Error Classes
 *
 * Thrown by provider adapters; caught by GenerativeTextService, which turns
 * them into diagnostics instead of letting them reach the tool layer.
 */

import type { ProviderKind } from './types.js';

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: ProviderKind,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  get isQuotaExceeded(): boolean {
    return this.statusCode === 429;
  }
}

export class ProviderNotConfiguredError extends ProviderError {
  constructor(provider: ProviderKind, envVar: string) {
    super(`${provider} provider is not configured: ${envVar} is not set`, provider);
    this.name = 'ProviderNotConfiguredError';
  }
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return undefined;
}

/**
 * Normalize anything an SDK call throws into a ProviderError.
 * Status is taken from the SDK error object, or from a "429" in the
 * message when the SDK only reports it textually.
 */
export function toProviderError(error: unknown, provider: ProviderKind): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error) ?? (/\b429\b/.test(message) ? 429 : undefined);
  return new ProviderError(message, provider, status);
}
