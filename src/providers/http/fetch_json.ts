/**
 * JSON GET helper for the HTTP-backed providers.
 * No retries: failures surface as ProviderUnavailableError.
 */

import { createChildLogger } from '@/utils/logger';
import {
  ProviderPayloadError,
  ProviderUnavailableError,
  toError,
  type ProviderName,
} from '../types';
import type { RateLimiter } from './rate_limiter';

const logger = createChildLogger('http');

export interface JsonRequest {
  provider: ProviderName;
  operation: string;
  url: URL;
  headers?: Record<string, string>;
  limiter?: RateLimiter;
  /** Resolve to null on 404 instead of failing */
  allowNotFound?: boolean;
}

export type FetchLike = (input: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export async function fetchJson(
  request: JsonRequest,
  fetchImpl: FetchLike = fetch
): Promise<unknown> {
  const { provider, operation, url, headers = {}, limiter, allowNotFound = false } = request;

  const send = () => fetchImpl(url.toString(), { headers: { Accept: 'application/json', ...headers } });

  let response: Response;
  try {
    response = limiter ? await limiter.run(send) : await send();
  } catch (error) {
    const cause = toError(error);
    logger.error({ provider, operation, error: cause.message }, 'Request failed');
    throw new ProviderUnavailableError(
      `${provider} ${operation} request failed: ${cause.message}`,
      provider,
      operation,
      undefined,
      cause
    );
  }

  if (response.status === 404 && allowNotFound) {
    logger.debug({ provider, operation, url: url.toString() }, 'Not found');
    return null;
  }

  if (!response.ok) {
    logger.error({ provider, operation, status: response.status }, 'Request returned an error status');
    throw new ProviderUnavailableError(
      `${provider} ${operation} error: ${response.status} ${response.statusText}`,
      provider,
      operation,
      response.status
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ProviderPayloadError(
      `${provider} ${operation} returned invalid JSON`,
      provider,
      operation,
      [toError(error).message]
    );
  }
}
