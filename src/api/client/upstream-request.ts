import { Readable } from 'stream';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { ApiError } from '@/api/middleware/error.handler.js';

export const USER_AGENT = 'sim-job-gateway/1.0.0';

const MAX_ERROR_BODY_BYTES = 4096;
const MAX_UPSTREAM_MESSAGE_LENGTH = 500;

/**
 * Bounded retry for idempotent reads
 */
export interface RetryPolicy {
  /** Additional attempts after the first */
  maxRetries: number;
  baseDelayMs: number;
}

/**
 * One outbound GET
 */
export interface UpstreamRequest {
  /** Log prefix, e.g. JobServiceClient */
  component: string;
  url: string;
  params?: Record<string, string | number | boolean>;
  credential: string;
  timeoutMs: number;
  signal?: AbortSignal;
  correlationId?: string;
  responseType?: 'json' | 'stream';
  accept?: string;
  /** Message for a 404 */
  notFoundMessage: string;
  /** Merged into every error's details */
  details?: Record<string, unknown>;
}

/**
 * Backoff before retry `attempt` (1-based)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Sleep that rejects with REQUEST_CANCELLED as soon as the signal fires
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(ApiError.requestCancelled());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(ApiError.requestCancelled());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Read at most MAX_ERROR_BODY_BYTES of an error response body.
 * Streams are destroyed afterwards so the socket goes back to the pool.
 */
export async function readErrorBody(data: unknown): Promise<string> {
  if (data === undefined || data === null) {
    return '';
  }

  if (typeof data === 'string') {
    return data.slice(0, MAX_ERROR_BODY_BYTES);
  }

  if (Buffer.isBuffer(data)) {
    return data.subarray(0, MAX_ERROR_BODY_BYTES).toString('utf8');
  }

  if (data instanceof Readable) {
    const chunks: Buffer[] = [];
    let size = 0;
    try {
      for await (const chunk of data) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        chunks.push(buffer);
        size += buffer.length;
        if (size >= MAX_ERROR_BODY_BYTES) {
          break;
        }
      }
    } catch (error) {
      console.warn(`[Upstream] Error body unreadable: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      data.destroy();
    }
    return Buffer.concat(chunks).subarray(0, MAX_ERROR_BODY_BYTES).toString('utf8');
  }

  return (JSON.stringify(data) ?? '').slice(0, MAX_ERROR_BODY_BYTES);
}

/**
 * Pull a human-readable message out of an upstream error body
 */
export function extractUpstreamMessage(body: string): string | null {
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return trimmed.slice(0, MAX_UPSTREAM_MESSAGE_LENGTH);
  }

  if (parsed && typeof parsed === 'object') {
    for (const key of ['message', 'Message', 'error', 'detail', 'Error']) {
      const value: unknown = Reflect.get(parsed, key);
      if (typeof value === 'string' && value.length > 0) {
        return value.slice(0, MAX_UPSTREAM_MESSAGE_LENGTH);
      }
    }
  }

  return trimmed.slice(0, MAX_UPSTREAM_MESSAGE_LENGTH);
}

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED');
}

function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

/**
 * Map a non-2xx status that will not be retried
 */
async function toStatusError(request: UpstreamRequest, response: AxiosResponse<unknown>): Promise<ApiError> {
  const upstreamMessage = extractUpstreamMessage(await readErrorBody(response.data));
  const status = response.status;

  switch (status) {
    case 401:
      return ApiError.unauthorized(upstreamMessage ?? 'Credential rejected by upstream service');
    case 403:
      return ApiError.forbidden(upstreamMessage ?? 'Credential not permitted for this resource');
    case 404:
      return ApiError.notFound(request.notFoundMessage, request.details);
    default:
      return ApiError.upstreamError(
        upstreamMessage ?? `Upstream service answered ${status}`,
        status,
        request.details
      );
  }
}

/**
 * Perform a GET against an upstream service.
 *
 * Resolves with the 2xx response. 4xx answers map to their error right away;
 * 5xx answers and transport failures are retried with exponential backoff
 * and then surface as UPSTREAM_UNAVAILABLE. A timeout is UPSTREAM_TIMEOUT and
 * is not retried. Cancellation through the signal aborts the call and any
 * pending backoff.
 */
export async function executeUpstream(
  http: AxiosInstance,
  request: UpstreamRequest,
  policy: RetryPolicy
): Promise<AxiosResponse<unknown>> {
  const totalAttempts = policy.maxRetries + 1;
  const prefix = `[${request.component}]${request.correlationId ? ` [${request.correlationId}]` : ''}`;
  const path = pathOf(request.url);
  let lastStatus: number | undefined;
  let lastFailure = '';

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    if (attempt > 1) {
      const delay = backoffDelay(policy, attempt - 1);
      console.log(`${prefix} GET ${path} failed (${lastFailure}); retry ${attempt - 1}/${policy.maxRetries} in ${delay}ms`);
      await abortableSleep(delay, request.signal);
    }

    if (request.signal?.aborted) {
      throw ApiError.requestCancelled();
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await http.request<unknown>({
        method: 'GET',
        url: request.url,
        params: request.params,
        timeout: request.timeoutMs,
        signal: request.signal,
        responseType: request.responseType ?? 'json',
        validateStatus: () => true,
        // Replaces axios's transitional defaults as a whole, so all three are set
        transitional: { silentJSONParsing: true, forcedJSONParsing: true, clarifyTimeoutError: true },
        headers: {
          Authorization: `Bearer ${request.credential}`,
          Accept: request.accept ?? 'application/json',
          'User-Agent': USER_AGENT,
          ...(request.correlationId ? { 'x-request-id': request.correlationId } : {})
        }
      });
    } catch (error) {
      if (axios.isCancel(error) || request.signal?.aborted) {
        throw ApiError.requestCancelled();
      }

      if (isTimeout(error)) {
        console.warn(`${prefix} GET ${path} timed out after ${request.timeoutMs}ms`);
        throw ApiError.upstreamTimeout(
          `Upstream service did not answer within ${request.timeoutMs}ms`,
          request.details
        );
      }

      lastStatus = undefined;
      lastFailure = describeTransportError(error);
      continue;
    }

    if (response.status >= 200 && response.status < 300) {
      return response;
    }

    if (response.status < 500) {
      throw await toStatusError(request, response);
    }

    lastStatus = response.status;
    const upstreamMessage = extractUpstreamMessage(await readErrorBody(response.data));
    lastFailure = upstreamMessage ? `${response.status}: ${upstreamMessage}` : `status ${response.status}`;
  }

  console.error(`${prefix} GET ${path} failed after ${totalAttempts} attempt(s): ${lastFailure}`);

  throw ApiError.upstreamUnavailable(
    `Upstream service unavailable after ${totalAttempts} attempt(s): ${lastFailure}`,
    lastStatus,
    request.details
  );
}
