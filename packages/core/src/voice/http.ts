import { truncate } from '@receipt-voice/shared';
import { ErrorCodes, ServiceError, type RemoteService } from '../errors';

export interface PostJsonOptions {
  service: RemoteService;
  apiKey: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

function abortController(controller: AbortController): void {
  controller.abort();
}

function withKey(endpoint: string, apiKey: string): string {
  const url = new URL(endpoint);
  url.searchParams.set('key', apiKey);
  return url.toString();
}

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * Throws ServiceError with NETWORK_FAILURE (transport, timeout, abort),
 * SERVICE_ERROR (non-2xx, `statusCode` set) or PARSE_FAILURE (body is not JSON).
 */
export async function postJson(endpoint: string, payload: unknown, options: PostJsonOptions): Promise<unknown> {
  const { service } = options;
  const controller = new AbortController();
  const onAbort = () => controller.abort();

  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }

  // The deadline covers the body as well as the headers
  const timeoutId = setTimeout(abortController, options.timeoutMs, controller);
  const failureReason = (cause: Error): string => {
    if (!controller.signal.aborted) return cause.message;
    return options.signal?.aborted ? 'request cancelled' : `timed out after ${options.timeoutMs}ms`;
  };

  try {
    let response: Response;
    try {
      response = await fetch(withKey(endpoint, options.apiKey), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json; charset=utf-8',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ServiceError(`Failed to connect to ${service} service: ${failureReason(cause)}`, {
        service,
        code: ErrorCodes.NETWORK_FAILURE,
        cause,
        suggestion: 'Check your network connection and try again.',
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ServiceError(`Failed to read ${service} response: ${failureReason(cause)}`, {
        service,
        statusCode: response.status,
        code: ErrorCodes.NETWORK_FAILURE,
        cause,
      });
    }

    if (!response.ok) {
      throw new ServiceError(`${service} service error ${response.status}: ${truncate(text || response.statusText, 200)}`, {
        service,
        statusCode: response.status,
        code: ErrorCodes.SERVICE_ERROR,
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ServiceError(`Error parsing ${service} response`, {
        service,
        statusCode: response.status,
        code: ErrorCodes.PARSE_FAILURE,
        cause: error instanceof Error ? error : undefined,
      });
    }
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onAbort);
  }
}
