import { ApiError } from './errors';

export type Throttle = <T>(fn: () => Promise<T>) => Promise<T>;

const STATUS_MESSAGES: Record<number, string> = {
  401: 'Invalid API key',
  402: 'Premium data required',
  403: 'Access forbidden',
  404: 'Data not found',
  429: 'Rate limit exceeded',
  500: 'Internal server error',
  503: 'Service unavailable'
};

export function describeStatus(status: number): string {
  return STATUS_MESSAGES[status] ?? `Unknown error ${status}`;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export interface FetchJsonOptions {
  params?: Record<string, string>;
  headers?: Record<string, string>;
  throttle?: Throttle;
  attempts?: number;
  backoffMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
const passthrough: Throttle = (fn) => fn();

/**
 * GET a JSON document. 429, 5xx and network failures are retried with
 * exponential backoff; any other non-2xx status fails at once.
 */
export async function fetchJson(baseUrl: string, options: FetchJsonOptions = {}): Promise<unknown> {
  const {
    params = {},
    headers = {},
    throttle = passthrough,
    attempts = 3,
    backoffMs = 1000,
    fetchImpl = fetch,
    sleep = defaultSleep
  } = options;

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  const target = url.toString();

  let lastError: Error | null = null;
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (attempt > 0) {
      await sleep(backoffMs * 2 ** attempt);
    }

    let response: Response;
    try {
      response = await throttle(() => fetchImpl(target, { headers }));
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      continue;
    }

    if (response.ok) {
      return response.json();
    }

    const apiError = new ApiError({ status: response.status, message: describeStatus(response.status), url: baseUrl });
    if (!isRetryableStatus(response.status)) {
      throw apiError;
    }
    lastError = apiError;
  }

  throw lastError ?? new Error(`Request to ${baseUrl} failed`);
}
