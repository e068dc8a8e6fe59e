/**
 * HTTP helpers shared by the feed client, gallery expander and image fetcher
 */

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
  timeout: number;
  userAgent?: string;
  fetch?: HttpFetch;
}

export interface RetryOptions extends RequestOptions {
  retries: number;
}

export class HttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpError";
  }
}

export class InvalidUrlError extends Error {
  constructor(readonly url: string) {
    super(`Invalid URL: ${url}`);
    this.name = "InvalidUrlError";
  }
}

export type BodyReader<T> = (response: Response) => Promise<T>;

/**
 * GET a URL and read it with `read`; the timeout covers headers and body
 * Throws InvalidUrlError, HttpError (non-2xx) or the transport's own error
 */
export async function request<T>(
  url: string,
  options: RequestOptions,
  read: BodyReader<T>,
): Promise<T> {
  try {
    new URL(url);
  } catch {
    throw new InvalidUrlError(url);
  }

  const doFetch = options.fetch ?? fetch;
  const headers: Record<string, string> = {};
  if (options.userAgent) {
    headers["User-Agent"] = options.userAgent;
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await doFetch(url, {
      signal: controller.signal,
      headers,
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new HttpError(url, response.status, response.statusText);
    }

    return await read(response);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * GET a URL with retry logic and exponential backoff
 */
export async function requestWithRetry<T>(
  url: string,
  options: RetryOptions,
  read: BodyReader<T>,
): Promise<T> {
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    try {
      return await request(url, options, read);
    } catch (error) {
      if (error instanceof InvalidUrlError) throw error;
      lastError = error;
      if (attempt < options.retries) {
        // Exponential backoff: 1s, 2s, 4s, 8s...
        await new Promise((r) => setTimeout(r, Math.pow(2, attempt) * 1000));
      }
    }
  }

  throw lastError ?? new Error(`Failed to fetch ${url}`);
}
