/**
 * HTTP Transport
 * Talks to the Mealie REST API with the base URL and bearer token bound
 */

import type {
  HttpConfig,
  HttpMethod,
  RequestBody,
  Transport,
  TransportResponse,
} from "../types";
import { TransportError, errorMessage } from "./errors";
import { wait } from "./wait";

export interface HttpTransportOptions {
  baseUrl: string;
  token: string;
  http: HttpConfig;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

async function parseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class HttpTransport implements Transport {
  private baseUrl: string;

  constructor(private options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  /**
   * Send a request with retry logic and exponential backoff
   *
   * Network failures, timeouts, 429 and 5xx are retried. Rejected credentials
   * throw immediately; any other status is handed back to the caller.
   */
  async invoke(
    method: HttpMethod,
    path: string,
    body?: RequestBody,
  ): Promise<TransportResponse> {
    const { timeout, retries, backoff } = this.options.http;
    const url = `${this.baseUrl}${path}`;

    let lastError: TransportError | null = null;

    for (let attempt = 0; attempt <= retries; attempt++) {
      if (attempt > 0) {
        // Exponential backoff: 1s, 2s, 4s, 8s... with the default base
        await wait(Math.pow(2, attempt - 1) * backoff);
      }

      let status: number;
      let data: unknown;
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      // The timeout covers reading the body as well as the headers
      try {
        const response = await fetch(url, {
          method,
          headers: this.headers(body),
          body: this.encode(body),
          signal: controller.signal,
        });
        status = response.status;
        data = await parseBody(response);
      } catch (error) {
        const reason =
          error instanceof Error && error.name === "AbortError"
            ? `timed out after ${timeout}ms`
            : errorMessage(error);
        lastError = new TransportError(`${method} ${path} failed: ${reason}`, null, true, {
          cause: error,
        });
        continue;
      } finally {
        clearTimeout(timeoutId);
      }

      if (status === 401 || status === 403) {
        throw new TransportError(
          `${method} ${path} rejected credentials (HTTP ${status})`,
          status,
          false,
        );
      }

      if (isRetryableStatus(status) && attempt < retries) {
        lastError = new TransportError(
          `${method} ${path} returned HTTP ${status}`,
          status,
          true,
        );
        continue;
      }

      return { status, data };
    }

    throw lastError ?? new TransportError(`${method} ${path} failed`, null, false);
  }

  private headers(body?: RequestBody): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.token}`,
      Accept: "application/json",
    };
    // fetch sets the multipart boundary itself for FormData
    if (body && !(body instanceof FormData)) {
      headers["Content-Type"] = "application/json";
    }
    return headers;
  }

  private encode(body?: RequestBody): string | FormData | undefined {
    if (!body) return undefined;
    return body instanceof FormData ? body : JSON.stringify(body);
  }
}
