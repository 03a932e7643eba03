/**
 * Target transport abstraction
 * Base URL and credentials are bound by the implementation
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type RequestBody = Record<string, unknown> | FormData;

export interface TransportResponse {
  status: number;
  data: unknown; // Parsed JSON, raw text when the body isn't JSON, null when empty
}

export interface Transport {
  invoke(method: HttpMethod, path: string, body?: RequestBody): Promise<TransportResponse>;
}

export function isSuccess(response: TransportResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Short description of a rejected response for reports
 *
 * @example
 * describeResponse({ status: 422, data: { detail: "bad" } }) // 'HTTP 422: {"detail":"bad"}'
 */
export function describeResponse(response: TransportResponse): string {
  if (response.data === null || response.data === "") return `HTTP ${response.status}`;
  const body =
    typeof response.data === "string" ? response.data : JSON.stringify(response.data);
  return `HTTP ${response.status}: ${body.slice(0, 200)}`;
}
