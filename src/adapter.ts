import type { JsonValue, WireRecord } from "./json.js";

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Transport used by every model. Each call resolves to the decoded JSON
 * body, or `null` when the resource was not found; any other failure
 * rejects with `ApiRequestFailed`.
 */
export interface Adapter {
  get(path: string, params?: QueryParams): Promise<JsonValue | null>;
  post(path: string, body?: WireRecord): Promise<JsonValue | null>;
  put(path: string, body?: WireRecord): Promise<JsonValue | null>;
  delete(path: string, params?: QueryParams): Promise<JsonValue | null>;
}
