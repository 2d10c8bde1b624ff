import type { Adapter, QueryParams } from "./adapter.js";
import {
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  validateConfig,
  type EmmaConfig,
} from "./config.js";
import { ApiRequestFailed } from "./errors.js";
import { isWireRecord, type JsonValue, type WireRecord } from "./json.js";

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

interface DecodedBody {
  data: JsonValue | null;
  text: string;
}

export default class FetchAdapter implements Adapter {
  private baseUrl: string;
  private timeoutMs: number;
  private debug: boolean;
  private authHeader: string;

  constructor(config: EmmaConfig) {
    validateConfig(config);

    const apiUrl = config.apiURL ?? DEFAULT_API_URL;
    const normalizedUrl = apiUrl.endsWith("/") ? apiUrl.slice(0, -1) : apiUrl;
    this.baseUrl = `${normalizedUrl}/${config.accountId}`;
    this.timeoutMs = config.timeoutMS ?? DEFAULT_TIMEOUT_MS;
    this.debug = config.debug ?? false;

    this.authHeader = `Basic ${FetchAdapter.encodeBase64(
      `${config.publicKey}:${config.privateKey}`,
    )}`;
  }

  private static encodeBase64(value: string): string {
    const globalBtoa = globalThis.btoa;
    if (typeof globalBtoa !== "function") {
      throw new Error("btoa is not available in this runtime");
    }

    return globalBtoa(value);
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = `${this.baseUrl}${path}`;
    if (!params) return url;

    const search = new URLSearchParams();
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) search.append(key, String(value));
    });
    const query = search.toString();
    return query ? `${url}?${query}` : url;
  }

  private async send(
    input: string,
    init: RequestInit = {},
  ): Promise<Response> {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), this.timeoutMs);

    const method = (init.method ?? "GET").toUpperCase();
    const headers = new Headers(init.headers);
    headers.set("Authorization", this.authHeader);
    headers.set("Accept", "application/json");
    if (method !== "GET" && !headers.has("Content-Type")) {
      headers.set("Content-Type", "application/json");
    }

    if (this.debug) {
      console.log("[FetchAdapter] Request:", input);
      console.log("[FetchAdapter] Method:", method);
    }

    try {
      return await fetch(input, {
        ...init,
        headers,
        signal: controller.signal,
      });
    } catch (err: unknown) {
      if (controller.signal.aborted) {
        throw new ApiRequestFailed(504, "Request timed out");
      }
      throw new ApiRequestFailed(
        500,
        err instanceof Error ? err.message : "Request failed",
      );
    } finally {
      clearTimeout(id);
    }
  }

  private async decodeBody(res: Response): Promise<DecodedBody> {
    if (res.status === 204 || res.status === 205) {
      return { data: null, text: "" };
    }

    const text = await res.text();
    const contentType = res.headers.get("content-type") ?? "";
    if (!text || !contentType.toLowerCase().includes("application/json")) {
      return { data: null, text };
    }

    try {
      const data: JsonValue = JSON.parse(text);
      return { data, text };
    } catch (err: unknown) {
      const parseMessage =
        err instanceof Error ? err.message : "Failed to parse JSON response";
      throw new ApiRequestFailed(res.status, parseMessage, text);
    }
  }

  private static describeFailure(res: Response, body: DecodedBody): string {
    if (isWireRecord(body.data)) {
      const { error, message } = body.data;
      if (typeof error === "string" && error) return error;
      if (typeof message === "string" && message) return message;
    }
    return res.statusText || `Request failed with status ${res.status}`;
  }

  private async request(
    method: HttpMethod,
    path: string,
    options: { params?: QueryParams; body?: WireRecord } = {},
  ): Promise<JsonValue | null> {
    const url = this.buildUrl(path, options.params);
    const init: RequestInit = { method };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    if (this.debug) {
      console.log(
        `Making ${method} request to: ${url} (timeout: ${this.timeoutMs}ms)`,
      );
      if (init.body !== undefined) {
        console.log("Request body:", init.body);
      }
    }

    const res = await this.send(url, init);
    if (res.status === 404) {
      return null;
    }

    const body = await this.decodeBody(res);
    if (!res.ok) {
      throw new ApiRequestFailed(
        res.status,
        FetchAdapter.describeFailure(res, body),
        body.data ?? (body.text || null),
      );
    }
    return body.data;
  }

  async get(path: string, params?: QueryParams): Promise<JsonValue | null> {
    return this.request("GET", path, { params });
  }

  async post(path: string, body?: WireRecord): Promise<JsonValue | null> {
    return this.request("POST", path, { body });
  }

  async put(path: string, body?: WireRecord): Promise<JsonValue | null> {
    return this.request("PUT", path, { body });
  }

  async delete(path: string, params?: QueryParams): Promise<JsonValue | null> {
    return this.request("DELETE", path, { params });
  }
}
