import axios, { type AxiosInstance, isAxiosError } from "axios";
import { API_BASE_URL, WEBAPP_ORIGIN } from "../constants/game.js";
import { AuthError, GameLogicError, MaintenanceError, NetworkError } from "../errors.js";
import { createProxyAgent } from "../proxy/agent.js";
import type { InitData } from "../types.js";

export type HttpMethod = "GET" | "POST";

export interface RequestOptions {
  /** Query-string parameters; the signed init data. */
  params?: InitData;
  body?: unknown;
  signal?: AbortSignal;
}

/** The only network boundary of the game client. */
export interface Transport {
  request(method: HttpMethod, endpoint: string, options: RequestOptions): Promise<unknown>;
}

export function buildHeaders(userAgent: string): Record<string, string> {
  return {
    accept: "*/*",
    "accept-language": "ru,en-US;q=0.9,en;q=0.8",
    "cache-control": "no-cache",
    dnt: "1",
    origin: WEBAPP_ORIGIN,
    pragma: "no-cache",
    priority: "u=1, i",
    referer: `${WEBAPP_ORIGIN}/`,
    "sec-ch-ua": '"Chromium";v="131", "Not_A Brand";v="24"',
    "sec-ch-ua-mobile": "?0",
    "sec-ch-ua-platform": '"macOS"',
    "sec-fetch-dest": "empty",
    "sec-fetch-mode": "cors",
    "sec-fetch-site": "same-site",
    "user-agent": userAgent,
  };
}

function parseErrorBody(body: string): { name: string; message: string } {
  try {
    const data: unknown = JSON.parse(body);
    if (data && typeof data === "object") {
      const name = "name" in data && typeof data.name === "string" ? data.name : "Unknown";
      const message = "message" in data && typeof data.message === "string" ? data.message : "No message";
      return { name, message };
    }
  } catch {
    // Not JSON; fall through to the raw body
  }
  return { name: "Unknown", message: body.trim().slice(0, 200) || "No message" };
}

/**
 * Map a raw HTTP response onto the error taxonomy, returning the parsed JSON
 * body on success.
 */
export function classifyResponse(endpoint: string, status: number, body: string): unknown {
  const trimmed = body.trimStart().toLowerCase();
  if (trimmed.startsWith("<html") || trimmed.startsWith("<!doctype")) {
    // Cloudflare challenge or proxy error page
    throw new NetworkError(endpoint, `HTML response (status ${status})`, status);
  }

  if (status === 200) {
    try {
      return JSON.parse(body);
    } catch {
      throw new NetworkError(endpoint, "invalid JSON in response", status);
    }
  }

  const { name, message } = parseErrorBody(body);

  if (status === 418 && message.toLowerCase().includes("maintenance mode")) {
    throw new MaintenanceError(endpoint);
  }
  if (status === 401 || status === 403) {
    throw new AuthError(endpoint, `${name} - ${message}`, status);
  }
  if (status === 429 || status >= 500) {
    throw new NetworkError(endpoint, `${status} ${name} - ${message}`, status);
  }
  throw new GameLogicError(endpoint, message, status);
}

export interface AxiosTransportOptions {
  userAgent: string;
  proxy: string | null;
  timeoutMs: number;
  baseURL?: string;
}

export class AxiosTransport implements Transport {
  private readonly http: AxiosInstance;

  constructor(options: AxiosTransportOptions) {
    const agent = options.proxy ? createProxyAgent(options.proxy) : undefined;
    this.http = axios.create({
      baseURL: options.baseURL ?? API_BASE_URL,
      timeout: options.timeoutMs,
      headers: buildHeaders(options.userAgent),
      httpAgent: agent,
      httpsAgent: agent,
      proxy: false,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async request(method: HttpMethod, endpoint: string, options: RequestOptions): Promise<unknown> {
    let status: number;
    let body: string;
    try {
      const response = await this.http.request<string>({
        method,
        url: `/${endpoint}`,
        params: options.params,
        data: options.body,
        signal: options.signal,
      });
      status = response.status;
      body = typeof response.data === "string" ? response.data : JSON.stringify(response.data ?? "");
    } catch (error) {
      if (isAxiosError(error)) {
        const reason = error.code === "ECONNABORTED" ? "timeout" : error.code ?? error.message;
        throw new NetworkError(endpoint, reason);
      }
      throw error;
    }
    return classifyResponse(endpoint, status, body);
  }
}
