import { TransportError } from "../errors";
import { Transport } from "../types";
import { Logger } from "../utils/logger";

export type FetchLike = (
  url: string,
  init: { method: string; signal: AbortSignal }
) => Promise<Response>;

export type HttpTransportOptions = {
  timeoutMs?: number;
  fetch?: FetchLike;
};

export function buildUrl(baseUri: string, parameters: ReadonlyMap<string, string>): string {
  const query = Array.from(parameters, ([key, value]) => `${key}=${value}`).join("&");
  if (!query) return baseUri;
  if (baseUri.endsWith("?") || baseUri.endsWith("&")) return baseUri + query;
  return baseUri + (baseUri.includes("?") ? "&" : "?") + query;
}

function withTimeout(timeoutMs: number): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  return { signal: controller.signal, cleanup: () => clearTimeout(timeout) };
}

export class HttpTransport implements Transport {
  private logger: Logger;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(logger: Logger, options: HttpTransportOptions = {}) {
    this.logger = logger;
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async submitRequest(baseUri: string, parameters: ReadonlyMap<string, string>): Promise<Uint8Array> {
    const url = buildUrl(baseUri, parameters);
    const { signal, cleanup } = withTimeout(this.timeoutMs);

    try {
      let res: Response;
      let body: Uint8Array;
      try {
        res = await this.fetchImpl(url, { method: "GET", signal });
        body = new Uint8Array(await res.arrayBuffer());
      } catch (err) {
        this.logger.error("HTTP request failed", { message: String(err) });
        throw new TransportError({
          url,
          message: signal.aborted ? `Timed out after ${this.timeoutMs}ms` : String(err),
          cause: err,
        });
      }

      if (!res.ok) {
        this.logger.error("HTTP error status", { status: res.status });
        throw new TransportError({
          url,
          status: res.status,
          message: `HTTP ${res.status} ${res.statusText}`,
          responseText: Buffer.from(body).toString("latin1"),
        });
      }
      return body;
    } finally {
      cleanup();
    }
  }
}
