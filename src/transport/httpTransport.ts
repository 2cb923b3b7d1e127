import { performance } from "node:perf_hooks";
import { Agent, request } from "undici";
import { RequestEvent } from "../source/types.js";
import { ReplayResponse, Transport } from "./types.js";

export interface HttpTransportOptions {
  host: string;
  port: number;
  /** Upper bound on sockets the shared agent keeps open to the target. */
  connections?: number;
}

type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "DELETE" | "PATCH" | "OPTIONS";

const HTTP_METHODS: readonly HttpMethod[] = ["GET", "HEAD", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"];

const toHttpMethod = (method: string): HttpMethod => {
  const upper = method.toUpperCase();
  const known = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!known) {
    throw new Error(`Unsupported HTTP method "${method}"`);
  }
  return known;
};

const parseBody = (text: string): unknown => {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

/**
 * Sends captured requests to one host:port. All requests share a single
 * undici Agent, the replay's connection pool.
 */
export class HttpTransport implements Transport {
  readonly origin: string;
  private readonly agent: Agent;

  constructor(options: HttpTransportOptions) {
    this.origin = `http://${options.host}:${options.port}`;
    // No per-request deadline: only the end-of-run drain cuts a request short.
    this.agent = new Agent({
      connections: options.connections ?? null,
      headersTimeout: 0,
      bodyTimeout: 0
    });
  }

  urlFor(requestPath: string): string {
    return `${this.origin}${requestPath}`;
  }

  async send(event: RequestEvent, signal: AbortSignal): Promise<ReplayResponse> {
    const method = toHttpMethod(event.method);
    const hasBody = event.body !== undefined && method !== "GET" && method !== "HEAD";
    const start = performance.now();

    const { statusCode, body } = await request(this.urlFor(event.path), {
      method,
      headers: hasBody ? { "content-type": "application/json" } : {},
      body: hasBody ? JSON.stringify(event.body) : undefined,
      dispatcher: this.agent,
      signal
    });
    const text = await body.text();

    return {
      status: statusCode,
      body: parseBody(text),
      latencyMs: Math.max(0, performance.now() - start)
    };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
