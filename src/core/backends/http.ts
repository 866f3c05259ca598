import type { z } from "zod";

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export interface JsonRequest {
  method?: "GET" | "POST" | "PUT";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  /** Cancels the request, body read included. */
  signal?: AbortSignal;
}

/**
 * One JSON request, no retry. Non-2xx responses throw HttpError; the body is
 * validated against `schema` before it is returned. The timeout covers the
 * whole exchange up to the last byte of the body.
 */
export async function requestJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  request: JsonRequest
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), request.timeoutMs);
  const cancel = () => controller.abort();
  if (request.signal?.aborted) controller.abort();
  request.signal?.addEventListener("abort", cancel, { once: true });

  let data: unknown;
  try {
    const response = await fetch(url, {
      method: request.method ?? "GET",
      headers: {
        Accept: "application/json",
        ...(request.body === undefined ? {} : { "Content-Type": "application/json" }),
        ...request.headers,
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new HttpError(response.status, `HTTP ${response.status} from ${url}: ${body.slice(0, 200)}`);
    }
    data = await response.json();
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      if (request.signal?.aborted) throw new Error(`Request to ${url} was cancelled`);
      throw new Error(`Request to ${url} timed out after ${request.timeoutMs}ms`);
    }
    throw err;
  } finally {
    clearTimeout(timer);
    request.signal?.removeEventListener("abort", cancel);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Unexpected response from ${url}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}
