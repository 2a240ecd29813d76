import { request, type Dispatcher } from "undici";

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class UnsupportedProtocolError extends Error {
  readonly protocol: string;

  constructor(protocol: string) {
    super(`Unsupported protocol for request: ${protocol}`);
    this.name = "UnsupportedProtocolError";
    this.protocol = protocol;
  }
}

type UndiciRequestOptions = {
  dispatcher?: Dispatcher;
} & Omit<Dispatcher.RequestOptions, "origin" | "path" | "method" | "signal"> &
  Partial<Pick<Dispatcher.RequestOptions, "method">>;

export interface HttpRequestOptions extends UndiciRequestOptions {
  url: string | URL;
  timeoutMs?: number;
  signal?: AbortSignal;
}

function ensureUrlInstance(value: string | URL): URL {
  if (value instanceof URL) {
    return value;
  }

  return new URL(value);
}

function isFinitePositive(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function forwardAbortSignal(source: AbortSignal, controller: AbortController): () => void {
  if (source.aborted) {
    controller.abort(source.reason);
    return () => {};
  }

  const listener = () => {
    controller.abort(source.reason);
  };

  source.addEventListener("abort", listener, { once: true });

  return () => {
    source.removeEventListener("abort", listener);
  };
}

/**
 * Issues a single request. The timeout covers the whole exchange up to the
 * response headers; callers own the response body and must consume or dump it.
 */
export async function httpRequest(options: HttpRequestOptions): Promise<Dispatcher.ResponseData> {
  const { url, timeoutMs, signal, dispatcher, ...rest } = options;

  const targetUrl = ensureUrlInstance(url);
  const protocol = targetUrl.protocol;

  if (protocol !== "http:" && protocol !== "https:") {
    throw new UnsupportedProtocolError(protocol);
  }

  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  if (isFinitePositive(timeoutMs)) {
    const timer = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort(new RequestTimeoutError(timeoutMs));
      }
    }, timeoutMs);
    cleanups.push(() => {
      clearTimeout(timer);
    });
  }

  if (signal) {
    cleanups.push(forwardAbortSignal(signal, controller));
  }

  try {
    return await request(targetUrl, {
      ...rest,
      ...(dispatcher ? { dispatcher } : {}),
      signal: controller.signal,
    });
  } catch (error) {
    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      if (reason instanceof Error) {
        throw reason;
      }
    }

    throw error;
  } finally {
    for (const cleanup of cleanups.splice(0, cleanups.length)) {
      cleanup();
    }
  }
}
