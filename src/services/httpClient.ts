import { RecipeSourceError } from "./recipeSourceError.js";

export type FetchLike = typeof fetch;

export type RequestOptions = {
  fetchImpl: FetchLike;
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
};

export type FetchOutcome<T> =
  | { ok: true; body: T }
  | { ok: false; error: RecipeSourceError };

export function fetchJSON(url: string | URL, options: RequestOptions): Promise<FetchOutcome<unknown>> {
  return request(url, options, "application/json", (response) => response.json());
}

export function fetchHTML(url: string | URL, options: RequestOptions): Promise<FetchOutcome<string>> {
  return request(url, options, "text/html,application/xhtml+xml", (response) => response.text());
}

async function request<T>(
  url: string | URL,
  options: RequestOptions,
  accept: string,
  read: (response: Response) => Promise<T>
): Promise<FetchOutcome<T>> {
  if (options.signal?.aborted) {
    return failed(new RecipeSourceError("Request cancelled", "aborted"));
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const forwardAbort = () => controller.abort();
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const response = await options.fetchImpl(url.toString(), {
      method: "GET",
      headers: {
        Accept: accept,
        ...options.headers
      },
      signal: controller.signal
    });

    if (!response.ok) {
      return failed(new RecipeSourceError(`Request failed with status ${response.status}`, "http_status", response.status));
    }

    return { ok: true, body: await read(response) };
  } catch (error) {
    if (timedOut) {
      return failed(new RecipeSourceError(`Request timed out after ${options.timeoutMs}ms`, "timeout"));
    }
    if (options.signal?.aborted) {
      return failed(new RecipeSourceError("Request cancelled", "aborted"));
    }
    if (error instanceof SyntaxError) {
      return failed(new RecipeSourceError("Response body is not valid JSON", "invalid_payload"));
    }
    return failed(new RecipeSourceError(error instanceof Error ? error.message : "Request failed", "network_error"));
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}

function failed(error: RecipeSourceError): { ok: false; error: RecipeSourceError } {
  return { ok: false, error };
}
