import { failed, type FailedResult } from "./LLMProvider.js";

export interface PostOptions {
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
}

export type PostResult = { ok: true; payload: unknown } | FailedResult;

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * POST a JSON body with a hard timeout and classify whatever goes wrong.
 * 429 is a rate limit; every other non-2xx status, auth errors included, is
 * treated as the service being unavailable.
 */
export async function postJson(url: string, options: PostOptions): Promise<PostResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...options.headers },
      body: JSON.stringify(options.body),
      signal: controller.signal
    });

    if (response.status === 429) {
      return failed("rate_limited", `Rate limited (${response.status})`);
    }
    if (!response.ok) {
      return failed("service_unavailable", `Request failed (${response.status})`);
    }

    const payload: unknown = await response.json();
    return { ok: true, payload };
  } catch (error) {
    if (isAbortError(error)) {
      return failed("timeout", `No response within ${options.timeoutMs}ms`);
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    return failed("service_unavailable", message);
  } finally {
    clearTimeout(timeout);
  }
}
