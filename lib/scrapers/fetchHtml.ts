const DEFAULT_TIMEOUT_MS = 90_000;

const UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export class FetchHtmlError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchHtmlError";
  }
}

/**
 * Fetch the agenda page. Any failure (timeout, network, non-2xx) throws
 * FetchHtmlError so the run stops before anything is written.
 */
export async function fetchHtml(url: string, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: { "User-Agent": UA, Accept: "text/html" },
    });
    if (!res.ok) {
      throw new FetchHtmlError(`HTTP ${res.status}: ${url}`, url, res.status);
    }
    return await res.text();
  } catch (e) {
    if (e instanceof FetchHtmlError) throw e;
    if (controller.signal.aborted) {
      throw new FetchHtmlError(`Timed out after ${timeoutMs}ms: ${url}`, url, undefined, { cause: e });
    }
    const msg = e instanceof Error ? e.message : String(e);
    throw new FetchHtmlError(`Fetch failed: ${url} (${msg})`, url, undefined, { cause: e });
  } finally {
    clearTimeout(timeoutId);
  }
}
