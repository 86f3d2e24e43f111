import {
  DownloadError,
  type DownloadService,
  type DownloadedResource,
  type FetchOptions,
} from "../ports/download.js";

export interface FetchDownloadServiceOptions {
  userAgent?: string;
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Create a download service using fetch.
 * Every failure (network, timeout, non-2xx) surfaces as a DownloadError.
 */
export function createFetchDownloadService(
  fetchImpl: typeof fetch = globalThis.fetch,
  options: FetchDownloadServiceOptions = {}
): DownloadService {
  const headers: Record<string, string> = {};
  if (options.userAgent) {
    headers["User-Agent"] = options.userAgent;
  }

  return {
    async fetch(url: string, { timeoutMs }: FetchOptions): Promise<DownloadedResource> {
      const signal = AbortSignal.timeout(timeoutMs);

      let response: Response;
      try {
        response = await fetchImpl(url, { headers, signal, redirect: "follow" });
      } catch (error) {
        if (isTimeout(error)) {
          throw new DownloadError("timeout", url, `Timed out after ${timeoutMs}ms`, {
            cause: error,
          });
        }
        throw new DownloadError("network", url, (error as Error).message, { cause: error });
      }

      if (!response.ok) {
        throw new DownloadError(
          "status",
          url,
          `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
          { status: response.status }
        );
      }

      let body: Buffer;
      try {
        body = Buffer.from(await response.arrayBuffer());
      } catch (error) {
        const kind = isTimeout(error) ? "timeout" : "network";
        throw new DownloadError(kind, url, `Body read failed: ${(error as Error).message}`, {
          cause: error,
        });
      }

      return {
        url,
        contentType: response.headers.get("content-type") ?? undefined,
        body,
      };
    },
  };
}
