/**
 * Abstraction for fetching a remote file.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /** GET a URL and return its body; rejects with DownloadError */
  fetch(url: string, options: FetchOptions): Promise<DownloadedResource>;
}

export interface FetchOptions {
  timeoutMs: number;
}

export interface DownloadedResource {
  url: string;
  contentType?: string;
  body: Buffer;
}

export type DownloadFailureKind = "status" | "timeout" | "network";

/**
 * A per-row fetch failure. Never fatal for the run.
 */
export class DownloadError extends Error {
  readonly kind: DownloadFailureKind;
  readonly url: string;
  readonly status?: number;

  constructor(
    kind: DownloadFailureKind,
    url: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "DownloadError";
    this.kind = kind;
    this.url = url;
    this.status = options?.status;
  }
}
