import { extname } from "path";

const VALID_EXTENSION = /^\.[a-z0-9]+$/;

/** Content-Type to extension, for URLs whose path has no suffix */
const CONTENT_TYPE_TO_EXT: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/pjpeg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/svg+xml": ".svg",
  "image/bmp": ".bmp",
  "image/tiff": ".tiff",
  "image/avif": ".avif",
  "image/heic": ".heic",
  "image/heif": ".heif",
  "image/x-icon": ".ico",
  "audio/mpeg": ".mp3",
  "audio/ogg": ".ogg",
  "audio/wav": ".wav",
  "video/mp4": ".mp4",
  "video/webm": ".webm",
  "application/pdf": ".pdf",
  "application/json": ".json",
  "application/zip": ".zip",
  "text/csv": ".csv",
  "text/html": ".html",
  "text/plain": ".txt",
};

/**
 * Extension of the URL's path, lowercased and including the dot.
 * Query string and fragment are ignored. Returns "" when there is none.
 */
export function extensionFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return "";
  }

  const ext = extname(decodeURIComponentSafe(pathname)).toLowerCase();
  return VALID_EXTENSION.test(ext) ? ext : "";
}

export function extensionFromContentType(contentType: string | undefined | null): string {
  if (!contentType) return "";
  const mainType = contentType.split(";")[0]?.trim().toLowerCase();
  if (!mainType) return "";
  return CONTENT_TYPE_TO_EXT[mainType] ?? "";
}

/**
 * URL suffix first, then the response Content-Type.
 */
export function resolveExtension(url: string, contentType: string | undefined | null): string {
  return extensionFromUrl(url) || extensionFromContentType(contentType);
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
