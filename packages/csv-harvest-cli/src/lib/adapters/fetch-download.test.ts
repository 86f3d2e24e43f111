import { describe, it, expect, vi } from "vitest";
import { createFetchDownloadService } from "./fetch-download.js";
import { DownloadError } from "../ports/download.js";

const URL_UNDER_TEST = "https://img.example.test/pizza.jpg";

describe("createFetchDownloadService", () => {
  it("returns the body and content type", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      new Response("jpeg-bytes", { status: 200, headers: { "content-type": "image/jpeg" } })
    );
    const service = createFetchDownloadService(fetchImpl);

    const resource = await service.fetch(URL_UNDER_TEST, { timeoutMs: 1000 });

    expect(resource.url).toBe(URL_UNDER_TEST);
    expect(resource.contentType).toBe("image/jpeg");
    expect(resource.body.toString("utf-8")).toBe("jpeg-bytes");
  });

  it("leaves contentType undefined when the header is absent", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(new Uint8Array([1, 2, 3]), { status: 200 })
    );
    const service = createFetchDownloadService(fetchImpl);

    const resource = await service.fetch(URL_UNDER_TEST, { timeoutMs: 1000 });

    expect(resource.contentType).toBeUndefined();
    expect([...resource.body]).toEqual([1, 2, 3]);
  });

  it("sends the configured User-Agent and a timeout signal", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response("ok"));
    const service = createFetchDownloadService(fetchImpl, { userAgent: "csv-harvest-test" });

    await service.fetch(URL_UNDER_TEST, { timeoutMs: 1000 });

    const init = fetchImpl.mock.calls[0][1];
    expect(init?.headers).toEqual({ "User-Agent": "csv-harvest-test" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("maps non-2xx responses to status errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      new Response("missing", { status: 404, statusText: "Not Found" })
    );
    const service = createFetchDownloadService(fetchImpl);

    const promise = service.fetch(URL_UNDER_TEST, { timeoutMs: 1000 });

    await expect(promise).rejects.toBeInstanceOf(DownloadError);
    await expect(promise).rejects.toMatchObject({
      kind: "status",
      status: 404,
      url: URL_UNDER_TEST,
      message: "HTTP 404 Not Found",
    });
  });

  it("maps aborted requests to timeout errors", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockRejectedValue(Object.assign(new Error("aborted"), { name: "TimeoutError" }));
    const service = createFetchDownloadService(fetchImpl);

    await expect(service.fetch(URL_UNDER_TEST, { timeoutMs: 500 })).rejects.toMatchObject({
      kind: "timeout",
      message: "Timed out after 500ms",
    });
  });

  it("maps other failures to network errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
    const service = createFetchDownloadService(fetchImpl);

    await expect(service.fetch(URL_UNDER_TEST, { timeoutMs: 1000 })).rejects.toMatchObject({
      kind: "network",
      message: "fetch failed",
    });
  });
});
