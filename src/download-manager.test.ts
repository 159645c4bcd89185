import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { downloadAll, partFilename } from "./download-manager";
import { NetworkError } from "./errors";
import { resolveAll } from "./url-resolver";
import { sleep } from "./utils/sleep";
import { FakeHttpClient, type FakeReply } from "./testing/fake-http-client";
import type { DownloadOptions, DownloadResult, MediaEntry } from "./types";

function entry(id: string, kind: MediaEntry["kind"] = "photo"): MediaEntry {
  return {
    id,
    baseUrl: `https://lh3.googleusercontent.com/pw/${id}`,
    kind,
    width: 800,
    height: 600,
  };
}

const items = resolveAll([
  entry("AF1QipPhotoOne1"),
  entry("AF1QipPhotoTwo2"),
  entry("AF1QipVideoOne3", "video"),
]);

const options: DownloadOptions = { concurrency: 2, retries: 2, retryDelay: 0 };

/**
 * Serves "content of <id>" for every media URL
 */
function mediaServer(): FakeHttpClient {
  return new FakeHttpClient((url) => {
    const id = new URL(url).pathname.split("/").pop()?.split("=")[0];
    return { body: `content of ${id}` };
  });
}

function statuses(results: DownloadResult[]): string[] {
  return results.map((r) => r.outcome.status);
}

describe("downloadAll", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gphoto-get-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes every item under its target filename", async () => {
    const client = mediaServer();

    const results = await downloadAll(client, items, dir, options);

    expect(statuses(results)).toEqual(["success", "success", "success"]);
    expect((await readdir(dir)).sort()).toEqual([
      "PhotoOne.jpg",
      "PhotoTwo.jpg",
      "VideoOne.mp4",
    ]);
    expect(await readFile(join(dir, "VideoOne.mp4"), "utf-8")).toBe(
      "content of AF1QipVideoOne3",
    );
    expect(results[0].outcome).toEqual({
      status: "success",
      bytes: "content of AF1QipPhotoOne1".length,
      attempts: 1,
    });
  });

  it("requests the resolved download URLs", async () => {
    const client = mediaServer();

    await downloadAll(client, items, dir, options);

    expect(client.requests.map((r) => r.url).sort()).toEqual([
      "https://lh3.googleusercontent.com/pw/AF1QipPhotoOne1=w800-h600",
      "https://lh3.googleusercontent.com/pw/AF1QipPhotoTwo2=w800-h600",
      "https://lh3.googleusercontent.com/pw/AF1QipVideoOne3=dv",
    ]);
  });

  it("creates the destination directory", async () => {
    const nested = join(dir, "album", "2024");

    await downloadAll(mediaServer(), items.slice(0, 1), nested, options);

    expect(await readdir(nested)).toEqual(["PhotoOne.jpg"]);
  });

  it("skips everything on a second run without touching the network", async () => {
    const client = mediaServer();
    await downloadAll(client, items, dir, options);
    const before = await readFile(join(dir, "PhotoOne.jpg"), "utf-8");

    const results = await downloadAll(client, items, dir, options);

    expect(statuses(results)).toEqual(["skipped", "skipped", "skipped"]);
    expect(client.requests).toHaveLength(3);
    expect(await readdir(dir)).toHaveLength(3);
    expect(await readFile(join(dir, "PhotoOne.jpg"), "utf-8")).toBe(before);
  });

  it("re-downloads existing files with overwrite", async () => {
    await writeFile(join(dir, "PhotoOne.jpg"), "stale");

    const results = await downloadAll(mediaServer(), items.slice(0, 1), dir, {
      ...options,
      overwrite: true,
    });

    expect(statuses(results)).toEqual(["success"]);
    expect(await readFile(join(dir, "PhotoOne.jpg"), "utf-8")).toBe(
      "content of AF1QipPhotoOne1",
    );
  });

  it("re-downloads an empty file left by an earlier run", async () => {
    await writeFile(join(dir, "PhotoOne.jpg"), "");

    const results = await downloadAll(mediaServer(), items.slice(0, 1), dir, options);

    expect(statuses(results)).toEqual(["success"]);
  });

  describe("retries", () => {
    it("retries a 500 up to the bound, then fails", async () => {
      const client = new FakeHttpClient(() => ({
        status: 500,
        statusText: "Internal Server Error",
      }));

      const [result] = await downloadAll(client, items.slice(0, 1), dir, options);

      expect(result.outcome).toMatchObject({
        status: "failed",
        reason: "http-error",
        attempts: 3,
      });
      expect(client.requests).toHaveLength(3);
      expect(await readdir(dir)).toEqual([]);
    });

    it("fails a 404 immediately", async () => {
      const client = new FakeHttpClient(() => ({
        status: 404,
        statusText: "Not Found",
      }));

      const [result] = await downloadAll(client, items.slice(0, 1), dir, options);

      expect(result.outcome).toMatchObject({
        status: "failed",
        reason: "not-found",
        attempts: 1,
      });
      expect(client.requests).toHaveLength(1);
    });

    it("recovers when a retry succeeds", async () => {
      let calls = 0;
      const client = new FakeHttpClient((url): FakeReply | Error => {
        calls++;
        if (calls === 1) return new NetworkError(url, "socket hang up");
        if (calls === 2) return { status: 429, headers: { "Retry-After": "0" } };
        return { body: "finally" };
      });

      const [result] = await downloadAll(client, items.slice(0, 1), dir, options);

      expect(result.outcome).toEqual({
        status: "success",
        bytes: 7,
        attempts: 3,
      });
    });

    it("reports network failures after retrying", async () => {
      const client = new FakeHttpClient(
        (url) => new NetworkError(url, "Timed out after 10ms", true),
      );

      const [result] = await downloadAll(client, items.slice(0, 1), dir, options);

      expect(result.outcome).toMatchObject({
        status: "failed",
        reason: "timeout",
        attempts: 3,
      });
    });
  });

  it("never leaves a partial file under the final name", async () => {
    const client = new FakeHttpClient(() => ({
      stream: () =>
        new Readable({
          read() {
            this.push(Buffer.from("partial"));
            this.destroy(new Error("connection reset"));
          },
        }),
    }));

    const [result] = await downloadAll(client, items.slice(0, 1), dir, options);

    expect(result.outcome.status).toBe("failed");
    expect(await readdir(dir)).toEqual([]);
  });

  it("keeps going when one item fails", async () => {
    const client = new FakeHttpClient((url) =>
      url.includes("PhotoTwo") ? { status: 403 } : { body: "ok" },
    );

    const results = await downloadAll(client, items, dir, options);

    expect(statuses(results)).toEqual(["success", "failed", "success"]);
    expect((await readdir(dir)).sort()).toEqual(["PhotoOne.jpg", "VideoOne.mp4"]);
  });

  it("runs at most `concurrency` downloads at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const client = new FakeHttpClient(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(25);
      inFlight--;
      return { body: "ok" };
    });
    const many = resolveAll(
      Array.from({ length: 6 }, (_, i) => entry(`AF1QipItem${i}xxxx`)),
    );

    await downloadAll(client, many, dir, { ...options, concurrency: 2 });

    expect(peak).toBe(2);
    expect(client.requests).toHaveLength(6);
  });

  it("reports each result through onResult", async () => {
    const seen: string[] = [];

    await downloadAll(mediaServer(), items, dir, {
      ...options,
      onResult: (result) => seen.push(result.entry.targetFilename),
    });

    expect(seen.sort()).toEqual(["PhotoOne.jpg", "PhotoTwo.jpg", "VideoOne.mp4"]);
  });

  describe("cancellation", () => {
    it("cuts a backoff wait short", async () => {
      const client = new FakeHttpClient(() => ({
        status: 503,
        headers: { "Retry-After": "60" },
      }));
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 20);
      const started = Date.now();

      const [result] = await downloadAll(client, items.slice(0, 1), dir, {
        ...options,
        signal: controller.signal,
      });

      expect(result.outcome).toMatchObject({
        status: "failed",
        reason: "cancelled",
        attempts: 2,
      });
      expect(Date.now() - started).toBeLessThan(2000);
    });

    it("starts nothing once the signal has fired", async () => {
      const client = mediaServer();
      const controller = new AbortController();
      controller.abort();

      const results = await downloadAll(client, items, dir, {
        ...options,
        signal: controller.signal,
      });

      expect(results.map((r) => r.outcome)).toEqual([
        { status: "failed", reason: "cancelled", error: expect.any(String), attempts: 0 },
        { status: "failed", reason: "cancelled", error: expect.any(String), attempts: 0 },
        { status: "failed", reason: "cancelled", error: expect.any(String), attempts: 0 },
      ]);
      expect(client.requests).toHaveLength(0);
    });

    it("stops issuing new downloads after a mid-run abort", async () => {
      const client = mediaServer();
      const controller = new AbortController();

      const results = await downloadAll(client, items, dir, {
        ...options,
        concurrency: 1,
        signal: controller.signal,
        onResult: () => controller.abort(),
      });

      expect(statuses(results)).toEqual(["success", "failed", "failed"]);
      expect(client.requests).toHaveLength(1);
      expect(await readdir(dir)).toEqual(["PhotoOne.jpg"]);
    });

    it("removes the part file of an aborted transfer", async () => {
      const controller = new AbortController();
      const client = new FakeHttpClient(() => ({
        stream: () =>
          new Readable({
            read() {
              this.push(Buffer.from("first chunk"));
              controller.abort();
            },
          }),
      }));

      const [result] = await downloadAll(client, items.slice(0, 1), dir, {
        ...options,
        signal: controller.signal,
      });

      expect(result.outcome).toMatchObject({
        status: "failed",
        reason: "cancelled",
      });
      expect(await readdir(dir)).not.toContain(partFilename("PhotoOne.jpg"));
      expect(await readdir(dir)).toEqual([]);
    });
  });
});
