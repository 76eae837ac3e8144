import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseConfig } from "@coinwire/shared";
import { startService, type RunningService } from "../index.js";
import { loadSourceCatalog } from "../sources/catalog.js";

describe("startService", () => {
  let service: RunningService | null = null;
  let dir: string | null = null;

  afterEach(async () => {
    await service?.stop();
    service = null;
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("serves the seeded catalog in api mode without background loops", async () => {
    service = await startService(
      parseConfig({ mode: "api", database: { path: ":memory:" }, server: { host: "127.0.0.1", port: 0 } }),
    );
    const base = `http://127.0.0.1:${service.api?.port ?? 0}`;

    expect(service.scheduler).toBeNull();
    expect(service.translation).toBeNull();
    expect((await fetch(`${base}/health`)).status).toBe(200);

    const sources: unknown = await (await fetch(`${base}/api/v1/sources`)).json();
    expect(sources).toMatchObject({ data: expect.any(Array) });
    expect(sources).toHaveProperty("data.length", loadSourceCatalog().length);
  });

  it("runs the fetch loop and the API together in all mode", async () => {
    dir = mkdtempSync(join(tmpdir(), "coinwire-"));
    const catalog = join(dir, "sources.json");
    writeFileSync(catalog, "[]");

    service = await startService(
      parseConfig({
        mode: "all",
        database: { path: ":memory:" },
        server: { host: "127.0.0.1", port: 0 },
        fetcher: { sourcesFile: catalog },
      }),
    );

    expect(service.translation).toBeNull();
    await vi.waitFor(() => expect(service?.scheduler?.stats.fetchCount).toBe(1));

    const status: unknown = await (await fetch(`http://127.0.0.1:${service.api?.port ?? 0}/api/v1/status`)).json();
    expect(status).toMatchObject({
      data: {
        scheduler: { running: true, fetchCount: 1, errorCount: 0 },
        translation: null,
        sources: { total: 0, enabled: 0, healthy: 0, unhealthy: 0 },
      },
    });
  });

  it("skips the API in fetcher mode", async () => {
    dir = mkdtempSync(join(tmpdir(), "coinwire-"));
    const catalog = join(dir, "sources.json");
    writeFileSync(catalog, "[]");

    service = await startService(
      parseConfig({ mode: "fetcher", database: { path: ":memory:" }, fetcher: { sourcesFile: catalog } }),
    );

    expect(service.api).toBeNull();
    expect(service.scheduler?.isRunning).toBe(true);
  });
});
