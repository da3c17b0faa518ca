import { describe, expect, it } from "vitest";
import { REQUEST_CATALOG } from "../catalog/requests.js";
import { defineCatalog } from "../catalog/types.js";
import {
  type GeneratorConfig,
  requestGeneratorConfig,
  responseGeneratorConfig,
} from "../config/generator-config.js";
import type { IFileHandle } from "../interfaces/filesystem.js";
import { LogStore, storeLogger } from "../logging/logger.js";
import { InMemoryFileSystem } from "../testing/in-memory-filesystem.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { FixtureGenerator } from "./fixture-generator.js";

function setup(config: GeneratorConfig, fileSystem = new InMemoryFileSystem()) {
  const logs = new LogStore();
  const generator = new FixtureGenerator({
    fileSystem,
    config,
    logger: storeLogger(logs),
  });
  return { fileSystem, logs, generator };
}

/** Fails to open the nth file (1-based) opened for writing. */
class FailingFileSystem extends InMemoryFileSystem {
  private opened = 0;

  constructor(private readonly failOn: number) {
    super();
  }

  override async open(path: string, mode: "r" | "w"): Promise<IFileHandle> {
    if (mode === "w" && ++this.opened === this.failOn) {
      throw new Error(`ENOSPC: no space left on device: ${path}`);
    }
    return super.open(path, mode);
  }
}

/** Accepts at most `chunk` bytes per write call. */
class ChunkingFileSystem extends InMemoryFileSystem {
  writeCalls = 0;

  constructor(private readonly chunk: number) {
    super();
  }

  override async open(path: string, mode: "r" | "w"): Promise<IFileHandle> {
    const handle = await super.open(path, mode);
    return {
      read: (buffer, offset, length, position) =>
        handle.read(buffer, offset, length, position),
      write: (buffer, offset, length, position) => {
        this.writeCalls++;
        return handle.write(buffer, offset, Math.min(length, this.chunk), position);
      },
      close: () => handle.close(),
    };
  }
}

describe("FixtureGenerator", () => {
  it("writes every request fixture byte-for-byte", async () => {
    const config = requestGeneratorConfig();
    const { fileSystem, generator } = setup(config);

    const report = await generator.generate();

    expect(report.outputDir).toBe("sample_requests");
    expect(report.files).toHaveLength(32);
    expect(report.files[0]).toBe("sample_requests/01_simple_get.txt");
    for (const entry of config.catalog) {
      const written = await fileSystem.readFile(`sample_requests/${entry.name}`);
      expect(written).toEqual(entry.payload);
    }
    expect((await fileSystem.readdir("sample_requests")).sort()).toEqual(
      config.catalog.map((entry) => entry.name).sort(),
    );
  });

  it("writes the catalog bytes even after a caller edits an exported payload", async () => {
    const exported = REQUEST_CATALOG[0].payload;
    exported[0] = 0x58;
    const { fileSystem, generator } = setup(requestGeneratorConfig());

    await generator.generate();

    const bytes = await fileSystem.readFile("sample_requests/01_simple_get.txt");
    expect(bytes[0]).toBe(0x47);
    expect(decodeToString(bytes)).toBe("GET / HTTP/1.1\r\nHost: example.com\r\n\r\n");
  });

  it("writes the 204 response with nothing after the headers", async () => {
    const { fileSystem, generator } = setup(responseGeneratorConfig());
    await generator.generate();

    const bytes = await fileSystem.readFile("sample_responses/05_204_no_content.txt");
    expect(decodeToString(bytes)).toBe(
      "HTTP/1.1 204 No Content\r\nX-Request-ID: abc-789\r\n\r\n",
    );
    expect(await fileSystem.readdir("sample_responses")).toHaveLength(16);
  });

  it("logs one line per file and a summary", async () => {
    const { logs, generator } = setup(responseGeneratorConfig());
    await generator.generate();

    const messages = logs.messages("info");
    expect(messages).toHaveLength(17);
    expect(messages[0]).toBe("Created: sample_responses/01_simple_200.txt");
    expect(messages[15]).toBe("Created: sample_responses/16_many_headers.txt");
    expect(messages[16]).toBe(
      "\nGenerated 16 HTTP 1.1 response files in sample_responses/",
    );
  });

  it("creates missing parent directories", async () => {
    const config = { ...requestGeneratorConfig(), outputDir: "/build/fixtures/requests/" };
    const { fileSystem, logs, generator } = setup(config);

    const report = await generator.generate();

    expect(report.files[0]).toBe("/build/fixtures/requests/01_simple_get.txt");
    expect((await fileSystem.stat("/build/fixtures")).isDirectory).toBe(true);
    expect(logs.messages("info").at(-1)).toBe(
      "\nGenerated 32 HTTP 1.1 request files in /build/fixtures/requests/",
    );
  });

  it("overwrites stale content and leaves the same files on a rerun", async () => {
    const fileSystem = new InMemoryFileSystem();
    await fileSystem.writeFile(
      "sample_requests/01_simple_get.txt",
      fromString("stale content that is longer than the fixture"),
    );
    const { generator } = setup(requestGeneratorConfig(), fileSystem);

    await generator.generate();
    const first = await fileSystem.readdir("sample_requests");
    await generator.generate();
    const second = await fileSystem.readdir("sample_requests");

    expect(second.sort()).toEqual(first.sort());
    expect(second).toHaveLength(32);
    expect(decodeToString(await fileSystem.readFile("sample_requests/01_simple_get.txt"))).toBe(
      "GET / HTTP/1.1\r\nHost: example.com\r\n\r\n",
    );
  });

  it("continues partial writes until the payload is written", async () => {
    const fileSystem = new ChunkingFileSystem(100);
    const config: GeneratorConfig = {
      kind: "request",
      outputDir: "out",
      catalog: defineCatalog([
        { name: "01_big.txt", payload: fromString("B".repeat(250)) },
      ]),
    };
    const { generator } = setup(config, fileSystem);

    await generator.generate();

    expect(fileSystem.writeCalls).toBe(3);
    expect(decodeToString(await fileSystem.readFile("out/01_big.txt"))).toBe(
      "B".repeat(250),
    );
  });

  it("writes empty payloads as empty files", async () => {
    const config: GeneratorConfig = {
      kind: "response",
      outputDir: "out",
      catalog: defineCatalog([{ name: "01_empty.txt", payload: new Uint8Array(0) }]),
    };
    const { fileSystem, generator } = setup(config);

    await generator.generate();

    expect((await fileSystem.stat("out/01_empty.txt")).size).toBe(0);
  });

  it("propagates directory creation errors without writing anything", async () => {
    const fileSystem = new InMemoryFileSystem();
    await fileSystem.writeFile("/sample_requests", fromString("not a directory"));
    const { logs, generator } = setup(requestGeneratorConfig(), fileSystem);

    await expect(generator.generate()).rejects.toThrow(
      "EEXIST: file exists at path: /sample_requests",
    );
    expect(logs.size).toBe(0);
  });

  it("stops at the failing entry and keeps earlier files", async () => {
    const fileSystem = new FailingFileSystem(3);
    const { logs, generator } = setup(requestGeneratorConfig(), fileSystem);

    await expect(generator.generate()).rejects.toThrow(
      "ENOSPC: no space left on device: sample_requests/03_post_small.txt",
    );
    expect((await fileSystem.readdir("sample_requests")).sort()).toEqual([
      "01_simple_get.txt",
      "02_get_with_headers.txt",
    ]);
    expect(logs.messages("info")).toEqual([
      "Created: sample_requests/01_simple_get.txt",
      "Created: sample_requests/02_get_with_headers.txt",
    ]);
    expect(fileSystem.openHandleCount()).toBe(0);
  });

  it("closes the handle when a write fails", async () => {
    class BrokenWriteFileSystem extends InMemoryFileSystem {
      override async open(path: string, mode: "r" | "w"): Promise<IFileHandle> {
        const handle = await super.open(path, mode);
        return {
          read: (buffer, offset, length, position) =>
            handle.read(buffer, offset, length, position),
          write: async () => {
            throw new Error(`EIO: i/o error, write: ${path}`);
          },
          close: () => handle.close(),
        };
      }
    }
    const fileSystem = new BrokenWriteFileSystem();
    const { generator } = setup(requestGeneratorConfig(), fileSystem);

    await expect(generator.generate()).rejects.toThrow(
      "EIO: i/o error, write: sample_requests/01_simple_get.txt",
    );
    expect(fileSystem.openHandleCount()).toBe(0);
  });
});
