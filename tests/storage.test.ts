/**
 * Unit tests for DiskStorage and the result sink.
 */
import { describe, test, expect } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { DiskStorage } from "../src/storage/disk.js";
import { ResultSink, extractIdentifier, transcriptionKey } from "../src/output/sink.js";
import { makeLogger, makeTmpDir, messages } from "./fixtures.js";

describe("DiskStorage", () => {
  test("write and read", async () => {
    const dir = makeTmpDir();
    const s = new DiskStorage(join(dir, "store"));
    await s.write("a/b.txt", "hello");
    const data = await s.read("a/b.txt");
    expect(new TextDecoder().decode(data)).toBe("hello");
  });

  test("exists", async () => {
    const dir = makeTmpDir();
    const s = new DiskStorage(join(dir, "store"));
    expect(await s.exists("")).toBe(false);
    expect(await s.exists("missing.txt")).toBe(false);
    await s.write("found.txt", "here");
    expect(await s.exists("found.txt")).toBe(true);
    expect(await s.exists("")).toBe(true);
  });

  test("list keys", async () => {
    const dir = makeTmpDir();
    const s = new DiskStorage(join(dir, "store"));
    await s.write("p/one.txt", "1");
    await s.write("p/two.txt", "2");
    await s.write("q/three.txt", "3");
    expect(await s.list("p")).toEqual(["p/one.txt", "p/two.txt"]);
    expect(await s.list("")).toEqual(["p/one.txt", "p/two.txt", "q/three.txt"]);
  });

  test("list keys empty", async () => {
    const dir = makeTmpDir();
    const s = new DiskStorage(join(dir, "store"));
    expect(await s.list("nope")).toEqual([]);
  });

  test("describe resolves under the base path", () => {
    const dir = makeTmpDir();
    const s = new DiskStorage(join(dir, "store"));
    expect(s.describe("x.txt")).toBe(join(dir, "store", "x.txt"));
  });
});

describe("extractIdentifier", () => {
  test("digits after the bdr: marker", () => {
    expect(extractIdentifier("https://repo.test/iiif/image/bdr:123456/full/full/0/default.jpg")).toBe(
      "123456",
    );
    expect(extractIdentifier(".../bdr:123456/...")).toBe("123456");
  });

  test("first marker wins", () => {
    expect(extractIdentifier("https://x.test/bdr:11/bdr:22")).toBe("11");
  });

  test("no marker, no identifier", () => {
    expect(extractIdentifier("https://example.com/img.jpg")).toBeNull();
    expect(extractIdentifier("https://x.test/bdr:abc")).toBeNull();
  });

  test("key is the identifier with .txt", () => {
    expect(transcriptionKey("42")).toBe("42.txt");
  });
});

describe("ResultSink", () => {
  test("save writes UTF-8 text and overwrites", async () => {
    const dir = makeTmpDir();
    const out = join(dir, "output", "nested");
    const sink = new ResultSink({ storage: new DiskStorage(out), logger: makeLogger() });

    expect(await sink.save("first", "77")).toBe("77.txt");
    await sink.save("Über die Briefe – ſ", "77");

    expect(readFileSync(join(out, "77.txt"), "utf-8")).toBe("Über die Briefe – ſ");
  });

  test("publish saves under the identifier from the URL", async () => {
    const dir = makeTmpDir();
    const emitted: string[] = [];
    const sink = new ResultSink({
      storage: new DiskStorage(dir),
      logger: makeLogger(),
      emit: (t) => emitted.push(t),
    });

    const res = await sink.publish("https://repo.test/iiif/image/bdr:555/full.jpg", "Hello");

    expect(res).toEqual({ identifier: "555", key: "555.txt" });
    expect(readFileSync(join(dir, "555.txt"), "utf-8")).toBe("Hello");
    expect(emitted).toEqual([]);
  });

  test("publish without an identifier emits the text and warns", async () => {
    const dir = makeTmpDir();
    const emitted: string[] = [];
    const logger = makeLogger();
    const storage = new DiskStorage(join(dir, "out"));
    const sink = new ResultSink({ storage, logger, emit: (t) => emitted.push(t) });

    const res = await sink.publish("https://example.com/img.jpg", "Hello");

    expect(res).toEqual({ identifier: null, key: null });
    expect(emitted).toEqual(["Hello"]);
    expect(messages(logger.warn)).toEqual([
      "No identifier found in https://example.com/img.jpg, displaying transcription:",
    ]);
    expect(await storage.exists("")).toBe(false);
  });

  test("write failures are logged and rethrown", async () => {
    const dir = makeTmpDir();
    const blocker = join(dir, "blocker");
    writeFileSync(blocker, "a file where the directory should be");
    const logger = makeLogger();
    const sink = new ResultSink({ storage: new DiskStorage(blocker), logger });

    await expect(sink.save("text", "9")).rejects.toThrow();
    expect(messages(logger.error)[0]).toContain(`Failed to write file ${join(blocker, "9.txt")}`);
  });
});
