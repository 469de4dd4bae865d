import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fetchImageBytes, persist, processPhoto } from "./fetcher";
import { createContext, fakeImageHost, FakePageSource } from "./test-helpers";
import { PhotoSchema } from "../types";
import { IOError, ProtocolError, TransportError } from "../utils/errors";
import type { Transport } from "../utils/http";

describe("fetchImageBytes", () => {
  it("sends no credentials", async () => {
    const transport = fakeImageHost();

    const bytes = await fetchImageBytes(transport, "https://img.test/a.jpg");

    expect(transport).toHaveBeenCalledWith("https://img.test/a.jpg", {
      method: "GET",
      headers: {},
    });
    expect(Buffer.from(bytes).toString()).toBe("bytes:https://img.test/a.jpg");
  });

  it("fails with ProtocolError on a non-200 status", async () => {
    const transport = fakeImageHost({ "https://img.test/a.jpg": 404 });

    await expect(
      fetchImageBytes(transport, "https://img.test/a.jpg"),
    ).rejects.toMatchObject({ kind: "protocol", status: 404 });
  });

  it("fails with TransportError when the network call errors", async () => {
    const transport = vi.fn<Transport>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(
      fetchImageBytes(transport, "https://img.test/a.jpg"),
    ).rejects.toBeInstanceOf(TransportError);
  });
});

describe("persist", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "pexels-harvest-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes the exact bytes", async () => {
    const bytes = new Uint8Array([0xff, 0xd8, 0xff, 0xe0]);

    const path = await persist(bytes, root, "pic.jpg");

    expect(path).toBe(join(root, "pic.jpg"));
    expect(new Uint8Array(await readFile(path))).toEqual(bytes);
  });

  it("overwrites an existing file", async () => {
    await writeFile(join(root, "pic.jpg"), "old contents that are longer");

    await persist(new TextEncoder().encode("new"), root, "pic.jpg");

    expect(await readFile(join(root, "pic.jpg"), "utf-8")).toBe("new");
  });

  it("does not create the destination directory", async () => {
    const missing = join(root, "missing");

    const error = await persist(new Uint8Array([1]), missing, "pic.jpg").catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ path: join(missing, "pic.jpg") });
  });
});

describe("processPhoto", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "pexels-harvest-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("downloads the large2x variant under its derived name", async () => {
    const transport = fakeImageHost();
    const ctx = createContext(root, new FakePageSource({}), transport);
    const photo = PhotoSchema.parse({
      id: 42,
      src: {
        original: "https://img.test/42/original.jpeg",
        large2x: "https://img.test/42/pic.jpeg?auto=compress&dpr=2",
        tiny: "https://img.test/42/tiny.jpeg",
      },
    });

    const written = await processPhoto(ctx, photo);

    const contents = "bytes:https://img.test/42/pic.jpeg?auto=compress&dpr=2";
    expect(transport).toHaveBeenCalledTimes(1);
    expect(await readdir(root)).toEqual(["pic.jpeg"]);
    expect(await readFile(join(root, "pic.jpeg"), "utf-8")).toBe(contents);
    expect(written).toBe(contents.length);
  });

  it("creates no file when the download fails", async () => {
    const url = "https://img.test/1/pic.jpeg";
    const ctx = createContext(
      root,
      new FakePageSource({}),
      fakeImageHost({ [url]: 500 }),
    );
    const photo = PhotoSchema.parse({ src: { large2x: url } });

    await expect(processPhoto(ctx, photo)).rejects.toBeInstanceOf(ProtocolError);
    expect(await readdir(root)).toEqual([]);
  });
});
