import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  getUserConfigPath,
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Point the user config at a scratch directory instead of the real one
const userPaths = await vi.hoisted(async () => {
  const os = await import("node:os");
  const path = await import("node:path");
  return {
    config: path.join(os.tmpdir(), `pexels-harvest-user-config-${process.pid}`),
  };
});

vi.mock("env-paths", () => ({ default: () => userPaths }));

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config).toEqual({
      api: { key: "" },
      output: { directory: "output" },
      search: { query: "people" },
      logging: { level: "info", showProgress: true },
    });
  });
});

describe("mergeConfig", () => {
  it("merges nested sections key by key", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      search: { query: "mountains" },
      logging: { showProgress: false },
    });

    expect(merged.search.query).toBe("mountains");
    expect(merged.logging).toEqual({ level: "info", showProgress: false });
    expect(merged.output.directory).toBe("output");
  });
});

describe("loadConfig", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "pexels-harvest-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    await rm(userPaths.config, { recursive: true, force: true });
  });

  async function writeUserConfig(content: string): Promise<void> {
    await mkdir(userPaths.config, { recursive: true });
    await writeFile(getUserConfigPath(), content);
  }

  it("resolves the user config inside the env-paths config directory", () => {
    expect(getUserConfigPath()).toBe(join(userPaths.config, "config.json"));
  });

  it("uses the defaults when there is no user config", async () => {
    const { config, errors } = await loadConfig();

    expect(errors).toEqual([]);
    expect(config.search.query).toBe("people");
  });

  it("applies the user config", async () => {
    await writeUserConfig(JSON.stringify({ search: { query: "forest" } }));

    const { config, errors } = await loadConfig();

    expect(errors).toEqual([]);
    expect(config.search.query).toBe("forest");
  });

  it("lets a custom config override the user config", async () => {
    await writeUserConfig(
      JSON.stringify({ api: { key: "user-key" }, search: { query: "forest" } }),
    );
    const path = join(root, "custom.json");
    await writeFile(path, JSON.stringify({ search: { query: "ocean" } }));

    const { config } = await loadConfig(path);

    expect(config.api.key).toBe("user-key");
    expect(config.search.query).toBe("ocean");
  });

  it("reports an unreadable user config and keeps the defaults", async () => {
    await writeUserConfig("{ not json");

    const { config, errors } = await loadConfig();

    expect(errors.map((e) => e.path)).toEqual([getUserConfigPath()]);
    expect(errors[0].error).toBeInstanceOf(SyntaxError);
    expect(config.search.query).toBe("people");
  });

  it("applies a custom config file", async () => {
    const path = join(root, "custom.json");
    await writeFile(
      path,
      JSON.stringify({ api: { key: "test-key" }, output: { directory: "shots" } }),
    );

    const { config, errors } = await loadConfig(path);

    expect(errors).toEqual([]);
    expect(config.api.key).toBe("test-key");
    expect(config.output.directory).toBe("shots");
  });

  it("reports an invalid custom config and keeps going", async () => {
    const path = join(root, "broken.json");
    await writeFile(path, JSON.stringify({ logging: { level: "loud" } }));

    const { config, errors } = await loadConfig(path);

    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(path);
    expect(config.logging.level).not.toBe("loud");
  });

  it("reports a missing custom config", async () => {
    const path = join(root, "missing.json");
    const { errors } = await loadConfig(path);
    expect(errors.map((e) => e.path)).toEqual([path]);
  });
});
