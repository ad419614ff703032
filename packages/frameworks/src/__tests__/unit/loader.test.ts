import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigError, FrameworksFileNotFoundError, FrameworksParseError } from "@benchdef/errors";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_FRAMEWORKS_FILE,
  FRAMEWORKS_FILE_ENV,
  loadFrameworks,
  resolveFrameworksPath,
} from "../../loader.js";
import { VALID_FULL_YAML, VALID_MINIMAL_YAML, YAML_WITH_CYCLE } from "../helpers/fixtures.js";

describe("resolveFrameworksPath", () => {
  it("prefers the filePath option", () => {
    expect(
      resolveFrameworksPath({
        filePath: "custom.yaml",
        cwd: "/srv/bench",
        env: { [FRAMEWORKS_FILE_ENV]: "/etc/other.yaml" },
      }),
    ).toBe(resolve("/srv/bench", "custom.yaml"));
  });

  it("falls back to the environment variable", () => {
    expect(
      resolveFrameworksPath({ cwd: "/srv/bench", env: { [FRAMEWORKS_FILE_ENV]: "/etc/other.yaml" } }),
    ).toBe(resolve("/etc/other.yaml"));
  });

  it("ignores an empty environment variable", () => {
    expect(resolveFrameworksPath({ cwd: "/srv/bench", env: { [FRAMEWORKS_FILE_ENV]: "" } })).toBe(
      resolve("/srv/bench", DEFAULT_FRAMEWORKS_FILE),
    );
  });

  it("defaults to resources/frameworks.yaml under cwd", () => {
    expect(resolveFrameworksPath({ cwd: "/srv/bench", env: {} })).toBe(
      resolve("/srv/bench/resources/frameworks.yaml"),
    );
  });
});

describe("loadFrameworks", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "benchdef-frameworks-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("loads a valid YAML file from disk", async () => {
    const filePath = join(tmpDir, "frameworks.yaml");
    await writeFile(filePath, VALID_MINIMAL_YAML, "utf-8");

    const registry = await loadFrameworks({ filePath });
    expect(registry.names()).toEqual(["solo"]);
  });

  it("loads the default document relative to cwd", async () => {
    await mkdir(join(tmpDir, "resources"));
    await writeFile(join(tmpDir, "resources", "frameworks.yaml"), VALID_FULL_YAML, "utf-8");

    const registry = await loadFrameworks({ cwd: tmpDir, env: {} });
    expect(registry.size).toBe(4);
  });

  it("loads the document named by the environment", async () => {
    const filePath = join(tmpDir, "from-env.yaml");
    await writeFile(filePath, VALID_MINIMAL_YAML, "utf-8");

    const registry = await loadFrameworks({ env: { [FRAMEWORKS_FILE_ENV]: filePath } });
    expect(registry.has("solo")).toBe(true);
  });

  it("throws FrameworksFileNotFoundError for a missing file", async () => {
    await expect(loadFrameworks({ filePath: join(tmpDir, "nope.yaml") })).rejects.toThrow(
      FrameworksFileNotFoundError,
    );
  });

  it("includes the absolute path in FrameworksFileNotFoundError", async () => {
    try {
      await loadFrameworks({ filePath: "missing.yaml", cwd: tmpDir });
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(FrameworksFileNotFoundError);
      expect((error as FrameworksFileNotFoundError).filePath).toBe(join(tmpDir, "missing.yaml"));
    }
  });

  it("strips a UTF-8 byte order mark", async () => {
    const filePath = join(tmpDir, "bom.yaml");
    await writeFile(filePath, `\uFEFF${VALID_MINIMAL_YAML}`, "utf-8");

    const registry = await loadFrameworks({ filePath });
    expect(registry.names()).toEqual(["solo"]);
  });

  it("rejects binary content", async () => {
    const filePath = join(tmpDir, "binary.yaml");
    await writeFile(filePath, Buffer.from([0x73, 0x00, 0x6f, 0x00]));

    await expect(loadFrameworks({ filePath })).rejects.toThrow(FrameworksParseError);
  });

  it("propagates resolution errors", async () => {
    const filePath = join(tmpDir, "cycle.yaml");
    await writeFile(filePath, YAML_WITH_CYCLE, "utf-8");

    await expect(loadFrameworks({ filePath })).rejects.toThrow(ConfigError);
  });

  it("reports the file path in parse errors", async () => {
    const filePath = join(tmpDir, "broken.yaml");
    await writeFile(filePath, "solo: [unclosed\n", "utf-8");

    await expect(loadFrameworks({ filePath })).rejects.toThrow(`(${filePath})`);
  });

  it("passes onWarning to the registry", async () => {
    const filePath = join(tmpDir, "frameworks.yaml");
    await writeFile(filePath, VALID_MINIMAL_YAML, "utf-8");
    const onWarning = vi.fn();

    const registry = await loadFrameworks({ filePath, onWarning });
    registry.get("SOLO");
    expect(onWarning).toHaveBeenCalledWith("Framework 'SOLO' matched 'solo' case-insensitively");
  });
});
