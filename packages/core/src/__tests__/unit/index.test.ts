import { describe, expect, it } from "vitest";
import * as core from "../../index.js";

describe("@benchdef/core exports", () => {
  it("exports PACKAGE_NAME as @benchdef/core", () => {
    expect(core.PACKAGE_NAME).toBe("@benchdef/core");
  });

  it("exports definition constants", () => {
    expect(core.DEFAULT_DOCKER_AUTHOR).toBe("automlbenchmark");
    expect(core.TEMPLATE_NAME_PREFIX).toBe("__");
  });

  it("exports type guards", () => {
    expect(core.isTemplateName("__dummy")).toBe(true);
    expect(core.isPlainRecord({})).toBe(true);
  });
});
