import { describe, expect, it } from "vitest";
import * as frameworks from "../../index.js";

describe("@benchdef/frameworks exports", () => {
  it("exports package metadata", () => {
    expect(frameworks.PACKAGE_NAME).toBe("@benchdef/frameworks");
    expect(frameworks.PACKAGE_VERSION).toBe("0.1.0");
  });

  it("exports the resolver entry points", () => {
    expect(typeof frameworks.resolveFrameworkDefinitions).toBe("function");
    expect(typeof frameworks.parseFrameworksYaml).toBe("function");
    expect(typeof frameworks.loadFrameworks).toBe("function");
    expect(typeof frameworks.FrameworkRegistry).toBe("function");
  });

  it("exports consumer helpers", () => {
    expect(typeof frameworks.dockerImageReference).toBe("function");
    expect(typeof frameworks.parseParamOverrides).toBe("function");
    expect(typeof frameworks.withParamOverrides).toBe("function");
    expect(typeof frameworks.runFrameworksCommand).toBe("function");
  });

  it("exports the entry schema", () => {
    expect(typeof frameworks.FrameworkEntrySchema.safeParse).toBe("function");
  });

  it("exports configuration constants", () => {
    expect(frameworks.FRAMEWORKS_FILE_ENV).toBe("BENCHDEF_FRAMEWORKS_FILE");
    expect(frameworks.DEFAULT_FRAMEWORKS_FILE).toBe("resources/frameworks.yaml");
    expect(frameworks.DOCUMENT_ENTRY).toBe("<document>");
  });
});
