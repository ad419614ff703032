import { describe, expect, it } from "vitest";
import {
  ConfigError,
  FrameworkNotFoundError,
  FrameworksFileNotFoundError,
  FrameworksParseError,
  NotFoundError,
  ValidationError,
} from "../../index.js";

describe("ConfigError", () => {
  const problems = [
    { entry: "child", kind: "UNKNOWN_PARENT", message: "extends unknown framework 'ghost'" },
    { entry: "a", kind: "CYCLIC_EXTENDS", message: "cyclic extends chain: a -> b -> a" },
  ] as const;

  it("is a ValidationError with the config code", () => {
    const error = new ConfigError(problems);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.name).toBe("ConfigError");
    expect(error.code).toBe("FRAMEWORKS_CONFIG_INVALID");
    expect(error.domain).toBe("frameworks");
    expect(error.isExpected).toBe(true);
  });

  it("lists every problem in the message", () => {
    const error = new ConfigError(problems);

    expect(error.message).toBe(
      [
        "Invalid framework definitions:",
        "  - child [UNKNOWN_PARENT]: extends unknown framework 'ghost'",
        "  - a [CYCLIC_EXTENDS]: cyclic extends chain: a -> b -> a",
      ].join("\n"),
    );
  });

  it("maps problems to validation issues", () => {
    const error = new ConfigError(problems);

    expect(error.issues).toEqual([
      { field: "child", message: "extends unknown framework 'ghost'", code: "UNKNOWN_PARENT" },
      { field: "a", message: "cyclic extends chain: a -> b -> a", code: "CYCLIC_EXTENDS" },
    ]);
  });

  it("filters problems by kind", () => {
    const error = new ConfigError(problems);

    expect(error.problemsOfKind("CYCLIC_EXTENDS").map((p) => p.entry)).toEqual(["a"]);
    expect(error.problemsOfKind("MISSING_VERSION")).toEqual([]);
  });
});

describe("FrameworksParseError", () => {
  it("includes file path and location in the message", () => {
    const error = new FrameworksParseError("/tmp/frameworks.yaml", "bad indentation", 3, 5);

    expect(error.code).toBe("FRAMEWORKS_PARSE_FAILED");
    expect(error.message).toBe(
      "Framework document parse failed (/tmp/frameworks.yaml) at line 3:5: bad indentation",
    );
    expect(error.line).toBe(3);
    expect(error.column).toBe(5);
  });

  it("omits what it does not know", () => {
    const error = new FrameworksParseError(undefined, "binary content");
    expect(error.message).toBe("Framework document parse failed: binary content");
  });
});

describe("FrameworksFileNotFoundError", () => {
  it("carries the file path", () => {
    const error = new FrameworksFileNotFoundError("/srv/frameworks.yaml");

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.code).toBe("FRAMEWORKS_FILE_NOT_FOUND");
    expect(error.filePath).toBe("/srv/frameworks.yaml");
    expect(error.message).toBe("Framework document not found: /srv/frameworks.yaml");
  });
});

describe("FrameworkNotFoundError", () => {
  it("lists the available frameworks", () => {
    const error = new FrameworkNotFoundError("autogluon", ["TPOT", "oboe"]);

    expect(error.code).toBe("FRAMEWORK_NOT_FOUND");
    expect(error.frameworkName).toBe("autogluon");
    expect(error.message).toBe("Framework 'autogluon' not found. Available: TPOT, oboe");
  });

  it("says when nothing is available", () => {
    const error = new FrameworkNotFoundError("TPOT", []);
    expect(error.message).toBe("Framework 'TPOT' not found. Available: (none)");
  });
});
