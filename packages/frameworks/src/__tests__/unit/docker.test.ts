import { describe, expect, it } from "vitest";
import { dockerImageReference } from "../../docker.js";
import { resolveFrameworkDefinitions } from "../../resolver.js";

describe("dockerImageReference", () => {
  it("formats a definition as author/image:tag", () => {
    const definitions = resolveFrameworkDefinitions({
      RandomForest_R: { version: "0.10.1", docker_image: { image: "rfr" } },
    });
    const definition = definitions.get("RandomForest_R");
    if (definition === undefined) {
      throw new Error("fixture missing");
    }

    expect(dockerImageReference(definition)).toBe("automlbenchmark/rfr:0.10.1");
  });

  it("formats a bare docker image record", () => {
    expect(dockerImageReference({ author: "lab", image: "tpot", tag: "0.9.5" })).toBe(
      "lab/tpot:0.9.5",
    );
  });
});
