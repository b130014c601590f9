import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { discoverClassFiles, resolveSources } from "../../src/cli/loader.js";

const FIXTURES = fileURLToPath(new URL("../fixtures", import.meta.url));

describe("discoverClassFiles", () => {
  it("classifies class files by their XData blocks", async () => {
    const found = await discoverClassFiles(FIXTURES);

    expect(found.productionFiles).toEqual([join(FIXTURES, "Demo.Production.cls")]);
    expect(found.routingRuleFiles).toEqual([join(FIXTURES, "Demo.ADTRoutingRule.cls")]);
    expect(found.skipped).toEqual([join(FIXTURES, "nested", "Demo.Utils.cls")]);
  });

  it("honours ignore patterns", async () => {
    const found = await discoverClassFiles(FIXTURES, { ignore: ["**/nested/**"] });
    expect(found.skipped).toEqual([]);
  });
});

describe("resolveSources", () => {
  it("prefers explicit files over discovery", async () => {
    const sources = await resolveSources({
      productionFile: "Other.Production.cls",
      routingRuleFile: ["Extra.Rules.cls"],
      dir: FIXTURES,
    });

    expect(sources).toEqual({
      productionFile: "Other.Production.cls",
      routingRuleFiles: ["Extra.Rules.cls", join(FIXTURES, "Demo.ADTRoutingRule.cls")],
    });
  });

  it("requires a production file", async () => {
    await expect(resolveSources({ routingRuleFile: ["Rules.cls"] })).rejects.toThrow(
      "No production file given; use --production-file or --dir",
    );
  });
});
