import { describe, expect, it } from "vitest";
import { defineConfig } from "../../config/configLoader.utils.js";
import { classifyImport } from "./classifyImport.js";

describe(classifyImport.name, () => {
  const config = defineConfig({ app: { importPrefixes: ["@/", "@acme/web"] } });

  it.each([
    ["node:fs", "builtin"],
    ["fs", "builtin"],
    ["path/posix", "builtin"],
    ["./user.js", "internal"],
    ["../shared/index.js", "internal"],
    ["@/components/Button", "internal"],
    ["@acme/web/routes", "internal"],
    ["zod", "package"],
    ["@acme/other", "package"],
    ["ts-morph", "package"],
  ] as const)("classifies %s as %s", (path, expected) => {
    expect(classifyImport(path, config)).toBe(expected);
  });

  it("honors custom builtin prefixes", () => {
    const bunConfig = defineConfig({ imports: { builtinPrefixes: ["bun:"] } });

    expect(classifyImport("bun:sqlite", bunConfig)).toBe("builtin");
    expect(classifyImport("node:fs", bunConfig)).toBe("builtin");
  });

  it("treats bare specifiers without a package prefix as internal", () => {
    const aliasConfig = defineConfig({
      imports: { packagePrefixes: ["npm:", "@acme/"] },
    });

    expect(classifyImport("npm:zod", aliasConfig)).toBe("package");
    expect(classifyImport("@acme/ui", aliasConfig)).toBe("package");
    expect(classifyImport("~/routes/home", aliasConfig)).toBe("internal");
    expect(classifyImport("node:fs", aliasConfig)).toBe("builtin");
  });
});
