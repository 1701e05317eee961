import type { Node } from "ts-morph";
import { describe, expect, it } from "vitest";
import { createSyntaxProject } from "../parseSourceText.js";
import { computeComplexity } from "./computeComplexity.js";

const project = createSyntaxProject();

const bodyOf = (code: string): Node | undefined =>
  project
    .createSourceFile("method.ts", `function method() {\n${code}\n}`, {
      overwrite: true,
    })
    .getFunctionOrThrow("method")
    .getBody();

describe(computeComplexity.name, () => {
  it("returns the baseline without a body", () => {
    expect(computeComplexity(undefined)).toEqual({ cyclomatic: 1, cognitive: 0 });
  });

  it("returns the baseline for an empty body", () => {
    expect(computeComplexity(bodyOf(""))).toEqual({ cyclomatic: 1, cognitive: 0 });
  });

  it("adds nesting to the cognitive score of nested ifs", () => {
    expect(computeComplexity(bodyOf("if (a) { if (b) {} }"))).toEqual({
      cyclomatic: 3,
      cognitive: 3,
    });
  });

  it("counts an else branch", () => {
    expect(computeComplexity(bodyOf("if (a) {} else {}"))).toEqual({
      cyclomatic: 2,
      cognitive: 2,
    });
  });

  it("scores an else-if as an if nested in the else branch", () => {
    expect(computeComplexity(bodyOf("if (a) {} else if (b) {}"))).toEqual({
      cyclomatic: 3,
      cognitive: 4,
    });
  });

  it("adds one per switch clause, default included", () => {
    const code = "switch (x) { case 1: f(); case 2: g(); default: h(); }";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 4,
      cognitive: 1,
    });
  });

  it("counts each break", () => {
    const code = "switch (x) { case 1: f(); break; case 2: g(); break; }";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 3,
      cognitive: 3,
    });
  });

  it("counts logical operators without nesting", () => {
    const code = "if (a) { return (b && c) || d; }\nconst v = e ?? f;";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 5,
      cognitive: 4,
    });
  });

  it("nests loops inside branches", () => {
    const code = "if (a) { for (const x of xs) { if (x) {} } }";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 4,
      cognitive: 6,
    });
  });

  it("treats every loop form alike", () => {
    const code =
      "for (let i = 0; i < n; i++) {}\nfor (const k in o) {}\nwhile (a) {}\ndo {} while (b);";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 5,
      cognitive: 4,
    });
  });

  it("scores catch clauses without nesting their body", () => {
    const code = "try { f(); } catch (e) { if (e) {} }";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 3,
      cognitive: 2,
    });
  });

  it("scores conditional expressions with nesting", () => {
    const code = "while (a) { x = b ? c : d; }";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 3,
      cognitive: 3,
    });
  });

  it("includes nested function bodies", () => {
    const code = "const handler = () => { if (a) {} };";

    expect(computeComplexity(bodyOf(code))).toEqual({
      cyclomatic: 2,
      cognitive: 1,
    });
  });

  it("does not carry state between calls", () => {
    const body = bodyOf("if (a) { if (b) {} }");

    computeComplexity(body);

    expect(computeComplexity(body)).toEqual({ cyclomatic: 3, cognitive: 3 });
  });
});
