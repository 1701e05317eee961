import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { TestSession } from "../createTestSession.js";
import { createTestSession } from "../createTestSession.js";
import { analyzeTypes } from "../types/analyzeTypes.js";
import { analyzeMethods } from "./analyzeMethods.js";

describe(analyzeMethods.name, () => {
  let session: TestSession;

  const analyze = (path: string, text: string): number[] => {
    const { ctx, sourceFile } = session.addFile(path, text);
    return [...analyzeTypes(sourceFile, ctx)].map((entry) =>
      analyzeMethods(entry, ctx),
    );
  };

  const methodRows = () =>
    session.db
      .prepare(
        `SELECT name, return_type, is_async, is_static, parameter_count,
                cyclomatic, cognitive, has_annotation
         FROM methods ORDER BY id`,
      )
      .all();

  beforeEach(() => {
    session = createTestSession();
  });

  afterEach(() => {
    session.close();
  });

  it("records methods and function properties with their attributes", () => {
    const counts = analyze(
      "service.ts",
      `
      class UserService {
        private cache = new Map<string, User>();
        constructor(private readonly repo: Repo) {}
        get size(): number { return this.cache.size; }

        @Cached()
        async load(id: string,   force: boolean): Promise<User | undefined> {
          if (force || !this.cache.has(id)) { return this.repo.find(id); }
          return this.cache.get(id);
        }

        static create() { return new UserService(defaultRepo); }

        onChange = (event: Event) => { if (event) {} };
      }
      `,
    );

    expect(counts).toEqual([3]);
    expect(methodRows()).toEqual([
      {
        name: "load",
        return_type: "Promise<User | undefined>",
        is_async: 1,
        is_static: 0,
        parameter_count: 2,
        cyclomatic: 3,
        cognitive: 2,
        has_annotation: 1,
      },
      {
        name: "create",
        return_type: "<inferred>",
        is_async: 0,
        is_static: 1,
        parameter_count: 0,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
      {
        name: "onChange",
        return_type: "<inferred>",
        is_async: 0,
        is_static: 0,
        parameter_count: 1,
        cyclomatic: 2,
        cognitive: 1,
        has_annotation: 0,
      },
    ]);
  });

  it("records interface method signatures with baseline complexity", () => {
    analyze(
      "repo.ts",
      `
      interface Repo {
        find(id: string): Promise<User>;
        name: string;
        save(user: User,
             options?: SaveOptions): void;
      }
      enum Mode { A, B }
      `,
    );

    expect(methodRows()).toEqual([
      {
        name: "find",
        return_type: "Promise<User>",
        is_async: 0,
        is_static: 0,
        parameter_count: 1,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
      {
        name: "save",
        return_type: "void",
        is_async: 0,
        is_static: 0,
        parameter_count: 2,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
    ]);
  });

  it("records the members of a mixin's class expression", () => {
    analyze(
      "mixins.ts",
      `
      export const Timestamped = <T extends Ctor>(Base: T) =>
        class extends Base {
          touch(): void { this.updatedAt = Date.now(); }
        };
      `,
    );

    const rows = session.db
      .prepare(
        "SELECT t.name AS type_name, m.name FROM methods m JOIN declared_types t ON t.id = m.type_id",
      )
      .all();
    expect(rows).toEqual([{ type_name: "Timestamped", name: "touch" }]);
  });

  it("keeps one record for an overloaded method", () => {
    analyze(
      "parse.ts",
      `
      class Parser {
        parse(input: string): Node;
        parse(input: Buffer): Node;
        parse(input: string | Buffer): Node { return toNode(input); }
      }
      `,
    );

    expect(methodRows()).toEqual([
      {
        name: "parse",
        return_type: "Node",
        is_async: 0,
        is_static: 0,
        parameter_count: 1,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
    ]);
    expect(session.skippedRecords).toEqual([]);
  });

  it("keeps the first signature of bodiless overloads", () => {
    const counts = analyze(
      "emitter.ts",
      `
      interface Emitter {
        on(event: "open"): void;
        on(event: "data", size: number): void;
      }
      abstract class Source {
        abstract get(key: string): string;
        abstract get(index: number): string;
      }
      `,
    );

    expect(counts).toEqual([1, 1]);
    expect(methodRows()).toEqual([
      {
        name: "on",
        return_type: "void",
        is_async: 0,
        is_static: 0,
        parameter_count: 1,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
      {
        name: "get",
        return_type: "string",
        is_async: 0,
        is_static: 0,
        parameter_count: 1,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
    ]);
    expect(session.skippedRecords).toEqual([]);
  });

  it("replaces a framework override with a synthetic record", () => {
    analyze(
      "Counter.tsx",
      `
      class Counter extends React.Component<Props> {
        increment() { this.setState({ n: this.state.n + 1 }); }
        render() {
          if (this.state.n > 10) { return <b>many</b>; }
          return <span>{this.state.n}</span>;
        }
      }
      class Empty extends LitElement {}
      `,
    );

    expect(methodRows()).toEqual([
      {
        name: "increment",
        return_type: "<inferred>",
        is_async: 0,
        is_static: 0,
        parameter_count: 0,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
      {
        name: "render",
        return_type: "ReactNode",
        is_async: 0,
        is_static: 0,
        parameter_count: 0,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
      {
        name: "render",
        return_type: "TemplateResult",
        is_async: 0,
        is_static: 0,
        parameter_count: 0,
        cyclomatic: 1,
        cognitive: 0,
        has_annotation: 0,
      },
    ]);
  });

  it("skips a second method with the same name and keeps going", () => {
    const counts = analyze(
      "dup.ts",
      `
      class Dup {
        run() {}
        run = () => {};
        stop() {}
      }
      `,
    );

    expect(counts).toEqual([2]);
    expect(session.skippedRecords).toEqual([
      {
        file: "dup.ts",
        record: "method Dup.run",
        message: expect.stringContaining("already declares a method with this name"),
      },
    ]);
  });
});
