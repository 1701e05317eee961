import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { TestSession } from "../createTestSession.js";
import { createTestSession } from "../createTestSession.js";
import { analyzeMethods } from "../methods/analyzeMethods.js";
import { analyzeTypes } from "../types/analyzeTypes.js";
import { analyzeUsages, type UsageCounts } from "./analyzeUsages.js";

describe(analyzeUsages.name, () => {
  let session: TestSession;

  const analyze = (path: string, text: string): UsageCounts[] => {
    const { ctx, sourceFile } = session.addFile(path, text);
    const counts: UsageCounts[] = [];
    for (const entry of analyzeTypes(sourceFile, ctx)) {
      analyzeMethods(entry, ctx);
      counts.push(analyzeUsages(entry, ctx));
    }
    return counts;
  };

  const methodUsages = () =>
    session.db
      .prepare(
        `SELECT m.name AS method, s.name AS source_method, u.is_direct_call
         FROM method_usage_references u
         JOIN methods m ON m.id = u.referenced_method_id
         LEFT JOIN methods s ON s.id = u.source_method_id
         ORDER BY u.id`,
      )
      .all();

  const typeUsages = () =>
    session.db
      .prepare(
        `SELECT t.name AS type, s.name AS source_method, u.kind
         FROM type_usage_references u
         JOIN declared_types t ON t.id = u.referenced_type_id
         LEFT JOIN methods s ON s.id = u.source_method_id
         ORDER BY u.id`,
      )
      .all();

  beforeEach(() => {
    session = createTestSession();
  });

  afterEach(() => {
    session.close();
  });

  it("records a call inside a method as a direct call from that method", () => {
    analyze("a-repo.ts", "export class Repo { save(): void {} }");
    const counts = analyze(
      "b-app.ts",
      "export class App { run(repo: Repo) { repo.save(); } }",
    );

    expect(counts).toEqual([{ methodUsages: 1, typeUsages: 1 }]);
    expect(methodUsages()).toEqual([
      { method: "save", source_method: "run", is_direct_call: 1 },
    ]);
    expect(typeUsages()).toEqual([
      { type: "Repo", source_method: "run", kind: "usage" },
    ]);
  });

  it("records methods passed as callbacks as indirect references", () => {
    analyze(
      "view.ts",
      `
      class View {
        handle() {}
        mount(el: El) {
          el.addEventListener("click", this.handle);
          const bound = this.handle.bind(this);
        }
      }
      `,
    );

    expect(methodUsages()).toEqual([
      { method: "handle", source_method: "mount", is_direct_call: 0 },
      { method: "handle", source_method: "mount", is_direct_call: 0 },
    ]);
  });

  it("records methods used as field initializers and parameter defaults", () => {
    analyze(
      "view.ts",
      `
      class View {
        handle() {}
        private onClick = this.handle;
        run(cb = this.handle) {}
      }
      `,
    );

    expect(methodUsages()).toEqual([
      { method: "handle", source_method: null, is_direct_call: 0 },
      { method: "handle", source_method: "run", is_direct_call: 0 },
    ]);
  });

  it("records one creation per instantiation", () => {
    analyze(
      "factory.ts",
      `
      class Widget {}
      class Factory {
        static instance = new Factory();
        make() { return new Widget(); }
      }
      `,
    );

    expect(typeUsages()).toEqual([
      { type: "Factory", source_method: null, kind: "creation" },
      { type: "Widget", source_method: "make", kind: "creation" },
    ]);
  });

  it("inserts nothing for names that do not resolve", () => {
    const counts = analyze(
      "ghost.ts",
      "class Caller { run(x: Unknown) { missing(); x.nothing(); new Ghost(); } }",
    );

    expect(counts).toEqual([{ methodUsages: 0, typeUsages: 0 }]);
    expect(methodUsages()).toEqual([]);
    expect(typeUsages()).toEqual([]);
  });

  it("resolves a shared name to the lowest id", () => {
    analyze(
      "a-stores.ts",
      "class First { save() {} }\nclass Second { save() {} }",
    );
    analyze("b-user.ts", "class Caller { run(s: Store) { s.save(); } }");

    const row = session.db
      .prepare(
        `SELECT t.name AS type FROM method_usage_references u
         JOIN methods m ON m.id = u.referenced_method_id
         JOIN declared_types t ON t.id = m.type_id`,
      )
      .all();
    expect(row).toEqual([{ type: "First" }]);
  });

  it("skips annotations naming the type itself", () => {
    analyze("list.ts", "class ListNode { next?: ListNode; }");

    expect(typeUsages()).toEqual([]);
  });

  it("does not resolve records from files analyzed later", () => {
    analyze("a-caller.ts", "class Caller { run() { new Later().go(); } }");
    analyze("b-later.ts", "class Later { go() {} }");

    expect(methodUsages()).toEqual([]);
    expect(typeUsages()).toEqual([]);
  });

  it("treats component tags as creations from the synthetic override", () => {
    analyze("a-Button.tsx", "export class Button extends Component {}");
    analyze(
      "b-Page.tsx",
      "export class Page extends Component { render() { return <div><Button /></div>; } }",
    );

    expect(typeUsages()).toEqual([
      { type: "Button", source_method: "render", kind: "creation" },
    ]);
  });
});
