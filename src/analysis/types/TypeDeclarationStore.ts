import {
  type ArrowFunction,
  type ClassDeclaration,
  type ClassExpression,
  type EnumDeclaration,
  type FunctionDeclaration,
  type FunctionExpression,
  type InterfaceDeclaration,
  Node,
  type SourceFile,
  type VariableDeclaration,
} from "ts-morph";
import type { FrameworkBaseClass } from "../../config/Config.schemas.js";
import type { DeclaredTypeKind } from "../../db/Types.js";

/** Name recorded for `export default class {}` */
export const ANONYMOUS_TYPE_NAME = "<anonymous>";

/**
 * A top-level declaration that becomes a DeclaredType record.
 * `form` is the syntactic shape; the recorded kind is decided from it.
 */
export type TypeDeclaration =
  | { form: "class"; name: string; node: ClassDeclaration }
  | { form: "interface"; name: string; node: InterfaceDeclaration }
  | { form: "enum"; name: string; node: EnumDeclaration }
  | {
      form: "mixin";
      name: string;
      node: FunctionDeclaration | VariableDeclaration;
      factory: FunctionDeclaration | ArrowFunction | FunctionExpression;
      /** The class expression the factory returns */
      classNode: ClassExpression;
    };

export interface TypeDeclarationEntry {
  declaration: TypeDeclaration;
  id: number;
  kind: DeclaredTypeKind;
  /** Set when the class extends a configured framework base class */
  framework?: FrameworkBaseClass;
}

/**
 * Ordered association between declarations and the ids the store gave them.
 *
 * Later passes iterate the entries instead of looking types up by name, so
 * same-named declarations in one file each keep their own id.
 */
export class TypeDeclarationStore implements Iterable<TypeDeclarationEntry> {
  private readonly entries: TypeDeclarationEntry[] = [];

  add(entry: TypeDeclarationEntry): void {
    this.entries.push(entry);
  }

  get size(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<TypeDeclarationEntry> {
    return this.entries[Symbol.iterator]();
  }
}

const unwrapClassExpression = (
  node: Node | undefined,
): ClassExpression | undefined => {
  let current = node;
  while (current !== undefined && Node.isParenthesizedExpression(current)) {
    current = current.getExpression();
  }
  return current !== undefined && Node.isClassExpression(current)
    ? current
    : undefined;
};

/**
 * Find the class expression a mixin factory returns: the expression body of
 * an arrow function, or the first top-level `return` of a block body.
 */
const findReturnedClass = (
  body: Node | undefined,
): ClassExpression | undefined => {
  if (body === undefined) return undefined;
  if (!Node.isBlock(body)) return unwrapClassExpression(body);

  for (const statement of body.getStatements()) {
    if (Node.isReturnStatement(statement)) {
      return unwrapClassExpression(statement.getExpression());
    }
  }
  return undefined;
};

const collectMixins = (node: Node): TypeDeclaration[] => {
  if (Node.isFunctionDeclaration(node)) {
    const name = node.getName();
    const classNode = findReturnedClass(node.getBody());
    return name !== undefined && classNode !== undefined
      ? [{ form: "mixin", name, node, factory: node, classNode }]
      : [];
  }

  if (!Node.isVariableStatement(node)) return [];

  const mixins: TypeDeclaration[] = [];
  for (const variable of node.getDeclarations()) {
    const factory = variable.getInitializer();
    if (
      factory === undefined ||
      !(Node.isArrowFunction(factory) || Node.isFunctionExpression(factory))
    ) {
      continue;
    }
    const classNode = findReturnedClass(factory.getBody());
    if (classNode !== undefined) {
      mixins.push({
        form: "mixin",
        name: variable.getName(),
        node: variable,
        factory,
        classNode,
      });
    }
  }
  return mixins;
};

/**
 * Collect the type declarations of a file in source order.
 * Only top-level statements are inspected; namespaces are not entered.
 */
export const collectTypeDeclarations = (
  sourceFile: SourceFile,
): TypeDeclaration[] => {
  const declarations: TypeDeclaration[] = [];

  for (const statement of sourceFile.getStatements()) {
    if (Node.isClassDeclaration(statement)) {
      declarations.push({
        form: "class",
        name: statement.getName() ?? ANONYMOUS_TYPE_NAME,
        node: statement,
      });
    } else if (Node.isInterfaceDeclaration(statement)) {
      declarations.push({
        form: "interface",
        name: statement.getName(),
        node: statement,
      });
    } else if (Node.isEnumDeclaration(statement)) {
      declarations.push({
        form: "enum",
        name: statement.getName(),
        node: statement,
      });
    } else {
      declarations.push(...collectMixins(statement));
    }
  }

  return declarations;
};
