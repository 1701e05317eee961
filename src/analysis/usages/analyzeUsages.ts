import {
  type CallExpression,
  type NewExpression,
  Node,
  type PropertyAccessExpression,
  SyntaxKind,
  type TypeReferenceNode,
} from "ts-morph";
import type { FileAnalysisContext } from "../AnalysisSession.js";
import { collectMethodShapes } from "../methods/collectMethodShapes.js";
import { rightmostName } from "../types/heritageNames.js";
import type { TypeDeclarationEntry } from "../types/TypeDeclarationStore.js";

export interface UsageCounts {
  methodUsages: number;
  typeUsages: number;
}

/** `this.f.bind(this)` and friends pass `f` on without calling it */
const BINDING_METHODS = new Set(["bind", "call", "apply"]);

const COMPONENT_TAG_REGEX = /^[A-Z]/;

const calledName = (call: CallExpression): string | undefined => {
  const callee = call.getExpression();
  if (Node.isIdentifier(callee)) return callee.getText();
  if (Node.isPropertyAccessExpression(callee)) return callee.getName();
  return undefined;
};

const isMemberOfThis = (access: PropertyAccessExpression): boolean => {
  const kind = access.getExpression().getKind();
  return kind === SyntaxKind.ThisKeyword || kind === SyntaxKind.SuperKeyword;
};

/**
 * Check whether a `this.f` access hands `f` on as a value (callback,
 * assignment, return value...) rather than reading a property of it.
 */
const isPassedAsValue = (access: PropertyAccessExpression): boolean => {
  const parent = access.getParent();

  if (Node.isCallExpression(parent) || Node.isNewExpression(parent)) {
    return parent.getArguments().includes(access);
  }
  if (Node.isPropertyAccessExpression(parent)) {
    return (
      parent.getExpression() === access && BINDING_METHODS.has(parent.getName())
    );
  }
  if (Node.isBinaryExpression(parent)) {
    return (
      parent.getRight() === access &&
      parent.getOperatorToken().getKind() === SyntaxKind.EqualsToken
    );
  }
  if (
    Node.isVariableDeclaration(parent) ||
    Node.isPropertyAssignment(parent) ||
    Node.isPropertyDeclaration(parent) ||
    Node.isParameterDeclaration(parent)
  ) {
    return parent.getInitializer() === access;
  }
  return (
    Node.isReturnStatement(parent) ||
    Node.isArrayLiteralExpression(parent) ||
    Node.isJsxExpression(parent) ||
    Node.isArrowFunction(parent)
  );
};

const createdTypeName = (expression: NewExpression): string | undefined => {
  const target = expression.getExpression();
  return Node.isIdentifier(target) || Node.isPropertyAccessExpression(target)
    ? rightmostName(target)
    : undefined;
};

const referencedTypeName = (reference: TypeReferenceNode): string => {
  const typeName = reference.getTypeName();
  return Node.isQualifiedName(typeName)
    ? typeName.getRight().getText()
    : typeName.getText();
};

/**
 * Record what one type's declaration references: method calls, methods
 * passed as callbacks, instantiations (`new` and JSX component tags) and
 * type annotations.
 *
 * Names resolve globally against records already in the store (lowest id
 * wins); a name that does not resolve is ignored. References inside a
 * recorded method carry that method's id as source.
 */
export const analyzeUsages = (
  entry: TypeDeclarationEntry,
  ctx: FileAnalysisContext,
): UsageCounts => {
  const { store, logger } = ctx;
  const counts: UsageCounts = { methodUsages: 0, typeUsages: 0 };

  const methodNodes = new Map<Node, string>(
    collectMethodShapes(entry.declaration).map((shape): [Node, string] => [
      shape.node,
      shape.name,
    ]),
  );
  let currentMethodId: number | undefined;

  const recordMethodUsage = (name: string, isDirectCall: boolean): void => {
    const referencedMethodId = store.findMethodIdByName(name);
    if (referencedMethodId === undefined) return;

    store.insertMethodUsage({
      referencedMethodId,
      sourceFileId: ctx.fileId,
      sourceTypeId: entry.id,
      sourceMethodId: currentMethodId,
      isDirectCall,
    });
    counts.methodUsages++;
    logger.debug(
      `${ctx.filePath}: ${entry.declaration.name} ${isDirectCall ? "calls" : "passes"} ${name}`,
    );
  };

  const recordTypeUsage = (name: string, kind: "creation" | "usage"): void => {
    const referencedTypeId = store.findTypeIdByName(name);
    if (referencedTypeId === undefined) return;
    if (kind === "usage" && referencedTypeId === entry.id) return;

    store.insertTypeUsage({
      referencedTypeId,
      sourceFileId: ctx.fileId,
      sourceTypeId: entry.id,
      sourceMethodId: currentMethodId,
      kind,
    });
    counts.typeUsages++;
    logger.debug(
      `${ctx.filePath}: ${entry.declaration.name} ${kind === "creation" ? "creates" : "uses"} ${name}`,
    );
  };

  const recordReferences = (node: Node): void => {
    if (Node.isCallExpression(node)) {
      const name = calledName(node);
      if (name !== undefined) recordMethodUsage(name, true);
    } else if (Node.isPropertyAccessExpression(node)) {
      if (isMemberOfThis(node) && isPassedAsValue(node)) {
        recordMethodUsage(node.getName(), false);
      }
    } else if (Node.isNewExpression(node)) {
      const name = createdTypeName(node);
      if (name !== undefined) recordTypeUsage(name, "creation");
    } else if (
      Node.isJsxOpeningElement(node) ||
      Node.isJsxSelfClosingElement(node)
    ) {
      // <Counter /> instantiates a component; lowercase tags are intrinsic
      const name = rightmostName(node.getTagNameNode());
      if (COMPONENT_TAG_REGEX.test(name)) recordTypeUsage(name, "creation");
    } else if (Node.isTypeReference(node)) {
      recordTypeUsage(referencedTypeName(node), "usage");
    }
  };

  const visit = (node: Node): void => {
    const methodName = methodNodes.get(node);
    const enclosingMethodId = currentMethodId;
    if (methodName !== undefined) {
      currentMethodId = store.findMethodIdInType(entry.id, methodName);
    }

    recordReferences(node);
    node.forEachChild(visit);

    currentMethodId = enclosingMethodId;
  };

  visit(entry.declaration.node);
  return counts;
};
