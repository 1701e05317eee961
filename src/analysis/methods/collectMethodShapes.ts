import {
  type ArrowFunction,
  type ClassDeclaration,
  type ClassExpression,
  type FunctionExpression,
  type MethodDeclaration,
  type MethodSignature,
  Node,
  type PropertyDeclaration,
  type TypeNode,
} from "ts-morph";
import type { TypeDeclaration } from "../types/TypeDeclarationStore.js";

/** Return type recorded when the annotation is omitted */
export const INFERRED_RETURN_TYPE = "<inferred>";

const WHITESPACE_REGEX = /\s+/g;

/**
 * A member that is recorded as a method, reduced to what the store keeps.
 */
export interface MethodShape {
  name: string;
  returnType: string;
  isAsync: boolean;
  isStatic: boolean;
  parameterCount: number;
  hasAnnotation: boolean;
  /** Walked for complexity; undefined for signatures */
  body: Node | undefined;
  /** The member declaring the method (usage walk scope) */
  node: MethodDeclaration | PropertyDeclaration | MethodSignature;
}

const returnTypeText = (typeNode: TypeNode | undefined): string =>
  typeNode === undefined
    ? INFERRED_RETURN_TYPE
    : typeNode.getText().replace(WHITESPACE_REGEX, " ");

const fromMethod = (node: MethodDeclaration): MethodShape => ({
  name: node.getName(),
  returnType: returnTypeText(node.getReturnTypeNode()),
  isAsync: node.isAsync(),
  isStatic: node.isStatic(),
  parameterCount: node.getParameters().length,
  hasAnnotation: node.getDecorators().length > 0,
  body: node.getBody(),
  node,
});

const fromFunctionProperty = (
  node: PropertyDeclaration,
  fn: ArrowFunction | FunctionExpression,
): MethodShape => ({
  name: node.getName(),
  returnType: returnTypeText(fn.getReturnTypeNode()),
  isAsync: fn.isAsync(),
  isStatic: node.isStatic(),
  parameterCount: fn.getParameters().length,
  hasAnnotation: node.getDecorators().length > 0,
  body: fn.getBody(),
  node,
});

const fromSignature = (node: MethodSignature): MethodShape => ({
  name: node.getName(),
  returnType: returnTypeText(node.getReturnTypeNode()),
  isAsync: false,
  isStatic: false,
  parameterCount: node.getParameters().length,
  hasAnnotation: false,
  body: undefined,
  node,
});

const collectClassMembers = (
  classNode: ClassDeclaration | ClassExpression,
): MethodShape[] => {
  const shapes: MethodShape[] = [];
  // Bodiless overload groups (abstract or ambient) keep their first signature
  const signatureNames = new Set<string>();

  for (const member of classNode.getMembers()) {
    if (Node.isMethodDeclaration(member)) {
      // Overload signatures belong to their implementation
      if (member.isOverload() && member.getImplementation() !== undefined) {
        continue;
      }
      if (member.getBody() === undefined) {
        if (signatureNames.has(member.getName())) continue;
        signatureNames.add(member.getName());
      }
      shapes.push(fromMethod(member));
    } else if (Node.isPropertyDeclaration(member)) {
      const initializer = member.getInitializer();
      if (
        initializer !== undefined &&
        (Node.isArrowFunction(initializer) ||
          Node.isFunctionExpression(initializer))
      ) {
        shapes.push(fromFunctionProperty(member, initializer));
      }
    }
  }

  return shapes;
};

/** One shape per overload group, from its first signature */
const collectSignatures = (signatures: MethodSignature[]): MethodShape[] => {
  const names = new Set<string>();
  const shapes: MethodShape[] = [];
  for (const signature of signatures) {
    if (names.has(signature.getName())) continue;
    names.add(signature.getName());
    shapes.push(fromSignature(signature));
  }
  return shapes;
};

/**
 * List the method-shaped members of a declaration in source order.
 *
 * Classes and mixins contribute method declarations and properties holding
 * a function; interfaces contribute method signatures. Overloads fold into
 * one shape. Accessors and constructors are never method-shaped.
 */
export const collectMethodShapes = (
  declaration: TypeDeclaration,
): MethodShape[] => {
  switch (declaration.form) {
    case "class":
      return collectClassMembers(declaration.node);
    case "mixin":
      return collectClassMembers(declaration.classNode);
    case "interface":
      return collectSignatures(declaration.node.getMethods());
    case "enum":
      return [];
  }
};
