import { Node } from "ts-morph";

const WHITESPACE_REGEX = /\s+/g;

/**
 * Name a heritage expression by its rightmost identifier.
 *
 * @example
 * // class A extends React.Component<Props> {}
 * rightmostName(expression) // "Component"
 */
export const rightmostName = (expression: Node): string => {
  if (Node.isIdentifier(expression)) {
    return expression.getText();
  }
  if (Node.isPropertyAccessExpression(expression)) {
    return expression.getName();
  }
  return expression.getText().replace(WHITESPACE_REGEX, " ");
};

export interface ExtendsTarget {
  /** Innermost superclass, undefined when the mixin chain has no argument */
  base: string | undefined;
  /** Applied mixin factories, outermost first */
  mixins: string[];
}

/**
 * Split an `extends` expression into the mixins applied and the base class.
 *
 * @example
 * // class A extends Timestamped(Serializable(Base)) {}
 * splitExtendsExpression(expression)
 * // { base: "Base", mixins: ["Timestamped", "Serializable"] }
 */
export const splitExtendsExpression = (expression: Node): ExtendsTarget => {
  const mixins: string[] = [];
  let current: Node | undefined = expression;

  while (current !== undefined && Node.isCallExpression(current)) {
    mixins.push(rightmostName(current.getExpression()));
    current = current.getArguments()[0];
  }

  return {
    base: current === undefined ? undefined : rightmostName(current),
    mixins,
  };
};
