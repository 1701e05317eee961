import { Node, SyntaxKind } from "ts-morph";

export interface ComplexityScore {
  cyclomatic: number;
  cognitive: number;
}

/** Score of a method without a body */
export const BASELINE_COMPLEXITY: Readonly<ComplexityScore> = {
  cyclomatic: 1,
  cognitive: 0,
};

const LOGICAL_OPERATORS = new Set<SyntaxKind>([
  SyntaxKind.AmpersandAmpersandToken,
  SyntaxKind.BarBarToken,
  SyntaxKind.QuestionQuestionToken,
]);

/**
 * Compute cyclomatic and cognitive complexity of a method body.
 *
 * Single depth-first pre-order walk. Branching statements and loops add
 * 1 + the current nesting to the cognitive score and nest their children;
 * logical operators, `break` and `else` add a flat 1. Nested function
 * bodies are walked as part of the method.
 *
 * @example
 * // if (a) { if (b) {} }
 * computeComplexity(body) // { cyclomatic: 3, cognitive: 3 }
 */
export const computeComplexity = (body: Node | undefined): ComplexityScore => {
  const score = { ...BASELINE_COMPLEXITY };
  if (body === undefined) return score;

  let nesting = 0;

  const visitChildren = (node: Node): void => {
    node.forEachChild(visit);
  };

  const visitNested = (node: Node): void => {
    nesting++;
    visitChildren(node);
    nesting--;
  };

  const visit = (node: Node): void => {
    switch (node.getKind()) {
      case SyntaxKind.IfStatement:
        score.cyclomatic++;
        score.cognitive += 1 + nesting;
        if (Node.isIfStatement(node) && node.getElseStatement() !== undefined) {
          score.cognitive++;
        }
        visitNested(node);
        return;

      case SyntaxKind.ForStatement:
      case SyntaxKind.ForInStatement:
      case SyntaxKind.ForOfStatement:
      case SyntaxKind.WhileStatement:
      case SyntaxKind.DoStatement:
        score.cyclomatic++;
        score.cognitive += 1 + nesting;
        visitNested(node);
        return;

      case SyntaxKind.SwitchStatement:
        if (Node.isSwitchStatement(node)) {
          score.cyclomatic += node.getClauses().length;
        }
        score.cognitive += 1 + nesting;
        visitNested(node);
        return;

      case SyntaxKind.CatchClause:
      case SyntaxKind.ConditionalExpression:
        score.cyclomatic++;
        score.cognitive += 1 + nesting;
        visitChildren(node);
        return;

      case SyntaxKind.BinaryExpression:
        if (
          Node.isBinaryExpression(node) &&
          LOGICAL_OPERATORS.has(node.getOperatorToken().getKind())
        ) {
          score.cyclomatic++;
          score.cognitive++;
        }
        visitChildren(node);
        return;

      case SyntaxKind.BreakStatement:
        score.cognitive++;
        return;

      default:
        visitChildren(node);
    }
  };

  visit(body);
  return score;
};
