import type { FileAnalysisContext } from "../AnalysisSession.js";
import { insertOrSkip } from "../AnalysisSession.js";
import type { TypeDeclarationEntry } from "../types/TypeDeclarationStore.js";
import { collectMethodShapes } from "./collectMethodShapes.js";
import { computeComplexity } from "./computeComplexity.js";

/**
 * Record the methods of one type with their complexity.
 *
 * For a class extending a framework base class, the mandated override is
 * replaced by one synthetic record built from the framework entry, whether
 * or not the class declares it.
 *
 * @returns Number of methods recorded
 */
export const analyzeMethods = (
  entry: TypeDeclarationEntry,
  ctx: FileAnalysisContext,
): number => {
  const typeName = entry.declaration.name;
  const override = entry.framework;
  let recorded = 0;

  for (const shape of collectMethodShapes(entry.declaration)) {
    if (override !== undefined && shape.name === override.overrideMethod) {
      continue;
    }

    const { cyclomatic, cognitive } = computeComplexity(shape.body);
    const id = insertOrSkip(ctx, `method ${typeName}.${shape.name}`, () =>
      ctx.store.insertMethod({
        typeId: entry.id,
        name: shape.name,
        returnType: shape.returnType,
        isAsync: shape.isAsync,
        isStatic: shape.isStatic,
        parameterCount: shape.parameterCount,
        cyclomatic,
        cognitive,
        hasAnnotation: shape.hasAnnotation,
      }),
    );
    if (id !== undefined) recorded++;
  }

  if (override !== undefined) {
    const id = insertOrSkip(
      ctx,
      `method ${typeName}.${override.overrideMethod}`,
      () =>
        ctx.store.insertMethod({
          typeId: entry.id,
          name: override.overrideMethod,
          returnType: override.returnType,
          isAsync: false,
          isStatic: false,
          parameterCount: override.parameterCount,
          cyclomatic: 1,
          cognitive: 0,
          hasAnnotation: false,
        }),
    );
    if (id !== undefined) recorded++;
  }

  return recorded;
};
