import type { TypeRelationKind } from "../../db/Types.js";
import type { FileAnalysisContext } from "../AnalysisSession.js";
import { rightmostName, splitExtendsExpression } from "./heritageNames.js";
import type {
  TypeDeclaration,
  TypeDeclarationEntry,
} from "./TypeDeclarationStore.js";

export interface TypeRelationTarget {
  targetTypeName: string;
  kind: TypeRelationKind;
}

/**
 * List the heritage of a declaration by target name, without duplicates.
 *
 * - class: `extends` base, `with` for each mixin applied in the extends
 *   expression, `implements` targets
 * - interface: `extends` targets
 * - mixin: like a class, minus a base that is one of the factory's parameters
 */
export const collectTypeRelations = (
  declaration: TypeDeclaration,
): TypeRelationTarget[] => {
  const targets: TypeRelationTarget[] = [];
  const seen = new Set<string>();
  const add = (targetTypeName: string, kind: TypeRelationKind): void => {
    const key = `${kind}:${targetTypeName}`;
    if (!seen.has(key)) {
      seen.add(key);
      targets.push({ targetTypeName, kind });
    }
  };

  switch (declaration.form) {
    case "interface":
      for (const heritage of declaration.node.getExtends()) {
        add(rightmostName(heritage.getExpression()), "extends");
      }
      return targets;

    case "enum":
      return targets;

    case "class":
    case "mixin": {
      const classNode =
        declaration.form === "class" ? declaration.node : declaration.classNode;
      const parameters =
        declaration.form === "mixin"
          ? declaration.factory.getParameters().map((p) => p.getName())
          : [];

      const heritage = classNode.getExtends();
      if (heritage !== undefined) {
        const { base, mixins } = splitExtendsExpression(heritage.getExpression());
        for (const mixin of mixins) {
          add(mixin, "with");
        }
        if (base !== undefined && !parameters.includes(base)) {
          add(base, "extends");
        }
      }
      for (const implemented of classNode.getImplements()) {
        add(rightmostName(implemented.getExpression()), "implements");
      }
      return targets;
    }
  }
};

/**
 * Record the relations of one type. A target that resolves by name to a
 * recorded type also counts as a usage of it.
 */
export const analyzeTypeRelations = (
  entry: TypeDeclarationEntry,
  ctx: FileAnalysisContext,
): void => {
  for (const { targetTypeName, kind } of collectTypeRelations(entry.declaration)) {
    ctx.store.insertTypeRelation({
      sourceTypeId: entry.id,
      targetTypeName,
      kind,
    });

    const targetId = ctx.store.findTypeIdByName(targetTypeName);
    if (targetId === undefined || targetId === entry.id) continue;

    ctx.store.insertTypeUsage({
      referencedTypeId: targetId,
      sourceFileId: ctx.fileId,
      sourceTypeId: entry.id,
      kind: kind === "implements" ? "implementation" : "extension",
    });
  }
};
