import type { ClassDeclaration, SourceFile } from "ts-morph";
import type {
  AnalyzerConfig,
  FrameworkBaseClass,
} from "../../config/Config.schemas.js";
import type { DeclaredTypeKind } from "../../db/Types.js";
import type { FileAnalysisContext } from "../AnalysisSession.js";
import { analyzeTypeRelations } from "./analyzeTypeRelations.js";
import { rightmostName, splitExtendsExpression } from "./heritageNames.js";
import {
  collectTypeDeclarations,
  type TypeDeclaration,
  TypeDeclarationStore,
} from "./TypeDeclarationStore.js";

/**
 * Decide the recorded kind of a declaration.
 * Classes: abstract first, then an implemented interface marker, then class.
 */
export const classifyTypeDeclaration = (
  declaration: TypeDeclaration,
  interfaceMarkers: readonly string[],
): DeclaredTypeKind => {
  switch (declaration.form) {
    case "interface":
    case "enum":
    case "mixin":
      return declaration.form;
    case "class": {
      if (declaration.node.isAbstract()) return "abstract";
      const implementsMarker = declaration.node
        .getImplements()
        .some((i) => interfaceMarkers.includes(rightmostName(i.getExpression())));
      return implementsMarker ? "interface" : "class";
    }
  }
};

/**
 * Find the framework base class a class extends, if it is configured.
 */
export const findFrameworkBaseClass = (
  node: ClassDeclaration,
  config: AnalyzerConfig,
): FrameworkBaseClass | undefined => {
  const heritage = node.getExtends();
  if (heritage === undefined) return undefined;

  const { base } = splitExtendsExpression(heritage.getExpression());
  const { baseClasses } = config.frameworks;
  return base !== undefined && Object.hasOwn(baseClasses, base)
    ? baseClasses[base]
    : undefined;
};

/**
 * Record every type declared at the top level of a file, with its relations.
 *
 * Each type is inserted as soon as it is seen so its id is available to the
 * method and usage passes.
 *
 * @returns Declarations paired with their ids, in source order
 */
export const analyzeTypes = (
  sourceFile: SourceFile,
  ctx: FileAnalysisContext,
): TypeDeclarationStore => {
  const types = new TypeDeclarationStore();

  for (const declaration of collectTypeDeclarations(sourceFile)) {
    const kind = classifyTypeDeclaration(
      declaration,
      ctx.config.types.interfaceMarkers,
    );
    const framework =
      declaration.form === "class"
        ? findFrameworkBaseClass(declaration.node, ctx.config)
        : undefined;

    const id = ctx.store.insertDeclaredType({
      fileId: ctx.fileId,
      name: declaration.name,
      kind,
      widgetKind: framework?.widgetKind,
      frameworkKind: framework?.framework,
    });
    ctx.logger.debug(`${ctx.filePath}: ${kind} ${declaration.name} (#${id})`);

    const entry = { declaration, id, kind, framework };
    types.add(entry);
    analyzeTypeRelations(entry, ctx);
  }

  return types;
};
