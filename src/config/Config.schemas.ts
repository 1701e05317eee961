import { z } from "zod";
import { LOG_LEVELS } from "../logging/AnalyzerLogger.js";

// --- Schemas ---

/**
 * A framework base class whose subclasses must override one method.
 * The override is recorded as a synthetic method (see analyzeMethods).
 */
export const FrameworkBaseClassSchema = z.object({
  /** Framework name stored as the type's framework_kind (e.g. "react") */
  framework: z.string().min(1),
  /** Stored as the type's widget_kind (e.g. "class-component") */
  widgetKind: z.string().min(1),
  /** Name of the mandated override (e.g. "render") */
  overrideMethod: z.string().min(1),
  /** Parameter count recorded for the synthetic override */
  parameterCount: z.number().int().nonnegative(),
  /** Return type recorded for the synthetic override */
  returnType: z.string().min(1),
});

export const DEFAULT_FRAMEWORK_BASE_CLASSES: Record<
  string,
  z.input<typeof FrameworkBaseClassSchema>
> = {
  Component: {
    framework: "react",
    widgetKind: "class-component",
    overrideMethod: "render",
    parameterCount: 0,
    returnType: "ReactNode",
  },
  PureComponent: {
    framework: "react",
    widgetKind: "pure-component",
    overrideMethod: "render",
    parameterCount: 0,
    returnType: "ReactNode",
  },
  LitElement: {
    framework: "lit",
    widgetKind: "custom-element",
    overrideMethod: "render",
    parameterCount: 0,
    returnType: "TemplateResult",
  },
};

export const AppConfigSchema = z.object({
  /** Application name, used in logs */
  name: z.string().min(1).default("app"),
  /** Import prefixes that point back into the application (e.g. "@/", "@acme/web") */
  importPrefixes: z.array(z.string().min(1)).default([]),
});

export const AnalyzerSettingsSchema = z.object({
  /** Directory walked for source files (relative to project root) */
  sourceRoot: z.string().min(1).default("src"),
  /** Recognized file extensions */
  extensions: z.array(z.string().startsWith(".")).min(1).default([".ts", ".tsx"]),
  excluded: z
    .object({
      /** Path fragments; any file whose relative path contains one is skipped */
      dirs: z
        .array(z.string().min(1))
        .default(["node_modules", "dist", "__generated__"]),
      /** Filename suffixes that are skipped */
      files: z
        .array(z.string().min(1))
        .default([".d.ts", ".test.ts", ".spec.ts", ".generated.ts"]),
    })
    .default({}),
});

export const ImportsConfigSchema = z.object({
  /** Prefixes marking runtime builtins (Node core module names are always builtin) */
  builtinPrefixes: z.array(z.string().min(1)).default(["node:"]),
  /**
   * Prefixes marking third-party packages (e.g. "npm:", "@scope/").
   * Empty means every bare specifier is a package; otherwise a bare
   * specifier without one of these prefixes (a path alias) is internal.
   */
  packagePrefixes: z.array(z.string().min(1)).default([]),
});

export const TypesConfigSchema = z.object({
  /** A class implementing one of these names is classified as an interface */
  interfaceMarkers: z.array(z.string().min(1)).default(["Interface"]),
});

export const FrameworksConfigSchema = z.object({
  baseClasses: z
    .record(z.string().min(1), FrameworkBaseClassSchema)
    .default(DEFAULT_FRAMEWORK_BASE_CLASSES),
});

export const DatabaseConfigSchema = z.object({
  /** Database file path (default: '.code-census/census.db') */
  path: z.string().min(1).optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
});

/** Analyzer configuration schema */
export const AnalyzerConfigSchema = z.object({
  app: AppConfigSchema.default({}),
  analyzer: AnalyzerSettingsSchema.default({}),
  imports: ImportsConfigSchema.default({}),
  types: TypesConfigSchema.default({}),
  frameworks: FrameworksConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// --- Inferred Types ---

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;
export type FrameworkBaseClass = z.infer<typeof FrameworkBaseClassSchema>;
