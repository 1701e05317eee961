import { Project, type SourceFile, ts } from "ts-morph";
import { ParseError } from "../errors/AnalysisError.js";

/**
 * Create the ts-morph project used as syntax provider for a run.
 *
 * Files live in an in-memory file system and lib files are never loaded:
 * only syntax is inspected, the type checker is not used.
 */
export const createSyntaxProject = (): Project =>
  new Project({
    useInMemoryFileSystem: true,
    skipLoadingLibFiles: true,
    skipFileDependencyResolution: true,
    compilerOptions: {
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      noLib: true,
    },
  });

/**
 * Parse one file's text into a syntax tree.
 *
 * @param project - Syntax project (see createSyntaxProject)
 * @param filePath - Path used for the in-memory file (its extension selects TS or TSX)
 * @param text - Raw source text
 * @returns The parsed source file; remove it from the project when done
 * @throws ParseError if the parser reports syntax errors
 */
export const parseSourceText = (
  project: Project,
  filePath: string,
  text: string,
): SourceFile => {
  const sourceFile = project.createSourceFile(filePath, text, {
    overwrite: true,
  });

  const diagnostics = project.getProgram().getSyntacticDiagnostics(sourceFile);
  if (diagnostics.length > 0) {
    // Line numbers are read from the source file, so map before removing it
    const messages = diagnostics.map((diagnostic) => {
      const message = ts.flattenDiagnosticMessageText(
        diagnostic.compilerObject.messageText,
        " ",
      );
      const line = diagnostic.getLineNumber();
      return line === undefined ? message : `line ${line}: ${message}`;
    });
    project.removeSourceFile(sourceFile);
    throw new ParseError(filePath, messages);
  }

  return sourceFile;
};
