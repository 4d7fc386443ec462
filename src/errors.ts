import * as ast from "./ast";

export type ImportErrorKind =
  | "DirectoryError"
  | "ConvertOsString"
  | "ExpectedFile"
  | "UnknownSymbol"
  | "UnknownPackage"
  | "CyclicImport";

/**
 * Failure while resolving an import. Resolution stops at the first one;
 * nothing already stored is rolled back.
 */
export class ImportError extends Error {
  private constructor(
    readonly kind: ImportErrorKind,
    message: string,
    readonly span: ast.Span | undefined,
    readonly path: string | undefined,
  ) {
    super(message);
    this.name = "ImportError";
  }

  static directoryError(cause: unknown, span: ast.Span, path?: string): ImportError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ImportError("DirectoryError", `Compilation failed due to directory error: ${reason}`, span, path);
  }

  static convertOsString(span: ast.Span): ImportError {
    return new ImportError("ConvertOsString", "Failed to convert file string name, maybe an illegal character?", span, undefined);
  }

  static expectedFile(fileName: string, span: ast.Span): ImportError {
    return new ImportError("ExpectedFile", `Cannot import symbol \`${fileName}\` from directory \`${fileName}\``, span, undefined);
  }

  static unknownSymbol(symbol: ast.ImportSymbol, programName: string, path: string): ImportError {
    return new ImportError(
      "UnknownSymbol",
      `cannot find imported symbol \`${symbol.symbol.name}\` in imported file \`${programName}\` (searched ${path})`,
      symbol.span,
      path,
    );
  }

  static unknownPackage(name: ast.Identifier): ImportError {
    return new ImportError(
      "UnknownPackage",
      `cannot find imported package \`${name.name}\` in source files or import directory`,
      name.span,
      undefined,
    );
  }

  static cyclicImport(chain: string[], span: ast.Span): ImportError {
    const last = chain[chain.length - 1];
    return new ImportError("CyclicImport", `cyclic import detected: ${chain.join(" -> ")}`, span, last);
  }
}
