import path from "path";
import * as ast from "./ast";
import { DefinitionStore, DefinitionValue, newScope } from "./definitions";
import { ImportError } from "./errors";
import {
  DirEntry,
  SOURCE_DIRECTORY_NAME,
  entryIsDirectory,
  SOURCE_FILE_EXTENSION,
  parseImportFile,
  readDirEntries,
  trimEndMatches,
} from "./loader";
import defaultLogger, { Logger } from "./logger";
import { Program, renameProgram } from "./program";

export type ImportResolverOptions = {
  /** Package root searched by every import; defaults to the working directory */
  root?: string;
  logger?: Logger;
};

/**
 * Resolves import statements against the package's `src/` directory and
 * installs what they name into a definition store.
 *
 * Resolution is depth-first and synchronous. Files whose imports are being
 * resolved are tracked on the active path, so an import that leads back to
 * one of them fails instead of recursing forever.
 */
export class ImportResolver {
  private readonly activePath: string[] = [];
  private readonly logger: Logger;

  constructor(
    readonly store: DefinitionStore,
    private readonly options: ImportResolverOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Install a main program's imports and declarations.
   * `filePath` puts the main file on the active path so imports cycling back to it are caught.
   */
  resolveProgram(program: Program, filePath?: string): void {
    if (filePath === undefined) {
      this.resolveDefinitions(program);
      return;
    }
    this.descend(filePath, EMPTY_SPAN, () => this.resolveDefinitions(program));
  }

  /**
   * Install every circuit and function of `program` under its own name as scope,
   * after resolving the program's own imports. A key already in the store is replaced.
   */
  resolveDefinitions(program: Program): void {
    const programName = program.name;

    for (const nested of program.imports) {
      this.enforceImport(programName, nested);
    }

    for (const [circuitName, circuit] of program.circuits) {
      this.store.store(newScope(programName, circuitName), {
        kind: "CircuitDefinition",
        localName: circuitName,
        circuit,
      });
    }

    for (const [functionName, fn] of program.functions) {
      this.store.store(newScope(programName, functionName), {
        kind: "Function",
        boundCircuit: null,
        function: fn,
      });
    }
  }

  enforceImport(scope: string, statement: ast.ImportStatement): void {
    let root: string;
    try {
      root = this.options.root ?? process.cwd();
    } catch (error) {
      throw ImportError.directoryError(error, statement.span);
    }

    this.enforcePackage(scope, root, statement.package);
  }

  enforcePackage(scope: string, directory: string, pkg: ast.Package): void {
    const packageName = pkg.name;
    const sourceDirectory = path.join(directory, SOURCE_DIRECTORY_NAME);

    let entries: DirEntry[];
    try {
      entries = readDirEntries(sourceDirectory);
    } catch (error) {
      throw ImportError.directoryError(error, packageName.span, sourceDirectory);
    }

    const matches = entries.filter(
      (entry) => trimEndMatches(entry.rawName.toString("utf8"), SOURCE_FILE_EXTENSION) === packageName.name,
    );

    if (matches.length === 0) {
      throw ImportError.unknownPackage(packageName);
    }

    // TODO: search an `imports/` directory beside `src/` and reject names found in both
    this.enforceMatches(scope, packageName, matches, pkg.access);
  }

  enforcePackageAccess(scope: string, entry: DirEntry, access: ast.PackageAccess): void {
    switch (access.kind) {
      case "Star":
        return this.enforceImportStar(scope, entry, access.span);
      case "Symbol":
        return this.enforceImportSymbol(scope, entry, access.symbol);
      case "SubPackage":
        return this.enforcePackage(scope, entry.path, access.package);
      case "Multiple":
        for (const nested of access.accesses) {
          this.enforcePackageAccess(scope, entry, nested);
        }
        return;
      default: {
        const _exhaustive: never = access;
        throw new Error(`Unexpected package access: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  /** `import foo.*;` brings every declaration of `foo` into the importing scope */
  enforceImportStar(scope: string, entry: DirEntry, span: ast.Span): void {
    const program = renameProgram(parseImportFile(entry, span), scope);
    this.logger.debug("importing all declarations of %s into %s", entry.path, scope);
    this.descend(entry.path, span, () => this.resolveDefinitions(program));
  }

  enforceImportSymbol(scope: string, entry: DirEntry, symbol: ast.ImportSymbol): void {
    const program = renameProgram(parseImportFile(entry, symbol.span), scope);
    const programName = program.name;
    const wanted = symbol.symbol.name;

    const name = symbol.alias?.name ?? wanted;
    const value = findDefinition(program, wanted, name);
    if (value === undefined) {
      throw ImportError.unknownSymbol(symbol, programName, entry.path);
    }

    const resolvedName = newScope(programName, name);
    this.logger.debug("storing %s from %s as %s", wanted, entry.path, resolvedName);
    this.store.store(resolvedName, value);

    this.descend(entry.path, symbol.span, () => {
      for (const nested of program.imports) {
        this.enforceImport(programName, nested);
      }
    });
  }

  /**
   * Apply an access to the entry it needs when a package name matches several
   * entries: a file for Star and Symbol, a directory for SubPackage. Members of
   * a Multiple access each pick their own entry.
   */
  private enforceMatches(
    scope: string,
    packageName: ast.Identifier,
    matches: DirEntry[],
    access: ast.PackageAccess,
  ): void {
    if (access.kind === "Multiple") {
      for (const nested of access.accesses) {
        this.enforceMatches(scope, packageName, matches, nested);
      }
      return;
    }

    const entry = selectEntry(matches, access.kind === "SubPackage");
    if (matches.length > 1) {
      this.logger.warn(
        "package %s matches %s; using %s",
        packageName.name,
        matches.map((match) => match.path).join(", "),
        entry.path,
      );
    }

    this.logger.debug("resolving package %s from %s", packageName.name, entry.path);
    this.enforcePackageAccess(scope, entry, access);
  }

  private descend(filePath: string, span: ast.Span, resolve: () => void): void {
    const key = path.resolve(filePath);
    const index = this.activePath.indexOf(key);
    if (index !== -1) {
      const chain = [...this.activePath.slice(index), key];
      throw ImportError.cyclicImport(chain, span);
    }

    this.activePath.push(key);
    try {
      resolve();
    } finally {
      this.activePath.pop();
    }
  }
}

const EMPTY_SPAN: ast.Span = {
  start: { line: 0, column: 0, offset: 0 },
  end: { line: 0, column: 0, offset: 0 },
};

/**
 * First entry of the wanted kind, else the first entry, so the access reports
 * why it cannot use it.
 */
function selectEntry(matches: DirEntry[], wantDirectory: boolean): DirEntry {
  const first = matches[0];
  if (first === undefined) {
    throw new Error("Internal error: no entry to select");
  }
  if (matches.length === 1) {
    return first;
  }
  return matches.find((match) => entryIsDirectory(match) === wantDirectory) ?? first;
}

/** Circuits are searched before functions */
function findDefinition(program: Program, name: string, localName: string): DefinitionValue | undefined {
  const circuit = program.circuits.get(name);
  if (circuit !== undefined) {
    return { kind: "CircuitDefinition", localName, circuit };
  }
  const fn = program.functions.get(name);
  if (fn !== undefined) {
    return { kind: "Function", boundCircuit: null, function: fn };
  }
  return undefined;
}
