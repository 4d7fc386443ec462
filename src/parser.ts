import fs from "fs";
import path from "path";
import * as peggy from "peggy";
import * as ast from "./ast";

type GeneratedParser = {
  parse(input: string, options?: { grammarSource?: string }): ast.File;
};

const GRAMMAR_PATH = path.resolve(__dirname, "..", "grammar", "leo.peggy");

let cachedParser: GeneratedParser | null = null;

function loadParser(): GeneratedParser {
  if (!cachedParser) {
    const grammar = fs.readFileSync(GRAMMAR_PATH, "utf8");
    cachedParser = peggy.generate(grammar, { grammarSource: GRAMMAR_PATH });
  }
  return cachedParser;
}

const DEFAULT_SOURCE_NAME = "<input>";

export class ParserError extends Error {
  constructor(message: string, readonly filePath: string) {
    super(message);
    this.name = "ParserError";
  }
}

export function parseFile(code: string, filePath?: string): ast.File {
  const parser = loadParser();
  const sourceName = filePath ?? DEFAULT_SOURCE_NAME;
  try {
    return parser.parse(code, { grammarSource: sourceName });
  } catch (err) {
    throw formatParserError(err, sourceName, code);
  }
}

/** Read a source file, reporting I/O failures as parser errors */
export function loadFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParserError(`${filePath}: cannot read file: ${reason}`, filePath);
  }
}

export function parseFileFromPath(filePath: string): ast.File {
  const absolute = path.resolve(filePath);
  return parseFile(loadFile(absolute), absolute);
}

type PeggySyntaxError = Error & {
  location?: {
    source?: string;
    start: { line: number; column: number };
    end: { line: number; column: number };
  };
  format?: (sources: Array<{ source: string; text: string }>) => string;
};

function isPeggySyntaxError(err: unknown): err is PeggySyntaxError {
  return Boolean(
    err &&
      typeof err === "object" &&
      "location" in err &&
      "message" in err
  );
}

function formatParserError(err: unknown, sourceName: string, code: string): ParserError {
  if (isPeggySyntaxError(err)) {
    if (typeof err.format === "function") {
      const formatted = err.format([{ source: sourceName, text: code }]);
      return new ParserError(formatted, sourceName);
    }
    const location = err.location;
    if (location) {
      const { start, end } = location;
      const lines = code.split(/\r?\n/);
      const lineText = lines[start.line - 1] ?? "";
      const caretSpacing = " ".repeat(Math.max(start.column - 1, 0));
      const caretLength =
        start.line === end.line
          ? Math.max(end.column - start.column, 1)
          : 1;
      const caret = caretSpacing + "^".repeat(caretLength);
      const header = `${sourceName}:${start.line}:${start.column}`;
      return new ParserError(`${header}: ${err.message}\n${lineText}\n${caret}`, sourceName);
    }
  }

  const fallbackMessage =
    err instanceof Error ? err.message : String(err);
  return new ParserError(`${sourceName}: ${fallbackMessage}`, sourceName);
}
