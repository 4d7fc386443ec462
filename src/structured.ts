// Structured error types for JSON output

import { Span } from "./ast";
import { ImportError } from "./errors";
import { TypeCheckError } from "./typecheck";

/**
 * Structured error type that can be serialized to JSON.
 */
export type StructuredError = {
  kind: "error";
  errorType: string; // e.g., "DuplicateVariable", "UnknownPackage", "ParserError"
  message: string;
  location?: ErrorLocation;
};

export type ErrorLocation = {
  file?: string;
  line: number;
  column: number;
};

export type StructuredOutput = {
  status: "success" | "error";
  errors?: StructuredError[];
  result?: unknown;
};

export function spanToErrorLocation(span: Span | undefined, file?: string): ErrorLocation | undefined {
  if (!span) return undefined;
  const result: ErrorLocation = {
    line: span.start.line,
    column: span.start.column,
  };
  if (file !== undefined) result.file = file;
  return result;
}

function withLocation(error: StructuredError, location: ErrorLocation | undefined): StructuredError {
  if (location !== undefined) error.location = location;
  return error;
}

export function typeCheckErrorToStructured(error: TypeCheckError): StructuredError {
  return withLocation(
    { kind: "error", errorType: error.code, message: error.message },
    spanToErrorLocation(error.span, error.filePath),
  );
}

export function importErrorToStructured(error: ImportError): StructuredError {
  return withLocation(
    { kind: "error", errorType: error.kind, message: error.message },
    spanToErrorLocation(error.span, error.path),
  );
}

export function unknownErrorToStructured(error: unknown): StructuredError {
  if (error instanceof ImportError) {
    return importErrorToStructured(error);
  }
  if (error instanceof Error) {
    return { kind: "error", errorType: error.name, message: error.message };
  }
  return { kind: "error", errorType: "Error", message: String(error) };
}

export function formatStructuredOutput(output: StructuredOutput): string {
  return JSON.stringify(output, null, 2);
}
