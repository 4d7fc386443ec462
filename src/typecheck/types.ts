import * as ast from "../ast";
import type { Handler } from "./handler";
import type { SymbolTable } from "./symbol-table";

export type TypeCheckErrorCode =
  | "DuplicateVariable"
  | "FunctionHasNoReturn"
  | "DuplicateCircuitMember"
  | "DuplicateRecordVariable"
  | "RequiredRecordVariable"
  | "RecordVarWrongType"
  | "UnknownSymbol";

/** Type checking error with the span it points at */
export type TypeCheckError = {
  code: TypeCheckErrorCode;
  message: string;
  span: ast.Span;
  filePath?: string;
};

/** State threaded through one type-checking pass */
export type TypeChecker = {
  symbolTable: SymbolTable;
  handler: Handler;
  /** Set by the statement visitor when it reaches a `return` */
  hasReturn: boolean;
  /** Name of the function being checked */
  parent: string | null;
  filePath?: string;
};

export function makeError(code: TypeCheckErrorCode, message: string, span: ast.Span, filePath?: string): TypeCheckError {
  const error: TypeCheckError = { code, message, span };
  if (filePath !== undefined) error.filePath = filePath;
  return error;
}

export function formatLocation(span: ast.Span): string {
  return `line ${span.start.line}, column ${span.start.column}`;
}

export function formatTypeCheckError(error: TypeCheckError): string {
  const file = error.filePath !== undefined ? `${error.filePath}: ` : "";
  return `${file}${formatLocation(error.span)}: ${error.message}`;
}
