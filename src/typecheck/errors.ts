import * as ast from "../ast";
import { makeError, TypeCheckError } from "./types";

export function duplicateVariable(name: string, span: ast.Span, filePath?: string): TypeCheckError {
  return makeError("DuplicateVariable", `Variable \`${name}\` is declared more than once in this scope.`, span, filePath);
}

export function functionHasNoReturn(func: string, span: ast.Span, filePath?: string): TypeCheckError {
  return makeError("FunctionHasNoReturn", `The function \`${func}\` has no return statement.`, span, filePath);
}

export function duplicateCircuitMember(circuit: string, span: ast.Span, filePath?: string): TypeCheckError {
  return makeError(
    "DuplicateCircuitMember",
    `Circuit \`${circuit}\` defined with more than one member with the same name.`,
    span,
    filePath,
  );
}

export function duplicateRecordVariable(record: string, span: ast.Span, filePath?: string): TypeCheckError {
  return makeError(
    "DuplicateRecordVariable",
    `Record \`${record}\` defined with more than one variable with the same name.`,
    span,
    filePath,
  );
}

export function requiredRecordVariable(name: string, type: string, span: ast.Span, filePath?: string): TypeCheckError {
  return makeError(
    "RequiredRecordVariable",
    `The \`record\` type requires the variable \`${name}: ${type}\`.`,
    span,
    filePath,
  );
}

export function recordVarWrongType(name: string, type: string, span: ast.Span, filePath?: string): TypeCheckError {
  return makeError(
    "RecordVarWrongType",
    `The field \`${name}\` in a \`record\` must have type \`${type}\`.`,
    span,
    filePath,
  );
}

export function unknownSymbol(kind: string, name: string, span: ast.Span, filePath?: string): TypeCheckError {
  return makeError("UnknownSymbol", `Unknown ${kind} \`${name}\`.`, span, filePath);
}
