import * as ast from "../ast";
import { unknownSymbol } from "./errors";
import { TypeChecker } from "./types";

export const ADDRESS_TYPE: ast.Type = { kind: "Address" };
export const U64_TYPE: ast.Type = { kind: "Integer", integer: "u64" };

/**
 * Equality of type constructors, ignoring spans. `Err` stands for a type
 * that never resolved and equals nothing, itself included.
 */
export function eqFlat(left: ast.Type, right: ast.Type): boolean {
  switch (left.kind) {
    case "Integer":
      return right.kind === "Integer" && left.integer === right.integer;
    case "Identifier":
      return right.kind === "Identifier" && left.identifier.name === right.identifier.name;
    case "Err":
      return false;
    default:
      return left.kind === right.kind;
  }
}

export function typeToString(type: ast.Type): string {
  switch (type.kind) {
    case "Address":
      return "address";
    case "Boolean":
      return "bool";
    case "Field":
      return "field";
    case "Group":
      return "group";
    case "Scalar":
      return "scalar";
    case "String":
      return "string";
    case "Integer":
      return type.integer;
    case "Identifier":
      return type.identifier.name;
    case "Err":
      return "error";
  }
}

/** Report a circuit type that names no known circuit. Never stops the pass. */
export function checkIdentType(type: ast.Type | undefined, checker: TypeChecker): void {
  if (type?.kind !== "Identifier") {
    return;
  }
  const { name, span } = type.identifier;
  if (!checker.symbolTable.hasCircuit(name)) {
    checker.handler.emitErr(unknownSymbol("circuit", name, span, checker.filePath));
  }
}
