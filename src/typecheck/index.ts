/**
 * Type checking for assembled programs.
 *
 * Circuits are registered first so type annotations can name
 * circuits declared later in the file; then every circuit and every function
 * is visited. Diagnostics accumulate in a handler instead of being thrown.
 */

import { Program } from "../program";
import { visitCircuit, visitFunction } from "./checkers";
import { Handler } from "./handler";
import { SymbolTable } from "./symbol-table";
import { TypeCheckError, TypeChecker } from "./types";

export * from "./types";
export * from "./errors";
export { Handler } from "./handler";
export type { DiagnosticSink } from "./handler";
export { SymbolTable } from "./symbol-table";
export type { Declaration, VariableSymbol } from "./symbol-table";
export { eqFlat, typeToString, checkIdentType } from "./type-ops";
export { visitCircuit, visitFunction, REQUIRED_RECORD_FIELDS } from "./checkers";

export type TypecheckOptions = {
  handler?: Handler;
  /** Circuit names declared elsewhere, such as those brought in by imports */
  knownCircuits?: Iterable<string>;
  filePath?: string;
};

export function createSymbolTable(program: Program, knownCircuits: Iterable<string> = []): SymbolTable {
  const symbolTable = new SymbolTable();
  for (const name of knownCircuits) {
    symbolTable.insertCircuit(name, null);
  }
  for (const [name, circuit] of program.circuits) {
    symbolTable.insertCircuit(name, circuit);
  }
  return symbolTable;
}

export function typecheckProgram(program: Program, options: TypecheckOptions = {}): TypeCheckError[] {
  const handler = options.handler ?? new Handler();
  const checker: TypeChecker = {
    symbolTable: createSymbolTable(program, options.knownCircuits),
    handler,
    hasReturn: false,
    parent: null,
  };
  if (options.filePath !== undefined) {
    checker.filePath = options.filePath;
  }

  const before = handler.errCount;

  for (const circuit of program.circuits.values()) {
    visitCircuit(circuit, checker);
  }

  for (const fn of program.functions.values()) {
    visitFunction(fn, checker);
  }

  return handler.errors.slice(before);
}
