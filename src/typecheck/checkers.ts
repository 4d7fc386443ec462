import * as ast from "../ast";
import {
  duplicateCircuitMember,
  duplicateRecordVariable,
  functionHasNoReturn,
  recordVarWrongType,
  requiredRecordVariable,
} from "./errors";
import { visitBlock } from "./statements";
import { ADDRESS_TYPE, U64_TYPE, checkIdentType, eqFlat, typeToString } from "./type-ops";
import { TypeChecker } from "./types";

/** Fields every record must declare, with their required types */
export const REQUIRED_RECORD_FIELDS: ReadonlyArray<{ name: string; type: ast.Type }> = [
  { name: "owner", type: ADDRESS_TYPE },
  { name: "balance", type: U64_TYPE },
];

/**
 * Check a function's inputs and body. Variables from the previous function
 * are dropped first; every problem is emitted and checking carries on.
 */
export function visitFunction(fn: ast.Function, checker: TypeChecker): void {
  checker.hasReturn = false;
  checker.symbolTable.clearVariables();
  checker.parent = fn.identifier.name;

  for (const input of fn.inputs) {
    checkIdentType(input.type, checker);

    const error = checker.symbolTable.insertVariable(
      input.identifier.name,
      {
        type: input.type,
        span: input.identifier.span,
        declaration: { kind: "Input", mode: input.mode },
      },
      checker.filePath,
    );
    if (error !== null) {
      checker.handler.emitErr(error);
    }
  }

  visitBlock(fn.block, checker);

  if (!checker.hasReturn) {
    checker.handler.emitErr(functionHasNoReturn(fn.identifier.name, fn.span, checker.filePath));
  }
}

export function visitCircuit(circuit: ast.Circuit, checker: TypeChecker): void {
  const name = circuit.identifier.name;

  // One diagnostic per declaration, however many names collide.
  const used = new Set<string>();
  const allUnique = circuit.members.every((member) => {
    const memberName = member.identifier.name;
    if (used.has(memberName)) {
      return false;
    }
    used.add(memberName);
    return true;
  });
  if (!allUnique) {
    checker.handler.emitErr(
      circuit.isRecord
        ? duplicateRecordVariable(name, circuit.span, checker.filePath)
        : duplicateCircuitMember(name, circuit.span, checker.filePath),
    );
  }

  if (!circuit.isRecord) {
    return;
  }

  for (const required of REQUIRED_RECORD_FIELDS) {
    const member = circuit.members.find((candidate) => candidate.identifier.name === required.name);
    const expected = typeToString(required.type);
    if (member === undefined) {
      checker.handler.emitErr(requiredRecordVariable(required.name, expected, circuit.span, checker.filePath));
    } else if (!eqFlat(required.type, member.type)) {
      checker.handler.emitErr(recordVarWrongType(member.identifier.name, expected, circuit.span, checker.filePath));
    }
  }
}
