import * as ast from "../ast";
import { checkIdentType } from "./type-ops";
import { TypeChecker } from "./types";
import { VariableSymbol } from "./symbol-table";

/** Visit a block in a fresh variable scope */
export function visitBlock(block: ast.Block, checker: TypeChecker): void {
  checker.symbolTable.enterScope();
  try {
    for (const statement of block.statements) {
      visitStatement(statement, checker);
    }
  } finally {
    checker.symbolTable.exitScope();
  }
}

export function visitStatement(statement: ast.Statement, checker: TypeChecker): void {
  switch (statement.kind) {
    case "Return":
      checker.hasReturn = true;
      return;
    case "Definition":
      return visitDefinition(statement, checker);
    case "Conditional":
      return visitConditional(statement, checker);
    case "Iteration":
      return visitIteration(statement, checker);
    case "Block":
      return visitBlock(statement, checker);
    case "Assign":
    case "Console":
    case "Expression":
      return;
    default: {
      const _exhaustive: never = statement;
      throw new Error(`Unexpected statement: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function visitDefinition(definition: ast.DefinitionStatement, checker: TypeChecker): void {
  checkIdentType(definition.type, checker);
  const symbol: VariableSymbol = {
    type: definition.type ?? { kind: "Err" },
    span: definition.variableName.span,
    declaration: definition.declarationType === "const" ? { kind: "Const" } : { kind: "Mut" },
  };
  declare(definition.variableName.name, symbol, checker);
}

function visitConditional(conditional: ast.ConditionalStatement, checker: TypeChecker): void {
  visitBlock(conditional.then, checker);
  const otherwise = conditional.otherwise;
  if (otherwise === undefined) {
    return;
  }
  if (otherwise.kind === "Block") {
    visitBlock(otherwise, checker);
  } else {
    visitConditional(otherwise, checker);
  }
}

function visitIteration(iteration: ast.IterationStatement, checker: TypeChecker): void {
  checkIdentType(iteration.type, checker);
  checker.symbolTable.enterScope();
  try {
    declare(
      iteration.variable.name,
      { type: iteration.type, span: iteration.variable.span, declaration: { kind: "Const" } },
      checker,
    );
    visitBlock(iteration.block, checker);
  } finally {
    checker.symbolTable.exitScope();
  }
}

function declare(name: string, symbol: VariableSymbol, checker: TypeChecker): void {
  const error = checker.symbolTable.insertVariable(name, symbol, checker.filePath);
  if (error !== null) {
    checker.handler.emitErr(error);
  }
}
