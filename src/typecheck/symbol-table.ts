import * as ast from "../ast";
import { duplicateVariable } from "./errors";
import type { TypeCheckError } from "./types";

export type Declaration =
  | { kind: "Input"; mode: ast.Mode }
  | { kind: "Const" }
  | { kind: "Mut" };

export type VariableSymbol = {
  type: ast.Type;
  span: ast.Span;
  declaration: Declaration;
};

/**
 * Program-wide circuits plus the variables of the function
 * being checked. Variables live in a stack of block scopes; the bottom scope
 * holds the function's inputs.
 */
export class SymbolTable {
  private readonly circuits = new Map<string, ast.Circuit | null>();
  private scopes: Map<string, VariableSymbol>[] = [new Map()];

  insertCircuit(name: string, circuit: ast.Circuit | null): void {
    this.circuits.set(name, circuit);
  }

  /** `null` marks a circuit known only by name, e.g. one brought in by an import */
  lookupCircuit(name: string): ast.Circuit | null | undefined {
    return this.circuits.get(name);
  }

  hasCircuit(name: string): boolean {
    return this.circuits.has(name);
  }

  /**
   * Declare a variable in the innermost scope. A name already visible in any
   * enclosing scope is rejected and the existing entry stays.
   */
  insertVariable(name: string, symbol: VariableSymbol, filePath?: string): TypeCheckError | null {
    if (this.lookupVariable(name) !== undefined) {
      return duplicateVariable(name, symbol.span, filePath);
    }
    this.currentScope().set(name, symbol);
    return null;
  }

  lookupVariable(name: string): VariableSymbol | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const symbol = this.scopes[i]?.get(name);
      if (symbol !== undefined) {
        return symbol;
      }
    }
    return undefined;
  }

  enterScope(): void {
    this.scopes.push(new Map());
  }

  exitScope(): void {
    if (this.scopes.length > 1) {
      this.scopes.pop();
    }
  }

  /** Drop every variable, leaving a single empty function scope */
  clearVariables(): void {
    this.scopes = [new Map()];
  }

  get variableCount(): number {
    return this.scopes.reduce((count, scope) => count + scope.size, 0);
  }

  private currentScope(): Map<string, VariableSymbol> {
    const scope = this.scopes[this.scopes.length - 1];
    if (scope === undefined) {
      throw new Error("Internal error: symbol table has no scope");
    }
    return scope;
  }
}
