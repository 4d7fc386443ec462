import * as ast from "./ast";

/**
 * Named unit of declarations built from one parsed file.
 * Circuit and function maps keep declaration order.
 */
export type Program = {
  name: string;
  imports: ast.ImportStatement[];
  circuits: Map<string, ast.Circuit>;
  functions: Map<string, ast.Function>;
};

/**
 * Build a program from a parsed file. A later declaration with the same name
 * replaces an earlier one.
 */
export function programFromFile(file: ast.File, name: string): Program {
  const circuits = new Map<string, ast.Circuit>();
  const functions = new Map<string, ast.Function>();

  for (const decl of file.decls) {
    switch (decl.kind) {
      case "Circuit":
        circuits.set(decl.identifier.name, decl);
        break;
      case "Function":
        functions.set(decl.identifier.name, decl);
        break;
      default: {
        const _exhaustive: never = decl;
        throw new Error(`Unexpected declaration: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  return { name, imports: [...file.imports], circuits, functions };
}

/** Same declarations under another name; imported programs take the importing scope's name */
export function renameProgram(program: Program, name: string): Program {
  return { ...program, name };
}
