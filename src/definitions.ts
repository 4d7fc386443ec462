import * as ast from "./ast";

/** Declaration installed into the running program under a qualified name */
export type DefinitionValue =
  | {
      kind: "CircuitDefinition";
      /** Name the importing program refers to the circuit by: its alias, or its declared name */
      localName: string;
      circuit: ast.Circuit;
    }
  | {
      kind: "Function";
      /** Circuit whose method this is; `null` for free functions and imported functions */
      boundCircuit: string | null;
      function: ast.Function;
    };

/** Join an owning program's name and a local name into a qualified name */
export function newScope(outer: string, inner: string): string {
  return `${outer}_${inner}`;
}

/**
 * Definitions of the program being assembled, keyed by qualified name.
 * Written only by the import resolver; a store belongs to one compilation.
 */
export class DefinitionStore {
  private readonly values = new Map<string, DefinitionValue>();

  store(name: string, value: DefinitionValue): void {
    this.values.set(name, value);
  }

  get(name: string): DefinitionValue | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, DefinitionValue]> {
    return [...this.values.entries()];
  }

  /** Local names of every circuit or record in the store, unqualified */
  circuitNames(): string[] {
    const names: string[] = [];
    for (const value of this.values.values()) {
      if (value.kind === "CircuitDefinition") {
        names.push(value.localName);
      }
    }
    return names;
  }
}
