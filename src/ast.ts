/** Location in source file tracking line, column, and byte offset for error reporting */
export type Span = {
  start: { line: number; column: number; offset: number };
  end: { line: number; column: number; offset: number };
};

/** Name with the span it was written at */
export type Identifier = {
  name: string;
  span: Span;
};

/** Parsed source file: import statements followed by top-level declarations */
export type File = {
  kind: "File";
  imports: ImportStatement[];
  decls: TopLevelDecl[];
  span: Span;
};

export type TopLevelDecl = Circuit | Function;

/** `import <package>;` */
export type ImportStatement = {
  kind: "Import";
  package: Package;
  span: Span;
};

/** Package name followed by what is accessed inside it, e.g. `foo.bar as baz` */
export type Package = {
  name: Identifier;
  access: PackageAccess;
  span: Span;
};

/** Recursive description of what an import pulls out of a package */
export type PackageAccess =
  | { kind: "Star"; span: Span }
  | { kind: "Symbol"; symbol: ImportSymbol }
  | { kind: "SubPackage"; package: Package }
  | { kind: "Multiple"; accesses: PackageAccess[]; span: Span };

/** Single imported name with an optional local alias */
export type ImportSymbol = {
  symbol: Identifier;
  alias?: Identifier;
  span: Span;
};

export type IntegerType = "i8" | "i16" | "i32" | "i64" | "i128" | "u8" | "u16" | "u32" | "u64" | "u128";

/** Type annotation. `Identifier` names a circuit or record; `Err` stands for a type that failed to resolve. */
export type Type =
  | { kind: "Address" }
  | { kind: "Boolean" }
  | { kind: "Field" }
  | { kind: "Group" }
  | { kind: "Scalar" }
  | { kind: "String" }
  | { kind: "Integer"; integer: IntegerType }
  | { kind: "Identifier"; identifier: Identifier }
  | { kind: "Err" };

/** Circuit or record declaration */
export type Circuit = {
  kind: "Circuit";
  identifier: Identifier;
  members: CircuitMember[];
  /** Records describe state-owned data and must carry `owner` and `balance` */
  isRecord: boolean;
  span: Span;
};

export type CircuitMember = {
  kind: "CircuitVariable";
  identifier: Identifier;
  type: Type;
};

export type Mode = "private" | "public" | "const";

export type FunctionInput = {
  identifier: Identifier;
  mode: Mode;
  type: Type;
  span: Span;
};

export type Function = {
  kind: "Function";
  identifier: Identifier;
  inputs: FunctionInput[];
  output?: Type;
  block: Block;
  span: Span;
};

export type Block = {
  kind: "Block";
  statements: Statement[];
  span: Span;
};

export type Statement =
  | ReturnStatement
  | DefinitionStatement
  | AssignStatement
  | ConditionalStatement
  | IterationStatement
  | ConsoleStatement
  | ExpressionStatement
  | Block;

export type ReturnStatement = {
  kind: "Return";
  expression: Expression;
  span: Span;
};

/** `let` or `const` binding */
export type DefinitionStatement = {
  kind: "Definition";
  declarationType: "let" | "const";
  variableName: Identifier;
  type?: Type;
  value: Expression;
  span: Span;
};

export type AssignOperation = "=" | "+=" | "-=" | "*=" | "/=";

export type AssignStatement = {
  kind: "Assign";
  operation: AssignOperation;
  place: Expression;
  value: Expression;
  span: Span;
};

export type ConditionalStatement = {
  kind: "Conditional";
  condition: Expression;
  then: Block;
  otherwise?: Block | ConditionalStatement;
  span: Span;
};

/** Bounded loop `for i: u32 in 0u32..4u32 { ... }` */
export type IterationStatement = {
  kind: "Iteration";
  variable: Identifier;
  type: Type;
  start: Expression;
  stop: Expression;
  block: Block;
  span: Span;
};

export type ConsoleStatement = {
  kind: "Console";
  function: "log" | "assert" | "error";
  args: Expression[];
  span: Span;
};

export type ExpressionStatement = {
  kind: "Expression";
  expression: Expression;
  span: Span;
};

export type BinaryOperation =
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "+"
  | "-"
  | "*"
  | "/";

export type Expression =
  | { kind: "Literal"; value: string; type: Type; span: Span }
  | { kind: "Variable"; name: string; span: Span }
  | { kind: "Binary"; op: BinaryOperation; left: Expression; right: Expression; span: Span }
  | { kind: "Unary"; op: "!" | "-"; operand: Expression; span: Span }
  | { kind: "Call"; callee: Expression; args: Expression[]; span: Span }
  | { kind: "Access"; target: Expression; member: Identifier; span: Span };
