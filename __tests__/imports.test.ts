import { expect } from "@jest/globals";
import fs from "fs";
import os from "os";
import path from "path";
import { DefinitionStore } from "../src/definitions";
import { ImportError } from "../src/errors";
import { ImportResolver } from "../src/imports";
import { createLogger } from "../src/logger";
import { parseFile } from "../src/parser";
import { Program, programFromFile } from "../src/program";
import { typecheckProgram } from "../src/typecheck";

const logger = createLogger("error");

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "leo-imports-"));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

/** Write files relative to the package root */
const writeTree = (files: Record<string, string>) => {
  for (const [relative, contents] of Object.entries(files)) {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, contents);
  }
};

const mainProgram = (code: string, name = "main"): Program => programFromFile(parseFile(code), name);

const resolve = (code: string) => {
  const store = new DefinitionStore();
  const resolver = new ImportResolver(store, { root, logger });
  resolver.resolveProgram(mainProgram(code));
  return store;
};

const importErrorOf = (run: () => unknown): ImportError => {
  try {
    run();
  } catch (error) {
    if (error instanceof ImportError) return error;
    throw error;
  }
  throw new Error("expected an ImportError");
};

const FOO = [
  "circuit Point { x: u32, y: u32 }",
  "function add(a: u32, b: u32) -> u32 { return a + b; }",
].join("\n");

describe("star imports", () => {
  test("install every declaration under the importing scope", () => {
    writeTree({ "src/foo.leo": FOO });
    const store = resolve("import foo.*;\nfunction main() -> u32 { return 1u32; }");
    expect(store.keys()).toEqual(["main_Point", "main_add", "main_main"]);
    expect(store.get("main_Point")?.kind).toBe("CircuitDefinition");
    expect(store.get("main_add")).toMatchObject({ kind: "Function", boundCircuit: null });
    expect(store.circuitNames()).toEqual(["Point"]);
  });

  test("reject a directory where a file is expected", () => {
    writeTree({ "src/foo/src/bar.leo": FOO });
    const error = importErrorOf(() => resolve("import foo.*;"));
    expect(error.kind).toBe("ExpectedFile");
    expect(error.message).toBe("Cannot import symbol `foo` from directory `foo`");
  });
});

describe("symbol imports", () => {
  test("store the symbol under the importing scope", () => {
    writeTree({ "src/foo.leo": FOO });
    const store = resolve("import foo.Point;");
    expect(store.keys()).toEqual(["main_Point"]);
    const value = store.get("main_Point");
    expect(value?.kind === "CircuitDefinition" ? value.circuit.identifier.name : null).toBe("Point");
  });

  test("store an aliased function under its alias", () => {
    writeTree({ "src/foo.leo": FOO });
    const store = resolve("import foo.add as plus;");
    expect(store.keys()).toEqual(["main_plus"]);
    const value = store.get("main_plus");
    expect(value?.kind === "Function" ? value.function.identifier.name : null).toBe("add");
    expect(store.has("main_add")).toBe(false);
  });

  test("make an aliased circuit a known type under its alias only", () => {
    writeTree({ "src/foo.leo": FOO });
    const code = "import foo.Point as P;\nfunction main(p: P) -> u8 { return 1u8; }";
    const store = resolve(code);
    expect(store.get("main_P")).toMatchObject({ kind: "CircuitDefinition", localName: "P" });
    expect(store.circuitNames()).toEqual(["P"]);

    const knownCircuits = store.circuitNames();
    expect(typecheckProgram(mainProgram(code), { knownCircuits })).toEqual([]);
    const byDeclaredName = mainProgram("import foo.Point as P;\nfunction main(p: Point) -> u8 { return 1u8; }");
    expect(typecheckProgram(byDeclaredName, { knownCircuits }).map((error) => error.message)).toEqual([
      "Unknown circuit `Point`.",
    ]);
  });

  test("prefer a circuit over a function with the same name", () => {
    writeTree({ "src/foo.leo": "function thing() -> u8 { return 1u8; }\ncircuit thing { v: u8 }" });
    expect(resolve("import foo.thing;").get("main_thing")?.kind).toBe("CircuitDefinition");
  });

  test("report a symbol the file does not declare", () => {
    writeTree({ "src/foo.leo": FOO });
    const error = importErrorOf(() => resolve("import foo.missing;"));
    const searched = path.join(root, "src", "foo.leo");
    expect(error.kind).toBe("UnknownSymbol");
    expect(error.path).toBe(searched);
    expect(error.message).toBe(
      `cannot find imported symbol \`missing\` in imported file \`main\` (searched ${searched})`,
    );
    expect(error.span?.start).toEqual({ offset: 11, line: 1, column: 12 });
  });

  test("resolve the imported file's own imports", () => {
    writeTree({
      "src/foo.leo": "import bar.*;\n" + FOO,
      "src/bar.leo": "circuit Inner { v: u8 }",
    });
    const store = resolve("import foo.add;");
    expect(store.keys()).toEqual(["main_add", "main_Inner"]);
  });

  test("fail when a nested import fails", () => {
    writeTree({ "src/foo.leo": "import nothere.*;\n" + FOO });
    const store = new DefinitionStore();
    const resolver = new ImportResolver(store, { root, logger });
    expect(() => resolver.resolveProgram(mainProgram("import foo.add;"))).toThrow(ImportError);
    expect(store.keys()).toEqual(["main_add"]);
  });
});

describe("package lookup", () => {
  test("report an unknown package", () => {
    writeTree({ "src/foo.leo": FOO });
    const error = importErrorOf(() => resolve("import nothere.*;"));
    expect(error.kind).toBe("UnknownPackage");
    expect(error.message).toBe("cannot find imported package `nothere` in source files or import directory");
    expect(error.span?.start.column).toBe(8);
  });

  test("report a package root without a source directory", () => {
    const error = importErrorOf(() => resolve("import foo.*;"));
    expect(error.kind).toBe("DirectoryError");
    expect(error.path).toBe(path.join(root, "src/"));
  });

  test("resolve sub-packages below the matched directory", () => {
    writeTree({ "src/lib/src/math.leo": "function square(a: u32) -> u32 { return a * a; }" });
    const store = resolve("import lib.math.square;");
    expect(store.keys()).toEqual(["main_square"]);
  });

  describe("when a directory and a file share a name", () => {
    beforeEach(() => {
      writeTree({
        "src/foo.leo": FOO,
        "src/foo/src/bar.leo": "function square(a: u32) -> u32 { return a * a; }",
      });
    });

    test("symbol and star imports read the file", () => {
      expect(resolve("import foo.Point;").keys()).toEqual(["main_Point"]);
      expect(resolve("import foo.*;").keys()).toEqual(["main_Point", "main_add"]);
    });

    test("sub-package imports descend into the directory", () => {
      expect(resolve("import foo.bar.square;").keys()).toEqual(["main_square"]);
    });

    test("each access of a multiple import picks its own entry", () => {
      expect(resolve("import foo.(Point, bar.*);").keys()).toEqual(["main_Point", "main_square"]);
    });
  });
});

describe("multiple imports", () => {
  test("apply every access in order", () => {
    writeTree({ "src/foo.leo": FOO });
    expect(resolve("import foo.(add, Point as P);").keys()).toEqual(["main_add", "main_P"]);
  });

  test("stop at the first failure and keep what was already stored", () => {
    writeTree({ "src/foo.leo": FOO });
    const store = new DefinitionStore();
    const resolver = new ImportResolver(store, { root, logger });
    const error = importErrorOf(() => resolver.resolveProgram(mainProgram("import foo.(add, missing, Point);")));
    expect(error.kind).toBe("UnknownSymbol");
    expect(store.keys()).toEqual(["main_add"]);
  });
});

describe("cyclic imports", () => {
  test("report an import that leads back to the main file", () => {
    writeTree({
      "src/a.leo": "import b.*;\nfunction fa() -> u8 { return 1u8; }",
      "src/b.leo": "import a.*;\nfunction fb() -> u8 { return 2u8; }",
    });
    const mainPath = path.join(root, "src", "a.leo");
    const resolver = new ImportResolver(new DefinitionStore(), { root, logger });
    const program = programFromFile(parseFile(fs.readFileSync(mainPath, "utf8")), "a");

    const error = importErrorOf(() => resolver.resolveProgram(program, mainPath));
    const bPath = path.join(root, "src", "b.leo");
    expect(error.kind).toBe("CyclicImport");
    expect(error.message).toBe(`cyclic import detected: ${mainPath} -> ${bPath} -> ${mainPath}`);
    expect(error.path).toBe(mainPath);
  });

  test("report a file that imports itself", () => {
    writeTree({ "src/self.leo": "import self.*;\nfunction f() -> u8 { return 1u8; }" });
    const error = importErrorOf(() => resolve("import self.f;"));
    expect(error.kind).toBe("CyclicImport");
  });

  test("allow the same file to be imported twice", () => {
    writeTree({
      "src/foo.leo": FOO,
      "src/bar.leo": "import foo.Point;\ncircuit Line { a: u8 }",
    });
    const store = resolve("import foo.add;\nimport bar.*;");
    expect(store.keys()).toEqual(["main_add", "main_Point", "main_Line"]);
  });

  test("leave the resolver usable after a failure", () => {
    writeTree({ "src/self.leo": "import self.*;", "src/foo.leo": FOO });
    const store = new DefinitionStore();
    const resolver = new ImportResolver(store, { root, logger });
    expect(() => resolver.resolveProgram(mainProgram("import self.*;"))).toThrow(ImportError);
    resolver.resolveProgram(mainProgram("import foo.add;"));
    expect(store.has("main_add")).toBe(true);
  });
});
