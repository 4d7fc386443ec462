import { ImportError } from "../src/errors";
import {
  formatStructuredOutput,
  importErrorToStructured,
  typeCheckErrorToStructured,
  unknownErrorToStructured,
} from "../src/structured";
import { functionHasNoReturn, formatTypeCheckError } from "../src/typecheck";
import { ident, span } from "./helper/ast";

describe("structured errors", () => {
  test("type check errors keep their code and location", () => {
    const error = functionHasNoReturn("main", span(7), "src/main.leo");
    expect(typeCheckErrorToStructured(error)).toEqual({
      kind: "error",
      errorType: "FunctionHasNoReturn",
      message: "The function `main` has no return statement.",
      location: { file: "src/main.leo", line: 7, column: 1 },
    });
    expect(formatTypeCheckError(error)).toBe(
      "src/main.leo: line 7, column 1: The function `main` has no return statement.",
    );
  });

  test("import errors use their kind", () => {
    const error = ImportError.unknownPackage(ident("foo", 2));
    expect(importErrorToStructured(error)).toEqual({
      kind: "error",
      errorType: "UnknownPackage",
      message: "cannot find imported package `foo` in source files or import directory",
      location: { line: 2, column: 1 },
    });
    expect(unknownErrorToStructured(error).errorType).toBe("UnknownPackage");
  });

  test("other errors", () => {
    expect(unknownErrorToStructured(new RangeError("out of range"))).toEqual({
      kind: "error",
      errorType: "RangeError",
      message: "out of range",
    });
    expect(unknownErrorToStructured("plain")).toEqual({ kind: "error", errorType: "Error", message: "plain" });
  });

  test("output is indented JSON", () => {
    expect(formatStructuredOutput({ status: "success" })).toBe('{\n  "status": "success"\n}');
  });
});
