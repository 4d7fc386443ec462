#!/usr/bin/env node

import path from "path";
import process from "process";
import { ConfigError, Config, configFromEnv, parseOutputFormat } from "./config";
import { DefinitionStore } from "./definitions";
import { ImportResolver, ImportResolverOptions } from "./imports";
import logger from "./logger";
import { parseFileFromPath } from "./parser";
import { Program, programFromFile } from "./program";
import { SOURCE_FILE_EXTENSION } from "./loader";
import {
  StructuredOutput,
  formatStructuredOutput,
  typeCheckErrorToStructured,
  unknownErrorToStructured,
} from "./structured";
import { formatTypeCheckError, typecheckProgram } from "./typecheck";

type LoadedProgram = {
  program: Program;
  filePath: string;
  store: DefinitionStore;
};

function main() {
  const [, , command, ...rest] = process.argv;

  if (!command) {
    printUsage();
    process.exit(1);
  }

  let config: Config = { logLevel: "info", format: "text" };
  try {
    config = configFromEnv();
    const { args, overrides } = parseGlobalFlags(rest);
    config = { ...config, ...overrides };
    logger.level = config.logLevel;

    switch (command) {
      case "check":
        return handleCheck(args, config);
      case "imports":
        return handleImports(args, config);
      default:
        console.error(`Unknown command '${command}'`);
        printUsage();
        process.exit(1);
    }
  } catch (error) {
    handleFatal(error, config);
  }
}

function parseGlobalFlags(args: string[]): { args: string[]; overrides: Partial<Config> } {
  const overrides: Partial<Config> = {};
  const remaining: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;
    const next = args[i + 1];

    if (arg === "--format" && next !== undefined) {
      overrides.format = parseOutputFormat(next);
      i++; // Skip the next argument
    } else if (arg.startsWith("--format=")) {
      overrides.format = parseOutputFormat(arg.substring(9));
    } else if (arg === "--root" && next !== undefined) {
      overrides.packageRoot = path.resolve(next);
      i++;
    } else if (arg.startsWith("--root=")) {
      overrides.packageRoot = path.resolve(arg.substring(7));
    } else {
      remaining.push(arg);
    }
  }

  return { args: remaining, overrides };
}

function loadProgram(filePath: string, config: Config): LoadedProgram {
  const absolute = path.resolve(filePath);
  const program = programFromFile(parseFileFromPath(absolute), path.basename(absolute, SOURCE_FILE_EXTENSION));
  const store = new DefinitionStore();
  const options: ImportResolverOptions = { logger };
  if (config.packageRoot !== undefined) {
    options.root = config.packageRoot;
  }
  new ImportResolver(store, options).resolveProgram(program, absolute);
  return { program, filePath: absolute, store };
}

function handleCheck(args: string[], config: Config) {
  const [file] = args;
  if (!file) {
    console.error("Usage: leo-check check [--format=json|text] [--root <dir>] <file>");
    process.exit(1);
  }

  const { program, filePath, store } = loadProgram(file, config);
  const errors = typecheckProgram(program, { knownCircuits: store.circuitNames(), filePath });

  if (config.format === "json") {
    const output: StructuredOutput =
      errors.length === 0
        ? { status: "success" }
        : { status: "error", errors: errors.map(typeCheckErrorToStructured) };
    console.log(formatStructuredOutput(output));
  } else if (errors.length === 0) {
    console.log(`✓ ${program.name}: no type errors`);
  } else {
    for (const error of errors) {
      console.error(formatTypeCheckError(error));
    }
  }

  if (errors.length > 0) {
    process.exitCode = 1;
  }
}

function handleImports(args: string[], config: Config) {
  const [file] = args;
  if (!file) {
    console.error("Usage: leo-check imports [--format=json|text] [--root <dir>] <file>");
    process.exit(1);
  }

  const { store } = loadProgram(file, config);
  const definitions = store.entries().map(([name, value]) => ({ name, kind: value.kind }));

  if (config.format === "json") {
    console.log(formatStructuredOutput({ status: "success", result: definitions }));
    return;
  }
  for (const { name, kind } of definitions) {
    console.log(`${name}\t${kind}`);
  }
}

function handleFatal(error: unknown, config: Config): never {
  if (config.format === "json") {
    console.log(formatStructuredOutput({ status: "error", errors: [unknownErrorToStructured(error)] }));
  } else if (error instanceof ConfigError) {
    console.error(error.message);
  } else if (error instanceof Error) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error(String(error));
  }
  process.exit(1);
}

function printUsage() {
  console.log("Usage:");
  console.log("  leo-check check [--format=json|text] [--root <dir>] <file>");
  console.log("  leo-check imports [--format=json|text] [--root <dir>] <file>");
  console.log("");
  console.log("Environment:");
  console.log("  LOG_LEVEL         error | warn | info | debug (default: info)");
  console.log("  LEO_PACKAGE_ROOT  package root searched by imports (default: working directory)");
}

if (require.main === module) {
  main();
}
