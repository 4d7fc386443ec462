import fs from "fs";
import path from "path";
import * as ast from "./ast";
import { ImportError } from "./errors";
import { loadFile, parseFile } from "./parser";
import { Program, programFromFile } from "./program";

export const SOURCE_FILE_EXTENSION = ".leo";
export const SOURCE_DIRECTORY_NAME = "src/";

/**
 * Directory listing entry. The raw name is kept as bytes so that a name which
 * is not valid UTF-8 can still be stat'ed and reported.
 */
export type DirEntry = {
  directory: string;
  rawName: Buffer;
  /** Lossy text path, for display and for descending into sub-packages */
  path: string;
};

/** List a directory, sorted by raw file name. Filesystem errors are thrown unchanged. */
export function readDirEntries(directory: string): DirEntry[] {
  return fs
    .readdirSync(directory, "buffer")
    .sort(Buffer.compare)
    .map((rawName) => ({
      directory,
      rawName,
      path: path.join(directory, rawName.toString("utf8")),
    }));
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/** File name as text, or `null` when the bytes are not valid UTF-8 */
export function entryFileName(entry: DirEntry): string | null {
  try {
    return strictUtf8.decode(entry.rawName);
  } catch {
    return null;
  }
}

/** Strip every trailing occurrence of `suffix` */
export function trimEndMatches(value: string, suffix: string): string {
  let trimmed = value;
  while (suffix.length > 0 && trimmed.endsWith(suffix)) {
    trimmed = trimmed.slice(0, trimmed.length - suffix.length);
  }
  return trimmed;
}

function entryRawPath(entry: DirEntry): Buffer {
  const prefix = entry.directory.endsWith(path.sep) ? entry.directory : entry.directory + path.sep;
  return Buffer.concat([Buffer.from(prefix, "utf8"), entry.rawName]);
}

/** Whether the entry is a directory, or `null` when its type cannot be read */
export function entryIsDirectory(entry: DirEntry): boolean | null {
  try {
    return fs.statSync(entryRawPath(entry)).isDirectory();
  } catch {
    return null;
  }
}

/**
 * Parse the file behind a directory entry into a program named after the file.
 * Entries that are directories or whose type cannot be read are rejected.
 */
export function parseImportFile(entry: DirEntry, span: ast.Span): Program {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(entryRawPath(entry));
  } catch (error) {
    throw ImportError.directoryError(error, span, entry.path);
  }

  const fileName = entryFileName(entry);
  if (fileName === null) {
    throw ImportError.convertOsString(span);
  }

  if (stats.isDirectory()) {
    throw ImportError.expectedFile(fileName, span);
  }

  const syntaxTree = parseFile(loadFile(entry.path), entry.path);
  return programFromFile(syntaxTree, fileName);
}
