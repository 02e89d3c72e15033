/**
 * NAME=value documents
 *
 * Reading goes through dotenv; writing edits the text line by line so that
 * comments, blank lines and unrelated entries survive an update.
 *
 * @module credentials/env-document
 */

import { readFile } from "node:fs/promises";

import { parse } from "dotenv";

/** Names we are willing to write (shell identifier rules) */
const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidEnvName(name: string): boolean {
  return ENV_NAME_PATTERN.test(name);
}

/**
 * Parse a document into a name → value map. A repeated name keeps its last value.
 */
export function parseEnvDocument(content: string): Record<string, string> {
  return parse(content);
}

/**
 * Read and parse a document.
 *
 * @returns The entries, or undefined when the file does not exist
 * @throws On any read error other than ENOENT
 */
export async function readEnvDocument(path: string): Promise<Record<string, string> | undefined> {
  try {
    return parseEnvDocument(await readFile(path, "utf-8"));
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

export function formatEnvLine(name: string, value: string): string {
  return `${name}="${value}"`;
}

/**
 * Set `name` in a document.
 *
 * The first `NAME=` or `export NAME=` line is replaced in place, later lines
 * for the same name are dropped, and a missing name is appended. The result
 * always ends with a newline.
 */
export function upsertEnvDocument(content: string, name: string, value: string): string {
  const assignment = new RegExp(`^\\s*(?:export\\s+)?${name}\\s*=`);
  const lines = content === "" ? [] : content.split(/\r?\n/);
  if (lines.at(-1) === "") {
    lines.pop();
  }

  const output: string[] = [];
  let replaced = false;
  for (const line of lines) {
    if (!assignment.test(line)) {
      output.push(line);
    } else if (!replaced) {
      output.push(formatEnvLine(name, value));
      replaced = true;
    }
  }

  if (!replaced) {
    output.push(formatEnvLine(name, value));
  }

  return `${output.join("\n")}\n`;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
