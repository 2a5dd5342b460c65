#!/usr/bin/env node
import * as fs from "node:fs";
import { pathToFileURL } from "node:url";
import { parse } from "./parser.js";
import { formatParseError } from "./diagnostics.js";
import { toTagged } from "./tagged.js";
import { ParseError } from "./types.js";

export interface DecodeResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * toml-test decoder: TOML bytes in, tagged JSON out. A parse error is
 * rendered for stderr and gives exit code 1.
 */
export function decode(input: Uint8Array): DecodeResult {
  try {
    const table = parse(input);
    return { stdout: JSON.stringify(toTagged(table), null, 2) + "\n", stderr: "", exitCode: 0 };
  } catch (e) {
    if (e instanceof ParseError) {
      const source = new TextDecoder("utf-8", { ignoreBOM: true }).decode(input);
      return { stdout: "", stderr: formatParseError(source, e) + "\n", exitCode: 1 };
    }
    throw e;
  }
}

function main(args: string[]): void {
  const input = fs.readFileSync(args[0] ?? 0);
  const result = decode(input);
  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
}

if (process.argv[1] && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href) {
  main(process.argv.slice(2));
}
