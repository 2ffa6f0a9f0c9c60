#!/usr/bin/env -S tsx

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { collatzStats, computeCollatz, describeCollatzSteps } from "../shared/collatz";

export type CollatzCliArgs = {
  number: number;
  maxSteps?: number;
  json: boolean;
};

type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

const USAGE = "usage: collatz <number> [--max-steps N] [--json]";

const parseIntegerArg = (raw: string, label: string): number => {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`${label} must be an integer (got "${raw}")`);
  }
  return Number(trimmed);
};

export function parseCollatzArgs(args: string[]): CollatzCliArgs {
  let rawNumber: string | undefined;
  let maxSteps: number | undefined;
  let json = false;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--json") {
      json = true;
    } else if (token === "--max-steps") {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error("--max-steps needs a value");
      }
      maxSteps = parseIntegerArg(value, "--max-steps");
      i += 1;
    } else if (token.startsWith("--max-steps=")) {
      maxSteps = parseIntegerArg(token.slice("--max-steps=".length), "--max-steps");
    } else if (rawNumber === undefined) {
      rawNumber = token;
    } else {
      throw new Error(`unexpected argument "${token}"`);
    }
  }

  if (rawNumber === undefined) {
    throw new Error(USAGE);
  }

  return { number: parseIntegerArg(rawNumber, "number"), maxSteps, json };
}

export function formatSequence(values: readonly number[]): string {
  return values.map((value, index) => `Step ${String(index).padStart(2)}: ${value}`).join("\n");
}

export function runCollatzCli(args: string[], io: CliIo): number {
  try {
    const parsed = parseCollatzArgs(args);
    const { values, truncated } = computeCollatz(parsed.number, parsed.maxSteps);

    if (parsed.json) {
      io.stdout(JSON.stringify({ steps: describeCollatzSteps(values), truncated }, null, 2));
      return 0;
    }

    io.stdout(formatSequence(values));
    if (truncated) {
      io.stdout(`(truncated after ${collatzStats(values).computedSteps} steps)`);
    }
    return 0;
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

// npm links bin entries, so argv[1] may be a symlink to this file.
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) {
    return false;
  }
  return fs.realpathSync(fileURLToPath(moduleUrl)) === fs.realpathSync(scriptPath);
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  process.exitCode = runCollatzCli(process.argv.slice(2), {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  });
}
