import { parseAsOf } from "../../src/lib/date";
import { parseSymbolList } from "../../src/market/config";

export function getArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];

    if (a === `--${name}`) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.startsWith("--")) {
        throw new Error(`Expected value after --${name}`);
      }

      return next;
    }

    if (a.startsWith(prefix)) {
      return a.slice(prefix.length);
    }
  }
  return undefined;
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(`--${name}`);
}

export function getAsOfArg(argv: string[]): Date {
  const raw = getArg(argv, "as-of");
  return raw === undefined ? new Date() : parseAsOf(raw);
}

export function getSymbolsArg(argv: string[]): string[] | undefined {
  const raw = getArg(argv, "symbols");
  return raw === undefined ? undefined : parseSymbolList(raw);
}

export function getPositiveIntArg(argv: string[], name: string): number | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }

  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`Expected a positive integer for --${name}, got: ${raw}`);
  }
  return n;
}
