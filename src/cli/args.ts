/** Minimal argv parsing: positionals plus `--flag value` / `--flag=value` options */

export interface ParsedArgs {
  positionals: string[];
  options: Map<string, string>;
}

const SHORT_FLAGS: Record<string, string> = {
  t: "target",
  o: "output",
  s: "segment",
  h: "help",
};

/** Flags that take no value */
const SWITCHES = new Set(["help"]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(args: string[], allowed: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const options = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }

    const body = arg.replace(/^--?/, "");
    const eq = body.indexOf("=");
    const rawName = eq === -1 ? body : body.slice(0, eq);
    const name = arg.startsWith("--") ? rawName : (SHORT_FLAGS[rawName] ?? rawName);

    if (!allowed.includes(name) && !SWITCHES.has(name)) {
      throw new UsageError(`Unknown option '${arg}'`);
    }
    if (SWITCHES.has(name)) {
      options.set(name, "true");
      continue;
    }

    if (eq !== -1) {
      options.set(name, body.slice(eq + 1));
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`Option '--${name}' needs a value`);
    }
    options.set(name, value);
    i++;
  }

  return { positionals, options };
}

/** Split a comma list, dropping blanks */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
