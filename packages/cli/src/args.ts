/**
 * Minimal argument parser.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  c: "config",
  o: "output",
  h: "help",
  v: "version",
};

const BOOLEAN_FLAGS = new Set(["help", "version", "strict", "scaffold2"]);

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    let key: string | undefined;
    if (arg.startsWith("--")) {
      key = arg.slice(2);
    } else if (arg.startsWith("-") && arg.length === 2) {
      const short = arg.slice(1);
      key = ALIASES[short] ?? short;
    }

    if (key === undefined) {
      positionals.push(arg);
    } else if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    }

    i++;
  }

  return { positionals, flags };
}
