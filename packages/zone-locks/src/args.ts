/**
 * Minimal argument parser.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  c: "config",
  z: "zone",
  r: "ref",
  l: "lock",
  u: "unlock",
  d: "debug",
  f: "format",
  h: "help",
  v: "version",
};

export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  "lock",
  "unlock",
  "debug",
  "help",
  "version",
]);

/** Flags that take a value; present without one they are left as `true` */
export const VALUE_FLAGS: ReadonlySet<string> = new Set(["config", "zone", "ref", "view", "format"]);

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      // Everything after -- is positional
      positionals.push(...argv.slice(i + 1));
      break;
    }

    let key: string | undefined;
    let inline: string | undefined;
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      inline = eq === -1 ? undefined : arg.slice(eq + 1);
    } else if (arg.startsWith("-") && arg.length === 2) {
      const short = arg.slice(1);
      key = ALIASES[short] ?? short;
    }

    if (key === undefined) {
      positionals.push(arg);
    } else if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
    } else if (inline !== undefined) {
      flags[key] = inline;
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
