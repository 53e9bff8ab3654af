/**
 * Argument Parsing Utility
 */

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

/** Flags that never take a value, even when followed by a positional */
const BOOLEAN_FLAGS = new Set(['help', 'dry-run', 'json']);

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    positional: [],
    flags: {},
    options: {}
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        result.options[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }

      // Check if next arg is a value (doesn't start with --)
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('--')) {
        result.options[body] = next;
        i++; // Skip next arg
      } else {
        result.flags[body] = true;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      result.flags[arg.slice(1)] = true;
    } else {
      result.positional.push(arg);
    }
  }

  return result;
}

export function hasFlag(args: ParsedArgs, ...names: string[]): boolean {
  return names.some(name => args.flags[name]);
}

export function getOption(args: ParsedArgs, ...names: string[]): string | undefined {
  for (const name of names) {
    if (args.options[name]) return args.options[name];
  }
  return undefined;
}

export function requireOption(args: ParsedArgs, ...names: string[]): string {
  const value = getOption(args, ...names);
  if (!value) {
    throw new Error(`Missing required option: --${names[0]}`);
  }
  return value;
}

export function getNumberOption(args: ParsedArgs, ...names: string[]): number | undefined {
  const raw = getOption(args, ...names);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Option --${names[0]} must be a number, got "${raw}"`);
  }
  return value;
}
