export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string>;
}

/** `--name value` pairs become flags; everything else stays positional. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg.startsWith("--")) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`Missing value for ${arg}`);
      }
      flags.set(arg.slice(2), value);
      i++;
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
}

export function parseUserId(value: string | undefined): number {
  if (value === undefined || !/^\d+$/u.test(value)) {
    throw new Error(`Expected a numeric user id, got ${value === undefined ? "nothing" : `"${value}"`}`);
  }
  const userId = Number(value);
  if (!Number.isSafeInteger(userId)) {
    throw new Error(`User id out of range: ${value}`);
  }
  return userId;
}
