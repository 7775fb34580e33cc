export interface ArgReader {
  getString(flags: readonly string[]): string | undefined;
  hasFlag(flag: string): boolean;
}

/** Reads `--flag value` and `--flag=value` pairs; the last occurrence wins. */
export function createArgReader(args: readonly string[]): ArgReader {
  const getString = (flags: readonly string[]): string | undefined => {
    let found: string | undefined;
    args.forEach((arg, index) => {
      for (const flag of flags) {
        if (arg === flag) {
          const next = args[index + 1];
          if (next !== undefined && !next.startsWith('--')) {
            found = next;
          }
        } else if (arg.startsWith(`${flag}=`)) {
          found = arg.slice(flag.length + 1);
        }
      }
    });
    return found;
  };
  const hasFlag = (flag: string): boolean => args.includes(flag);
  return { getString, hasFlag };
}

/** Drops unset and blank values so they do not shadow lower layers. */
export function compact(values: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}
