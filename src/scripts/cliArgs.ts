export function readFlagValue(flag: string, argv: readonly string[] = process.argv): string | undefined {
  const flagIndex = argv.findIndex((arg) => arg === flag);
  const value = flagIndex >= 0 ? argv[flagIndex + 1] : undefined;
  if (value === undefined || value.startsWith('--')) {
    return undefined;
  }
  return value;
}

export function readPositiveInt(flag: string, argv: readonly string[] = process.argv): number | undefined {
  const raw = readFlagValue(flag, argv);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (Number.isFinite(parsed) && parsed > 0) {
    return Math.floor(parsed);
  }
  return undefined;
}

export function hasFlag(flag: string, argv: readonly string[] = process.argv): boolean {
  return argv.includes(flag);
}

/** Comma-separated values of a flag, trimmed, blanks dropped. */
export function readListFlag(flag: string, argv: readonly string[] = process.argv): string[] {
  const raw = readFlagValue(flag, argv);
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}
