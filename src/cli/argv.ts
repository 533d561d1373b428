// ── argv helpers ────────────────────────────────────────────────────

export function hasFlag(argv: readonly string[], name: string): boolean {
  return argv.slice(2).some(arg => arg === name || arg.startsWith(`${name}=`));
}

/** Value of `--name value` or `--name=value`; null when absent or valueless. */
export function getFlagValue(argv: readonly string[], name: string): string | null {
  const args = argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === name) {
      const next = args[i + 1];
      return next !== undefined && !next.startsWith('-') ? next : null;
    }
    if (arg.startsWith(`${name}=`)) {
      return arg.slice(name.length + 1) || null;
    }
  }
  return null;
}

export function getVerboseFlag(argv: readonly string[]): boolean {
  return hasFlag(argv, '--verbose') || hasFlag(argv, '-v');
}
