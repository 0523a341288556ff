/** `--key=value` flags; a bare `--flag` reads as "true". Positional arguments are ignored. */
export function readFlags(argv: readonly string[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const arg of argv) {
    if (!arg.startsWith("--")) continue;
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    const key = (eq === -1 ? body : body.slice(0, eq)).trim();
    if (!key) continue;
    lookup.set(key, eq === -1 ? "true" : body.slice(eq + 1));
  }
  return lookup;
}

export function flagNumber(flags: Map<string, string>, key: string): number | undefined {
  const raw = flags.get(key);
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}
