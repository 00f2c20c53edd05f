const DURATION = /^(\d+)(ms|s|m|h)$/;

export function isDuration(value: string): boolean {
  return DURATION.test(value.trim());
}

/** Parses `250ms`, `5s`, `2m` or `1h` into milliseconds. */
export function ms(value: string): number {
  const m = DURATION.exec(value.trim());
  if (!m) throw new Error("Invalid duration: " + value);
  const n = Number(m[1]);
  switch (m[2]) {
    case "ms": return n;
    case "s": return n * 1000;
    case "m": return n * 60_000;
    case "h": return n * 3_600_000;
    default: throw new Error("Unsupported unit");
  }
}

export function sleep(durationMs: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, durationMs));
}
