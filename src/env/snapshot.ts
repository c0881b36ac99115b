/**
 * A private, mutable copy of an environment.
 *
 * Constructed from an input record (usually `process.env`) that is never
 * written to. Path-like variables are handled as token lists: `getTokens`
 * splits on a separator and drops empty entries, `setTokens` joins back.
 */

export type EnvRecord = Readonly<Record<string, string | undefined>>;

export function splitTokens(value: string | undefined, separator: string): string[] {
  if (value === undefined) return [];
  return value.split(separator).filter((token) => token !== '');
}

export function joinTokens(tokens: readonly string[], separator: string): string {
  return tokens.join(separator);
}

export class EnvSnapshot {
  private readonly base: ReadonlyMap<string, string>;
  private readonly current: Map<string, string>;

  constructor(env: EnvRecord) {
    const entries: [string, string][] = [];
    for (const [key, value] of Object.entries(env)) {
      if (value !== undefined) entries.push([key, value]);
    }
    this.base = new Map(entries);
    this.current = new Map(entries);
  }

  get(key: string): string | undefined {
    return this.current.get(key);
  }

  set(key: string, value: string): void {
    this.current.set(key, value);
  }

  getTokens(key: string, separator: string): string[] {
    return splitTokens(this.current.get(key), separator);
  }

  setTokens(key: string, tokens: readonly string[], separator: string): void {
    this.current.set(key, joinTokens(tokens, separator));
  }

  /** Variables added or changed since construction. */
  delta(): Record<string, string> {
    const changed: Record<string, string> = {};
    for (const [key, value] of this.current) {
      if (this.base.get(key) !== value) changed[key] = value;
    }
    return changed;
  }

  /** Full mapping, suitable for `child_process.spawn(..., { env })`. */
  toRecord(): Record<string, string> {
    return Object.fromEntries(this.current);
  }
}
