export type Flags = Record<string, unknown>;

export function stringFlag(flags: Flags, name: string): string | undefined {
  const value = flags[name];
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

export function numberFlag(flags: Flags, name: string): number | undefined {
  const value = stringFlag(flags, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new Error(`--${name} must be a number, got '${value}'`);
  }
  return n;
}

export function booleanFlag(flags: Flags, name: string): boolean {
  return flags[name] === true;
}

/** Positional argument at `index`, as a string */
export function positional(flags: Flags, index: number): string | undefined {
  const args = flags._;
  if (!Array.isArray(args)) return undefined;
  const value: unknown = args[index];
  return value === undefined ? undefined : String(value);
}
