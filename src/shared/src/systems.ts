// shared/src/systems.ts
import { assertBase } from "./baseConversion.js";
import { InvalidBase } from "./errors.js";

export type BaseId = "bin" | "ter" | "oct" | "dec" | "doz" | "hex" | "b32" | "b36";

export type NamedBase = Readonly<{
  id: BaseId;
  name: string;
  base: number;
  prefix?: string; // radix prefix understood by detectBase
  aliases: readonly string[];
}>;

export const NAMED_BASES: readonly NamedBase[] = [
  { id: "bin", name: "Binary", base: 2, prefix: "0b", aliases: ["binary", "base2"] },
  { id: "ter", name: "Ternary", base: 3, aliases: ["ternary", "base3"] },
  { id: "oct", name: "Octal", base: 8, prefix: "0o", aliases: ["octal", "base8"] },
  { id: "dec", name: "Decimal", base: 10, aliases: ["decimal", "base10"] },
  { id: "doz", name: "Duodecimal", base: 12, aliases: ["duodecimal", "dozenal", "base12"] },
  { id: "hex", name: "Hexadecimal", base: 16, prefix: "0x", aliases: ["hexadecimal", "base16"] },
  { id: "b32", name: "Base32", base: 32, aliases: ["base32"] },
  { id: "b36", name: "Base36", base: 36, aliases: ["base36"] },
];

const SYSTEMS: ReadonlyMap<BaseId, NamedBase> = new Map(NAMED_BASES.map(b => [b.id, b]));

export function getNamedBase(id: BaseId): NamedBase {
  const nb = SYSTEMS.get(id);
  if (!nb) throw new InvalidBase(id, `Unknown base id: ${id}`);
  return nb;
}

export function isBaseId(s: string): s is BaseId {
  return NAMED_BASES.some(b => b.id === s);
}

export function findNamedBase(base: number): NamedBase | undefined {
  return NAMED_BASES.find(b => b.base === base);
}

export function baseName(base: number): string {
  return findNamedBase(base)?.name ?? `Base ${base}`;
}

/**
 * Accepts a base as a number, an integer string ("16"), an id ("hex"),
 * a display name ("Hexadecimal") or an alias ("base16"), case-insensitively.
 */
export function resolveBase(input: string | number): number {
  if (typeof input === "number") {
    assertBase(input);
    return input;
  }

  const s = input.trim().toLowerCase();
  if (/^\d+$/.test(s)) {
    const base = Number(s);
    assertBase(base);
    return base;
  }

  if (isBaseId(s)) return getNamedBase(s).base;

  const match = NAMED_BASES.find(b => b.name.toLowerCase() === s || b.aliases.includes(s));
  if (!match) throw new InvalidBase(input, `Unknown base: "${input}".`);
  return match.base;
}
