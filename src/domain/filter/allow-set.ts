export type AllowSet = ReadonlySet<string>;

export const EMPTY_ALLOW_SET: AllowSet = new Set<string>();

/**
 * Builds an allow-set from user input such as "a, P,<div>".
 * Names are trimmed and lower-cased; empty entries are ignored.
 */
export function parseAllowList(input: string | undefined): AllowSet {
  if (!input) return EMPTY_ALLOW_SET;
  return createAllowSet(input.split(","));
}

export function createAllowSet(names: Iterable<string>): AllowSet {
  const out = new Set<string>();
  for (const raw of names) {
    const name = normalizeTagName(raw);
    if (name) out.add(name);
  }
  return out;
}

export function isAllowed(allow: AllowSet, tagName: string): boolean {
  return allow.has(tagName.toLowerCase());
}

function normalizeTagName(raw: string): string {
  return raw
    .trim()
    .replace(/^<\/?/, "")
    .replace(/\/?>$/, "")
    .trim()
    .toLowerCase();
}
