// Allow-list normalization.
// Purpose: accept allow-lists as JSON arrays or comma-separated text without ever failing.

// =============================================================================
// PUBLIC API
// =============================================================================

export function normalizeAllowList(raw: string | undefined): Set<string> {
  if (raw === undefined) {
    return new Set();
  }

  const parsed = tryParseJson(raw);
  const names = parsed.ok ? namesFromJson(parsed.value, raw) : splitCommaList(raw);

  return new Set(names.filter((name) => name.length > 0));
}

export function mergeAllowLists(...lists: Iterable<string>[]): Set<string> {
  const merged = new Set<string>();
  for (const list of lists) {
    for (const name of list) merged.add(name);
  }
  return merged;
}

// =============================================================================
// INTERNALS
// =============================================================================

type JsonParseResult = { ok: true; value: unknown } | { ok: false };

function tryParseJson(raw: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function namesFromJson(value: unknown, raw: string): string[] {
  if (value === null) return [];
  if (typeof value === "string") return splitCommaList(value);

  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim());
  }

  // Numbers, booleans and objects are not a list of names.
  return splitCommaList(raw);
}

function splitCommaList(raw: string): string[] {
  return raw.split(",").map((item) => item.trim());
}
