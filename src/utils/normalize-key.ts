/**
 * Lookup key normalisation: case-, accent- and whitespace-insensitive.
 * Letters and digits of every script survive.
 * "  São   Paulo " -> "sao paulo", "東京" -> "東京"
 */
export function normalizeKey(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N},>\- ]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Candidate keys for a place name, most specific first ("Lisbon, Portugal" -> ["lisbon, portugal", "lisbon"]). */
export function placeKeyCandidates(value: string): string[] {
  const full = normalizeKey(value);
  const first = normalizeKey(value.split(',')[0] ?? '');
  return full === first || !first ? [full] : [full, first];
}

export function routeKey(origin: string, destination: string): string {
  return `${normalizeKey(origin.split(',')[0] ?? origin)}>${normalizeKey(destination.split(',')[0] ?? destination)}`;
}
