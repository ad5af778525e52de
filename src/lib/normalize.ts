/**
 * Name form used for duplicate detection: the same work can appear
 * under several catalog ids with cosmetic differences in casing or padding.
 */
export function normalizeTitle(value: string | null | undefined): string {
  return (value ?? "").toLowerCase().trim();
}
