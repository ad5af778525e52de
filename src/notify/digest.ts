import type { ReleaseCandidate } from "../discovery";
import { formatShortDate } from "../lib/dates";

export type DigestOptions = {
  limit: number;
  date: Date;
};

/**
 * Short plain-text digest of what was added this run, or null when
 * nothing was.
 */
export function buildDigest(
  added: ReleaseCandidate[],
  playlistUrl: string,
  options: DigestOptions
): string | null {
  if (added.length === 0) return null;

  const ranked = [...added].sort((a, b) => b.relevanceScore - a.relevanceScore);
  const shown = ranked.slice(0, options.limit);

  const lines = [`New releases for ${formatShortDate(options.date)}:`, ""];
  shown.forEach((release, index) => {
    lines.push(`${index + 1}. '${release.name}' by ${release.artist} (${release.type})`);
  });

  const remainder = ranked.length - shown.length;
  lines.push("");
  if (remainder > 0) {
    lines.push(`+ ${remainder} more releases in playlist`);
  }
  if (playlistUrl) {
    lines.push(`Full playlist: ${playlistUrl}`);
  }
  return lines.join("\n").trimEnd();
}
