export type ReleaseType = "single" | "ep" | "album";

/**
 * A catalog release that passed the recency window, with the
 * artist signals that went into its score.
 */
export interface ReleaseCandidate {
  name: string;
  artist: string;
  artistId: string;
  albumId: string;
  type: ReleaseType;
  releaseDate: string;
  totalTracks: number;
  likedCount: number;
  recencyRank: number;
  recentArtistPlays: number;
  relevanceScore: number;
}

export interface DetectionOptions {
  /** Artists need strictly more liked tracks than this. */
  likedThreshold: number;
  windowDays: number;
  releasesPerArtist: number;
  now: Date;
}
