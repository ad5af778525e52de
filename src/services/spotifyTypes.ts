// Wire shapes of the Spotify Web API responses we read.

export interface SpotifyPaging<T> {
  items: T[];
  next: string | null;
  offset: number;
  limit: number;
  total: number;
}

export interface SpotifyArtistSimple {
  id: string | null;
  name: string;
}

export interface SpotifyAlbumSimple {
  id: string;
  name: string;
  release_date: string;
  release_date_precision?: "year" | "month" | "day";
  total_tracks: number;
  album_type?: string;
}

export interface SpotifyTrackObject {
  id: string | null;
  name: string;
  uri?: string;
  artists: SpotifyArtistSimple[];
  album?: { name: string };
}

export interface SpotifySavedTrack {
  added_at: string;
  track: SpotifyTrackObject | null;
}

export interface SpotifyPlaylistTrack {
  added_at: string | null;
  track: SpotifyTrackObject | null;
}

export interface SpotifyPlaylist {
  id: string;
  name: string;
  external_urls?: { spotify?: string };
}

export interface SpotifyUser {
  id: string;
}

export interface SpotifyTokenResponse {
  access_token: string;
  expires_in: number;
  refresh_token?: string;
}
