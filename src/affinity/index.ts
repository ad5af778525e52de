export { AffinityStore } from "./store";
export type { ArtistRecord, RebuildResult, TrackedArtist } from "./store";
