export {
  CatalogPlaylistGateway,
  DryRunPlaylistGateway,
  type PlaylistGateway,
} from "./gateway";
export {
  lookupPlaylistById,
  lookupPlaylistByName,
  resolvePlaylist,
  type PlaylistLookup,
  type ResolvedPlaylist,
} from "./resolve";
export {
  buildSnapshot,
  reconcilePlaylist,
  type AddedRelease,
  type PlaylistSnapshot,
  type ReconcileResult,
  type SkipReason,
} from "./reconcile";
export { expireEntries, isExpired, type ExpiryOptions } from "./expiry";
