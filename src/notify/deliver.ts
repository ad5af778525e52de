import { log, warn } from "../lib/logger";
import type { Messenger } from "../providers/selfping";

export type DeliveryStatus = "sent" | "failed" | "skipped" | "dry-run" | "empty";

export type DeliveryTarget = {
  messenger: Messenger | null;
  to: string | undefined;
  dryRun: boolean;
};

/**
 * Best-effort delivery: failures are reported as a status and a warning,
 * never thrown, so committed playlist changes stand.
 */
export async function deliverDigest(
  digest: string | null,
  target: DeliveryTarget
): Promise<DeliveryStatus> {
  if (!digest) {
    log("[notify] No new releases to notify");
    return "empty";
  }
  if (target.dryRun) {
    log(`[dry-run] Would send:\n${digest}`);
    return "dry-run";
  }
  if (!target.messenger || !target.to) {
    warn("Messaging credentials or contact address not set; skipping notification.");
    return "skipped";
  }

  const result = await target.messenger.send(target.to, digest);
  if (result.ok) {
    log("[notify] Notification sent");
    return "sent";
  }
  const status = result.status != null ? ` (status ${result.status})` : "";
  warn(`Failed to send notification${status}: ${result.detail}`);
  return "failed";
}
