import { computeFingerprint } from "../domain/fingerprint";
import type { FingerprintedSnapshot, TrackSnapshot } from "../domain/types";

// Later arrival wins; equal arrivals go to the higher batch sequence number
function supersedes(candidate: TrackSnapshot, kept: TrackSnapshot): boolean {
  const diff = Date.parse(candidate.arrivedAt) - Date.parse(kept.arrivedAt);
  if (diff !== 0) return diff > 0;
  return candidate.sequence >= kept.sequence;
}

/**
 * Collapse a batch to one snapshot per track id, in order of first appearance,
 * each paired with its content fingerprint.
 */
export function latestPerTrack(snapshots: TrackSnapshot[]): FingerprintedSnapshot[] {
  const latest = new Map<string, TrackSnapshot>();
  for (const snapshot of snapshots) {
    const kept = latest.get(snapshot.trackId);
    if (!kept || supersedes(snapshot, kept)) latest.set(snapshot.trackId, snapshot);
  }
  return Array.from(latest.values(), (snapshot) => ({ snapshot, fingerprint: computeFingerprint(snapshot) }));
}
