/**
 * Data completeness tiers (L0/L1/L2).
 *
 * The tier is derived fresh per call from the record's completeness score and
 * bounds how much confidence any downstream prediction may claim.
 */

import type { BiomarkerRecord, DataCompletenessTier } from "@/types";
import { COMPLETENESS_THRESHOLDS, COMPLETENESS_TRACKED_FIELDS } from "@/lib/engine-constants";
import { clamp01, measuredValue } from "@/lib/score-math";

/** Absent or non-finite scores count as 0.0 (L0). */
export function classifyCompleteness(score?: number | null): DataCompletenessTier {
  const s = score == null || !Number.isFinite(score) ? 0 : score;
  if (s >= COMPLETENESS_THRESHOLDS.L2) return "L2";
  if (s >= COMPLETENESS_THRESHOLDS.L1) return "L1";
  return "L0";
}

/**
 * Fraction of tracked fields populated. For callers whose report parser did
 * not supply a completeness score.
 */
export function estimateCompleteness(record: BiomarkerRecord | null | undefined): number {
  if (!record) return 0;
  let present = 0;
  for (const field of COMPLETENESS_TRACKED_FIELDS) {
    switch (field) {
      case "tmb":
        if (measuredValue(record.tmb) !== null) present++;
        break;
      case "hrdScore":
        if (measuredValue(record.hrdScore) !== null) present++;
        break;
      case "msiStatus":
        if (record.msiStatus != null && record.msiStatus !== "unknown") present++;
        break;
      case "somaticMutations":
        if ((record.somaticMutations?.length ?? 0) > 0) present++;
        break;
    }
  }
  return present / COMPLETENESS_TRACKED_FIELDS.length;
}

/** The record's completeness score clamped to [0, 1]; absent → 0. */
export function recordCompleteness(record: BiomarkerRecord | null | undefined): number {
  const given = record?.completenessScore;
  return given == null ? 0 : clamp01(given);
}
