import type { CapGateId, ConfidenceCapOutcome, DataCompletenessTier } from "@/types";
import { CONFIDENCE_CAPS } from "@/lib/engine-constants";

const CAP_GATE_IDS: Record<DataCompletenessTier, CapGateId> = {
  L0: "CONFIDENCE_CAP_L0",
  L1: "CONFIDENCE_CAP_L1",
  L2: "CONFIDENCE_CAP_L2",
};

const TIER_LABELS: Record<DataCompletenessTier, string> = {
  L0: "minimal data",
  L1: "partial data",
  L2: "full data",
};

/**
 * Bound confidence by the data-completeness tier. The verdict is CAPPED only
 * when the ceiling was binding.
 */
export function applyConfidenceCap(
  confidence: number,
  tier: DataCompletenessTier,
  completenessScore: number,
): ConfidenceCapOutcome {
  const cap = CONFIDENCE_CAPS[tier];
  const capped = cap == null ? confidence : Math.min(confidence, cap);
  const binding = capped < confidence;

  const reason = binding
    ? `Confidence capped at ${cap} (${tier}: ${TIER_LABELS[tier]}, completeness ${completenessScore.toFixed(2)})`
    : cap == null
      ? `No confidence cap (${tier}: ${TIER_LABELS[tier]})`
      : `Confidence ${confidence.toFixed(2)} within ${tier} ceiling ${cap}`;

  const result: ConfidenceCapOutcome = {
    gateId: CAP_GATE_IDS[tier],
    verdict: binding ? "CAPPED" : "NO_CAP",
    multiplier: confidence > 0 ? capped / confidence : 1.0,
    reason,
    metadata: { tier, completenessScore, cap, originalConfidence: confidence, cappedConfidence: capped },
  };
  return Object.freeze(result);
}
