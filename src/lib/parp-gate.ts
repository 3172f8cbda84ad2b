/**
 * PARP germline/HRD gate.
 *
 * Germline-negative patients can still benefit from PARP inhibition when the
 * tumor is HR-deficient (HRD ≥ 42 rescues). Missing HRD or unknown germline
 * status gets a conservative penalty, never the full effect.
 */

import type { BiomarkerRecord, DrugDescriptor, GermlineStatus, ParpGateOutcome } from "@/types";
import { isParpInhibitor } from "@/lib/drug-classification";
import { HRD_RESCUE_THRESHOLD, PARP_MULTIPLIERS } from "@/lib/engine-constants";
import { measuredValue } from "@/lib/score-math";

function outcome(
  gateId: ParpGateOutcome["gateId"],
  verdict: ParpGateOutcome["verdict"],
  multiplier: number,
  reason: string,
  germlineStatus: GermlineStatus,
  hrdScore: number | null,
): ParpGateOutcome {
  const result: ParpGateOutcome = { gateId, verdict, multiplier, reason, metadata: { germlineStatus, hrdScore } };
  return Object.freeze(result);
}

export function applyParpGate(
  drug: DrugDescriptor,
  germlineStatus: GermlineStatus,
  record: BiomarkerRecord | null | undefined,
): ParpGateOutcome {
  const hrd = measuredValue(record?.hrdScore);

  if (!isParpInhibitor(drug)) {
    return outcome("PARP_NOT_APPLICABLE", "NOT_PARP", 1.0, `${drug.name} is not a PARP inhibitor`, germlineStatus, hrd);
  }

  if (germlineStatus === "positive") {
    return outcome(
      "PARP_GERMLINE",
      "FULL_EFFECT",
      PARP_MULTIPLIERS.fullEffect,
      "Germline BRCA/HRR pathogenic variant: full PARP inhibitor effect",
      germlineStatus,
      hrd,
    );
  }

  if (germlineStatus === "negative") {
    if (hrd == null) {
      return outcome(
        "PARP_UNKNOWN_HRD",
        "CONSERVATIVE",
        PARP_MULTIPLIERS.conservative,
        `Germline negative, HRD unknown: conservative ${PARP_MULTIPLIERS.conservative.toFixed(1)}x penalty (order HRD testing)`,
        germlineStatus,
        hrd,
      );
    }
    if (hrd >= HRD_RESCUE_THRESHOLD) {
      return outcome(
        "PARP_HRD_RESCUE",
        "RESCUED",
        PARP_MULTIPLIERS.rescued,
        `Germline negative but HRD-high (score ${hrd} ≥ ${HRD_RESCUE_THRESHOLD}): PARP inhibitor rescued`,
        germlineStatus,
        hrd,
      );
    }
    return outcome(
      "PARP_HRD_LOW",
      "REDUCED",
      PARP_MULTIPLIERS.reduced,
      `Germline negative, HRD-low (score ${hrd} < ${HRD_RESCUE_THRESHOLD}): PARP inhibitor efficacy reduced ${PARP_MULTIPLIERS.reduced.toFixed(1)}x`,
      germlineStatus,
      hrd,
    );
  }

  return outcome(
    "PARP_UNKNOWN_GERMLINE",
    "CONSERVATIVE",
    PARP_MULTIPLIERS.conservative,
    `Germline status unknown: conservative ${PARP_MULTIPLIERS.conservative.toFixed(1)}x penalty (order germline testing)`,
    germlineStatus,
    hrd,
  );
}
