/**
 * Ovarian platinum-resistance pathway model (GSE165897, n=11 HGSOC).
 *
 * Higher DDR/PI3K/VEGF activity tracks shorter platinum-free interval.
 * MAPK and EFFLUX are scored for transparency but carry no composite weight.
 */

import ovarianPathwayGenes from "@/data/ovarian-pathways.json";
import type { ResistanceRisk } from "@/types";
import { OVARIAN_COMPOSITE_WEIGHTS, OVARIAN_RESISTANCE_THRESHOLDS } from "@/lib/engine-constants";
import { freezeGeneSets, scorePathways } from "@/lib/expression-profile";
import type { GeneSets, PathwayModel, PathwayScoreVector } from "@/lib/expression-profile";

export const OVARIAN_GENE_SETS: GeneSets = freezeGeneSets(ovarianPathwayGenes);

/** Pathways that enter the composite; also the ones quality is judged on. */
export const OVARIAN_COMPOSITE_PATHWAYS = ["DDR", "PI3K", "VEGF"] as const;

/** Weighted DDR/PI3K/VEGF sum; an unmeasured pathway contributes 0. */
export function ovarianResistanceComposite(scores: PathwayScoreVector): number {
  let composite = 0;
  for (const pathway of OVARIAN_COMPOSITE_PATHWAYS) {
    composite += OVARIAN_COMPOSITE_WEIGHTS[pathway] * (scores[pathway] ?? 0);
  }
  return composite;
}

export function classifyResistanceRisk(composite: number): ResistanceRisk {
  if (composite >= OVARIAN_RESISTANCE_THRESHOLDS.high) return "HIGH";
  if (composite >= OVARIAN_RESISTANCE_THRESHOLDS.moderate) return "MODERATE";
  return "LOW";
}

export function createOvarianPathwayModel(geneSets: GeneSets = OVARIAN_GENE_SETS): PathwayModel {
  return {
    geneSets,
    scorePathways: (profile) => scorePathways(profile, geneSets),
    composite: ovarianResistanceComposite,
  };
}
