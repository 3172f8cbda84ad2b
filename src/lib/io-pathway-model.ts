/**
 * IO pathway response model (GSE91061, n=51 melanoma, nivolumab; AUC 0.780).
 *
 * Eight pathway scores feed a fixed-coefficient logistic regression. The
 * coefficients are unstandardized: they expect raw mean log2(TPM+1) scores.
 * A pathway with no gene present is left out of the linear term.
 */

import ioPathwayGenes from "@/data/io-pathways.json";
import { IO_LR_COEFFICIENTS, IO_LR_INTERCEPT } from "@/lib/engine-constants";
import { freezeGeneSets, scorePathways } from "@/lib/expression-profile";
import type { GeneSets, PathwayModel, PathwayScoreVector } from "@/lib/expression-profile";
import { sigmoid } from "@/lib/score-math";

export type IoPathwayName = keyof typeof IO_LR_COEFFICIENTS;

export const IO_GENE_SETS: GeneSets = freezeGeneSets(ioPathwayGenes);

function isIoPathway(name: string): name is IoPathwayName {
  return Object.prototype.hasOwnProperty.call(IO_LR_COEFFICIENTS, name);
}

/** P(response) from the logistic composite; always in (0, 1). */
export function ioLogisticComposite(scores: PathwayScoreVector): number {
  let logit = IO_LR_INTERCEPT;
  for (const [pathway, score] of Object.entries(scores)) {
    if (score == null || !isIoPathway(pathway)) continue;
    logit += IO_LR_COEFFICIENTS[pathway] * score;
  }
  return sigmoid(logit);
}

export function createIoPathwayModel(geneSets: GeneSets = IO_GENE_SETS): PathwayModel {
  return {
    geneSets,
    scorePathways: (profile) => scorePathways(profile, geneSets),
    composite: ioLogisticComposite,
  };
}
