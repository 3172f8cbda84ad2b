/**
 * Trial ranking by eligibility + magnitude-weighted mechanism fit.
 *
 *   fit      = (patient · trial) / ‖trial‖, clamped to [0, 1]
 *   combined = 0.7 × eligibility + 0.3 × fit
 *
 * Dividing by the trial magnitude only keeps a low-burden patient (DDR 0.1)
 * from scoring 1.0 against a high-intensity DDR trial, which cosine would.
 */

import type { MechanismVectorInput, TrialDescriptor } from "@/types";
import { MECHANISM_DIMENSIONS, MECHANISM_RANKER } from "@/lib/engine-constants";
import type { EngineLogger } from "@/lib/engine-logger";
import { silentLogger } from "@/lib/engine-logger";
import { toMechanismArray } from "@/lib/mechanism-vector";
import { clamp01, dot, l2Norm, sortByDescending } from "@/lib/score-math";

export interface RankerOptions {
  minEligibility?: number;
  minMechanismFit?: number;
  logger?: EngineLogger;
}

export interface TrialMechanismScore {
  nctId: string;
  title: string;
  eligibilityScore: number;
  mechanismFitScore: number;
  combinedScore: number;
  mechanismAlignment: Record<string, number>;
  /** 1 = best. */
  rank: number;
  provenance: {
    formula: string;
    thresholds: { minEligibility: number; minMechanismFit: number };
    trialVectorFallback: boolean;
  };
}

export function magnitudeWeightedFit(patient: readonly number[], trial: readonly number[]): number {
  if (patient.length !== trial.length) return 0;
  const magnitude = l2Norm(trial);
  if (magnitude === 0) return 0;
  return clamp01(dot(patient, trial) / magnitude);
}

function pathwayAlignment(patient: readonly number[], trial: readonly number[]): Record<string, number> {
  const alignment: Record<string, number> = {};
  MECHANISM_DIMENSIONS.forEach((dim, i) => {
    alignment[dim] = (patient[i] ?? 0) * (trial[i] ?? 0);
  });
  return alignment;
}

export function rankTrialsByMechanismFit(
  trials: readonly TrialDescriptor[],
  patientVector: MechanismVectorInput,
  options: RankerOptions = {},
): TrialMechanismScore[] {
  const minEligibility = options.minEligibility ?? MECHANISM_RANKER.minEligibility;
  const minMechanismFit = options.minMechanismFit ?? MECHANISM_RANKER.minMechanismFit;
  const logger = options.logger ?? silentLogger;
  const patient = toMechanismArray(patientVector);
  const { eligibilityWeight: alpha, mechanismWeight: beta } = MECHANISM_RANKER;

  const scored: TrialMechanismScore[] = [];
  for (const trial of trials) {
    const eligibility = trial.eligibilityScore ?? 0;
    if (eligibility < minEligibility) continue;

    let trialVector = trial.moaVector ? toMechanismArray(trial.moaVector) : [];
    const fallback = trialVector.length === 0 || trialVector.length !== patient.length;
    if (fallback) {
      logger.warn("Trial missing or invalid mechanism vector; using zero vector", {
        nctId: trial.nctId,
        expectedDimension: patient.length,
      });
      trialVector = patient.map(() => 0);
    }

    const fit = magnitudeWeightedFit(patient, trialVector);
    if (fit < minMechanismFit) continue;

    scored.push({
      nctId: trial.nctId,
      title: trial.title ?? "Unknown Trial",
      eligibilityScore: eligibility,
      mechanismFitScore: fit,
      combinedScore: alpha * eligibility + beta * fit,
      mechanismAlignment: pathwayAlignment(patient, trialVector),
      rank: 0,
      provenance: {
        formula: `(${alpha} × eligibility) + (${beta} × weighted_mechanism_fit)`,
        thresholds: { minEligibility, minMechanismFit },
        trialVectorFallback: fallback,
      },
    });
  }

  return sortByDescending(scored, (s) => s.combinedScore).map((s, i) => ({ ...s, rank: i + 1 }));
}
