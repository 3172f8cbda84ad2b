/**
 * Ovarian pathway prediction safety layer (GSE165897, n=11).
 *
 * Stricter than the IO layer: an unvalidated cancer type always falls back,
 * because HRD-based PARP gating is a validated alternative in every case.
 */

import { classifyOvarianCancerType } from "@/lib/cancer-type";
import {
  MIN_PATHWAY_COVERAGE,
  OVARIAN_CONFIDENCE_FACTORS,
  OVARIAN_VALIDATION,
  OVARIAN_VERY_LOW_COMPOSITE,
  RUO_LABEL,
} from "@/lib/engine-constants";
import type { ExpressionQualityReport } from "@/lib/expression-profile";
import type { PathwayConfidence, PathwayUseDecision } from "@/lib/io-pathway-safety";
import { formatPct, measuredValue } from "@/lib/score-math";

export function shouldUseOvarianPathwayPrediction(
  composite: number,
  cancerType: string | null | undefined,
  quality: ExpressionQualityReport,
  hrdScore: number | null | undefined,
): PathwayUseDecision {
  if (classifyOvarianCancerType(cancerType) === "unknown") {
    return {
      use: false,
      reason: `Cancer type '${cancerType}' not validated for ovarian pathway prediction. Validated types: ovarian, ovarian_cancer, hgsoc (${OVARIAN_VALIDATION.cohort}).`,
    };
  }
  if (!quality.isAcceptable) {
    return {
      use: false,
      reason: `Low pathway coverage (${formatPct(quality.avgPathwayCoverage)} < ${formatPct(MIN_PATHWAY_COVERAGE)}). Insufficient genes for reliable pathway prediction.`,
    };
  }
  if (composite < OVARIAN_VERY_LOW_COMPOSITE && measuredValue(hrdScore) !== null) {
    return {
      use: false,
      reason: `Very low composite score (${composite.toFixed(3)} < ${OVARIAN_VERY_LOW_COMPOSITE}). Prefer HRD-based PARP logic.`,
    };
  }
  return { use: true, reason: "Pathway prediction validated and recommended" };
}

/** No floor or ceiling: the adjusted value is banded directly. */
export function computeOvarianPathwayConfidence(
  composite: number,
  cancerType: string | null | undefined,
  quality: ExpressionQualityReport,
): PathwayConfidence {
  const f = OVARIAN_CONFIDENCE_FACTORS;
  const warnings: string[] = [];

  const cancerFactor = classifyOvarianCancerType(cancerType) === "validated" ? f.validatedCancer : f.unspecifiedCancer;
  if (cancerFactor !== f.validatedCancer) {
    warnings.push("Cancer type not specified. Confidence degraded by 40%.");
  }

  const coverage = quality.avgPathwayCoverage;
  let qualityFactor = 1;
  if (coverage < MIN_PATHWAY_COVERAGE) {
    qualityFactor = Math.max(f.minQualityFactor, coverage / MIN_PATHWAY_COVERAGE);
    warnings.push(`Low pathway coverage (${formatPct(coverage)}). Confidence degraded by ${formatPct(1 - qualityFactor)}.`);
  }

  warnings.push(
    `${OVARIAN_VALIDATION.cohort} validation cohort is small (n=${OVARIAN_VALIDATION.nSamples}). Confidence degraded by 15%.`,
  );

  const multiplier = cancerFactor * qualityFactor * f.smallCohort;
  return {
    adjusted: composite * multiplier,
    multiplier,
    factors: { cancerType: cancerFactor, expressionQuality: qualityFactor, sampleSize: f.smallCohort },
    warnings: [...quality.warnings, ...warnings],
  };
}

export function ovarianRuoDisclaimer(cancerType?: string | null): string {
  const base =
    `${RUO_LABEL} (RUO): Ovarian pathway-based resistance prediction is validated on ` +
    `${OVARIAN_VALIDATION.cohort} (n=${OVARIAN_VALIDATION.nSamples} HGSOC patients, AUC=${OVARIAN_VALIDATION.auc.toFixed(3)}). ` +
    "Not intended for clinical diagnostic or treatment decisions.";
  if (classifyOvarianCancerType(cancerType) === "unknown") {
    return `${base} NOTE: Cancer type '${cancerType}' has not been validated.`;
  }
  return base;
}
