/**
 * IO pathway prediction safety layer.
 *
 * The logistic model is validated only for melanoma + nivolumab. This layer
 * degrades the composite for out-of-distribution inputs, decides whether the
 * pathway prediction may claim the IO priority slot at all, and supplies
 * the research-use-only disclaimer attached to every pathway outcome.
 */

import type { MsiStatus } from "@/types";
import { classifyIoCancerType } from "@/lib/cancer-type";
import type { CancerTypeValidation } from "@/lib/cancer-type";
import {
  IO_CONFIDENCE_FACTORS,
  IO_VALIDATION,
  IO_VERY_LOW_COMPOSITE,
  MIN_PATHWAY_COVERAGE,
  RUO_LABEL,
} from "@/lib/engine-constants";
import type { ExpressionQualityReport } from "@/lib/expression-profile";
import { clamp, formatPct, measuredValue } from "@/lib/score-math";

// ─── Types ───────────────────────────────────────────────────

export interface PathwayConfidence {
  adjusted: number;
  /** Product of all factors applied to the raw composite. */
  multiplier: number;
  factors: Readonly<Record<string, number>>;
  warnings: readonly string[];
}

export interface PathwayUseDecision {
  use: boolean;
  reason: string;
}

export interface IoFallbackSignals {
  cancerType?: string | null;
  quality: ExpressionQualityReport;
  tmb?: number | null;
  msiStatus?: MsiStatus | null;
}

// ─── Confidence degradation ──────────────────────────────────

const IO_CANCER_FACTORS: Record<CancerTypeValidation, number> = {
  validated: IO_CONFIDENCE_FACTORS.validatedCancer,
  known_unvalidated: IO_CONFIDENCE_FACTORS.knownUnvalidatedCancer,
  unknown: IO_CONFIDENCE_FACTORS.unknownCancer,
  unspecified: IO_CONFIDENCE_FACTORS.unspecifiedCancer,
};

export function computeIoPathwayConfidence(
  composite: number,
  cancerType: string | null | undefined,
  quality: ExpressionQualityReport,
): PathwayConfidence {
  const f = IO_CONFIDENCE_FACTORS;
  const warnings: string[] = [];

  const validation = classifyIoCancerType(cancerType);
  const cancerFactor = IO_CANCER_FACTORS[validation];
  if (validation === "known_unvalidated") {
    warnings.push(
      `IO pathway prediction not validated for ${cancerType}. Confidence degraded by 30%. Validated only for melanoma (${IO_VALIDATION.cohort}).`,
    );
  } else if (validation === "unknown") {
    warnings.push(`IO pathway prediction not validated for ${cancerType}. Confidence degraded by 50%.`);
  } else if (validation === "unspecified") {
    warnings.push("Cancer type not specified. IO pathway prediction confidence degraded by 40%.");
  }

  const coverage = quality.avgPathwayCoverage;
  let qualityFactor = 1;
  if (coverage < MIN_PATHWAY_COVERAGE) {
    qualityFactor = Math.max(f.minQualityFactor, coverage / MIN_PATHWAY_COVERAGE);
    warnings.push(
      `Low pathway gene coverage (${formatPct(coverage)} < ${formatPct(MIN_PATHWAY_COVERAGE)}). Confidence degraded by ${formatPct(1 - qualityFactor)}.`,
    );
  }

  let coverageFactor = 1;
  if (coverage < f.lowPathwayCoverage) {
    coverageFactor = Math.max(f.minCoverageFactor, coverage);
    warnings.push(`Low average pathway coverage (${formatPct(coverage)}).`);
  }

  let uncertaintyFactor = 1;
  if (composite < f.extremeLow || composite > f.extremeHigh) {
    uncertaintyFactor = f.extremeScore;
    warnings.push(`Extreme composite score (${composite.toFixed(3)}). Confidence degraded by 10%.`);
  }

  const factors = {
    cancerType: cancerFactor,
    expressionQuality: qualityFactor,
    pathwayCoverage: coverageFactor,
    scoreUncertainty: uncertaintyFactor,
  };
  const multiplier = cancerFactor * qualityFactor * coverageFactor * uncertaintyFactor;
  const adjusted = clamp(composite * multiplier, f.adjustedFloor, f.adjustedCeiling);

  return { adjusted, multiplier, factors, warnings: [...quality.warnings, ...warnings] };
}

// ─── Trust decision ──────────────────────────────────────────

/** TMB measured or MSI-High: a lower-priority IO signal exists to fall back on. */
export function hasTmbMsiFallback(tmb: number | null | undefined, msiStatus: MsiStatus | null | undefined): boolean {
  return measuredValue(tmb) !== null || msiStatus === "MSI-High";
}

/**
 * Pathway prediction is trusted when the cancer type is acceptable, quality
 * passes and the composite is not very low while TMB/MSI could stand in,
 * or when there is no TMB/MSI to fall back to at all.
 */
export function shouldUseIoPathwayPrediction(composite: number, signals: IoFallbackSignals): PathwayUseDecision {
  const validation = classifyIoCancerType(signals.cancerType);
  const cancerOk = validation === "validated" || validation === "unspecified";
  const qualityOk = signals.quality.isAcceptable;
  const fallback = hasTmbMsiFallback(signals.tmb, signals.msiStatus);

  if (!fallback) {
    return {
      use: true,
      reason: cancerOk && qualityOk
        ? "Pathway prediction validated and acceptable"
        : "Pathway prediction used with degraded confidence (no TMB/MSI to fall back to)",
    };
  }
  if (!cancerOk) {
    return {
      use: false,
      reason: `Pathway prediction not validated for ${signals.cancerType}. Fallback to TMB/MSI (validated only for melanoma).`,
    };
  }
  if (!qualityOk) {
    return {
      use: false,
      reason: "Expression data quality insufficient. Fallback to TMB/MSI (pathway coverage too low).",
    };
  }
  if (composite < IO_VERY_LOW_COMPOSITE) {
    return {
      use: false,
      reason: `Very low pathway composite (${composite.toFixed(3)} < ${IO_VERY_LOW_COMPOSITE}). Fallback to TMB/MSI.`,
    };
  }
  return { use: true, reason: "Pathway prediction validated and acceptable" };
}

export function ioRuoDisclaimer(cancerType?: string | null): string {
  const base =
    `${RUO_LABEL} (RUO): IO pathway predictions are based on retrospective analysis of ` +
    `${IO_VALIDATION.cohort} (n=${IO_VALIDATION.nSamples} melanoma samples, ${IO_VALIDATION.drug}). ` +
    "Not validated for clinical decision-making.";
  const validation = classifyIoCancerType(cancerType);
  if (validation === "validated" || validation === "unspecified") return base;
  return `${base} NOT VALIDATED for ${cancerType}. Validated only for melanoma.`;
}
