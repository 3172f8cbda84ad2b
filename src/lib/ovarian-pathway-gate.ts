/**
 * Ovarian PARP/platinum pathway-resistance gate.
 *
 * Only acts when expression is supplied. Without it the gate is a no-op and
 * says so, leaving the PARP germline/HRD gate as the sole determinant.
 */

import type {
  BiomarkerRecord,
  DrugDescriptor,
  OvarianGateMetadata,
  OvarianGateOutcome,
  OvarianVerdict,
} from "@/types";
import { isParpInhibitor, isPlatinumAgent } from "@/lib/drug-classification";
import { OVARIAN_MULTIPLIERS, OVARIAN_VERY_LOW_COMPOSITE } from "@/lib/engine-constants";
import { assessExpressionQuality, hasExpression } from "@/lib/expression-profile";
import type { PathwayModel } from "@/lib/expression-profile";
import { classifyResistanceRisk, createOvarianPathwayModel, OVARIAN_COMPOSITE_PATHWAYS } from "@/lib/ovarian-pathway-model";
import {
  computeOvarianPathwayConfidence,
  ovarianRuoDisclaimer,
  shouldUseOvarianPathwayPrediction,
} from "@/lib/ovarian-pathway-safety";

const defaultModel = createOvarianPathwayModel();

const EMPTY_METADATA: OvarianGateMetadata = {
  expressionSupplied: false,
  compositeRaw: null,
  compositeAdjusted: null,
  resistanceRisk: null,
  fallbackReason: null,
  warnings: [],
  ruoDisclaimer: null,
};

function outcome(
  verdict: OvarianVerdict,
  multiplier: number,
  reason: string,
  metadata: OvarianGateMetadata,
): OvarianGateOutcome {
  const result: OvarianGateOutcome = { gateId: "OVARIAN_PATHWAY", verdict, multiplier, reason, metadata: Object.freeze(metadata) };
  return Object.freeze(result);
}

export function applyOvarianPathwayGate(
  drug: DrugDescriptor,
  record: BiomarkerRecord | null | undefined,
  cancerType?: string | null,
  model: PathwayModel = defaultModel,
): OvarianGateOutcome {
  if (!isParpInhibitor(drug) && !isPlatinumAgent(drug)) {
    return outcome("NOT_APPLICABLE", OVARIAN_MULTIPLIERS.neutral, `${drug.name} is neither PARP- nor platinum-class`, EMPTY_METADATA);
  }

  const expression = record?.expression;
  if (!hasExpression(expression)) {
    return outcome(
      "NO_CHANGE",
      OVARIAN_MULTIPLIERS.neutral,
      "No expression data supplied: ovarian pathway gate not applied; HRD-based PARP gating is the sole determinant",
      EMPTY_METADATA,
    );
  }

  const scores = model.scorePathways(expression);
  const compositeRaw = model.composite(scores);
  const quality = assessExpressionQuality(expression, model.geneSets, OVARIAN_COMPOSITE_PATHWAYS);
  const ruoDisclaimer = ovarianRuoDisclaimer(cancerType);

  const decision = shouldUseOvarianPathwayPrediction(compositeRaw, cancerType, quality, record?.hrdScore);
  if (!decision.use) {
    return outcome("FALLBACK", OVARIAN_MULTIPLIERS.neutral, `Ovarian pathway prediction not used: ${decision.reason}`, {
      expressionSupplied: true,
      compositeRaw,
      compositeAdjusted: null,
      resistanceRisk: null,
      fallbackReason: decision.reason,
      warnings: quality.warnings,
      ruoDisclaimer,
    });
  }

  const confidence = computeOvarianPathwayConfidence(compositeRaw, cancerType, quality);
  const adjusted = confidence.adjusted;
  const risk = classifyResistanceRisk(adjusted);
  const metadata: OvarianGateMetadata = {
    expressionSupplied: true,
    compositeRaw,
    compositeAdjusted: adjusted,
    resistanceRisk: risk,
    fallbackReason: null,
    warnings: confidence.warnings,
    ruoDisclaimer,
  };
  const scoreText = `composite=${compositeRaw.toFixed(3)}, adjusted=${adjusted.toFixed(3)}`;

  if (risk === "HIGH") {
    return outcome(
      "REDUCED",
      OVARIAN_MULTIPLIERS.high,
      `High pathway resistance risk (${scoreText}): efficacy ${OVARIAN_MULTIPLIERS.high}x`,
      metadata,
    );
  }
  if (risk === "MODERATE") {
    return outcome(
      "MODERATELY_REDUCED",
      OVARIAN_MULTIPLIERS.moderate,
      `Moderate pathway resistance risk (${scoreText}): efficacy ${OVARIAN_MULTIPLIERS.moderate}x`,
      metadata,
    );
  }
  if (adjusted < OVARIAN_VERY_LOW_COMPOSITE) {
    return outcome(
      "SLIGHTLY_BOOSTED",
      OVARIAN_MULTIPLIERS.veryLow,
      `Very low pathway resistance (${scoreText}): efficacy ${OVARIAN_MULTIPLIERS.veryLow}x`,
      metadata,
    );
  }
  return outcome("NO_CHANGE", OVARIAN_MULTIPLIERS.neutral, `Low pathway resistance risk (${scoreText}): no adjustment`, metadata);
}
