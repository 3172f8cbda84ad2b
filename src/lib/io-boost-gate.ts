/**
 * IO boost gate for checkpoint inhibitors.
 *
 * Signals are evaluated through a declarative priority table; the first rule
 * that matches decides the outcome. Boosts are mutually exclusive and never
 * multiplied together: TMB 25 with MSI-High yields 1.35x, not 1.35 × 1.30.
 *
 * Priority:
 *   1. Pathway logistic composite (expression supplied and trusted, band ≥ 0.3)
 *   2. TMB ≥ 20       → 1.35x
 *   3. MSI-High        → 1.30x
 *   4. 10 ≤ TMB < 20   → 1.25x
 *   5. TMB unmeasured + hypermutator gene mutated → flag only, 1.0x
 */

import type {
  BiomarkerRecord,
  DrugDescriptor,
  IoBoostOutcome,
  IoGateMetadata,
  IoGateId,
  IoPathwayAssessment,
  IoVerdict,
  MsiStatus,
} from "@/types";
import { isCheckpointInhibitor } from "@/lib/drug-classification";
import {
  HYPERMUTATOR_GENES,
  IO_BOOSTS,
  IO_PATHWAY_BOOST_BANDS,
  IO_VALIDATION,
  TMB_HIGH_THRESHOLD,
  TMB_INTERMEDIATE_THRESHOLD,
} from "@/lib/engine-constants";
import type { EngineLogger } from "@/lib/engine-logger";
import { silentLogger } from "@/lib/engine-logger";
import { assessExpressionQuality, hasExpression } from "@/lib/expression-profile";
import type { PathwayModel } from "@/lib/expression-profile";
import { createIoPathwayModel } from "@/lib/io-pathway-model";
import { computeIoPathwayConfidence, ioRuoDisclaimer, shouldUseIoPathwayPrediction } from "@/lib/io-pathway-safety";
import { measuredValue } from "@/lib/score-math";

// ─── Types ───────────────────────────────────────────────────

export interface IoGateOptions {
  cancerType?: string | null;
  model?: PathwayModel;
  logger?: EngineLogger;
}

/** Pathway assessment plus the boost its band earned (null = no slot claim). */
export interface IoPathwayEvaluation extends IoPathwayAssessment {
  boost: number | null;
}

export interface IoSignals {
  tmb: number | null;
  msiStatus: MsiStatus | null;
  pathway: IoPathwayEvaluation | null;
  hypermutatorGenes: readonly string[];
}

export interface IoPriorityRule {
  gateId: IoGateId;
  verdict: IoVerdict;
  matches(signals: IoSignals): boolean;
  multiplier(signals: IoSignals): number;
  reason(signals: IoSignals): string;
  action?: IoGateMetadata["action"];
}

// ─── Signal extraction ───────────────────────────────────────

const defaultModel = createIoPathwayModel();

export function findHypermutatorGenes(record: BiomarkerRecord | null | undefined): string[] {
  const found: string[] = [];
  const mutations = [...(record?.somaticMutations ?? []), ...(record?.germlineMutations ?? [])];
  for (const m of mutations) {
    const gene = m.gene.trim().toUpperCase();
    if (HYPERMUTATOR_GENES.has(gene) && !found.includes(gene)) found.push(gene);
  }
  return found;
}

export function pathwayBoostForComposite(adjusted: number): number | null {
  for (const band of IO_PATHWAY_BOOST_BANDS) {
    if (adjusted >= band.min) return band.boost;
  }
  return null;
}

/** Null when no expression is supplied. */
export function evaluateIoPathway(
  record: BiomarkerRecord | null | undefined,
  cancerType: string | null | undefined,
  model: PathwayModel,
): IoPathwayEvaluation | null {
  const expression = record?.expression;
  if (!hasExpression(expression)) return null;

  const quality = assessExpressionQuality(expression, model.geneSets);
  const compositeRaw = model.composite(model.scorePathways(expression));
  const ruoDisclaimer = ioRuoDisclaimer(cancerType);
  const decision = shouldUseIoPathwayPrediction(compositeRaw, {
    cancerType,
    quality,
    tmb: measuredValue(record?.tmb),
    msiStatus: record?.msiStatus,
  });

  if (!decision.use) {
    return {
      used: false,
      compositeRaw,
      compositeAdjusted: null,
      fallbackReason: decision.reason,
      warnings: quality.warnings,
      ruoDisclaimer,
      boost: null,
    };
  }

  const confidence = computeIoPathwayConfidence(compositeRaw, cancerType, quality);
  return {
    used: true,
    compositeRaw,
    compositeAdjusted: confidence.adjusted,
    fallbackReason: null,
    warnings: confidence.warnings,
    ruoDisclaimer,
    boost: pathwayBoostForComposite(confidence.adjusted),
  };
}

// ─── Priority table ──────────────────────────────────────────

function tmbAtLeast(signals: IoSignals, threshold: number): boolean {
  return signals.tmb != null && signals.tmb >= threshold;
}

export const IO_PRIORITY_TABLE: readonly IoPriorityRule[] = [
  {
    gateId: "IO_PATHWAY_BOOST",
    verdict: "BOOSTED",
    matches: (s) => s.pathway?.boost != null,
    multiplier: (s) => s.pathway?.boost ?? 1.0,
    reason: (s) =>
      `Pathway-based IO prediction (${IO_VALIDATION.cohort}, AUC=${IO_VALIDATION.auc.toFixed(3)}): ` +
      `raw_composite=${(s.pathway?.compositeRaw ?? 0).toFixed(3)}, ` +
      `confidence_adjusted=${(s.pathway?.compositeAdjusted ?? 0).toFixed(3)} → ` +
      `checkpoint inhibitor boost ${(s.pathway?.boost ?? 1).toFixed(2)}x`,
  },
  {
    gateId: "IO_TMB_BOOST",
    verdict: "BOOSTED",
    matches: (s) => tmbAtLeast(s, TMB_HIGH_THRESHOLD),
    multiplier: () => IO_BOOSTS.tmbHigh,
    reason: (s) =>
      `TMB-high (${s.tmb} ≥ ${TMB_HIGH_THRESHOLD} mut/Mb): checkpoint inhibitor boost ${IO_BOOSTS.tmbHigh.toFixed(2)}x`,
  },
  {
    gateId: "IO_MSI_BOOST",
    verdict: "BOOSTED",
    matches: (s) => s.msiStatus === "MSI-High",
    multiplier: () => IO_BOOSTS.msiHigh,
    reason: () => `MSI-High: checkpoint inhibitor boost ${IO_BOOSTS.msiHigh.toFixed(2)}x`,
  },
  {
    gateId: "IO_TMB_BOOST",
    verdict: "BOOSTED",
    matches: (s) => tmbAtLeast(s, TMB_INTERMEDIATE_THRESHOLD),
    multiplier: () => IO_BOOSTS.tmbIntermediate,
    reason: (s) =>
      `TMB-intermediate (${s.tmb} mut/Mb, ${TMB_INTERMEDIATE_THRESHOLD}–${TMB_HIGH_THRESHOLD}): checkpoint inhibitor boost ${IO_BOOSTS.tmbIntermediate.toFixed(2)}x`,
  },
  {
    gateId: "IO_HYPERMUTATOR_FLAG",
    verdict: "SUSPECTED_HYPERMUTATION",
    matches: (s) => s.tmb == null && s.hypermutatorGenes.length > 0,
    multiplier: () => 1.0,
    reason: (s) =>
      `TMB not measured; hypermutator gene mutation detected (${s.hypermutatorGenes.join(", ")}). ` +
      "Suspected hypermutation: no boost applied. Measure TMB/MSI before considering checkpoint benefit.",
    action: "MEASURE_TMB_MSI",
  },
];

const NO_BOOST_RULE: IoPriorityRule = {
  gateId: "IO_NO_BOOST",
  verdict: "NO_BOOST",
  matches: () => true,
  multiplier: () => 1.0,
  reason: () => "No IO boost signals detected",
};

/** First matching rule wins. */
export function resolveIoPriority(signals: IoSignals, table: readonly IoPriorityRule[] = IO_PRIORITY_TABLE): IoPriorityRule {
  return table.find((rule) => rule.matches(signals)) ?? NO_BOOST_RULE;
}

// ─── Gate ────────────────────────────────────────────────────

export function applyIoBoostGate(
  drug: DrugDescriptor,
  record: BiomarkerRecord | null | undefined,
  options: IoGateOptions = {},
): IoBoostOutcome {
  const logger = options.logger ?? silentLogger;
  const tmb = measuredValue(record?.tmb);
  const msiStatus = record?.msiStatus ?? null;

  if (!isCheckpointInhibitor(drug)) {
    const notApplicable: IoBoostOutcome = {
      gateId: "IO_NO_BOOST",
      verdict: "NO_BOOST",
      multiplier: 1.0,
      reason: `${drug.name} is not a checkpoint inhibitor`,
      metadata: { tmb, msiStatus, pathway: null, hypermutatorGenes: [], action: null },
    };
    return Object.freeze(notApplicable);
  }

  const pathway = evaluateIoPathway(record, options.cancerType, options.model ?? defaultModel);
  if (pathway && !pathway.used) {
    logger.info("IO pathway prediction fell back to TMB/MSI", { drug: drug.name, reason: pathway.fallbackReason });
  } else if (pathway && pathway.warnings.length > 0) {
    logger.warn("IO pathway prediction warnings", { drug: drug.name, warnings: pathway.warnings });
  }

  const signals: IoSignals = { tmb, msiStatus, pathway, hypermutatorGenes: findHypermutatorGenes(record) };
  const rule = resolveIoPriority(signals);
  const multiplier = rule.multiplier(signals);

  if (rule.verdict === "BOOSTED") {
    logger.info("IO boost applied", { drug: drug.name, gateId: rule.gateId, multiplier });
  }

  const assessment: IoPathwayAssessment | null = pathway && {
    used: pathway.used,
    compositeRaw: pathway.compositeRaw,
    compositeAdjusted: pathway.compositeAdjusted,
    fallbackReason: pathway.fallbackReason,
    warnings: pathway.warnings,
    ruoDisclaimer: pathway.ruoDisclaimer,
  };

  const result: IoBoostOutcome = {
    gateId: rule.gateId,
    verdict: rule.verdict,
    multiplier,
    reason: rule.reason(signals),
    metadata: {
      tmb,
      msiStatus,
      pathway: assessment,
      hypermutatorGenes: signals.hypermutatorGenes,
      action: rule.action ?? null,
    },
  };
  return Object.freeze(result);
}
