/**
 * Gate outcome records. Each gate family returns its own variant of
 * GateOutcome; the orchestrator appends them, in evaluation order, to a
 * single rationale list that is never rewritten.
 */

import type { DataCompletenessTier, GermlineStatus } from "./biomarker";

// ─── Verdicts ────────────────────────────────────────────────

export type ParpVerdict = "FULL_EFFECT" | "RESCUED" | "REDUCED" | "CONSERVATIVE" | "NOT_PARP";

export type OvarianVerdict =
  | "REDUCED"
  | "MODERATELY_REDUCED"
  | "SLIGHTLY_BOOSTED"
  | "NO_CHANGE"
  | "FALLBACK"
  | "NOT_APPLICABLE";

export type IoVerdict = "BOOSTED" | "NO_BOOST" | "SUSPECTED_HYPERMUTATION";

export type CapVerdict = "CAPPED" | "NO_CAP";

export type GateVerdict = ParpVerdict | OvarianVerdict | IoVerdict | CapVerdict | "SUMMARY";

// ─── Gate ids ────────────────────────────────────────────────

export type ParpGateId =
  | "PARP_GERMLINE"
  | "PARP_HRD_RESCUE"
  | "PARP_HRD_LOW"
  | "PARP_UNKNOWN_HRD"
  | "PARP_UNKNOWN_GERMLINE"
  | "PARP_NOT_APPLICABLE";

export type OvarianGateId = "OVARIAN_PATHWAY";

export type IoGateId =
  | "IO_PATHWAY_BOOST"
  | "IO_TMB_BOOST"
  | "IO_MSI_BOOST"
  | "IO_HYPERMUTATOR_FLAG"
  | "IO_NO_BOOST";

export type CapGateId = "CONFIDENCE_CAP_L0" | "CONFIDENCE_CAP_L1" | "CONFIDENCE_CAP_L2";

export type GateId = ParpGateId | OvarianGateId | IoGateId | CapGateId | "GATES_SUMMARY";

// ─── Outcome shape ───────────────────────────────────────────

export interface GateOutcome<G extends GateId, V extends GateVerdict, M> {
  readonly gateId: G;
  readonly verdict: V;
  /** Multiplicative factor: < 1 penalty, 1 neutral, > 1 boost. */
  readonly multiplier: number;
  readonly reason: string;
  readonly metadata: M;
}

export interface ParpGateMetadata {
  germlineStatus: GermlineStatus;
  hrdScore: number | null;
}

export type ParpGateOutcome = GateOutcome<ParpGateId, ParpVerdict, ParpGateMetadata>;

export type ResistanceRisk = "HIGH" | "MODERATE" | "LOW";

export interface OvarianGateMetadata {
  expressionSupplied: boolean;
  compositeRaw: number | null;
  compositeAdjusted: number | null;
  resistanceRisk: ResistanceRisk | null;
  fallbackReason: string | null;
  warnings: readonly string[];
  ruoDisclaimer: string | null;
}

export type OvarianGateOutcome = GateOutcome<OvarianGateId, OvarianVerdict, OvarianGateMetadata>;

export interface IoPathwayAssessment {
  used: boolean;
  compositeRaw: number;
  compositeAdjusted: number | null;
  fallbackReason: string | null;
  warnings: readonly string[];
  ruoDisclaimer: string;
}

export interface IoGateMetadata {
  tmb: number | null;
  msiStatus: string | null;
  pathway: IoPathwayAssessment | null;
  hypermutatorGenes: readonly string[];
  action: "MEASURE_TMB_MSI" | null;
}

export type IoBoostOutcome = GateOutcome<IoGateId, IoVerdict, IoGateMetadata>;

export interface ConfidenceCapMetadata {
  tier: DataCompletenessTier;
  completenessScore: number;
  cap: number | null;
  originalConfidence: number;
  cappedConfidence: number;
}

export type ConfidenceCapOutcome = GateOutcome<CapGateId, CapVerdict, ConfidenceCapMetadata>;

export interface GateSummaryMetadata {
  drugName: string;
  germlineStatus: GermlineStatus;
  tier: DataCompletenessTier;
  completenessScore: number;
  originalEfficacy: number;
  finalEfficacy: number;
  efficacyDelta: number;
  originalConfidence: number;
  finalConfidence: number;
  confidenceDelta: number;
  gatesApplied: readonly GateId[];
}

export type GateSummary = GateOutcome<"GATES_SUMMARY", "SUMMARY", GateSummaryMetadata>;

export type GateRationaleEntry =
  | ParpGateOutcome
  | OvarianGateOutcome
  | IoBoostOutcome
  | ConfidenceCapOutcome
  | GateSummary;

export interface GateResult {
  efficacy: number;
  confidence: number;
  tier: DataCompletenessTier;
  rationale: readonly GateRationaleEntry[];
}
