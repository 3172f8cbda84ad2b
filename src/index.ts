/**
 * Public surface of the biomarker gate engine.
 *
 *   Gate pipeline   → applyGates / createGateOrchestrator
 *   Trial scoring   → computeHolisticScore / computeBatch / HolisticScoreService
 *   Drug ranking    → composeRiskBenefit / composeDrugRanking
 *   Mechanism rank  → rankTrialsByMechanismFit
 *   Input boundary  → parseBiomarkerRecord / safeParseBiomarkerRecord
 */

export type * from "./types";

// Gate pipeline
export { applyGates, createGateOrchestrator } from "./lib/gate-orchestrator";
export type { GateOrchestrator, GateOrchestratorDeps } from "./lib/gate-orchestrator";
export { applyParpGate } from "./lib/parp-gate";
export { applyOvarianPathwayGate } from "./lib/ovarian-pathway-gate";
export { applyIoBoostGate, findHypermutatorGenes, IO_PRIORITY_TABLE, resolveIoPriority } from "./lib/io-boost-gate";
export type { IoGateOptions, IoPriorityRule, IoSignals } from "./lib/io-boost-gate";
export { applyConfidenceCap } from "./lib/confidence-cap";
export { classifyCompleteness, estimateCompleteness, recordCompleteness } from "./lib/completeness";
export { isCheckpointInhibitor, isParpInhibitor, isPlatinumAgent } from "./lib/drug-classification";

// Pathway models
export { assessExpressionQuality, scorePathways } from "./lib/expression-profile";
export type { ExpressionQualityReport, GeneSets, PathwayModel, PathwayScoreVector } from "./lib/expression-profile";
export { createIoPathwayModel, IO_GENE_SETS } from "./lib/io-pathway-model";
export { createOvarianPathwayModel, OVARIAN_GENE_SETS } from "./lib/ovarian-pathway-model";

// Trial scoring
export { computeBatch, computeHolisticScore, HolisticScoreService, interpretScore } from "./lib/holistic-score";
export type {
  HolisticBatchEntry,
  HolisticInterpretation,
  HolisticScoreDeps,
  HolisticScoreResult,
} from "./lib/holistic-score";
export { computeMechanismFit } from "./lib/mechanism-fit";
export { scoreEligibility } from "./lib/eligibility-scorer";
export type { EligibilityResult } from "./lib/eligibility-scorer";
export { scorePgxSafety } from "./lib/pgx-safety";
export type { PgxSafetyResult, PgxScreeningStatus } from "./lib/pgx-safety";
export { createStaticPgxLookup, loadPgxRules } from "./lib/pgx-lookup";
export type { PgxLookup, PgxLookupResult, ToxicityTier } from "./lib/pgx-lookup";

// Mechanism vectors and ranking
export { rankTrialsByMechanismFit } from "./lib/mechanism-fit-ranker";
export type { RankerOptions, TrialMechanismScore } from "./lib/mechanism-fit-ranker";
export {
  mechanismVectorToRecord,
  normalizePathwayName,
  pathwayScoresToMechanismVector,
  toMechanismArray,
  validateMechanismVector,
} from "./lib/mechanism-vector";

// Drug ranking
export { composeDrugRanking, composeRiskBenefit } from "./lib/risk-benefit";
export type { DrugCandidate, RankedDrug, RiskBenefitAction, RiskBenefitResult } from "./lib/risk-benefit";

// Input boundary
export { BiomarkerRecordSchema, parseBiomarkerRecord, safeParseBiomarkerRecord } from "./lib/biomarker-schema";

// Logging
export { consoleLogger, silentLogger } from "./lib/engine-logger";
export type { EngineLogger } from "./lib/engine-logger";
