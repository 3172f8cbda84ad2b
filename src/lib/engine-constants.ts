/**
 * Engine constants: single source of truth for every threshold, weight and
 * model coefficient used by the gates and scorers.
 *
 * Values are fixed by the validation cohorts they were derived from and are
 * not user-tunable. Regression fixtures depend on them bit-for-bit.
 */

// ─── Completeness tiers ──────────────────────────────────────

export const COMPLETENESS_THRESHOLDS = Object.freeze({
  L1: 0.3,
  L2: 0.7,
} as const);

/** Confidence ceiling per tier; null = no cap. */
export const CONFIDENCE_CAPS = Object.freeze({
  L0: 0.4,
  L1: 0.6,
  L2: null,
} as const);

/** Fields counted by estimateCompleteness(). */
export const COMPLETENESS_TRACKED_FIELDS = Object.freeze(["tmb", "msiStatus", "hrdScore", "somaticMutations"] as const);

// ─── PARP germline / HRD gate ────────────────────────────────

export const HRD_RESCUE_THRESHOLD = 42;

export const PARP_MULTIPLIERS = Object.freeze({
  fullEffect: 1.0,
  rescued: 1.0,
  reduced: 0.6,
  conservative: 0.8,
} as const);

// ─── IO boost gate ───────────────────────────────────────────

export const TMB_HIGH_THRESHOLD = 20;
export const TMB_INTERMEDIATE_THRESHOLD = 10;

export const IO_BOOSTS = Object.freeze({
  tmbHigh: 1.35,
  msiHigh: 1.30,
  tmbIntermediate: 1.25,
} as const);

/** Pathway composite bands, checked top-down against the confidence-adjusted composite. */
export const IO_PATHWAY_BOOST_BANDS: readonly Readonly<{ min: number; boost: number }>[] = Object.freeze([
  Object.freeze({ min: 0.7, boost: 1.40 }),
  Object.freeze({ min: 0.5, boost: 1.30 }),
  Object.freeze({ min: 0.3, boost: 1.15 }),
]);

/** Genes whose loss can drive hypermutation (BER / polymerase proofreading). */
export const HYPERMUTATOR_GENES: ReadonlySet<string> = new Set(["MBD4", "POLE", "POLD1"]);

/**
 * Unstandardized logistic-regression coefficients for raw pathway scores
 * (mean log2(TPM+1)). Trained on GSE91061, n=51 melanoma, nivolumab; AUC 0.780.
 */
export const IO_LR_COEFFICIENTS = Object.freeze({
  EXHAUSTION: 0.747468,
  TIL_INFILTRATION: 0.513477,
  ANGIOGENESIS: 0.365093,
  MYELOID_INFLAMMATION: 0.077617,
  TGFB_RESISTANCE: -0.369679,
  T_EFFECTOR: -0.145055,
  PROLIFERATION: -0.357712,
  IMMUNOPROTEASOME: -0.819168,
} as const);

export const IO_LR_INTERCEPT = 4.038603;

export const IO_VALIDATION = Object.freeze({
  cohort: "GSE91061",
  nSamples: 51,
  drug: "nivolumab",
  auc: 0.78,
} as const);

export const IO_VALIDATED_CANCER_TYPES: ReadonlySet<string> = new Set(["melanoma"]);

/** Known-but-unvalidated types degrade less than types the model has never seen. */
export const IO_UNVALIDATED_CANCER_TYPES: readonly string[] = Object.freeze([
  "nsclc", "lung", "renal", "rcc", "bladder", "colorectal", "ovarian",
  "breast", "gastric", "hcc", "liver", "pancreatic", "prostate",
]);

export const IO_CONFIDENCE_FACTORS = Object.freeze({
  validatedCancer: 1.0,
  knownUnvalidatedCancer: 0.7,
  unknownCancer: 0.5,
  unspecifiedCancer: 0.6,
  minQualityFactor: 0.5,
  lowPathwayCoverage: 0.5,
  minCoverageFactor: 0.6,
  extremeScore: 0.9,
  extremeLow: 0.1,
  extremeHigh: 0.9,
  adjustedFloor: 0.1,
  adjustedCeiling: 0.9,
} as const);

export const IO_VERY_LOW_COMPOSITE = 0.1;

// ─── Expression quality ──────────────────────────────────────

export const MIN_PATHWAY_COVERAGE = 0.3;
export const MIN_TOTAL_GENES = 1000;

// ─── Ovarian pathway gate ────────────────────────────────────

/** Weighted composite (GSE165897, n=11 HGSOC; DDR and PI3K dominate). */
export const OVARIAN_COMPOSITE_WEIGHTS = Object.freeze({
  DDR: 0.4,
  PI3K: 0.3,
  VEGF: 0.3,
} as const);

export const OVARIAN_RESISTANCE_THRESHOLDS = Object.freeze({
  high: 0.25,
  moderate: 0.2,
} as const);

export const OVARIAN_VERY_LOW_COMPOSITE = 0.1;

export const OVARIAN_MULTIPLIERS = Object.freeze({
  high: 0.7,
  moderate: 0.85,
  veryLow: 1.05,
  neutral: 1.0,
} as const);

export const OVARIAN_VALIDATION = Object.freeze({
  cohort: "GSE165897",
  nSamples: 11,
  drug: "platinum (carboplatin/cisplatin)",
  auc: 0.75,
} as const);

export const OVARIAN_VALIDATED_CANCER_TYPES: ReadonlySet<string> = new Set([
  "ovarian",
  "ovarian_cancer",
  "hgsoc",
  "high_grade_serous_ovarian",
  "high_grade_serous_ovarian_cancer",
]);

export const OVARIAN_CONFIDENCE_FACTORS = Object.freeze({
  validatedCancer: 1.0,
  unspecifiedCancer: 0.6,
  minQualityFactor: 0.5,
  smallCohort: 0.85,
} as const);

// ─── Holistic score ──────────────────────────────────────────

export const HOLISTIC_WEIGHTS = Object.freeze({
  mechanismFit: 0.5,
  eligibility: 0.3,
  pgxSafety: 0.2,
} as const);

export const HOLISTIC_BANDS = Object.freeze({
  high: 0.8,
  medium: 0.6,
  low: 0.4,
} as const);

export const DEFAULT_MECHANISM_FIT = 0.5;

/** PGx adjustment factor at or below which a drug is contraindicated. */
export const CONTRAINDICATION_THRESHOLD = 0.1;

/** Factor below which a PGx result is a moderate (penalized) risk. */
export const MODERATE_TOXICITY_THRESHOLD = 0.8;

// ─── Mechanism vectors ───────────────────────────────────────

export const MECHANISM_DIMENSIONS = Object.freeze(["DDR", "MAPK", "PI3K", "VEGF", "HER2", "IO", "Efflux"] as const);

export const MECHANISM_RANKER = Object.freeze({
  eligibilityWeight: 0.7,
  mechanismWeight: 0.3,
  minEligibility: 0.6,
  minMechanismFit: 0.3,
} as const);

// ─── Eligibility checklist ───────────────────────────────────

export const ELIGIBILITY_SCORES = Object.freeze({
  pass: 1.0,
  fail: 0.0,
  diseaseAmbiguous: 0.5,
  noConditions: 0.7,
  ageUnknown: 0.7,
  locationDistant: 0.5,
} as const);

export const DEFAULT_MAX_AGE_YEARS = 120;

export const RUO_LABEL = "Research Use Only";
