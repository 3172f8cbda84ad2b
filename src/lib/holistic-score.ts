/**
 * Holistic feasibility score for a patient–trial–drug combination.
 *
 *   holistic = 0.5 × mechanism fit + 0.3 × eligibility + 0.2 × PGx safety
 *
 * Interpretation is checked in order: CONTRAINDICATED (PGx override),
 * INELIGIBLE (eligibility ≤ 0), then the HIGH / MEDIUM / LOW / VERY_LOW
 * score bands. Each band carries a templated recommendation citing the
 * component scores that put it there.
 */

import type { PatientProfile, PharmacogeneVariant, TrialDescriptor } from "@/types";
import { DEFAULT_MECHANISM_FIT, HOLISTIC_BANDS, HOLISTIC_WEIGHTS, RUO_LABEL } from "@/lib/engine-constants";
import type { EngineLogger } from "@/lib/engine-logger";
import { consoleLogger, describeError } from "@/lib/engine-logger";
import { scoreEligibility } from "@/lib/eligibility-scorer";
import { computeMechanismFit } from "@/lib/mechanism-fit";
import type { PgxLookup } from "@/lib/pgx-lookup";
import { createStaticPgxLookup } from "@/lib/pgx-lookup";
import type { PgxSafetyResult } from "@/lib/pgx-safety";
import { primaryTrialDrug, scorePgxSafety } from "@/lib/pgx-safety";
import { clamp01, round3, sortByDescending } from "@/lib/score-math";

// ─── Types ───────────────────────────────────────────────────

export type HolisticInterpretation = "CONTRAINDICATED" | "INELIGIBLE" | "HIGH" | "MEDIUM" | "LOW" | "VERY_LOW";

export interface HolisticScoreResult {
  nctId: string;
  holisticScore: number;
  mechanismFitScore: number;
  eligibilityScore: number;
  pgxSafetyScore: number;
  weights: typeof HOLISTIC_WEIGHTS;
  interpretation: HolisticInterpretation;
  recommendation: string;
  caveats: string[];
  mechanismAlignment: Record<string, number>;
  eligibilityBreakdown: string[];
  pgxDetails: PgxSafetyResult;
  provenance: {
    service: string;
    version: string;
    formula: string;
    ruo: string;
  };
}

interface BatchEntryBase {
  nctId: string;
  title: string | null;
  holisticScore: number;
}

export interface ScoredBatchEntry extends BatchEntryBase {
  mechanismFitScore: number;
  eligibilityScore: number;
  pgxSafetyScore: number;
  interpretation: HolisticInterpretation;
  recommendation: string;
  caveats: string[];
}

export interface FailedBatchEntry extends BatchEntryBase {
  error: string;
}

export type HolisticBatchEntry = ScoredBatchEntry | FailedBatchEntry;

export interface HolisticScoreDeps {
  pgxLookup?: PgxLookup;
  logger?: EngineLogger;
}

export interface ComponentScores {
  holistic: number;
  mechanismFit: number;
  eligibility: number;
  pgxSafety: number;
}

const FORMULA = `${HOLISTIC_WEIGHTS.mechanismFit}×mechanism + ${HOLISTIC_WEIGHTS.eligibility}×eligibility + ${HOLISTIC_WEIGHTS.pgxSafety}×pgx_safety`;

// ─── Interpretation ──────────────────────────────────────────

const f2 = (v: number): string => v.toFixed(2);

export function interpretScore(
  scores: ComponentScores,
  pgx: Pick<PgxSafetyResult, "status" | "contraindicatedReason">,
  nctId: string,
): { interpretation: HolisticInterpretation; recommendation: string } {
  const { holistic, mechanismFit, eligibility, pgxSafety } = scores;

  if (pgx.status === "contraindicated") {
    return {
      interpretation: "CONTRAINDICATED",
      recommendation:
        `CONTRAINDICATED for ${nctId}: ${pgx.contraindicatedReason ?? "PGx contraindication"}. ` +
        "Consider alternative trial without this drug class or enroll with modified protocol (pre-approved dose adjustment).",
    };
  }

  if (eligibility <= 0) {
    return {
      interpretation: "INELIGIBLE",
      recommendation:
        `INELIGIBLE for ${nctId}: Patient does not meet hard eligibility criteria (recruiting status or age). ` +
        "Consider alternative trials.",
    };
  }

  if (holistic >= HOLISTIC_BANDS.high) {
    return {
      interpretation: "HIGH",
      recommendation:
        `HIGH PROBABILITY for ${nctId} (score: ${f2(holistic)}). ` +
        `Strong mechanism alignment (${f2(mechanismFit)}), meets eligibility (${f2(eligibility)}), ` +
        `and no significant PGx concerns (${f2(pgxSafety)}). Recommend proceeding with enrollment.`,
    };
  }

  if (holistic >= HOLISTIC_BANDS.medium) {
    const concerns: string[] = [];
    if (mechanismFit < 0.6) concerns.push(`moderate mechanism fit (${f2(mechanismFit)})`);
    if (eligibility < 0.8) concerns.push(`eligibility concerns (${f2(eligibility)})`);
    if (pgxSafety < 0.8) concerns.push(`dose adjustment may be needed (${f2(pgxSafety)})`);
    return {
      interpretation: "MEDIUM",
      recommendation:
        `MODERATE PROBABILITY for ${nctId} (score: ${f2(holistic)}). ` +
        `Proceed with caution due to: ${concerns.length > 0 ? concerns.join(", ") : "borderline scores"}. ` +
        "Consider additional workup before enrollment.",
    };
  }

  if (holistic >= HOLISTIC_BANDS.low) {
    return {
      interpretation: "LOW",
      recommendation:
        `LOW PROBABILITY for ${nctId} (score: ${f2(holistic)}). ` +
        `Significant concerns: mechanism fit=${f2(mechanismFit)}, eligibility=${f2(eligibility)}, PGx safety=${f2(pgxSafety)}. ` +
        "Consider alternative trials with better alignment.",
    };
  }

  return {
    interpretation: "VERY_LOW",
    recommendation:
      `VERY LOW PROBABILITY for ${nctId} (score: ${f2(holistic)}). ` +
      "Poor alignment across multiple dimensions. Recommend alternative trial search.",
  };
}

// ─── Service ─────────────────────────────────────────────────

export class HolisticScoreService {
  private readonly pgxLookup: PgxLookup;
  private readonly logger: EngineLogger;

  constructor(deps: HolisticScoreDeps = {}) {
    this.pgxLookup = deps.pgxLookup ?? createStaticPgxLookup();
    this.logger = deps.logger ?? consoleLogger;
  }

  computeHolisticScore(
    patient: PatientProfile,
    trial: TrialDescriptor,
    pharmacogenes?: readonly PharmacogeneVariant[] | null,
    drug?: string | null,
  ): HolisticScoreResult {
    const caveats: string[] = [];

    const fit = computeMechanismFit(patient.mechanismVector, trial.moaVector);
    if (fit === null) caveats.push(`Mechanism vector not available - using default ${DEFAULT_MECHANISM_FIT}`);

    const eligibility = scoreEligibility(patient, trial);

    const targetDrug = drug ?? primaryTrialDrug(trial);
    const pgx = this.screenPgx(pharmacogenes ?? patient.germlineVariants, targetDrug, trial.nctId, caveats);
    if (pgx.status === "contraindicated" && pgx.contraindicatedReason) {
      caveats.push(`CONTRAINDICATED: ${pgx.contraindicatedReason}`);
    }

    const mechanismFit = round3(clamp01(fit?.score ?? DEFAULT_MECHANISM_FIT));
    const eligibilityScore = round3(clamp01(eligibility.score));
    const pgxSafety = round3(clamp01(pgx.score));
    const holistic = round3(
      HOLISTIC_WEIGHTS.mechanismFit * mechanismFit +
        HOLISTIC_WEIGHTS.eligibility * eligibilityScore +
        HOLISTIC_WEIGHTS.pgxSafety * pgxSafety,
    );

    const { interpretation, recommendation } = interpretScore(
      { holistic, mechanismFit, eligibility: eligibilityScore, pgxSafety },
      pgx,
      trial.nctId,
    );

    return {
      nctId: trial.nctId,
      holisticScore: holistic,
      mechanismFitScore: mechanismFit,
      eligibilityScore,
      pgxSafetyScore: pgxSafety,
      weights: { ...HOLISTIC_WEIGHTS },
      interpretation,
      recommendation,
      caveats,
      mechanismAlignment: fit?.alignment ?? {},
      eligibilityBreakdown: eligibility.breakdown,
      pgxDetails: pgx,
      provenance: { service: "HolisticScoreService", version: "1.0", formula: FORMULA, ruo: RUO_LABEL },
    };
  }

  /** Scores every trial independently; ties keep input order. */
  computeBatch(
    patient: PatientProfile,
    trials: readonly TrialDescriptor[],
    pharmacogenes?: readonly PharmacogeneVariant[] | null,
  ): HolisticBatchEntry[] {
    const entries = trials.map((trial): HolisticBatchEntry => {
      const title = trial.title ?? null;
      try {
        const r = this.computeHolisticScore(patient, trial, pharmacogenes, primaryTrialDrug(trial));
        return {
          nctId: trial.nctId,
          title,
          holisticScore: r.holisticScore,
          mechanismFitScore: r.mechanismFitScore,
          eligibilityScore: r.eligibilityScore,
          pgxSafetyScore: r.pgxSafetyScore,
          interpretation: r.interpretation,
          recommendation: r.recommendation,
          caveats: r.caveats,
        };
      } catch (err) {
        const error = describeError(err);
        this.logger.error("Failed to score trial", { nctId: trial.nctId, error });
        return { nctId: trial.nctId, title, holisticScore: 0, error };
      }
    });
    return sortByDescending(entries, (e) => e.holisticScore);
  }

  private screenPgx(
    variants: readonly PharmacogeneVariant[] | null | undefined,
    drug: string | null,
    nctId: string,
    caveats: string[],
  ): PgxSafetyResult {
    try {
      return scorePgxSafety(variants, drug, this.pgxLookup);
    } catch (err) {
      const error = describeError(err);
      this.logger.warn("PGx lookup failed; treating drug as unscreened", { nctId, drug, error });
      caveats.push(`PGx screening failed (${error}) - safety score defaulted to 1.0`);
      return {
        score: 1.0,
        status: "error",
        drug,
        findings: [],
        contraindicatedReason: null,
        doseAdjustments: [],
        reason: error,
      };
    }
  }
}

// ─── Function API ────────────────────────────────────────────

export function computeHolisticScore(
  patient: PatientProfile,
  trial: TrialDescriptor,
  pharmacogenes?: readonly PharmacogeneVariant[] | null,
  drug?: string | null,
  deps?: HolisticScoreDeps,
): HolisticScoreResult {
  return new HolisticScoreService(deps).computeHolisticScore(patient, trial, pharmacogenes, drug);
}

export function computeBatch(
  patient: PatientProfile,
  trials: readonly TrialDescriptor[],
  pharmacogenes?: readonly PharmacogeneVariant[] | null,
  deps?: HolisticScoreDeps,
): HolisticBatchEntry[] {
  return new HolisticScoreService(deps).computeBatch(patient, trials, pharmacogenes);
}
