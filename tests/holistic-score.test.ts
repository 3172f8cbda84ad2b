/**
 * Holistic feasibility score: 0.5 mechanism + 0.3 eligibility + 0.2 PGx,
 * interpretation bands, collaborator failures and batch ordering.
 */
import { describe, it, expect, vi } from "vitest";
import type { PatientProfile, TrialDescriptor } from "@/types";
import { HolisticScoreService, computeBatch, computeHolisticScore, interpretScore } from "@/lib/holistic-score";
import type { PgxLookup } from "@/lib/pgx-lookup";
import { silentLogger } from "@/lib/engine-logger";
import { HOLISTIC_WEIGHTS } from "@/lib/engine-constants";

// ─── Helpers ─────────────────────────────────────────────────

const DDR = [1, 0, 0, 0, 0, 0, 0];

const PATIENT: PatientProfile = {
  patientId: "PT-TEST-1",
  disease: "ovarian cancer",
  age: 52,
  mechanismVector: DDR,
};

function makeTrial(nctId: string, overrides: Partial<TrialDescriptor> = {}): TrialDescriptor {
  return {
    nctId,
    title: `Trial ${nctId}`,
    overallStatus: "RECRUITING",
    conditions: ["Ovarian Cancer"],
    minimumAge: "18 Years",
    moaVector: DDR,
    interventions: [{ type: "DRUG", drugNames: ["Olaparib"] }],
    ...overrides,
  };
}

function mockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const service = new HolisticScoreService({ logger: silentLogger });

// ─── Composition ─────────────────────────────────────────────

describe("computeHolisticScore", () => {
  it("scores exactly 1.0 when every component is 1.0", () => {
    const r = service.computeHolisticScore(PATIENT, makeTrial("NCT-H1"));
    expect(r.mechanismFitScore).toBe(1);
    expect(r.eligibilityScore).toBe(1);
    expect(r.pgxSafetyScore).toBe(1);
    expect(r.holisticScore).toBe(1);
    expect(r.interpretation).toBe("HIGH");
    expect(r.recommendation).toBe(
      "HIGH PROBABILITY for NCT-H1 (score: 1.00). Strong mechanism alignment (1.00), meets eligibility (1.00), " +
        "and no significant PGx concerns (1.00). Recommend proceeding with enrollment.",
    );
    expect(r.caveats).toEqual([]);
    expect(r.pgxDetails.status).toBe("not_screened");
  });

  it("defaults mechanism fit to 0.5 with a caveat when a vector is missing", () => {
    const r = service.computeHolisticScore({ ...PATIENT, mechanismVector: null }, makeTrial("NCT-H2"));
    expect(r.mechanismFitScore).toBe(0.5);
    expect(r.holisticScore).toBe(0.75);
    expect(r.caveats).toEqual(["Mechanism vector not available - using default 0.5"]);
    expect(r.interpretation).toBe("MEDIUM");
    expect(r.recommendation).toBe(
      "MODERATE PROBABILITY for NCT-H2 (score: 0.75). Proceed with caution due to: moderate mechanism fit (0.50). " +
        "Consider additional workup before enrollment.",
    );
    expect(r.mechanismAlignment).toEqual({});
  });

  it("overrides the score band when PGx contraindicates the trial drug", () => {
    const patient: PatientProfile = { ...PATIENT, germlineVariants: [{ gene: "DPYD", variant: "*2A/*2A" }] };
    const trial = makeTrial("NCT-H3", { interventions: [{ drugNames: ["Capecitabine"] }] });
    const r = service.computeHolisticScore(patient, trial);
    expect(r.pgxSafetyScore).toBe(0);
    expect(r.holisticScore).toBe(0.8);
    expect(r.interpretation).toBe("CONTRAINDICATED");
    expect(r.caveats).toContain("CONTRAINDICATED: DPYD *2A/*2A: Contraindicated for Capecitabine");
    expect(r.recommendation.startsWith("CONTRAINDICATED for NCT-H3: DPYD *2A/*2A: Contraindicated for Capecitabine.")).toBe(
      true,
    );
  });

  it("uses explicit pharmacogenes and drug over the patient and trial defaults", () => {
    const r = service.computeHolisticScore(
      PATIENT,
      makeTrial("NCT-H4"),
      [{ gene: "UGT1A1", variant: "*28/*28" }],
      "irinotecan",
    );
    expect(r.pgxDetails.drug).toBe("irinotecan");
    expect(r.pgxSafetyScore).toBe(0.7);
    // 0.5 + 0.3 + 0.14
    expect(r.holisticScore).toBe(0.94);
  });

  it("is INELIGIBLE when a hard eligibility criterion fails", () => {
    const r = service.computeHolisticScore(PATIENT, makeTrial("NCT-H5", { overallStatus: "COMPLETED" }));
    expect(r.eligibilityScore).toBe(0);
    expect(r.holisticScore).toBe(0.7);
    expect(r.interpretation).toBe("INELIGIBLE");
    expect(r.eligibilityBreakdown).toContain("HARD CRITERIA FAILED");
  });

  it("degrades a failing PGx lookup to 1.0 with status error, a caveat and a warning", () => {
    const failing: PgxLookup = {
      lookup: () => {
        throw new Error("pgx service down");
      },
    };
    const logger = mockLogger();
    const r = new HolisticScoreService({ pgxLookup: failing, logger }).computeHolisticScore(
      { ...PATIENT, germlineVariants: [{ gene: "DPYD", variant: "*1/*1" }] },
      makeTrial("NCT-H6"),
    );
    expect(r.pgxSafetyScore).toBe(1);
    expect(r.pgxDetails.status).toBe("error");
    expect(r.caveats).toEqual(["PGx screening failed (pgx service down) - safety score defaulted to 1.0"]);
    expect(logger.warn).toHaveBeenCalledWith("PGx lookup failed; treating drug as unscreened", {
      nctId: "NCT-H6",
      drug: "Olaparib",
      error: "pgx service down",
    });
  });

  it("keeps the weights fixed when a caller edits a returned result", () => {
    const first = service.computeHolisticScore(PATIENT, makeTrial("NCT-H8"));
    Reflect.set(first.weights, "eligibility", 0);
    const second = service.computeHolisticScore(PATIENT, makeTrial("NCT-H8"));
    expect(second.holisticScore).toBe(1);
    expect(second.weights).toEqual({ mechanismFit: 0.5, eligibility: 0.3, pgxSafety: 0.2 });
    expect(Object.isFrozen(HOLISTIC_WEIGHTS)).toBe(true);
  });

  it("records provenance and weights", () => {
    const r = computeHolisticScore(PATIENT, makeTrial("NCT-H7"), null, null, { logger: silentLogger });
    expect(r.weights).toEqual({ mechanismFit: 0.5, eligibility: 0.3, pgxSafety: 0.2 });
    expect(r.provenance).toEqual({
      service: "HolisticScoreService",
      version: "1.0",
      formula: "0.5×mechanism + 0.3×eligibility + 0.2×pgx_safety",
      ruo: "Research Use Only",
    });
  });
});

// ─── Interpretation ──────────────────────────────────────────

describe("interpretScore", () => {
  const screened = { status: "screened" as const, contraindicatedReason: null };

  it("lists every concern in the MEDIUM band", () => {
    const r = interpretScore({ holistic: 0.62, mechanismFit: 0.55, eligibility: 0.7, pgxSafety: 0.7 }, screened, "NCT-I1");
    expect(r.interpretation).toBe("MEDIUM");
    expect(r.recommendation).toBe(
      "MODERATE PROBABILITY for NCT-I1 (score: 0.62). Proceed with caution due to: moderate mechanism fit (0.55), " +
        "eligibility concerns (0.70), dose adjustment may be needed (0.70). Consider additional workup before enrollment.",
    );
  });

  it("falls back to 'borderline scores' when no component is weak", () => {
    const r = interpretScore({ holistic: 0.6, mechanismFit: 0.6, eligibility: 0.8, pgxSafety: 0.8 }, screened, "NCT-I2");
    expect(r.recommendation).toContain("Proceed with caution due to: borderline scores.");
  });

  it("cites component scores in the LOW band", () => {
    const r = interpretScore({ holistic: 0.5, mechanismFit: 0, eligibility: 1, pgxSafety: 1 }, screened, "NCT-I3");
    expect(r.interpretation).toBe("LOW");
    expect(r.recommendation).toBe(
      "LOW PROBABILITY for NCT-I3 (score: 0.50). Significant concerns: mechanism fit=0.00, eligibility=1.00, " +
        "PGx safety=1.00. Consider alternative trials with better alignment.",
    );
  });

  it("is VERY_LOW below 0.4", () => {
    const r = interpretScore({ holistic: 0.39, mechanismFit: 0.1, eligibility: 0.5, pgxSafety: 0.7 }, screened, "NCT-I4");
    expect(r.interpretation).toBe("VERY_LOW");
  });

  it("checks INELIGIBLE before the score bands", () => {
    const r = interpretScore({ holistic: 0.9, mechanismFit: 1, eligibility: 0, pgxSafety: 1 }, screened, "NCT-I5");
    expect(r.interpretation).toBe("INELIGIBLE");
  });
});

// ─── Batch ───────────────────────────────────────────────────

describe("computeBatch", () => {
  const trials: TrialDescriptor[] = [
    makeTrial("NCT-B1", { overallStatus: "COMPLETED" }), // 0.7
    makeTrial("NCT-B2"), // 1.0
    makeTrial("NCT-B3", { moaVector: null }), // 0.75
    makeTrial("NCT-B4"), // 1.0, ties with B2
  ];

  it("sorts descending by holistic score, ties in input order", () => {
    const ranked = service.computeBatch(PATIENT, trials);
    expect(ranked.map((e) => e.nctId)).toEqual(["NCT-B2", "NCT-B4", "NCT-B3", "NCT-B1"]);
    expect(ranked.map((e) => e.holisticScore)).toEqual([1, 1, 0.75, 0.7]);
  });

  it("is deterministic across runs", () => {
    const first = computeBatch(PATIENT, trials, null, { logger: silentLogger });
    const second = computeBatch(PATIENT, trials, null, { logger: silentLogger });
    expect(second).toEqual(first);
  });

  it("turns a per-trial failure into a zero-score entry and logs it", () => {
    const broken: TrialDescriptor = {
      nctId: "NCT-BAD",
      get conditions(): readonly string[] {
        throw new Error("malformed conditions");
      },
    };
    const logger = mockLogger();
    const ranked = new HolisticScoreService({ logger }).computeBatch(PATIENT, [broken, makeTrial("NCT-OK")]);
    expect(ranked.map((e) => e.nctId)).toEqual(["NCT-OK", "NCT-BAD"]);
    expect(ranked[1]).toEqual({ nctId: "NCT-BAD", title: null, holisticScore: 0, error: "malformed conditions" });
    expect(logger.error).toHaveBeenCalledWith("Failed to score trial", {
      nctId: "NCT-BAD",
      error: "malformed conditions",
    });
  });
});
