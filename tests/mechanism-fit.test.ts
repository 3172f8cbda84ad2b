import { describe, it, expect, vi } from "vitest";
import type { TrialDescriptor } from "@/types";
import { computeMechanismFit } from "@/lib/mechanism-fit";
import { magnitudeWeightedFit, rankTrialsByMechanismFit } from "@/lib/mechanism-fit-ranker";
import { silentLogger } from "@/lib/engine-logger";

// ─── Cosine fit ──────────────────────────────────────────────

describe("computeMechanismFit", () => {
  it("scores identical directions 1.0 regardless of magnitude", () => {
    const r = computeMechanismFit([0.8, 0, 0, 0, 0, 0, 0], [0.2, 0, 0, 0, 0, 0, 0]);
    expect(r?.score).toBe(1);
    expect(r?.alignment.DDR).toBe(1);
    expect(r?.alignment.MAPK).toBe(0);
  });

  it("scores orthogonal vectors 0.0", () => {
    expect(computeMechanismFit([1, 0, 0, 0, 0, 0, 0], [0, 1, 0, 0, 0, 0, 0])?.score).toBe(0);
  });

  it("rounds to three decimals", () => {
    // cos 45° = 0.70710678…
    expect(computeMechanismFit([1, 1, 0, 0, 0, 0, 0], [1, 0, 0, 0, 0, 0, 0])?.score).toBe(0.707);
  });

  it("accepts mappings with case-insensitive keys and 0.0 defaults", () => {
    const r = computeMechanismFit({ ddr: 0.9, io: 0.1 }, [0.9, 0, 0, 0, 0, 0.1, 0]);
    expect(r?.score).toBe(1);
  });

  it("is undetermined when a vector is absent", () => {
    expect(computeMechanismFit(null, [1, 0, 0, 0, 0, 0, 0])).toBeNull();
    expect(computeMechanismFit([1, 0, 0, 0, 0, 0, 0], undefined)).toBeNull();
  });

  it("is undetermined on a length mismatch, not zero", () => {
    expect(computeMechanismFit([1, 0, 0], [1, 0, 0, 0, 0, 0, 0])).toBeNull();
  });

  it("is undetermined for non-finite entries", () => {
    expect(computeMechanismFit([Number.NaN, 0, 0, 0, 0, 0, 0], [1, 0, 0, 0, 0, 0, 0])).toBeNull();
  });

  it("scores a zero patient vector 0.0", () => {
    expect(computeMechanismFit([0, 0, 0, 0, 0, 0, 0], [1, 0, 0, 0, 0, 0, 0])?.score).toBe(0);
  });
});

// ─── Ranker ──────────────────────────────────────────────────

function trial(nctId: string, eligibilityScore: number, moaVector: number[] | null, title?: string): TrialDescriptor {
  return { nctId, eligibilityScore, moaVector, title };
}

describe("magnitudeWeightedFit", () => {
  it("divides by the trial magnitude only", () => {
    // low-burden patient against a full-intensity DDR trial
    expect(magnitudeWeightedFit([0.1, 0, 0, 0, 0, 0, 0], [1, 0, 0, 0, 0, 0, 0])).toBeCloseTo(0.1, 12);
  });

  it("is 0 for a zero trial vector or a length mismatch", () => {
    expect(magnitudeWeightedFit([1, 0], [0, 0])).toBe(0);
    expect(magnitudeWeightedFit([1, 0], [1, 0, 0])).toBe(0);
  });
});

describe("rankTrialsByMechanismFit", () => {
  const patient = [0.9, 0, 0, 0, 0, 0, 0];

  it("combines 0.7 × eligibility + 0.3 × fit and ranks descending", () => {
    const ranked = rankTrialsByMechanismFit(
      [trial("NCT-A", 0.7, [1, 0, 0, 0, 0, 0, 0], "A"), trial("NCT-B", 0.9, [1, 0, 0, 0, 0, 0, 0], "B")],
      patient,
      { logger: silentLogger },
    );
    expect(ranked.map((t) => t.nctId)).toEqual(["NCT-B", "NCT-A"]);
    expect(ranked.map((t) => t.rank)).toEqual([1, 2]);
    expect(ranked[0]?.combinedScore).toBeCloseTo(0.7 * 0.9 + 0.3 * 0.9, 12);
    expect(ranked[0]?.provenance.formula).toBe("(0.7 × eligibility) + (0.3 × weighted_mechanism_fit)");
  });

  it("drops trials below the eligibility or fit thresholds", () => {
    const ranked = rankTrialsByMechanismFit(
      [
        trial("NCT-LOW-ELIG", 0.5, [1, 0, 0, 0, 0, 0, 0]),
        trial("NCT-LOW-FIT", 0.9, [0, 1, 0, 0, 0, 0, 0]),
        trial("NCT-OK", 0.9, [1, 0, 0, 0, 0, 0, 0]),
      ],
      patient,
      { logger: silentLogger },
    );
    expect(ranked.map((t) => t.nctId)).toEqual(["NCT-OK"]);
    expect(ranked[0]?.title).toBe("Unknown Trial");
  });

  it("honors threshold overrides", () => {
    const ranked = rankTrialsByMechanismFit([trial("NCT-X", 0.5, [0, 1, 0, 0, 0, 0, 0])], patient, {
      minEligibility: 0,
      minMechanismFit: 0,
      logger: silentLogger,
    });
    expect(ranked).toHaveLength(1);
    expect(ranked[0]?.combinedScore).toBeCloseTo(0.35, 12);
  });

  it("keeps input order on ties", () => {
    const v = [1, 0, 0, 0, 0, 0, 0];
    const ranked = rankTrialsByMechanismFit(
      [trial("NCT-1", 0.8, v), trial("NCT-2", 0.8, v), trial("NCT-3", 0.8, v)],
      patient,
      { logger: silentLogger },
    );
    expect(ranked.map((t) => t.nctId)).toEqual(["NCT-1", "NCT-2", "NCT-3"]);
  });

  it("falls back to a zero vector for a missing trial vector and logs it", () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const ranked = rankTrialsByMechanismFit([trial("NCT-NOVEC", 0.9, null)], patient, {
      minMechanismFit: 0,
      logger,
    });
    expect(ranked[0]?.mechanismFitScore).toBe(0);
    expect(ranked[0]?.provenance.trialVectorFallback).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Trial missing or invalid mechanism vector; using zero vector", {
      nctId: "NCT-NOVEC",
      expectedDimension: 7,
    });
  });
});
