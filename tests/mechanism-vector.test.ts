import { describe, it, expect } from "vitest";
import {
  mechanismVectorToRecord,
  normalizePathwayName,
  pathwayScoresToMechanismVector,
  toMechanismArray,
  validateMechanismVector,
} from "@/lib/mechanism-vector";

describe("normalizePathwayName", () => {
  it("maps free-text names to canonical keys", () => {
    expect(normalizePathwayName("DNA Repair")).toBe("ddr");
    expect(normalizePathwayName("RAS/MAPK")).toBe("mapk");
    expect(normalizePathwayName("Angiogenesis")).toBe("vegf");
    expect(normalizePathwayName("PI3K/AKT/mTOR")).toBe("pi3k");
    expect(normalizePathwayName("HER2/neu")).toBe("her2");
    expect(normalizePathwayName("Drug Efflux")).toBe("efflux");
    expect(normalizePathwayName("TP53")).toBe("tp53");
  });

  it("matches short aliases only as whole tokens", () => {
    expect(normalizePathwayName("IO signaling")).toBe("io");
    expect(normalizePathwayName("Cell cycle regulation")).toBe("cell_cycle_regulation");
  });

  it("snake-cases unrecognized names", () => {
    expect(normalizePathwayName("Wnt beta-catenin")).toBe("wnt_beta_catenin");
    expect(normalizePathwayName("   ")).toBe("");
  });
});

describe("toMechanismArray", () => {
  it("copies ordered input", () => {
    const input = [0.1, 0.2];
    const out = toMechanismArray(input);
    expect(out).toEqual([0.1, 0.2]);
    expect(out).not.toBe(input);
  });

  it("reads mappings case-insensitively in fixed dimension order", () => {
    expect(toMechanismArray({ Efflux: 0.3, DDR: 0.9, her2: 0.5 })).toEqual([0.9, 0, 0, 0, 0.5, 0, 0.3]);
  });
});

describe("pathwayScoresToMechanismVector", () => {
  it("adds half of TP53 to DDR and clamps", () => {
    expect(pathwayScoresToMechanismVector({ "DNA Repair": 0.4, TP53: 0.6 })).toEqual([0.7, 0, 0, 0, 0, 0, 0]);
    expect(pathwayScoresToMechanismVector({ ddr: 0.9, tp53: 0.8 })[0]).toBe(1);
  });

  it("takes the max of contributions per dimension", () => {
    const v = pathwayScoresToMechanismVector({ "RAS/MAPK": 0.3, MAPK: 0.6, Angiogenesis: 0.2, VEGF: 0.1 });
    expect(v[1]).toBe(0.6);
    expect(v[3]).toBe(0.2);
  });

  it("sets IO to 1.0 for TMB ≥ 20 or MSI-High", () => {
    expect(pathwayScoresToMechanismVector({}, { tmb: 22 })[5]).toBe(1);
    expect(pathwayScoresToMechanismVector({}, { msiStatus: "MSI-High" })[5]).toBe(1);
    expect(pathwayScoresToMechanismVector({ io: 0.4 }, { tmb: 5 })[5]).toBe(0.4);
  });

  it("skips non-finite and unrecognized scores", () => {
    expect(pathwayScoresToMechanismVector({ mapk: Number.NaN, wnt: 0.9 })).toEqual([0, 0, 0, 0, 0, 0, 0]);
  });
});

describe("validateMechanismVector", () => {
  it("accepts a 7-dim vector in range and flags all-zero", () => {
    expect(validateMechanismVector([0.1, 0, 0, 0, 0, 0, 1])).toEqual({ valid: true, error: null, allZero: false });
    expect(validateMechanismVector([0, 0, 0, 0, 0, 0, 0]).allZero).toBe(true);
  });

  it("rejects wrong dimension and out-of-range values", () => {
    expect(validateMechanismVector([0.5, 0.5]).error).toBe("Invalid dimension: 2 (expected 7)");
    expect(validateMechanismVector([0, 0, 1.2, 0, 0, 0, 0]).error).toBe(
      "Value out of range at index 2: 1.2 (expected 0.0-1.0)",
    );
    expect(validateMechanismVector([]).valid).toBe(false);
  });
});

describe("mechanismVectorToRecord", () => {
  it("names each dimension", () => {
    expect(mechanismVectorToRecord([1, 2, 3, 4, 5, 6, 7])).toEqual({
      DDR: 1,
      MAPK: 2,
      PI3K: 3,
      VEGF: 4,
      HER2: 5,
      IO: 6,
      Efflux: 7,
    });
  });
});
