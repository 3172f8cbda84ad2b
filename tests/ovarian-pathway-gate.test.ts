/**
 * Ovarian DDR/PI3K/VEGF resistance gate: expression-only, safety-checked,
 * and a declared no-op without expression.
 */
import { describe, it, expect } from "vitest";
import type { DrugDescriptor, ExpressionProfile } from "@/types";
import { applyOvarianPathwayGate } from "@/lib/ovarian-pathway-gate";
import {
  classifyResistanceRisk,
  OVARIAN_COMPOSITE_PATHWAYS,
  OVARIAN_GENE_SETS,
  ovarianResistanceComposite,
} from "@/lib/ovarian-pathway-model";
import { computeOvarianPathwayConfidence, shouldUseOvarianPathwayPrediction } from "@/lib/ovarian-pathway-safety";
import { assessExpressionQuality } from "@/lib/expression-profile";

// ─── Helpers ─────────────────────────────────────────────────

const OLAPARIB: DrugDescriptor = { name: "Olaparib", drugClass: "PARP inhibitor" };
const CARBOPLATIN: DrugDescriptor = { name: "Carboplatin", drugClass: "platinum" };

/** Every DDR/PI3K/VEGF gene at the same raw value, so each pathway scores log2(v + 1). */
function uniformExpression(value: number): ExpressionProfile {
  const profile: Record<string, number> = {};
  for (const pathway of OVARIAN_COMPOSITE_PATHWAYS) {
    for (const gene of OVARIAN_GENE_SETS[pathway] ?? []) profile[gene] = value;
  }
  return profile;
}

// ─── Model ───────────────────────────────────────────────────

describe("ovarian resistance composite", () => {
  it("weights DDR 0.4, PI3K 0.3, VEGF 0.3", () => {
    expect(ovarianResistanceComposite({ DDR: 1, PI3K: 0, VEGF: 0 })).toBeCloseTo(0.4, 10);
    expect(ovarianResistanceComposite({ DDR: 0, PI3K: 1, VEGF: 1 })).toBeCloseTo(0.6, 10);
  });

  it("ignores MAPK and EFFLUX and counts unmeasured pathways as 0", () => {
    expect(ovarianResistanceComposite({ DDR: null, PI3K: 1, VEGF: null, MAPK: 5, EFFLUX: 5 })).toBeCloseTo(0.3, 10);
  });

  it("bands risk at 0.25 and 0.20", () => {
    expect(classifyResistanceRisk(0.25)).toBe("HIGH");
    expect(classifyResistanceRisk(0.2)).toBe("MODERATE");
    expect(classifyResistanceRisk(0.19)).toBe("LOW");
  });
});

describe("ovarian safety layer", () => {
  const quality = assessExpressionQuality(uniformExpression(1), OVARIAN_GENE_SETS, OVARIAN_COMPOSITE_PATHWAYS);

  it("rejects cancer types outside the validated ovarian set", () => {
    const d = shouldUseOvarianPathwayPrediction(0.5, "breast", quality, null);
    expect(d.use).toBe(false);
    expect(d.reason).toContain("'breast' not validated");
  });

  it("defers very low composites to HRD when HRD is known", () => {
    expect(shouldUseOvarianPathwayPrediction(0.05, "ovarian", quality, 30).use).toBe(false);
    expect(shouldUseOvarianPathwayPrediction(0.05, "ovarian", quality, null).use).toBe(true);
  });

  it("degrades an unspecified cancer type by 0.6 and always applies the small-cohort factor", () => {
    const validated = computeOvarianPathwayConfidence(1, "HGSOC", quality);
    expect(validated.multiplier).toBeCloseTo(0.85, 10);
    const unspecified = computeOvarianPathwayConfidence(1, null, quality);
    expect(unspecified.multiplier).toBeCloseTo(0.51, 10);
    expect(unspecified.warnings).toContain("Cancer type not specified. Confidence degraded by 40%.");
  });
});

// ─── Gate ────────────────────────────────────────────────────

describe("applyOvarianPathwayGate", () => {
  it("is not applicable to drugs that are neither PARP nor platinum", () => {
    const r = applyOvarianPathwayGate({ name: "Pembrolizumab", drugClass: "checkpoint_inhibitor" }, {});
    expect(r.verdict).toBe("NOT_APPLICABLE");
    expect(r.multiplier).toBe(1.0);
  });

  it("is a declared no-op without expression data", () => {
    const r = applyOvarianPathwayGate(OLAPARIB, { hrdScore: 20 }, "ovarian");
    expect(r.verdict).toBe("NO_CHANGE");
    expect(r.multiplier).toBe(1.0);
    expect(r.reason).toBe(
      "No expression data supplied: ovarian pathway gate not applied; HRD-based PARP gating is the sole determinant",
    );
    expect(r.metadata.expressionSupplied).toBe(false);
  });

  it("treats an empty expression map as not supplied", () => {
    expect(applyOvarianPathwayGate(CARBOPLATIN, { expression: {} }, "ovarian").metadata.expressionSupplied).toBe(false);
  });

  it("reduces to 0.7 on high resistance", () => {
    // composite 1.0, adjusted 0.85
    const r = applyOvarianPathwayGate(CARBOPLATIN, { expression: uniformExpression(1) }, "ovarian");
    expect(r.verdict).toBe("REDUCED");
    expect(r.multiplier).toBe(0.7);
    expect(r.metadata.resistanceRisk).toBe("HIGH");
    expect(r.metadata.compositeRaw).toBeCloseTo(1.0, 10);
    expect(r.metadata.compositeAdjusted).toBeCloseTo(0.85, 10);
  });

  it("reduces to 0.85 on moderate resistance", () => {
    // log2(1.2) ≈ 0.263 → adjusted ≈ 0.224
    const r = applyOvarianPathwayGate(CARBOPLATIN, { expression: uniformExpression(0.2) }, "ovarian");
    expect(r.verdict).toBe("MODERATELY_REDUCED");
    expect(r.multiplier).toBe(0.85);
    expect(r.metadata.compositeAdjusted).toBeCloseTo(Math.log2(1.2) * 0.85, 10);
  });

  it("leaves low resistance unchanged", () => {
    // log2(1.1) ≈ 0.1375 → adjusted ≈ 0.117
    const r = applyOvarianPathwayGate(CARBOPLATIN, { expression: uniformExpression(0.1) }, "ovarian");
    expect(r.verdict).toBe("NO_CHANGE");
    expect(r.multiplier).toBe(1.0);
    expect(r.metadata.resistanceRisk).toBe("LOW");
  });

  it("slightly boosts a very low composite when HRD is not available", () => {
    const r = applyOvarianPathwayGate(OLAPARIB, { expression: uniformExpression(0) }, "ovarian");
    expect(r.verdict).toBe("SLIGHTLY_BOOSTED");
    expect(r.multiplier).toBe(1.05);
  });

  it("falls back without score change when HRD is known and the composite is very low", () => {
    const r = applyOvarianPathwayGate(OLAPARIB, { expression: uniformExpression(0), hrdScore: 30 }, "ovarian");
    expect(r.verdict).toBe("FALLBACK");
    expect(r.multiplier).toBe(1.0);
    expect(r.metadata.fallbackReason).toBe("Very low composite score (0.000 < 0.1). Prefer HRD-based PARP logic.");
  });

  it("falls back for an unvalidated cancer type", () => {
    const r = applyOvarianPathwayGate(CARBOPLATIN, { expression: uniformExpression(1) }, "breast");
    expect(r.verdict).toBe("FALLBACK");
    expect(r.multiplier).toBe(1.0);
    expect(r.metadata.ruoDisclaimer).toContain("NOTE: Cancer type 'breast' has not been validated.");
  });

  it("falls back when pathway coverage is too low", () => {
    const r = applyOvarianPathwayGate(CARBOPLATIN, { expression: { BRCA1: 5, BRCA2: 5 } }, "ovarian");
    expect(r.verdict).toBe("FALLBACK");
    expect(r.metadata.fallbackReason).toContain("Low pathway coverage");
  });

  it("warns on a small profile without rejecting it", () => {
    const r = applyOvarianPathwayGate(CARBOPLATIN, { expression: uniformExpression(1) }, "ovarian");
    const geneCount = Object.keys(uniformExpression(1)).length;
    expect(r.metadata.warnings).toContain(`Low gene count (${geneCount} genes). Pathway scores may be unreliable.`);
  });

  it("freezes outcome and metadata", () => {
    const r = applyOvarianPathwayGate(CARBOPLATIN, { expression: uniformExpression(1) }, "ovarian");
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(r.metadata)).toBe(true);
  });
});
