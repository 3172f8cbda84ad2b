/**
 * Risk–benefit composition: one efficacy score plus an optional PGx toxicity
 * screen → composite score and action label. A HIGH tier (or a factor at
 * the contraindication threshold) is a hard veto: efficacy no longer matters.
 */

import { CONTRAINDICATION_THRESHOLD, MODERATE_TOXICITY_THRESHOLD, RUO_LABEL } from "@/lib/engine-constants";
import type { ToxicityTier } from "@/lib/pgx-lookup";
import { clamp01, round3, sortByDescending } from "@/lib/score-math";

export type RiskBenefitAction =
  | "PREFERRED (PGx UNSCREENED)"
  | "AVOID / HIGH-RISK"
  | "CONSIDER WITH MONITORING"
  | "PREFERRED";

export interface RiskBenefitResult {
  compositeScore: number;
  actionLabel: RiskBenefitAction;
  efficacyScore: number;
  toxicityTier: ToxicityTier | null;
  adjustmentFactor: number | null;
  rationale: string;
  provenance: { method: string; ruo: string };
}

export interface PgxScreen {
  toxicityTier?: ToxicityTier | null;
  adjustmentFactor?: number | null;
}

const METHOD = "risk_benefit_v1";

export function composeRiskBenefit(
  efficacy: number,
  toxicityTier?: ToxicityTier | null,
  adjustmentFactor?: number | null,
): RiskBenefitResult {
  const efficacyScore = clamp01(efficacy);
  const tier = toxicityTier ?? null;
  const factor = adjustmentFactor == null ? null : clamp01(adjustmentFactor);
  const base = { efficacyScore, toxicityTier: tier, adjustmentFactor: factor, provenance: { method: METHOD, ruo: RUO_LABEL } };

  if (tier === null && factor === null) {
    return {
      ...base,
      compositeScore: efficacyScore,
      actionLabel: "PREFERRED (PGx UNSCREENED)",
      rationale: `No PGx screening data; composite equals efficacy (${efficacyScore.toFixed(2)})`,
    };
  }

  if (tier === "HIGH" || (factor !== null && factor <= CONTRAINDICATION_THRESHOLD)) {
    return {
      ...base,
      compositeScore: 0.0,
      actionLabel: "AVOID / HIGH-RISK",
      rationale: `High PGx toxicity risk${factor !== null ? ` (adjustment factor ${factor})` : ""}: vetoed regardless of efficacy`,
    };
  }

  if (tier === "MODERATE" || (factor !== null && factor < MODERATE_TOXICITY_THRESHOLD)) {
    // A MODERATE tier without a factor has nothing to penalize by.
    const applied = factor ?? 1.0;
    return {
      ...base,
      compositeScore: round3(efficacyScore * applied),
      actionLabel: "CONSIDER WITH MONITORING",
      rationale: `Moderate PGx toxicity risk: efficacy ${efficacyScore.toFixed(2)} × adjustment ${applied} = ${round3(efficacyScore * applied)}`,
    };
  }

  return {
    ...base,
    compositeScore: efficacyScore,
    actionLabel: "PREFERRED",
    rationale: `Screened with no significant PGx risk; composite equals efficacy (${efficacyScore.toFixed(2)})`,
  };
}

export interface DrugCandidate {
  name: string;
  efficacy: number;
}

export interface RankedDrug extends RiskBenefitResult {
  name: string;
}

/**
 * Compose every drug against its screen (keyed by drug name, matched
 * case-insensitively) and rank by composite, ties in input order.
 */
export function composeDrugRanking(
  drugs: readonly DrugCandidate[],
  screening: Readonly<Record<string, PgxScreen>> = {},
): RankedDrug[] {
  const byName = new Map<string, PgxScreen>();
  for (const [name, screen] of Object.entries(screening)) byName.set(name.trim().toLowerCase(), screen);

  const composed = drugs.map((drug): RankedDrug => {
    const screen = byName.get(drug.name.trim().toLowerCase());
    return { name: drug.name, ...composeRiskBenefit(drug.efficacy, screen?.toxicityTier, screen?.adjustmentFactor) };
  });
  return sortByDescending(composed, (d) => d.compositeScore);
}
