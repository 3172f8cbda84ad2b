/**
 * PGx safety score for one patient/drug pair: the minimum adjustment factor
 * across every screened pharmacogene variant. A factor ≤ 0.1 marks the drug
 * contraindicated and pins the score to 0.0.
 *
 * Lookup failures propagate; the holistic composer is the boundary that
 * degrades them.
 */

import type { PharmacogeneVariant, TrialDescriptor } from "@/types";
import { CONTRAINDICATION_THRESHOLD } from "@/lib/engine-constants";
import type { PgxLookup, ToxicityTier } from "@/lib/pgx-lookup";
import { formatPct } from "@/lib/score-math";

export type PgxScreeningStatus = "not_screened" | "screened" | "contraindicated" | "error";

export interface PgxVariantFinding {
  gene: string;
  variant: string;
  toxicityTier: ToxicityTier;
  adjustmentFactor: number;
}

export interface PgxSafetyResult {
  score: number;
  status: PgxScreeningStatus;
  drug: string | null;
  findings: PgxVariantFinding[];
  contraindicatedReason: string | null;
  doseAdjustments: string[];
  reason?: string;
}

/** First drug name of the first intervention that lists one. */
export function primaryTrialDrug(trial: TrialDescriptor): string | null {
  for (const intervention of trial.interventions ?? []) {
    const name = intervention.drugNames?.find((d) => d.trim().length > 0);
    if (name) return name.trim();
  }
  return null;
}

function notScreened(drug: string | null, reason: string): PgxSafetyResult {
  return { score: 1.0, status: "not_screened", drug, findings: [], contraindicatedReason: null, doseAdjustments: [], reason };
}

export function scorePgxSafety(
  variants: readonly PharmacogeneVariant[] | null | undefined,
  drug: string | null | undefined,
  lookup: PgxLookup,
): PgxSafetyResult {
  const screened = (variants ?? []).filter((v) => v.gene.trim().length > 0);
  const drugName = drug?.trim() || null;
  if (screened.length === 0) return notScreened(drugName, "No germline variants provided");
  if (!drugName) return notScreened(null, "No drug specified for PGx screening");

  const findings: PgxVariantFinding[] = [];
  const doseAdjustments: string[] = [];
  let score = 1.0;
  let contraindicatedReason: string | null = null;

  const seen = new Set<string>();
  for (const { gene, variant = "" } of screened) {
    const key = `${gene.trim().toUpperCase()} ${variant.trim()}`;
    if (seen.has(key)) continue;
    seen.add(key);

    const hit = lookup.lookup(drugName, gene, variant);
    if (!hit) continue;
    findings.push({ gene, variant, toxicityTier: hit.toxicityTier, adjustmentFactor: hit.adjustmentFactor });

    if (hit.adjustmentFactor <= CONTRAINDICATION_THRESHOLD) {
      if (contraindicatedReason === null) contraindicatedReason = `${gene} ${variant}: Contraindicated for ${drugName}`;
      score = 0;
    } else {
      score = Math.min(score, hit.adjustmentFactor);
      if (hit.adjustmentFactor < 1) {
        doseAdjustments.push(`${gene} ${variant}: ${formatPct(1 - hit.adjustmentFactor)} dose reduction for ${drugName}`);
      }
    }
  }

  return {
    score,
    status: contraindicatedReason ? "contraindicated" : "screened",
    drug: drugName,
    findings,
    contraindicatedReason,
    doseAdjustments,
  };
}
