/**
 * Pharmacogenomic toxicity lookup.
 *
 * The scorers only see the PgxLookup interface; the static table below is
 * the default collaborator, built from src/data/pgx-rules.json (validated
 * with zod at load, then frozen).
 */

import { z } from "zod";
import pgxRulesJson from "@/data/pgx-rules.json";
import { CONTRAINDICATION_THRESHOLD, MODERATE_TOXICITY_THRESHOLD } from "@/lib/engine-constants";

// ─── Contract ────────────────────────────────────────────────

export type ToxicityTier = "LOW" | "MODERATE" | "HIGH";

export interface PgxLookupResult {
  toxicityTier: ToxicityTier;
  /** Dose fraction, 0–1; ≤ 0.1 means contraindicated. */
  adjustmentFactor: number;
  phenotype?: string;
}

export interface PgxLookup {
  /** Null when the gene has no guidance for this drug. */
  lookup(drug: string, gene: string, variant: string): PgxLookupResult | null;
}

// ─── Rule table ──────────────────────────────────────────────

const PhenotypeRuleSchema = z.object({
  phenotype: z.string(),
  adjustmentFactor: z.number().min(0).max(1),
});

const AlleleRuleSchema = PhenotypeRuleSchema.extend({ alleles: z.array(z.string()) });

const GeneRuleSchema = z.object({
  drugs: z.array(z.string()).min(1),
  diplotypes: z.record(PhenotypeRuleSchema),
  /** Applies when both alleles of an unlisted diplotype are in the list. */
  noFunctionAlleles: AlleleRuleSchema.optional(),
  /** Applies when any listed allele is named in the variant text. */
  decreasedFunctionAlleles: AlleleRuleSchema.optional(),
});

const PgxRuleTableSchema = z.record(GeneRuleSchema);

export type PgxGeneRule = z.infer<typeof GeneRuleSchema>;
export type PgxRuleTable = Readonly<Record<string, PgxGeneRule>>;

export function toxicityTierForFactor(factor: number): ToxicityTier {
  if (factor <= CONTRAINDICATION_THRESHOLD) return "HIGH";
  if (factor < MODERATE_TOXICITY_THRESHOLD) return "MODERATE";
  return "LOW";
}

/** Parse and freeze a rule table. Gene keys are upper-cased, drug names lower-cased. */
export function loadPgxRules(raw: unknown): PgxRuleTable {
  const parsed = PgxRuleTableSchema.parse(raw);
  const table: Record<string, PgxGeneRule> = {};
  for (const [gene, rule] of Object.entries(parsed)) {
    table[gene.toUpperCase()] = Object.freeze({ ...rule, drugs: rule.drugs.map((d) => d.toLowerCase()) });
  }
  return Object.freeze(table);
}

export const DEFAULT_PGX_RULES: PgxRuleTable = loadPgxRules(pgxRulesJson);

function fromPhenotype(rule: z.infer<typeof PhenotypeRuleSchema>): PgxLookupResult {
  return { toxicityTier: toxicityTierForFactor(rule.adjustmentFactor), adjustmentFactor: rule.adjustmentFactor, phenotype: rule.phenotype };
}

function normalizeDiplotype(variant: string): string {
  return variant.replace(/\s+/g, "");
}

/**
 * Exact diplotype match first ("*1/*2A"), then either allele order, then
 * two no-function alleles, then any known decreased-function allele named
 * in the variant text. A relevant gene with no matching rule reads as
 * normal function.
 */
export function createStaticPgxLookup(rules: PgxRuleTable = DEFAULT_PGX_RULES): PgxLookup {
  return {
    lookup(drug, gene, variant) {
      const rule = rules[gene.trim().toUpperCase()];
      if (!rule) return null;
      const drugKey = drug.trim().toLowerCase();
      if (!rule.drugs.some((d) => drugKey.includes(d))) return null;

      const dip = normalizeDiplotype(variant);
      const [a, b] = dip.split("/");
      const reversed = a && b ? `${b}/${a}` : dip;
      const hit = rule.diplotypes[dip] ?? rule.diplotypes[reversed];
      if (hit) return fromPhenotype(hit);

      // Compound heterozygote of two no-function alleles, e.g. DPYD *2A/*13.
      const none = rule.noFunctionAlleles;
      if (none && a && b && none.alleles.includes(a) && none.alleles.includes(b)) return fromPhenotype(none);

      const reduced = rule.decreasedFunctionAlleles;
      if (reduced && reduced.alleles.some((allele) => variant.includes(allele))) return fromPhenotype(reduced);

      return { toxicityTier: "LOW", adjustmentFactor: 1.0 };
    },
  };
}
