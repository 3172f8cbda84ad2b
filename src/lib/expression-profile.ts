/**
 * Gene-set scoring over an expression profile.
 *
 * A pathway score is the mean of log2(value + 1) over the genes of the set
 * that the profile actually contains. A set with no gene present scores
 * null, never 0: "not measured" and "not expressed" stay distinct.
 */

import type { ExpressionProfile } from "@/types";
import { MIN_PATHWAY_COVERAGE, MIN_TOTAL_GENES } from "@/lib/engine-constants";
import { formatPct, mean } from "@/lib/score-math";

export type GeneSets = Readonly<Record<string, readonly string[]>>;

/** pathway → score; null when no gene of the set is present. */
export type PathwayScoreVector = Readonly<Record<string, number | null>>;

/** pathway → fraction of the set's genes present in the profile. */
export type PathwayCoverage = Readonly<Record<string, number>>;

/** Gene sets plus the composite that a gate bands on. */
export interface PathwayModel {
  readonly geneSets: GeneSets;
  scorePathways(profile: ExpressionProfile): PathwayScoreVector;
  composite(scores: PathwayScoreVector): number;
}

export function log2p1(value: number): number {
  return Math.log2(Math.max(0, value) + 1);
}

/** Finite values only, keyed by upper-cased symbol. */
function indexProfile(profile: ExpressionProfile): Map<string, number> {
  const index = new Map<string, number>();
  for (const [gene, value] of Object.entries(profile)) {
    if (typeof value === "number" && Number.isFinite(value)) {
      index.set(gene.toUpperCase(), value);
    }
  }
  return index;
}

export function scorePathways(profile: ExpressionProfile, geneSets: GeneSets): PathwayScoreVector {
  const index = indexProfile(profile);
  const scores: Record<string, number | null> = {};
  for (const [pathway, genes] of Object.entries(geneSets)) {
    const values: number[] = [];
    for (const gene of genes) {
      const v = index.get(gene);
      if (v !== undefined) values.push(log2p1(v));
    }
    scores[pathway] = values.length > 0 ? mean(values) : null;
  }
  return scores;
}

export function pathwayCoverage(profile: ExpressionProfile, geneSets: GeneSets): PathwayCoverage {
  const index = indexProfile(profile);
  const coverage: Record<string, number> = {};
  for (const [pathway, genes] of Object.entries(geneSets)) {
    if (genes.length === 0) {
      coverage[pathway] = 0;
      continue;
    }
    const found = genes.filter((g) => index.has(g)).length;
    coverage[pathway] = found / genes.length;
  }
  return coverage;
}

export function countGenes(profile: ExpressionProfile): number {
  return indexProfile(profile).size;
}

// ─── Quality ─────────────────────────────────────────────────

export interface ExpressionQualityReport {
  totalGenes: number;
  pathwayCoverage: PathwayCoverage;
  avgPathwayCoverage: number;
  /** Average coverage meets MIN_PATHWAY_COVERAGE. Low gene count only warns. */
  isAcceptable: boolean;
  warnings: string[];
}

/**
 * Coverage-based quality check over the given pathways (all sets when
 * omitted). Sparse profiles are flagged but not rejected on gene count.
 */
export function assessExpressionQuality(
  profile: ExpressionProfile,
  geneSets: GeneSets,
  pathways: readonly string[] = Object.keys(geneSets),
): ExpressionQualityReport {
  const allCoverage = pathwayCoverage(profile, geneSets);
  const coverage: Record<string, number> = {};
  const warnings: string[] = [];

  for (const pathway of pathways) {
    const c = allCoverage[pathway] ?? 0;
    coverage[pathway] = c;
    if (c < MIN_PATHWAY_COVERAGE) {
      const size = geneSets[pathway]?.length ?? 0;
      warnings.push(
        `${pathway}: ${Math.round(c * size)}/${size} genes found (${formatPct(c)} coverage, minimum ${formatPct(MIN_PATHWAY_COVERAGE)})`,
      );
    }
  }

  const avg = mean(Object.values(coverage));
  const totalGenes = countGenes(profile);
  const isAcceptable = avg >= MIN_PATHWAY_COVERAGE;
  if (!isAcceptable) {
    warnings.push(`Average pathway coverage (${formatPct(avg)}) below minimum (${formatPct(MIN_PATHWAY_COVERAGE)})`);
  }
  if (totalGenes < MIN_TOTAL_GENES) {
    warnings.push(`Low gene count (${totalGenes} genes). Pathway scores may be unreliable.`);
  }

  return { totalGenes, pathwayCoverage: coverage, avgPathwayCoverage: avg, isAcceptable, warnings };
}

export function hasExpression(profile: ExpressionProfile | null | undefined): profile is ExpressionProfile {
  return profile != null && Object.keys(profile).length > 0;
}

/** Deep-freeze a JSON gene-set table; upper-cases symbols once at load. */
export function freezeGeneSets(raw: Record<string, readonly string[]>): GeneSets {
  const out: Record<string, readonly string[]> = {};
  for (const [pathway, genes] of Object.entries(raw)) {
    out[pathway] = Object.freeze(genes.map((g) => g.toUpperCase()));
  }
  return Object.freeze(out);
}
