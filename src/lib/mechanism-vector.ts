/**
 * 7-dimensional mechanism vectors [DDR, MAPK, PI3K, VEGF, HER2, IO, Efflux].
 *
 * Vectors arrive either ordered or as a mapping; mappings are read
 * case-insensitively with 0.0 for absent dimensions. Pathway disruption
 * scores from upstream analysis convert into the same space.
 */

import type { BiomarkerRecord, MechanismVectorInput } from "@/types";
import { MECHANISM_DIMENSIONS, TMB_HIGH_THRESHOLD } from "@/lib/engine-constants";
import { clamp01, measuredValue } from "@/lib/score-math";

export type MechanismDimension = (typeof MECHANISM_DIMENSIONS)[number];

export type MechanismVector = readonly number[];

// ─── Pathway names ───────────────────────────────────────────

type CanonicalPathway = "ddr" | "mapk" | "pi3k" | "vegf" | "her2" | "io" | "efflux" | "tp53";

/** Ordered: the first alias found in a free-text name wins. */
const PATHWAY_ALIASES: readonly (readonly [string, CanonicalPathway])[] = [
  ["dna repair", "ddr"],
  ["dna_repair", "ddr"],
  ["ddr", "ddr"],
  ["ras/mapk", "mapk"],
  ["ras_mapk", "mapk"],
  ["mapk", "mapk"],
  ["pi3k", "pi3k"],
  ["pi3k/akt", "pi3k"],
  ["vegf", "vegf"],
  ["angiogenesis", "vegf"],
  ["her2", "her2"],
  ["her2/neu", "her2"],
  ["io", "io"],
  ["immunotherapy", "io"],
  ["efflux", "efflux"],
  ["drug efflux", "efflux"],
  ["tp53", "tp53"],
];

const DIMENSION_INDEX: Readonly<Record<Exclude<CanonicalPathway, "tp53">, number>> = {
  ddr: 0,
  mapk: 1,
  pi3k: 2,
  vegf: 3,
  her2: 4,
  io: 5,
  efflux: 6,
};

const TP53_DDR_CONTRIBUTION = 0.5;

/**
 * "DNA Repair" → "ddr", "RAS/MAPK" → "mapk", "Angiogenesis" → "vegf".
 * Unrecognized names come back lower-snake-cased.
 */
export function normalizePathwayName(pathway: string): string {
  const lower = pathway.trim().toLowerCase();
  if (lower.length === 0) return "";
  for (const [alias, canonical] of PATHWAY_ALIASES) {
    if (alias === lower) return canonical;
  }
  // Short aliases ("io", "ddr") must be whole tokens: "regulation" is not IO.
  const tokens = lower.split(/[^a-z0-9]+/);
  for (const [alias, canonical] of PATHWAY_ALIASES) {
    const contained = alias.length <= 3 ? tokens.includes(alias) : lower.includes(alias);
    if (contained || (lower.length >= 3 && alias.includes(lower))) return canonical;
  }
  return lower.replace(/[\s/-]+/g, "_");
}

function isDimensionKey(key: string): key is keyof typeof DIMENSION_INDEX {
  return Object.prototype.hasOwnProperty.call(DIMENSION_INDEX, key);
}

// ─── Conversion ──────────────────────────────────────────────

function isOrdered(input: MechanismVectorInput): input is readonly number[] {
  return Array.isArray(input);
}

/** Ordered array form of either input shape. Arrays are copied as-is (no length check). */
export function toMechanismArray(input: MechanismVectorInput): number[] {
  if (isOrdered(input)) return [...input];
  const byKey = new Map<string, number>();
  for (const [key, value] of Object.entries(input)) byKey.set(key.toLowerCase(), value);
  return MECHANISM_DIMENSIONS.map((dim) => byKey.get(dim.toLowerCase()) ?? 0);
}

export function mechanismVectorToRecord(vector: MechanismVector): Record<MechanismDimension, number> {
  return {
    DDR: vector[0] ?? 0,
    MAPK: vector[1] ?? 0,
    PI3K: vector[2] ?? 0,
    VEGF: vector[3] ?? 0,
    HER2: vector[4] ?? 0,
    IO: vector[5] ?? 0,
    Efflux: vector[6] ?? 0,
  };
}

/**
 * Pathway disruption scores → mechanism vector. DDR takes its own score plus
 * half of TP53; other dimensions take the max of their contributors. When a
 * biomarker record is given, TMB ≥ 20 or MSI-High sets IO to 1.0.
 */
export function pathwayScoresToMechanismVector(
  pathwayScores: Readonly<Record<string, number>>,
  record?: BiomarkerRecord | null,
): number[] {
  const vector = new Array<number>(MECHANISM_DIMENSIONS.length).fill(0);
  let ddr = 0;
  let tp53 = 0;

  for (const [name, raw] of Object.entries(pathwayScores)) {
    if (!Number.isFinite(raw)) continue;
    const key = normalizePathwayName(name);
    if (key === "tp53") tp53 = Math.max(tp53, raw);
    else if (key === "ddr") ddr = Math.max(ddr, raw);
    else if (isDimensionKey(key)) vector[DIMENSION_INDEX[key]] = Math.max(vector[DIMENSION_INDEX[key]], raw);
  }
  vector[DIMENSION_INDEX.ddr] = ddr + tp53 * TP53_DDR_CONTRIBUTION;

  if (record) {
    const tmb = measuredValue(record.tmb);
    const tmbHigh = tmb !== null && tmb >= TMB_HIGH_THRESHOLD;
    if (tmbHigh || record.msiStatus === "MSI-High") vector[DIMENSION_INDEX.io] = 1.0;
  }

  return vector.map(clamp01);
}

// ─── Validation ──────────────────────────────────────────────

export interface MechanismVectorValidation {
  valid: boolean;
  error: string | null;
  allZero: boolean;
}

export function validateMechanismVector(vector: readonly number[]): MechanismVectorValidation {
  if (vector.length === 0) return { valid: false, error: "Mechanism vector is empty", allZero: false };
  if (vector.length !== MECHANISM_DIMENSIONS.length) {
    return {
      valid: false,
      error: `Invalid dimension: ${vector.length} (expected ${MECHANISM_DIMENSIONS.length})`,
      allZero: false,
    };
  }
  for (let i = 0; i < vector.length; i++) {
    const v = vector[i];
    if (!Number.isFinite(v) || v < 0 || v > 1) {
      return { valid: false, error: `Value out of range at index ${i}: ${v} (expected 0.0-1.0)`, allZero: false };
    }
  }
  return { valid: true, error: null, allZero: vector.every((v) => v === 0) };
}
