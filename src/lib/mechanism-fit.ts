/**
 * Mechanism fit: cosine similarity between patient and trial mechanism
 * vectors. Absent vectors, a length mismatch or non-finite entries are
 * "undetermined" (null), never 0; the caller decides the default.
 */

import type { MechanismVectorInput } from "@/types";
import { MECHANISM_DIMENSIONS } from "@/lib/engine-constants";
import { toMechanismArray } from "@/lib/mechanism-vector";
import { clamp01, dot, l2Normalize, round3 } from "@/lib/score-math";

export interface MechanismFitResult {
  score: number;
  /** Elementwise product of the normalized vectors, per named dimension. */
  alignment: Record<string, number>;
}

export function computeMechanismFit(
  patientVector: MechanismVectorInput | null | undefined,
  trialVector: MechanismVectorInput | null | undefined,
): MechanismFitResult | null {
  if (patientVector == null || trialVector == null) return null;

  const patient = toMechanismArray(patientVector);
  const trial = toMechanismArray(trialVector);
  if (patient.length === 0 || patient.length !== trial.length) return null;
  if (!patient.every(Number.isFinite) || !trial.every(Number.isFinite)) return null;

  const p = l2Normalize(patient);
  const t = l2Normalize(trial);
  const score = round3(clamp01(dot(p, t)));

  const alignment: Record<string, number> = {};
  for (let i = 0; i < p.length; i++) {
    const name = MECHANISM_DIMENSIONS[i] ?? `dim${i}`;
    alignment[name] = round3(p[i] * t[i]);
  }
  return { score, alignment };
}
