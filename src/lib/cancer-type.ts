/** Cancer-type validation lookups for the two expression models. */

import {
  IO_UNVALIDATED_CANCER_TYPES,
  IO_VALIDATED_CANCER_TYPES,
  OVARIAN_VALIDATED_CANCER_TYPES,
} from "@/lib/engine-constants";

export type CancerTypeValidation = "validated" | "known_unvalidated" | "unknown" | "unspecified";

/** "High Grade Serous Ovarian" → "high_grade_serous_ovarian"; blank → null. */
export function normalizeCancerType(cancerType: string | null | undefined): string | null {
  if (cancerType == null) return null;
  const key = cancerType.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return key.length > 0 ? key : null;
}

export function classifyIoCancerType(cancerType: string | null | undefined): CancerTypeValidation {
  const key = normalizeCancerType(cancerType);
  if (key == null) return "unspecified";
  if (IO_VALIDATED_CANCER_TYPES.has(key)) return "validated";
  if (IO_UNVALIDATED_CANCER_TYPES.some((t) => key.includes(t))) return "known_unvalidated";
  return "unknown";
}

/** Ovarian model has no partial credit: validated, unspecified, or rejected. */
export function classifyOvarianCancerType(cancerType: string | null | undefined): CancerTypeValidation {
  const key = normalizeCancerType(cancerType);
  if (key == null) return "unspecified";
  return OVARIAN_VALIDATED_CANCER_TYPES.has(key) ? "validated" : "unknown";
}
