/**
 * Boundary validation for biomarker records arriving from outside the
 * engine (request bodies, fixture files). The gates themselves assume a
 * well-formed BiomarkerRecord and never throw; this is where malformed
 * input is rejected.
 */

import { z } from "zod";
import type { BiomarkerRecord, MsiStatus } from "@/types";
import { clamp01 } from "@/lib/score-math";

const MSI_ALIASES: Readonly<Record<string, MsiStatus>> = {
  "MSI-HIGH": "MSI-High",
  "MSI-H": "MSI-High",
  MSI_HIGH: "MSI-High",
  MSIH: "MSI-High",
  "MSI-STABLE": "MSI-Stable",
  MSI_STABLE: "MSI-Stable",
  MSS: "MSI-Stable",
  "MSI-S": "MSI-Stable",
  // MSI-low is treated clinically as stable
  "MSI-LOW": "MSI-Stable",
  "MSI-L": "MSI-Stable",
  UNKNOWN: "unknown",
};

/** "MSI-H" → "MSI-High", "MSS" → "MSI-Stable"; null when unrecognized. */
export function normalizeMsiStatus(value: string): MsiStatus | null {
  return MSI_ALIASES[value.trim().toUpperCase()] ?? null;
}

const MsiStatusSchema = z.string().transform((value, ctx): MsiStatus => {
  const status = normalizeMsiStatus(value);
  if (status === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unrecognized MSI status: ${value}` });
    return z.NEVER;
  }
  return status;
});

const geneSymbol = z.string().trim().min(1, "gene symbol is required");

export const BiomarkerRecordSchema = z.object({
  hrdScore: z.number().min(0).max(100).nullish(),
  tmb: z.number().nonnegative().nullish(),
  msiStatus: MsiStatusSchema.nullish(),
  somaticMutations: z
    .array(
      z.object({
        gene: geneSymbol,
        proteinChange: z.string().optional(),
        zygosity: z.enum(["heterozygous", "homozygous", "hemizygous"]).optional(),
      }),
    )
    .optional(),
  germlineMutations: z.array(z.object({ gene: geneSymbol, variant: z.string().optional() })).optional(),
  expression: z.record(z.number().finite()).nullish(),
  completenessScore: z.number().finite().transform(clamp01).nullish(),
});

export type BiomarkerRecordInput = z.input<typeof BiomarkerRecordSchema>;

/** Throws ZodError on malformed input. */
export function parseBiomarkerRecord(raw: unknown): BiomarkerRecord {
  return BiomarkerRecordSchema.parse(raw);
}

export function safeParseBiomarkerRecord(
  raw: unknown,
): { success: true; data: BiomarkerRecord } | { success: false; error: z.ZodError } {
  const result = BiomarkerRecordSchema.safeParse(raw);
  return result.success ? { success: true, data: result.data } : { success: false, error: result.error };
}
