/**
 * Biomarker record consumed by the gate pipeline.
 * Every field is optional: a missing value is its own branch in each gate,
 * never an implicit zero.
 */

export type GermlineStatus = "positive" | "negative" | "unknown";

export type MsiStatus = "MSI-High" | "MSI-Stable" | "unknown";

export type DataCompletenessTier = "L0" | "L1" | "L2";

export type Zygosity = "heterozygous" | "homozygous" | "hemizygous";

export interface SomaticMutation {
  gene: string;
  proteinChange?: string;     // HGVS p. notation → "p.R175H"
  zygosity?: Zygosity;
}

export interface GermlineMutation {
  gene: string;
  variant?: string;
}

/** gene symbol → expression value (TPM or normalized counts, not log-transformed) */
export type ExpressionProfile = Readonly<Record<string, number>>;

export interface BiomarkerRecord {
  hrdScore?: number | null;                 // GIS, 0–100
  tmb?: number | null;                      // mutations / Mb
  msiStatus?: MsiStatus | null;
  somaticMutations?: readonly SomaticMutation[];
  germlineMutations?: readonly GermlineMutation[];
  expression?: ExpressionProfile | null;
  completenessScore?: number | null;        // fraction of tracked fields populated, 0–1
}

export interface DrugDescriptor {
  name: string;
  drugClass?: string;          // "PARP inhibitor", "checkpoint_inhibitor", "platinum"
  mechanism?: string;          // MoA free text → "PD-1 blockade"
}
