/**
 * Patient and trial descriptors for holistic feasibility scoring.
 * Shapes mirror what the trial-registry and patient-profile suppliers hand over;
 * nothing here is fetched by the engine itself.
 */

/** 7-dim mechanism vector in fixed order [DDR, MAPK, PI3K, VEGF, HER2, IO, Efflux]. */
export type MechanismVectorInput = readonly number[] | Readonly<Record<string, number>>;

export interface PharmacogeneVariant {
  gene: string;
  variant?: string;      // diplotype or allele → "*1/*2A", "*28/*28"
}

export interface PatientLocation {
  state?: string;
  country?: string;
}

export interface PatientMutation {
  gene: string;
  proteinChange?: string;
}

export interface PatientProfile {
  patientId?: string;
  disease?: string;
  age?: number | null;
  location?: PatientLocation | null;
  mutations?: readonly PatientMutation[];
  germlineVariants?: readonly PharmacogeneVariant[];
  mechanismVector?: MechanismVectorInput | null;
}

export interface TrialLocation {
  facility?: string;
  city?: string;
  state?: string;
  country?: string;
}

export interface TrialIntervention {
  type?: string;
  name?: string;
  drugNames?: readonly string[];
}

export interface TrialDescriptor {
  nctId: string;
  title?: string;
  overallStatus?: string;               // "RECRUITING", "ACTIVE_NOT_RECRUITING", "COMPLETED"
  conditions?: readonly string[];
  minimumAge?: string | number | null;  // "18 Years"
  maximumAge?: string | number | null;
  locations?: readonly TrialLocation[];
  biomarkerRequirements?: readonly string[];
  interventions?: readonly TrialIntervention[];
  moaVector?: MechanismVectorInput | null;
  /** Pre-computed eligibility, used by the mechanism-fit ranker. */
  eligibilityScore?: number;
}
