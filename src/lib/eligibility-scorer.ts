/**
 * Rule-based eligibility checklist, evaluated in fixed order:
 *   1. recruiting/active status  (hard)
 *   2. disease match             (soft)
 *   3. age range                 (hard when out of range)
 *   4. location                  (soft; only when both sides give a state)
 *   5. biomarker coverage        (soft; only when the trial lists requirements)
 *
 * A hard component at 0.0 forces the final score to 0.0; otherwise the score
 * is the arithmetic mean of every evaluated component.
 */

import type { PatientProfile, TrialDescriptor } from "@/types";
import { DEFAULT_MAX_AGE_YEARS, ELIGIBILITY_SCORES } from "@/lib/engine-constants";
import { mean, round3 } from "@/lib/score-math";

// ─── Types ───────────────────────────────────────────────────

export type EligibilityCriterion = "status" | "disease" | "age" | "location" | "biomarkers";

export interface EligibilityComponent {
  criterion: EligibilityCriterion;
  score: number;
  hard: boolean;
  note: string;
}

export interface EligibilityResult {
  score: number;
  hardFailed: boolean;
  components: EligibilityComponent[];
  /** Human-readable notes in checklist order. */
  breakdown: string[];
}

// ─── Age parsing ─────────────────────────────────────────────

const AGE_UNIT_DIVISORS: Readonly<Record<string, number>> = {
  year: 1,
  month: 12,
  week: 52,
  day: 365,
};

const NO_LIMIT = new Set(["", "n/a", "na", "none", "no limit"]);

/**
 * "18 Years" → 18, "6 Months" → 0.5. Returns undefined for "no limit"
 * markers and null when the text cannot be parsed.
 */
export function parseAgeYears(value: string | number | null | undefined): number | null | undefined {
  if (value == null) return undefined;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const text = value.trim().toLowerCase();
  if (NO_LIMIT.has(text)) return undefined;
  const match = /^(\d+(?:\.\d+)?)\s*(year|month|week|day)?s?$/.exec(text);
  if (!match) return null;
  const amount = Number(match[1]);
  const divisor = AGE_UNIT_DIVISORS[match[2] ?? "year"] ?? 1;
  return amount / divisor;
}

// ─── Checklist items ─────────────────────────────────────────

function checkStatus(trial: TrialDescriptor): EligibilityComponent {
  const status = (trial.overallStatus ?? "").toUpperCase();
  const open = status.includes("RECRUITING") || status.includes("ACTIVE");
  return {
    criterion: "status",
    hard: true,
    score: open ? ELIGIBILITY_SCORES.pass : ELIGIBILITY_SCORES.fail,
    note: open ? `Recruiting/Active (${status})` : `Not recruiting (${status || "status unknown"})`,
  };
}

function checkDisease(patient: PatientProfile, trial: TrialDescriptor): EligibilityComponent {
  const conditions = (trial.conditions ?? []).map((c) => c.trim().toLowerCase()).filter((c) => c.length > 0);
  const disease = (patient.disease ?? "").trim().toLowerCase();
  const base = { criterion: "disease" as const, hard: false };

  if (conditions.length === 0) {
    return { ...base, score: ELIGIBILITY_SCORES.noConditions, note: "No conditions listed" };
  }
  if (disease.length === 0) {
    return { ...base, score: ELIGIBILITY_SCORES.diseaseAmbiguous, note: "Patient disease not provided" };
  }
  const matched = conditions.find((c) => c.includes(disease) || disease.includes(c));
  if (matched !== undefined) {
    return { ...base, score: ELIGIBILITY_SCORES.pass, note: `Disease match (${matched})` };
  }
  return { ...base, score: ELIGIBILITY_SCORES.diseaseAmbiguous, note: "Disease match uncertain" };
}

function checkAge(patient: PatientProfile, trial: TrialDescriptor): EligibilityComponent {
  const base = { criterion: "age" as const, hard: true };
  const age = patient.age;
  if (age == null || !Number.isFinite(age)) {
    return { ...base, score: ELIGIBILITY_SCORES.ageUnknown, note: "Patient age not provided" };
  }

  const min = parseAgeYears(trial.minimumAge);
  const max = parseAgeYears(trial.maximumAge);
  if (min === null || max === null) {
    return { ...base, score: ELIGIBILITY_SCORES.ageUnknown, note: "Age criteria unclear" };
  }

  const lo = min ?? 0;
  const hi = max ?? DEFAULT_MAX_AGE_YEARS;
  if (age >= lo && age <= hi) {
    return { ...base, score: ELIGIBILITY_SCORES.pass, note: `Age eligible (${age} in ${lo}-${hi})` };
  }
  return { ...base, score: ELIGIBILITY_SCORES.fail, note: `Age ineligible (${age} not in ${lo}-${hi})` };
}

function checkLocation(patient: PatientProfile, trial: TrialDescriptor): EligibilityComponent | null {
  const state = (patient.location?.state ?? "").trim().toUpperCase();
  const trialStates = (trial.locations ?? [])
    .map((loc) => (loc.state ?? "").trim().toUpperCase())
    .filter((s) => s.length > 0);
  if (state.length === 0 || trialStates.length === 0) return null;

  const match = trialStates.includes(state);
  return {
    criterion: "location",
    hard: false,
    score: match ? ELIGIBILITY_SCORES.pass : ELIGIBILITY_SCORES.locationDistant,
    note: match ? `Location match (${state})` : `Location distant (patient: ${state})`,
  };
}

function checkBiomarkers(patient: PatientProfile, trial: TrialDescriptor): EligibilityComponent | null {
  const requirements = trial.biomarkerRequirements ?? [];
  if (requirements.length === 0) return null;

  const genes = new Set((patient.mutations ?? []).map((m) => m.gene.trim().toUpperCase()));
  const matched = requirements.filter((req) => genes.has(req.trim().toUpperCase())).length;
  const coverage = matched / requirements.length;
  const ratio = `${matched}/${requirements.length}`;
  const note =
    coverage >= 0.8
      ? `Biomarkers match (${ratio})`
      : coverage >= 0.5
        ? `Partial biomarker match (${ratio})`
        : `Biomarker mismatch (${ratio})`;
  return { criterion: "biomarkers", hard: false, score: coverage, note };
}

// ─── Scorer ──────────────────────────────────────────────────

export function scoreEligibility(patient: PatientProfile, trial: TrialDescriptor): EligibilityResult {
  const components: EligibilityComponent[] = [checkStatus(trial), checkDisease(patient, trial), checkAge(patient, trial)];
  const location = checkLocation(patient, trial);
  if (location) components.push(location);
  const biomarkers = checkBiomarkers(patient, trial);
  if (biomarkers) components.push(biomarkers);

  const breakdown = components.map((c) => c.note);
  const hardFailed = components.some((c) => c.hard && c.score === 0);
  if (hardFailed) {
    breakdown.push("HARD CRITERIA FAILED");
    return { score: 0, hardFailed, components, breakdown };
  }
  return { score: round3(mean(components.map((c) => c.score))), hardFailed, components, breakdown };
}
