/**
 * Drug-class matchers. Each gate decides applicability from the drug's
 * class and mechanism strings by case-insensitive substring match; the name
 * is only consulted for checkpoint tokens (e.g. "anti-PD-1 antibody").
 */

import type { DrugDescriptor } from "@/types";

const PLATINUM_AGENTS = ["carboplatin", "cisplatin", "oxaliplatin"];

const CHECKPOINT_TOKENS = ["pd-1", "pd-l1", "ctla-4", "anti-pd1", "anti-pdl1"];

function lower(value: string | undefined): string {
  return (value ?? "").toLowerCase();
}

export function isParpInhibitor(drug: DrugDescriptor): boolean {
  return lower(drug.drugClass).includes("parp") || lower(drug.mechanism).includes("parp");
}

export function isPlatinumAgent(drug: DrugDescriptor): boolean {
  const cls = lower(drug.drugClass);
  const moa = lower(drug.mechanism);
  if (cls.includes("platinum") || moa.includes("platinum")) return true;
  return PLATINUM_AGENTS.some((agent) => cls.includes(agent));
}

export function isCheckpointInhibitor(drug: DrugDescriptor): boolean {
  const cls = lower(drug.drugClass);
  if (cls.includes("checkpoint")) return true;
  const haystacks = [cls, lower(drug.mechanism), lower(drug.name)];
  return CHECKPOINT_TOKENS.some((token) => haystacks.some((h) => h.includes(token)));
}
