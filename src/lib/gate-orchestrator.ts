/**
 * Per-drug gate orchestration.
 *
 * Fixed evaluation order, each stage multiplying into a running efficacy:
 *   1. PARP germline/HRD gate (recorded unless NOT_PARP)
 *   2. Ovarian pathway gate, only if PARP penalized or the drug is platinum
 *   3. IO boost gate, checkpoint inhibitors only
 *   4. Confidence cap on the separately tracked confidence
 * Then both values are clamped to [0, 1] and a GATES_SUMMARY entry closes the
 * rationale list. Entries are appended in order and never rewritten.
 */

import type {
  BiomarkerRecord,
  DrugDescriptor,
  GateId,
  GateRationaleEntry,
  GateResult,
  GateSummary,
  GermlineStatus,
} from "@/types";
import { classifyCompleteness, recordCompleteness } from "@/lib/completeness";
import { applyConfidenceCap } from "@/lib/confidence-cap";
import { isCheckpointInhibitor, isPlatinumAgent } from "@/lib/drug-classification";
import type { EngineLogger } from "@/lib/engine-logger";
import { consoleLogger } from "@/lib/engine-logger";
import type { PathwayModel } from "@/lib/expression-profile";
import { applyIoBoostGate } from "@/lib/io-boost-gate";
import { createIoPathwayModel } from "@/lib/io-pathway-model";
import { applyOvarianPathwayGate } from "@/lib/ovarian-pathway-gate";
import { createOvarianPathwayModel } from "@/lib/ovarian-pathway-model";
import { applyParpGate } from "@/lib/parp-gate";
import { clamp01 } from "@/lib/score-math";

// ─── Types ───────────────────────────────────────────────────

export interface GateOrchestratorDeps {
  logger?: EngineLogger;
  ioModel?: PathwayModel;
  ovarianModel?: PathwayModel;
}

export interface GateOrchestrator {
  applyGates(
    drug: DrugDescriptor,
    efficacy: number,
    confidence: number,
    germlineStatus: GermlineStatus,
    record: BiomarkerRecord | null | undefined,
    cancerType?: string | null,
  ): GateResult;
}

// ─── Factory ─────────────────────────────────────────────────

export function createGateOrchestrator(deps: GateOrchestratorDeps = {}): GateOrchestrator {
  const logger = deps.logger ?? consoleLogger;
  const ioModel = deps.ioModel ?? createIoPathwayModel();
  const ovarianModel = deps.ovarianModel ?? createOvarianPathwayModel();

  return {
    applyGates(drug, efficacy, confidence, germlineStatus, record, cancerType) {
      const originalEfficacy = clamp01(efficacy);
      const originalConfidence = clamp01(confidence);
      const rationale: GateRationaleEntry[] = [];
      let eff = originalEfficacy;

      const parp = applyParpGate(drug, germlineStatus, record);
      eff *= parp.multiplier;
      if (parp.verdict !== "NOT_PARP") rationale.push(parp);

      if (parp.multiplier < 1 || isPlatinumAgent(drug)) {
        const ovarian = applyOvarianPathwayGate(drug, record, cancerType, ovarianModel);
        eff *= ovarian.multiplier;
        rationale.push(ovarian);
      }

      if (isCheckpointInhibitor(drug)) {
        const io = applyIoBoostGate(drug, record, { cancerType, model: ioModel, logger });
        eff *= io.multiplier;
        rationale.push(io);
      }

      const completenessScore = recordCompleteness(record);
      const tier = classifyCompleteness(completenessScore);
      const cap = applyConfidenceCap(originalConfidence, tier, completenessScore);
      rationale.push(cap);

      const finalEfficacy = clamp01(eff);
      const finalConfidence = clamp01(cap.metadata.cappedConfidence);
      const gatesApplied: GateId[] = rationale.map((entry) => entry.gateId);

      const summary: GateSummary = {
        gateId: "GATES_SUMMARY",
        verdict: "SUMMARY",
        multiplier: originalEfficacy > 0 ? finalEfficacy / originalEfficacy : 1.0,
        reason:
          `${drug.name}: efficacy ${originalEfficacy.toFixed(3)} → ${finalEfficacy.toFixed(3)}, ` +
          `confidence ${originalConfidence.toFixed(3)} → ${finalConfidence.toFixed(3)} ` +
          `[${gatesApplied.join(", ")}]`,
        metadata: {
          drugName: drug.name,
          germlineStatus,
          tier,
          completenessScore,
          originalEfficacy,
          finalEfficacy,
          efficacyDelta: finalEfficacy - originalEfficacy,
          originalConfidence,
          finalConfidence,
          confidenceDelta: finalConfidence - originalConfidence,
          gatesApplied,
        },
      };
      rationale.push(Object.freeze(summary));

      logger.debug("Gates applied", { drug: drug.name, gatesApplied, finalEfficacy, finalConfidence });

      return { efficacy: finalEfficacy, confidence: finalConfidence, tier, rationale };
    },
  };
}

/** One-shot orchestration with default collaborators. */
export function applyGates(
  drug: DrugDescriptor,
  efficacy: number,
  confidence: number,
  germlineStatus: GermlineStatus,
  record: BiomarkerRecord | null | undefined,
  cancerType?: string | null,
): GateResult {
  return createGateOrchestrator().applyGates(drug, efficacy, confidence, germlineStatus, record, cancerType);
}
