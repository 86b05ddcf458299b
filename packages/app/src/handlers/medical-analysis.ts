import type { Message } from '@agent-mesh/core';
import { dataPart, extractText, textPart } from '@agent-mesh/core';
import type { CapabilityHandler, HandlerResult } from '@agent-mesh/agent-runtime';
import { createStagedHandler } from '@agent-mesh/agent-runtime';

export type RiskLevel = 'low' | 'moderate' | 'high';

export const ANALYSIS_STAGES: readonly string[] = [
  'Analyzing patient demographics...',
  'Processing medical history...',
  'Evaluating diagnostic patterns...',
  'Generating risk assessment...',
  'Finalizing recommendations...',
];

const HIGH_RISK_TERMS = ['chest pain', 'shortness of breath', 'stroke', 'seizure', 'unconscious'];
const MODERATE_RISK_TERMS = ['diabetes', 'hypertension', 'smoker', 'asthma', 'obesity', 'high cholesterol'];

const RECOMMENDATIONS: Record<RiskLevel, string[]> = {
  high: ['Refer to emergency care immediately', 'Notify the attending physician'],
  moderate: ['Schedule a follow-up within two weeks', 'Review current medications'],
  low: ['Continue routine check-ups'],
};

export interface MedicalAnalysisOptions {
  stages?: readonly string[];
  stageDelayMs?: number;
}

/** Keyword-based risk summary of a free-text case description. */
export function assessRisk(text: string): { riskLevel: RiskLevel; findings: string[]; recommendations: string[] } {
  const lower = text.toLowerCase();
  const high = HIGH_RISK_TERMS.filter((t) => lower.includes(t));
  const moderate = MODERATE_RISK_TERMS.filter((t) => lower.includes(t));
  const riskLevel: RiskLevel = high.length > 0 ? 'high' : moderate.length > 0 ? 'moderate' : 'low';
  return { riskLevel, findings: [...high, ...moderate], recommendations: RECOMMENDATIONS[riskLevel] };
}

async function finish(message: Message): Promise<HandlerResult> {
  const assessment = assessRisk(extractText(message));
  return {
    parts: [
      textPart(`Analysis complete. Risk level: ${assessment.riskLevel}.`),
      dataPart({ ...assessment, recommendations: [...assessment.recommendations] }),
    ],
  };
}

/** Long-running analysis that reports each stage before answering. */
export function createMedicalAnalysisHandler(options: MedicalAnalysisOptions = {}): CapabilityHandler {
  return createStagedHandler({
    stages: options.stages ?? ANALYSIS_STAGES,
    stageDelayMs: options.stageDelayMs ?? 0,
    finish,
  });
}
