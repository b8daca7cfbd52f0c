import { CONFIDENCE_WEIGHTS, ReasonCode } from '../../config/constants';
import { ConfidenceResult, FieldExtraction, MatchCandidate } from '../../types/extraction.types';
import { FieldDefinition } from '../../types/template.types';

function baseScore(field: FieldDefinition, primary: MatchCandidate): number {
  const { baseCeiling, baseFloor } = CONFIDENCE_WEIGHTS;
  const priorities = field.rules.map((rule) => rule.priority);
  const highest = Math.max(...priorities);
  const lowest = Math.min(...priorities);
  if (highest === lowest) return baseCeiling;

  return baseFloor + ((baseCeiling - baseFloor) * (primary.priority - lowest)) / (highest - lowest);
}

/** Decreases with the candidate count and approaches multiMatchFloor */
export function multipleMatchFactor(count: number): number {
  const { multiMatchFloor } = CONFIDENCE_WEIGHTS;
  return multiMatchFloor + (1 - multiMatchFloor) / count;
}

function roundScore(score: number): number {
  return Math.round(score * 1000) / 1000;
}

/**
 * Pure function of the candidate set and its primary match. Reasons are
 * listed in evaluation order.
 */
export function scoreExtraction(field: FieldDefinition, extraction: FieldExtraction): ConfidenceResult {
  const { primary, candidates } = extraction;
  if (!primary) {
    return { confidence: 0, reasons: [ReasonCode.NO_MATCH] };
  }

  const reasons: ReasonCode[] = [];
  let score = baseScore(field, primary);

  if (candidates.length === 1) {
    reasons.push(ReasonCode.SINGLE_MATCH);
  } else {
    score *= multipleMatchFactor(candidates.length);
    reasons.push(ReasonCode.MULTIPLE_MATCHES_REDUCED_CONFIDENCE);
  }

  if (primary.rank > 0) {
    score -= CONFIDENCE_WEIGHTS.lowPriorityPenalty;
    reasons.push(ReasonCode.LOW_PRIORITY_PATTERN);
  }

  if (primary.normalizedValue === null) {
    score -= CONFIDENCE_WEIGHTS.normalizationPenalty;
    reasons.push(ReasonCode.NORMALIZATION_FAILED);
  }

  const clamped = Math.min(1, Math.max(CONFIDENCE_WEIGHTS.minMatchedScore, score));
  return { confidence: roundScore(clamped), reasons };
}
