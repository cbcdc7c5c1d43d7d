// src/analysis/recommendations.ts
// Keyword → framework recommendation rules for documents that are not compliant.

import recommendationRules from "./data/recommendationRules.json";
import { containsTerm } from "./textMatch";

export interface RecommendationRule {
  keywords: string[];
  recommendation: string;
}

export const RECOMMENDATION_RULES: readonly RecommendationRule[] = recommendationRules;

/** Rule recommendations whose keywords occur in the text, in catalogue order */
export function ruleRecommendations(
  text: string,
  rules: readonly RecommendationRule[] = RECOMMENDATION_RULES
): string[] {
  return rules
    .filter((rule) => rule.keywords.some((keyword) => containsTerm(text, keyword)))
    .map((rule) => rule.recommendation);
}
