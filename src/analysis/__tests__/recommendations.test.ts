import { describe, it, expect } from 'vitest';
import { ruleRecommendations, RECOMMENDATION_RULES } from '../recommendations';

describe('ruleRecommendations', () => {
  it('returns matching rules in catalogue order', () => {
    const recs = ruleRecommendations('We rely on consent and encrypt all backups.');
    expect(recs).toEqual([RECOMMENDATION_RULES[0].recommendation, RECOMMENDATION_RULES[2].recommendation]);
  });

  it('returns nothing when no keyword occurs', () => {
    expect(ruleRecommendations('Quarterly picnic schedule.')).toEqual([]);
  });

  it('accepts a custom rule set', () => {
    const rules = [{ keywords: ['retention'], recommendation: 'Check retention.' }];
    expect(ruleRecommendations('Data retention is 7 years.', rules)).toEqual(['Check retention.']);
  });
});
