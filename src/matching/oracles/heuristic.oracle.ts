import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import industryKeywordTable from '../data/industry-keywords.json';
import {
  BusinessStage,
  CompanyProfileInput,
  GeographicScope,
  OpportunityType,
  TechnologyAdoption,
} from '../interfaces/matching.types';
import type {
  AnalysisOracle,
  OpportunityScoringRequest,
  ProfileAnalysisRequest,
  ScoringOracle,
} from '../interfaces/oracle.interface';

const industryKeywords = new Map(
  Object.entries(z.record(z.array(z.string())).parse(industryKeywordTable)),
);

const TECH_TERMS = [
  'software', 'cloud', 'ai', 'digital', 'automation', 'platform',
  'saas', 'data', 'analytics', 'online', 'app',
];

const SCOPE_TERMS: Array<[GeographicScope, string[]]> = [
  [GeographicScope.INTERNATIONAL, ['international', 'global', 'export', 'worldwide', 'overseas']],
  [GeographicScope.NATIONAL, ['national', 'nationwide', 'countrywide']],
  [GeographicScope.REGIONAL, ['regional', 'region', 'statewide']],
  [GeographicScope.LOCAL, ['local', 'city', 'community', 'neighborhood']],
];

const STOPWORDS = new Set([
  'and', 'the', 'for', 'with', 'from', 'into', 'our', 'their', 'that',
  'this', 'are', 'new', 'all', 'unknown',
]);

const INDUSTRY_WEIGHT = 0.4;
const TERM_WEIGHT = 0.15;
const MAX_COUNTED_TERMS = 4;

/** Lowercased, space-padded text so phrases match on word boundaries. */
function normalizeText(...parts: string[]): string {
  const text = parts.join(' ').toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();
  return ` ${text} `;
}

function containsPhrase(text: string, phrase: string): boolean {
  return text.includes(` ${phrase.toLowerCase()} `);
}

function tokenize(...parts: string[]): string[] {
  const tokens = normalizeText(...parts)
    .split(' ')
    .filter((token) => token.length >= 3 && !STOPWORDS.has(token));
  return [...new Set(tokens)];
}

export function classifyIndustry(text: string): string | null {
  let best: string | null = null;
  let bestHits = 0;
  for (const [industry, keywords] of industryKeywords) {
    const hits = keywords.filter((keyword) => containsPhrase(text, keyword)).length;
    if (hits > bestHits) {
      best = industry;
      bestHits = hits;
    }
  }
  return best;
}

export function stageFromSize(companySize: string, description: string): BusinessStage {
  const text = normalizeText(companySize, description);
  if (containsPhrase(text, 'startup')) return BusinessStage.STARTUP;

  const numbers = (companySize.match(/\d+/g) ?? []).map(Number);
  if (numbers.length > 0) {
    const smallest = Math.min(...numbers);
    if (smallest <= 10) return BusinessStage.STARTUP;
    if (smallest <= 50) return BusinessStage.GROWTH;
    if (smallest < 250) return BusinessStage.ESTABLISHED;
    return BusinessStage.ENTERPRISE;
  }

  if (containsPhrase(text, 'enterprise') || containsPhrase(text, 'large')) {
    return BusinessStage.ENTERPRISE;
  }
  return BusinessStage.UNKNOWN;
}

function technologyAdoptionOf(text: string): TechnologyAdoption {
  const hits = TECH_TERMS.filter((term) => containsPhrase(text, term)).length;
  if (hits >= 3) return TechnologyAdoption.HIGH;
  if (hits >= 1) return TechnologyAdoption.MEDIUM;
  return TechnologyAdoption.LOW;
}

function geographicScopeOf(profile: CompanyProfileInput): GeographicScope {
  const text = normalizeText(...profile.targetMarkets, profile.description);
  const found = SCOPE_TERMS.find(([, terms]) => terms.some((term) => containsPhrase(text, term)));
  return found ? found[0] : GeographicScope.UNKNOWN;
}

/**
 * Rule-backed oracle for running without an LLM key. Keyword overlap
 * stands in for model judgement; answers use the same JSON shape the
 * LLM oracles are asked for.
 */
@Injectable()
export class HeuristicOracle implements AnalysisOracle, ScoringOracle {
  analyzeProfile({ profile }: ProfileAnalysisRequest): Promise<unknown> {
    const text = normalizeText(
      profile.industry,
      profile.businessType,
      profile.description,
      ...profile.services,
    );

    return Promise.resolve({
      industry_focus: classifyIndustry(text) ?? profile.industry,
      business_stage: stageFromSize(profile.companySize, profile.description),
      target_customers: profile.targetMarkets,
      growth_priorities: profile.keyChallenges,
      technology_adoption: technologyAdoptionOf(text),
      geographic_scope: geographicScopeOf(profile),
      key_capabilities: profile.services,
      partnership_interests: [],
    });
  }

  scoreOpportunity({ characterization, opportunity }: OpportunityScoringRequest): Promise<unknown> {
    const opportunityText = normalizeText(
      opportunity.title,
      opportunity.description,
      ...opportunity.tags,
      opportunity.contentPreview,
    );

    const industryTerms = [
      ...(industryKeywords.get(characterization.industryFocus) ?? []),
      ...tokenize(characterization.industryFocus),
    ];
    const industryHit = industryTerms.some((term) => containsPhrase(opportunityText, term));

    const companyTerms = tokenize(
      characterization.industryFocus,
      ...characterization.targetCustomers,
      ...characterization.growthPriorities,
      ...characterization.keyCapabilities,
      ...characterization.partnershipInterests,
    );
    const sharedTerms = companyTerms.filter((term) => containsPhrase(opportunityText, term));

    const raw =
      (industryHit ? INDUSTRY_WEIGHT : 0) +
      TERM_WEIGHT * Math.min(sharedTerms.length, MAX_COUNTED_TERMS);
    const relevanceScore = Math.round(Math.min(1, raw) * 100) / 100;

    const reasons: string[] = [];
    if (industryHit) reasons.push(`Matches industry focus "${characterization.industryFocus}"`);
    if (sharedTerms.length > 0) reasons.push(`Shared terms: ${sharedTerms.join(', ')}`);

    return Promise.resolve({
      relevance_score: relevanceScore,
      reasoning:
        reasons.length > 0
          ? reasons.join('. ')
          : 'No overlap between the company focus and this opportunity',
      key_match_factors: sharedTerms,
      actionability:
        opportunity.type === OpportunityType.SUPPLIER || opportunity.type === OpportunityType.EVENT
          ? 'High'
          : 'Medium',
    });
  }
}
