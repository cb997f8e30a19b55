import type { CompanyProfileInput } from '../interfaces/matching.types';
import type {
  OpportunityScoringRequest,
  ProfileAnalysisRequest,
} from '../interfaces/oracle.interface';
import { HIGH_RELEVANCE_SCORE } from '../scoring';

export const ANALYSIS_SYSTEM_PROMPT =
  'You are a business analyst expert at understanding company profiles and matching them with opportunities. Respond with JSON only.';

export const SCORING_SYSTEM_PROMPT =
  'You are a business opportunity analyst. Provide precise relevance scoring with detailed reasoning. Respond only with valid JSON.';

const UNKNOWN = 'Unknown';

function joinList(items: string[]): string {
  return items.length > 0 ? items.join(', ') : UNKNOWN;
}

export function buildProfileText(profile: CompanyProfileInput): string {
  return [
    `Company: ${profile.companyName || UNKNOWN}`,
    `Industry: ${profile.industry || UNKNOWN}`,
    `Business Type: ${profile.businessType || UNKNOWN}`,
    `Company Size: ${profile.companySize || UNKNOWN}`,
    `Description: ${profile.description || UNKNOWN}`,
    `Services: ${joinList(profile.services)}`,
    `Target Markets: ${joinList(profile.targetMarkets)}`,
    `Key Challenges: ${joinList(profile.keyChallenges)}`,
  ].join('\n');
}

export function buildAnalysisPrompt(request: ProfileAnalysisRequest): string {
  return `
Analyze this business profile and extract key characteristics for opportunity matching:

${request.profileText}

Return JSON with:
- industry_focus: primary industry category
- business_stage: startup/growth/established/enterprise
- target_customers: array of key customer segments
- growth_priorities: array of main areas for business growth
- technology_adoption: low/medium/high tech adoption level
- geographic_scope: local/regional/national/international
- key_capabilities: array of core business capabilities
- partnership_interests: array of partnership types they might seek
`.trim();
}

export function buildScoringPrompt(request: OpportunityScoringRequest): string {
  const { characterization: company, opportunity } = request;

  return `
Analyze the relevance of this business opportunity for the company:

Company Profile:
Industry Focus: ${company.industryFocus}
Business Stage: ${company.businessStage}
Target Customers: ${joinList(company.targetCustomers)}
Growth Priorities: ${joinList(company.growthPriorities)}
Technology Adoption: ${company.technologyAdoption}
Geographic Scope: ${company.geographicScope}

Opportunity:
Title: ${opportunity.title}
Description: ${opportunity.description}
Type: ${opportunity.type}
Source: ${opportunity.source}
Tags: ${opportunity.tags.join(', ')}
Content Preview: ${opportunity.contentPreview || 'No content'}

Analyze relevance considering:
1. Industry alignment and market fit
2. Business stage appropriateness
3. Geographic relevance
4. Potential business impact
5. Timing and urgency

Return JSON with:
- relevance_score: float between 0.0 and 1.0 (1.0 = highly relevant)
- reasoning: detailed explanation of why this opportunity matches or doesn't match
- key_match_factors: array of specific reasons for the score
- actionability: how actionable this opportunity is for the company

Be strict with scoring - only score above ${HIGH_RELEVANCE_SCORE} for highly relevant opportunities.
`.trim();
}
