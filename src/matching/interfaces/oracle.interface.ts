import type {
  CompanyCharacterization,
  CompanyProfileInput,
  OpportunityInput,
} from './matching.types';

export interface ProfileAnalysisRequest {
  profile: CompanyProfileInput;
  /** Plain-text profile summary submitted to LLM oracles. */
  profileText: string;
}

export interface OpportunityScoringRequest {
  characterization: CompanyCharacterization;
  opportunity: Pick<
    OpportunityInput,
    'id' | 'title' | 'description' | 'type' | 'source' | 'tags'
  > & { contentPreview: string };
}

/**
 * Given profile text, returns characterization JSON.
 * Implementations throw on transport failure and return whatever they
 * decoded otherwise; shape validation is the analyzer's job.
 * `signal` aborts when the caller stops waiting; the call must stop too.
 */
export interface AnalysisOracle {
  analyzeProfile(request: ProfileAnalysisRequest, signal?: AbortSignal): Promise<unknown>;
}

/**
 * Returns `{ relevance_score, reasoning, key_match_factors?, actionability? }`
 * as decoded JSON, or throws.
 */
export interface ScoringOracle {
  scoreOpportunity(request: OpportunityScoringRequest, signal?: AbortSignal): Promise<unknown>;
}

export const ANALYSIS_ORACLE = 'ANALYSIS_ORACLE';
export const SCORING_ORACLE = 'SCORING_ORACLE';
