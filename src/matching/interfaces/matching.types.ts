import type { OracleErrorKind } from '../matching.errors';

export enum OpportunityType {
  NEWS = 'news',
  SUPPLIER = 'supplier',
  EVENT = 'event',
  TREND = 'trend',
}

export enum BusinessStage {
  STARTUP = 'startup',
  GROWTH = 'growth',
  ESTABLISHED = 'established',
  ENTERPRISE = 'enterprise',
  UNKNOWN = 'unknown',
}

export enum TechnologyAdoption {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  UNKNOWN = 'unknown',
}

export enum GeographicScope {
  LOCAL = 'local',
  REGIONAL = 'regional',
  NATIONAL = 'national',
  INTERNATIONAL = 'international',
  UNKNOWN = 'unknown',
}

export enum MatchStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  DISMISSED = 'dismissed',
}

export enum RelevanceTier {
  HIGH = 'High',
  MEDIUM = 'Medium',
  LOW = 'Low',
}

/** Profile fields the matching pipeline reads. */
export interface CompanyProfileInput {
  id: string;
  companyName: string;
  industry: string;
  businessType: string;
  companySize: string;
  description: string;
  services: string[];
  targetMarkets: string[];
  keyChallenges: string[];
}

export interface OpportunityInput {
  id: string;
  title: string;
  description: string;
  content: string;
  source: string;
  sourceUrl: string;
  type: OpportunityType;
  tags: string[];
  publishedAt: Date;
  metadata: Record<string, unknown>;
}

export interface CharacterizationMetadata {
  source: 'oracle' | 'fallback';
  errorKind?: OracleErrorKind;
  error?: string;
}

export interface CompanyCharacterization {
  industryFocus: string;
  businessStage: BusinessStage;
  targetCustomers: string[];
  growthPriorities: string[];
  technologyAdoption: TechnologyAdoption;
  geographicScope: GeographicScope;
  keyCapabilities: string[];
  partnershipInterests: string[];
  metadata: CharacterizationMetadata;
}

export interface ScoredMatch {
  companyId: string;
  opportunityId: string;
  relevanceScore: number;
  relevanceTier: RelevanceTier;
  reasoning: string;
  keyMatchFactors: string[];
  actionability: string | null;
  status: MatchStatus;
  errorKind: OracleErrorKind | null;
  createdAt: Date;
}

export interface MatchingOptions {
  minScore?: number;
  concurrency?: number;
}

export interface MatchingRunResult {
  companyId: string;
  characterization: CompanyCharacterization;
  /** Matches at or above the threshold, best first. */
  ranked: ScoredMatch[];
  /** Every scored opportunity in catalog order, failures included. */
  scored: ScoredMatch[];
  failures: number;
  minScore: number;
}
