import matchingConfig, {
  MatchingConfig,
  OracleProviderName,
} from '../../config/matching.config';
import {
  CompanyProfileInput,
  OpportunityInput,
  OpportunityType,
} from '../interfaces/matching.types';

export const TEST_COMPANY_ID = '3f1c8a52-6a0e-4d8b-9a51-2f4b6c1d7e90';

export const testMatchingConfig = (
  overrides: Partial<MatchingConfig> = {},
): MatchingConfig => ({
  minScore: 0.6,
  concurrency: 5,
  oracleTimeoutMs: 1000,
  contentPreviewLength: 500,
  oracleProvider: OracleProviderName.HEURISTIC,
  ...overrides,
});

export const matchingConfigProvider = (overrides: Partial<MatchingConfig> = {}) => ({
  provide: matchingConfig.KEY,
  useValue: testMatchingConfig(overrides),
});

export const createProfile = (
  overrides: Partial<CompanyProfileInput> = {},
): CompanyProfileInput => ({
  id: TEST_COMPANY_ID,
  companyName: 'Acme Cloud Works',
  industry: 'technology software',
  businessType: 'B2B',
  companySize: '11-50 employees',
  description: 'We build cloud software for manufacturers',
  services: ['cloud migration', 'data integration'],
  targetMarkets: ['manufacturers'],
  keyChallenges: ['hiring'],
  ...overrides,
});

export const createOpportunity = (
  id: string,
  overrides: Partial<OpportunityInput> = {},
): OpportunityInput => ({
  id,
  title: `Opportunity ${id}`,
  description: 'A business opportunity',
  content: '',
  source: 'Test Source',
  sourceUrl: `https://example.com/${id}`,
  type: OpportunityType.NEWS,
  tags: [],
  publishedAt: new Date('2026-01-15T00:00:00Z'),
  metadata: {},
  ...overrides,
});

/** Prometheus metric stand-ins keyed for getToken(). */
export const fakeHistogram = () => ({
  startTimer: jest.fn().mockReturnValue(jest.fn()),
});

export const fakeCounter = () => ({
  inc: jest.fn(),
});
