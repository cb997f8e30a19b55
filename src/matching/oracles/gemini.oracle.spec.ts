import { ConfigService } from '@nestjs/config';
import { MalformedOracleResponseError } from '../matching.errors';
import { createOpportunity, createProfile } from '../testing/fixtures';
import {
  BusinessStage,
  GeographicScope,
  TechnologyAdoption,
} from '../interfaces/matching.types';
import { GeminiOracle } from './gemini.oracle';
import {
  ANALYSIS_SYSTEM_PROMPT,
  SCORING_SYSTEM_PROMPT,
  buildAnalysisPrompt,
  buildProfileText,
  buildScoringPrompt,
} from './prompts';

const mockGenerateContent = jest.fn();
const mockGetGenerativeModel = jest.fn(() => ({ generateContent: mockGenerateContent }));

jest.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: jest.fn().mockImplementation(() => ({
    getGenerativeModel: mockGetGenerativeModel,
  })),
}));

describe('GeminiOracle', () => {
  let oracle: GeminiOracle;

  const respondWith = (text: string) => {
    mockGenerateContent.mockResolvedValue({ response: { text: () => text } });
  };

  beforeEach(() => {
    jest.clearAllMocks();
    oracle = new GeminiOracle(
      new ConfigService({ GEMINI_API_KEY: 'test-key', GEMINI_MODEL: 'gemini-test' }),
    );
  });

  it('should configure JSON-mode models for analysis and scoring', () => {
    expect(mockGetGenerativeModel).toHaveBeenCalledWith(
      expect.objectContaining({
        systemInstruction: ANALYSIS_SYSTEM_PROMPT,
        generationConfig: { responseMimeType: 'application/json', temperature: 0.3 },
      }),
    );
    expect(mockGetGenerativeModel).toHaveBeenCalledWith(
      expect.objectContaining({
        systemInstruction: SCORING_SYSTEM_PROMPT,
        generationConfig: { responseMimeType: 'application/json', temperature: 0.2 },
      }),
    );
  });

  it('should send the analysis prompt and decode a fenced answer', async () => {
    const profile = createProfile();
    const request = { profile, profileText: buildProfileText(profile) };
    respondWith('```json\n{"industry_focus": "Technology"}\n```');
    const controller = new AbortController();

    const result = await oracle.analyzeProfile(request, controller.signal);

    expect(mockGenerateContent).toHaveBeenCalledWith(buildAnalysisPrompt(request), {
      signal: controller.signal,
    });
    expect(result).toEqual({ industry_focus: 'Technology' });
  });

  it('should reject an empty scoring answer as malformed', async () => {
    const opportunity = createOpportunity('opp-1');
    const request = {
      characterization: {
        industryFocus: 'Technology',
        businessStage: BusinessStage.GROWTH,
        targetCustomers: [],
        growthPriorities: [],
        technologyAdoption: TechnologyAdoption.HIGH,
        geographicScope: GeographicScope.LOCAL,
        keyCapabilities: [],
        partnershipInterests: [],
        metadata: { source: 'oracle' as const },
      },
      opportunity: { ...opportunity, contentPreview: '' },
    };
    respondWith('   ');
    const controller = new AbortController();

    await expect(oracle.scoreOpportunity(request, controller.signal)).rejects.toBeInstanceOf(
      MalformedOracleResponseError,
    );
    expect(mockGenerateContent).toHaveBeenCalledWith(buildScoringPrompt(request), {
      signal: controller.signal,
    });
  });

  it('should rethrow transport errors', async () => {
    const profile = createProfile();
    mockGenerateContent.mockRejectedValue(new Error('503 Service Unavailable'));

    await expect(
      oracle.analyzeProfile({ profile, profileText: buildProfileText(profile) }),
    ).rejects.toThrow('503 Service Unavailable');
  });
});
