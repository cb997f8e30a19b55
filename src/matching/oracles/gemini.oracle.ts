import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import type {
  AnalysisOracle,
  OpportunityScoringRequest,
  ProfileAnalysisRequest,
  ScoringOracle,
} from '../interfaces/oracle.interface';
import { parseJsonObject } from './parse-json';
import {
  ANALYSIS_SYSTEM_PROMPT,
  SCORING_SYSTEM_PROMPT,
  buildAnalysisPrompt,
  buildScoringPrompt,
} from './prompts';

@Injectable()
export class GeminiOracle implements AnalysisOracle, ScoringOracle {
  private readonly logger = new Logger(GeminiOracle.name);
  private readonly analysisModel: GenerativeModel;
  private readonly scoringModel: GenerativeModel;

  constructor(private readonly configService: ConfigService) {
    const genAI = new GoogleGenerativeAI(
      this.configService.get<string>('GEMINI_API_KEY') || '',
    );
    const model = this.configService.get<string>('GEMINI_MODEL') || 'gemini-2.0-flash';

    this.analysisModel = genAI.getGenerativeModel({
      model,
      systemInstruction: ANALYSIS_SYSTEM_PROMPT,
      generationConfig: { responseMimeType: 'application/json', temperature: 0.3 },
    });
    this.scoringModel = genAI.getGenerativeModel({
      model,
      systemInstruction: SCORING_SYSTEM_PROMPT,
      generationConfig: { responseMimeType: 'application/json', temperature: 0.2 },
    });
  }

  async analyzeProfile(request: ProfileAnalysisRequest, signal?: AbortSignal): Promise<unknown> {
    try {
      const result = await this.analysisModel.generateContent(buildAnalysisPrompt(request), {
        signal,
      });
      return parseJsonObject(result.response.text());
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`PROFILE_ANALYSIS_ERROR: ${errorMessage}`, {
        companyName: request.profile.companyName,
      });
      throw error; // Analyzer handles fallback
    }
  }

  async scoreOpportunity(
    request: OpportunityScoringRequest,
    signal?: AbortSignal,
  ): Promise<unknown> {
    try {
      const result = await this.scoringModel.generateContent(buildScoringPrompt(request), {
        signal,
      });
      return parseJsonObject(result.response.text());
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`OPPORTUNITY_SCORING_ERROR: ${errorMessage}`, {
        opportunityId: request.opportunity.id,
      });
      throw error; // Scorer handles fallback
    }
  }
}
