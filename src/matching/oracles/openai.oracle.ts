import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
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

/**
 * Chat-completions oracle. Setting OPENAI_BASE_URL points it at any
 * OpenAI-compatible API, e.g. https://api.x.ai/v1 with a Grok model.
 */
@Injectable()
export class OpenAiOracle implements AnalysisOracle, ScoringOracle {
  private readonly logger = new Logger(OpenAiOracle.name);
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(private readonly configService: ConfigService) {
    this.client = new OpenAI({
      apiKey: this.configService.get<string>('OPENAI_API_KEY') || '',
      baseURL: this.configService.get<string>('OPENAI_BASE_URL') || undefined,
      // Retries and timeouts are owned by the circuit breaker
      maxRetries: 0,
    });
    this.model = this.configService.get<string>('OPENAI_MODEL') || 'gpt-4o';
  }

  async analyzeProfile(request: ProfileAnalysisRequest, signal?: AbortSignal): Promise<unknown> {
    try {
      return await this.complete(ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt(request), 0.3, signal);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`PROFILE_ANALYSIS_ERROR: ${errorMessage}`, {
        companyName: request.profile.companyName,
      });
      throw error;
    }
  }

  async scoreOpportunity(
    request: OpportunityScoringRequest,
    signal?: AbortSignal,
  ): Promise<unknown> {
    try {
      return await this.complete(SCORING_SYSTEM_PROMPT, buildScoringPrompt(request), 0.2, signal);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`OPPORTUNITY_SCORING_ERROR: ${errorMessage}`, {
        opportunityId: request.opportunity.id,
      });
      throw error;
    }
  }

  private async complete(
    system: string,
    prompt: string,
    temperature: number,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        response_format: { type: 'json_object' },
        temperature,
      },
      { signal },
    );

    return parseJsonObject(response.choices[0]?.message.content);
  }
}
