import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import matchingConfig from '../config/matching.config';
import { mapWithConcurrency } from '../common/concurrency';
import {
  CompanyProfileInput,
  MatchingOptions,
  MatchingRunResult,
  OpportunityInput,
} from './interfaces/matching.types';
import { isScoringFailure } from './matching.errors';
import { MatchRanker } from './match-ranker';
import { ProfileAnalyzerService } from './profile-analyzer.service';
import { RelevanceScorerService } from './relevance-scorer.service';

/**
 * Runs one company through the pipeline: analyze the profile, score every
 * opportunity concurrently, then rank. A failing opportunity becomes a
 * zero-score match rather than aborting the run.
 */
@Injectable()
export class MatchingService {
  private readonly logger = new Logger(MatchingService.name);

  constructor(
    private readonly profileAnalyzer: ProfileAnalyzerService,
    private readonly relevanceScorer: RelevanceScorerService,
    private readonly matchRanker: MatchRanker,
    @Inject(matchingConfig.KEY)
    private readonly config: ConfigType<typeof matchingConfig>,
  ) {}

  async findMatches(
    profile: CompanyProfileInput,
    opportunities: readonly OpportunityInput[],
    options: MatchingOptions = {},
  ): Promise<MatchingRunResult> {
    const minScore = options.minScore ?? this.matchRanker.defaultMinScore;
    const concurrency = options.concurrency ?? this.config.concurrency;

    // Scoring depends on the characterization, so this finishes first
    const characterization = await this.profileAnalyzer.analyze(profile);
    if (characterization.metadata.source === 'fallback') {
      this.logger.warn(
        `Scoring ${profile.companyName} against a fallback characterization (${characterization.metadata.errorKind})`,
      );
    }

    const scored = await mapWithConcurrency(opportunities, concurrency, (opportunity) =>
      this.relevanceScorer.score(profile.id, characterization, opportunity),
    );

    const ranked = this.matchRanker.rank(scored, minScore);
    const failures = scored.filter((match) => isScoringFailure(match.errorKind)).length;

    this.logger.log(
      `Found ${ranked.length} relevant opportunities for ${profile.companyName} ` +
        `(${scored.length} scored, ${failures} failed, threshold ${minScore})`,
    );

    return {
      companyId: profile.id,
      characterization,
      ranked,
      scored,
      failures,
      minScore,
    };
  }
}
