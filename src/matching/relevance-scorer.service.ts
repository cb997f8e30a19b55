import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import type CircuitBreaker from 'opossum';
import { Counter, Histogram } from 'prom-client';
import matchingConfig from '../config/matching.config';
import {
  CircuitBreakerFactory,
  translateBreakerError,
} from '../common/circuit-breaker.factory';
import {
  OPPORTUNITIES_SCORED_TOTAL,
  ORACLE_CALL_DURATION,
} from '../common/metrics.providers';
import {
  CompanyCharacterization,
  MatchStatus,
  OpportunityInput,
  ScoredMatch,
} from './interfaces/matching.types';
import {
  OpportunityScoringRequest,
  SCORING_ORACLE,
} from './interfaces/oracle.interface';
import type { ScoringOracle } from './interfaces/oracle.interface';
import {
  MalformedOracleResponseError,
  OracleErrorKind,
  toOracleError,
} from './matching.errors';
import { ScoringResponseSchema } from './schemas/oracle-response.schema';
import { normalizeScore, toRelevanceTier } from './scoring';

export const MISSING_REASONING = 'Scoring oracle gave no reasoning';

/** First `length` code points, so a surrogate pair is never split. */
export function previewOf(content: string, length: number): string {
  return Array.from(content).slice(0, length).join('');
}

@Injectable()
export class RelevanceScorerService {
  private readonly logger = new Logger(RelevanceScorerService.name);
  private readonly breaker: CircuitBreaker<[OpportunityScoringRequest, AbortSignal], unknown>;

  constructor(
    @Inject(SCORING_ORACLE) private readonly oracle: ScoringOracle,
    @Inject(matchingConfig.KEY)
    private readonly config: ConfigType<typeof matchingConfig>,
    @InjectMetric(ORACLE_CALL_DURATION)
    private readonly durationHistogram: Histogram<string>,
    @InjectMetric(OPPORTUNITIES_SCORED_TOTAL)
    private readonly scoredCounter: Counter<string>,
    breakers: CircuitBreakerFactory,
  ) {
    this.breaker = breakers.createBreaker(
      'scoring-oracle',
      (request: OpportunityScoringRequest, signal: AbortSignal) =>
        this.oracle.scoreOpportunity(request, signal),
      // Each opportunity gets its own verdict; only the timeout applies
      { timeout: this.config.oracleTimeoutMs, tripOnFailure: false },
    );
  }

  /**
   * Scores one opportunity for one company. Never rejects: oracle failures
   * come back as a zero-score match whose reasoning names the cause.
   */
  async score(
    companyId: string,
    characterization: CompanyCharacterization,
    opportunity: OpportunityInput,
  ): Promise<ScoredMatch> {
    const request: OpportunityScoringRequest = {
      characterization,
      opportunity: {
        id: opportunity.id,
        title: opportunity.title,
        description: opportunity.description,
        type: opportunity.type,
        source: opportunity.source,
        tags: opportunity.tags,
        contentPreview: previewOf(opportunity.content ?? '', this.config.contentPreviewLength),
      },
    };

    const stopTimer = this.durationHistogram.startTimer({ oracle: 'scoring' });
    try {
      const controller = new AbortController();
      const raw = await this.breaker.fire(request, controller.signal).catch((error: unknown) => {
        controller.abort(error);
        throw translateBreakerError(error);
      });
      const match = this.toMatch(companyId, opportunity.id, raw);

      this.logger.log(
        `Opportunity scored: ${match.relevanceScore.toFixed(2)} for ${opportunity.title}`,
      );
      this.scoredCounter.inc({ outcome: match.errorKind ? 'adjusted' : 'scored' });
      return match;
    } catch (error: unknown) {
      const oracleError = toOracleError(error);
      this.logger.error(
        `Scoring failed for opportunity ${opportunity.id}: ${oracleError.message}`,
        oracleError.stack,
      );
      this.scoredCounter.inc({ outcome: 'failed' });
      return {
        companyId,
        opportunityId: opportunity.id,
        relevanceScore: 0,
        relevanceTier: toRelevanceTier(0),
        reasoning: `Analysis unavailable: ${oracleError.message}`,
        keyMatchFactors: [],
        actionability: null,
        status: MatchStatus.PENDING,
        errorKind: oracleError.kind,
        createdAt: new Date(),
      };
    } finally {
      stopTimer();
    }
  }

  private toMatch(companyId: string, opportunityId: string, raw: unknown): ScoredMatch {
    const parsed = ScoringResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedOracleResponseError(
        `Scoring response is not a JSON object: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      );
    }

    const { score, inRange } = normalizeScore(parsed.data.relevance_score);
    if (!inRange) {
      this.logger.warn(
        `Scoring oracle returned invalid relevance_score ${JSON.stringify(parsed.data.relevance_score) ?? 'undefined'} for ${opportunityId}; using ${score}`,
      );
    }

    return {
      companyId,
      opportunityId,
      relevanceScore: score,
      relevanceTier: toRelevanceTier(score),
      reasoning: parsed.data.reasoning || MISSING_REASONING,
      keyMatchFactors: parsed.data.key_match_factors,
      actionability: parsed.data.actionability || null,
      status: MatchStatus.PENDING,
      errorKind: inRange ? null : OracleErrorKind.INVALID_SCORE_RANGE,
      createdAt: new Date(),
    };
  }
}
