import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import type CircuitBreaker from 'opossum';
import { Histogram } from 'prom-client';
import matchingConfig from '../config/matching.config';
import {
  CircuitBreakerFactory,
  translateBreakerError,
} from '../common/circuit-breaker.factory';
import { ORACLE_CALL_DURATION } from '../common/metrics.providers';
import {
  BusinessStage,
  CompanyCharacterization,
  CompanyProfileInput,
  GeographicScope,
  TechnologyAdoption,
} from './interfaces/matching.types';
import {
  ANALYSIS_ORACLE,
  ProfileAnalysisRequest,
} from './interfaces/oracle.interface';
import type { AnalysisOracle } from './interfaces/oracle.interface';
import {
  InvalidCompanyProfileError,
  MalformedOracleResponseError,
  OracleError,
  toOracleError,
} from './matching.errors';
import { buildProfileText } from './oracles/prompts';
import { CharacterizationResponseSchema } from './schemas/oracle-response.schema';

const UNKNOWN_INDUSTRY = 'unknown';

@Injectable()
export class ProfileAnalyzerService {
  private readonly logger = new Logger(ProfileAnalyzerService.name);
  private readonly breaker: CircuitBreaker<[ProfileAnalysisRequest, AbortSignal], unknown>;

  constructor(
    @Inject(ANALYSIS_ORACLE) private readonly oracle: AnalysisOracle,
    @Inject(matchingConfig.KEY)
    private readonly config: ConfigType<typeof matchingConfig>,
    @InjectMetric(ORACLE_CALL_DURATION)
    private readonly durationHistogram: Histogram<string>,
    breakers: CircuitBreakerFactory,
  ) {
    this.breaker = breakers.createBreaker(
      'analysis-oracle',
      (request: ProfileAnalysisRequest, signal: AbortSignal) =>
        this.oracle.analyzeProfile(request, signal),
      { timeout: this.config.oracleTimeoutMs, tripOnFailure: false },
    );
  }

  /**
   * Derives a complete characterization from a profile. Oracle failures
   * degrade to a profile-derived fallback; only an empty profile throws.
   */
  async analyze(profile: CompanyProfileInput): Promise<CompanyCharacterization> {
    if (isEmptyProfile(profile)) {
      throw new InvalidCompanyProfileError(profile.id);
    }

    const stopTimer = this.durationHistogram.startTimer({ oracle: 'analysis' });
    try {
      const controller = new AbortController();
      const raw = await this.breaker
        .fire({ profile, profileText: buildProfileText(profile) }, controller.signal)
        .catch((error: unknown) => {
          controller.abort(error);
          throw translateBreakerError(error);
        });

      const characterization = this.normalize(raw, profile);
      this.logger.log(`Company profile analyzed for ${profile.companyName}`);
      return characterization;
    } catch (error: unknown) {
      const oracleError = toOracleError(error);
      this.logger.error(
        `Profile analysis failed for ${profile.companyName}, using fallback: ${oracleError.message}`,
        oracleError.stack,
      );
      return fallbackCharacterization(profile, oracleError);
    } finally {
      stopTimer();
    }
  }

  private normalize(raw: unknown, profile: CompanyProfileInput): CompanyCharacterization {
    const parsed = CharacterizationResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedOracleResponseError(
        `Characterization is not a JSON object: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      );
    }

    const data = parsed.data;
    return {
      industryFocus: data.industry_focus || industryOf(profile),
      businessStage: data.business_stage,
      targetCustomers: data.target_customers,
      growthPriorities: data.growth_priorities,
      technologyAdoption: data.technology_adoption,
      geographicScope: data.geographic_scope,
      keyCapabilities: data.key_capabilities,
      partnershipInterests: data.partnership_interests,
      metadata: { source: 'oracle' },
    };
  }
}

function industryOf(profile: CompanyProfileInput): string {
  return profile.industry.trim() || UNKNOWN_INDUSTRY;
}

export function fallbackCharacterization(
  profile: CompanyProfileInput,
  error: OracleError,
): CompanyCharacterization {
  return {
    industryFocus: industryOf(profile),
    businessStage: BusinessStage.UNKNOWN,
    targetCustomers: [],
    growthPriorities: [],
    technologyAdoption: TechnologyAdoption.UNKNOWN,
    geographicScope: GeographicScope.UNKNOWN,
    keyCapabilities: [],
    partnershipInterests: [],
    metadata: { source: 'fallback', errorKind: error.kind, error: error.message },
  };
}

export function isEmptyProfile(profile: CompanyProfileInput): boolean {
  const text = [
    profile.companyName,
    profile.industry,
    profile.businessType,
    profile.companySize,
    profile.description,
  ];
  const lists = [profile.services, profile.targetMarkets, profile.keyChallenges];

  return (
    text.every((value) => value.trim() === '') &&
    lists.every((items) => items.every((item) => item.trim() === ''))
  );
}
