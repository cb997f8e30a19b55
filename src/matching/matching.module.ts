import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import { metricsProviders } from '../common/metrics.providers';
import matchingConfig, { OracleProviderName } from '../config/matching.config';
import { OpportunitiesModule } from '../opportunities/opportunities.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { ANALYSIS_ORACLE, SCORING_ORACLE } from './interfaces/oracle.interface';
import { Match } from './match.entity';
import { MatchRanker } from './match-ranker';
import { MatchesService } from './matches.service';
import { MatchingController } from './matching.controller';
import { MatchingProcessor } from './matching.processor';
import { MATCHING_QUEUE, MatchingRunsService } from './matching-runs.service';
import { MatchingService } from './matching.service';
import { GeminiOracle } from './oracles/gemini.oracle';
import { HeuristicOracle } from './oracles/heuristic.oracle';
import { OpenAiOracle } from './oracles/openai.oracle';
import { ProfileAnalyzerService } from './profile-analyzer.service';
import { RelevanceScorerService } from './relevance-scorer.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Match]),
    ConfigModule.forFeature(matchingConfig),
    BullModule.registerQueue({ name: MATCHING_QUEUE }),
    ProfilesModule,
    OpportunitiesModule,
  ],
  controllers: [MatchingController],
  providers: [
    CircuitBreakerFactory,
    ProfileAnalyzerService,
    RelevanceScorerService,
    MatchRanker,
    MatchingService,
    MatchesService,
    MatchingRunsService,
    MatchingProcessor,
    {
      // One oracle instance answers both analysis and scoring
      provide: ANALYSIS_ORACLE,
      useFactory: (
        config: ConfigType<typeof matchingConfig>,
        configService: ConfigService,
      ) => {
        switch (config.oracleProvider) {
          case OracleProviderName.GEMINI:
            return new GeminiOracle(configService);
          case OracleProviderName.OPENAI:
            return new OpenAiOracle(configService);
          case OracleProviderName.HEURISTIC:
          default:
            return new HeuristicOracle();
        }
      },
      inject: [matchingConfig.KEY, ConfigService],
    },
    {
      provide: SCORING_ORACLE,
      useExisting: ANALYSIS_ORACLE,
    },
    ...metricsProviders,
  ],
  exports: [MatchingService],
})
export class MatchingModule {}
