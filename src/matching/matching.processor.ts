import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Job, UnrecoverableError } from 'bullmq';
import { Counter } from 'prom-client';
import { MATCHING_RUNS_TOTAL } from '../common/metrics.providers';
import { InvalidCompanyProfileError } from './matching.errors';
import { MatchesService } from './matches.service';
import {
  MATCHING_QUEUE,
  MatchingJobData,
  MatchingRunsService,
} from './matching-runs.service';

/** Result of a matching run job */
export interface MatchingJobResult {
  companyId: string;
  scored: number;
  stored: number;
  failures: number;
}

@Processor(MATCHING_QUEUE)
export class MatchingProcessor extends WorkerHost {
  private readonly logger = new Logger(MatchingProcessor.name);

  constructor(
    private readonly matchingRuns: MatchingRunsService,
    private readonly matchesService: MatchesService,
    @InjectMetric(MATCHING_RUNS_TOTAL)
    private readonly runsCounter: Counter<string>,
  ) {
    super();
  }

  async process(
    job: Pick<Job<MatchingJobData, MatchingJobResult, string>, 'id' | 'data'>,
  ): Promise<MatchingJobResult> {
    const { companyId, minScore } = job.data;
    this.logger.log(`Processing matching job ${job.id ?? '-'} for company ${companyId}`);

    try {
      const result = await this.matchingRuns.runForCompany(companyId, minScore);
      const stored = await this.matchesService.replacePending(companyId, result.ranked);

      this.runsCounter.inc({ status: result.failures > 0 ? 'partial' : 'success' });
      return {
        companyId,
        scored: result.scored.length,
        stored: stored.length,
        failures: result.failures,
      };
    } catch (error: unknown) {
      if (error instanceof InvalidCompanyProfileError) {
        this.runsCounter.inc({ status: 'invalid_profile' });
        // Retrying cannot fix an empty profile
        throw new UnrecoverableError(error.message);
      }
      this.runsCounter.inc({ status: 'error' });
      throw error;
    }
  }
}
