import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { OpportunitiesService } from '../opportunities/opportunities.service';
import { ProfilesService } from '../profiles/profiles.service';
import type { MatchingRunResult } from './interfaces/matching.types';
import { MatchingService } from './matching.service';

export const MATCHING_QUEUE = 'matching-runs';
export const MATCH_COMPANY_JOB = 'match-company';

/** Data payload for a queued matching run */
export interface MatchingJobData {
  companyId: string;
  minScore?: number;
}

@Injectable()
export class MatchingRunsService {
  constructor(
    private readonly profilesService: ProfilesService,
    private readonly opportunitiesService: OpportunitiesService,
    private readonly matchingService: MatchingService,
    @InjectQueue(MATCHING_QUEUE)
    private readonly matchingQueue: Queue<MatchingJobData>,
  ) {}

  /** Scores the company against the whole stored catalog. */
  async runForCompany(companyId: string, minScore?: number): Promise<MatchingRunResult> {
    const profile = await this.profilesService.findOne(companyId);
    const opportunities = await this.opportunitiesService.findAll();
    return this.matchingService.findMatches(profile, opportunities, { minScore });
  }

  async enqueue(data: MatchingJobData): Promise<{ jobId: string | undefined }> {
    await this.profilesService.findOne(data.companyId);

    const job = await this.matchingQueue.add(MATCH_COMPANY_JOB, data, {
      attempts: 5,
      backoff: {
        type: 'exponential',
        delay: 1000,
      },
    });
    return { jobId: job.id };
  }
}
