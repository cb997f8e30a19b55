import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UnprocessableEntityException,
} from '@nestjs/common';
import { CircuitBreakerFactory, CircuitHealth } from '../common/circuit-breaker.factory';
import {
  ListMatchesQueryDto,
  RunMatchingDto,
  UpdateMatchStatusDto,
} from './dto/run-matching.dto';
import type { MatchingRunResult } from './interfaces/matching.types';
import { Match } from './match.entity';
import { MatchesService } from './matches.service';
import { InvalidCompanyProfileError } from './matching.errors';
import { MatchingRunsService } from './matching-runs.service';

@Controller()
export class MatchingController {
  constructor(
    private readonly matchingRuns: MatchingRunsService,
    private readonly matchesService: MatchesService,
    private readonly breakers: CircuitBreakerFactory,
  ) {}

  /** Runs the pipeline inline and returns the result without storing it. */
  @Post('matching/preview')
  @HttpCode(200)
  async preview(@Body() dto: RunMatchingDto): Promise<MatchingRunResult> {
    try {
      return await this.matchingRuns.runForCompany(dto.companyId, dto.minScore);
    } catch (error: unknown) {
      if (error instanceof InvalidCompanyProfileError) {
        throw new UnprocessableEntityException(error.message);
      }
      throw error;
    }
  }

  @Post('matching/runs')
  @HttpCode(202)
  enqueue(@Body() dto: RunMatchingDto): Promise<{ jobId: string | undefined }> {
    return this.matchingRuns.enqueue({ companyId: dto.companyId, minScore: dto.minScore });
  }

  @Get('matching/oracles/health')
  oracleHealth(): Record<string, CircuitHealth> {
    return this.breakers.health();
  }

  @Get('profiles/:id/matches')
  findForCompany(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ListMatchesQueryDto,
  ): Promise<Match[]> {
    return this.matchesService.findForCompany(id, query.status);
  }

  @Patch('matches/:id/status')
  updateStatus(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateMatchStatusDto,
  ): Promise<Match> {
    return this.matchesService.updateStatus(id, dto.status);
  }
}
