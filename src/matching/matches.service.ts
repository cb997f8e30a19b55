import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { MatchStatus, ScoredMatch } from './interfaces/matching.types';
import { Match } from './match.entity';

/** Reviewer transitions; anything else is rejected. */
const ALLOWED_TRANSITIONS: Record<MatchStatus, readonly MatchStatus[]> = {
  [MatchStatus.PENDING]: [MatchStatus.ACCEPTED, MatchStatus.DISMISSED],
  [MatchStatus.ACCEPTED]: [MatchStatus.PENDING],
  [MatchStatus.DISMISSED]: [MatchStatus.PENDING],
};

export function canTransition(from: MatchStatus, to: MatchStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

@Injectable()
export class MatchesService {
  private readonly logger = new Logger(MatchesService.name);

  constructor(
    @InjectRepository(Match)
    private readonly matchRepository: Repository<Match>,
  ) {}

  /**
   * Swaps the company's pending matches for a fresh ranked set. Matches a
   * reviewer already accepted or dismissed are kept, and their
   * opportunities are not re-added as pending. Runs in one transaction
   * holding a per-company advisory lock, so concurrent runs for the same
   * company apply one after the other and a failed save keeps the old set.
   */
  async replacePending(companyId: string, ranked: ScoredMatch[]): Promise<Match[]> {
    const { saved, reviewedCount } = await this.matchRepository.manager.transaction(
      async (manager) => {
        await manager.query('SELECT pg_advisory_xact_lock(hashtext($1))', [companyId]);
        const matches = manager.getRepository(Match);

        const reviewed = await matches.find({
          where: {
            companyId,
            status: In([MatchStatus.ACCEPTED, MatchStatus.DISMISSED]),
          },
        });
        const reviewedOpportunities = new Set(reviewed.map((match) => match.opportunityId));

        await matches.delete({ companyId, status: MatchStatus.PENDING });

        const fresh = ranked
          .filter((match) => !reviewedOpportunities.has(match.opportunityId))
          .map((match) => matches.create({ ...match, companyId }));

        return {
          saved: fresh.length > 0 ? await matches.save(fresh) : [],
          reviewedCount: reviewed.length,
        };
      },
    );

    this.logger.log(
      `Stored ${saved.length} pending matches for company ${companyId} (${reviewedCount} reviewed kept)`,
    );
    return saved;
  }

  findForCompany(companyId: string, status?: MatchStatus): Promise<Match[]> {
    return this.matchRepository.find({
      where: status ? { companyId, status } : { companyId },
      order: { relevanceScore: 'DESC', createdAt: 'ASC' },
    });
  }

  async updateStatus(id: string, status: MatchStatus): Promise<Match> {
    const match = await this.matchRepository.findOne({ where: { id } });
    if (!match) {
      throw new NotFoundException(`Match ${id} not found`);
    }
    if (!canTransition(match.status, status)) {
      throw new ConflictException(
        `Match ${id} cannot move from ${match.status} to ${status}`,
      );
    }
    if (match.status === status) {
      return match;
    }

    match.status = status;
    return this.matchRepository.save(match);
  }
}
