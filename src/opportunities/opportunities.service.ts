import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { createHash } from 'crypto';
import { OpportunityType } from '../matching/interfaces/matching.types';
import { CreateOpportunityDto } from './dto/create-opportunity.dto';
import {
  CollectedOpportunity,
  OPPORTUNITY_COLLECTOR,
} from './interfaces/opportunity-collector.interface';
import type { OpportunityCollector } from './interfaces/opportunity-collector.interface';
import { Opportunity } from './opportunity.entity';

export interface CatalogFilter {
  type?: OpportunityType;
  industry?: string;
}

export interface CollectionResult {
  collector: string;
  collected: number;
  stored: number;
  skipped: number;
}

export function dedupeKeyFor(item: Pick<CollectedOpportunity, 'sourceUrl' | 'title'>): string {
  const basis = item.sourceUrl.trim()
    ? item.sourceUrl.trim().toLowerCase()
    : `title::${item.title.trim().toLowerCase()}`;
  return createHash('sha256').update(basis).digest('hex');
}

function mentionsIndustry(opportunity: Opportunity, industry: string): boolean {
  const needle = industry.trim().toLowerCase();
  if (!needle) return true;
  return [opportunity.title, opportunity.description, ...opportunity.tags].some((text) =>
    text.toLowerCase().includes(needle),
  );
}

@Injectable()
export class OpportunitiesService {
  private readonly logger = new Logger(OpportunitiesService.name);

  constructor(
    @InjectRepository(Opportunity)
    private readonly opportunityRepository: Repository<Opportunity>,
    @Inject(OPPORTUNITY_COLLECTOR)
    private readonly collector: OpportunityCollector,
  ) {}

  async create(dto: CreateOpportunityDto): Promise<Opportunity> {
    const item: CollectedOpportunity = {
      title: dto.title.trim(),
      description: dto.description ?? '',
      content: dto.content ?? '',
      source: dto.source ?? '',
      sourceUrl: dto.sourceUrl ?? '',
      type: dto.type,
      tags: dto.tags ?? [],
      publishedAt: dto.publishedAt ?? new Date(),
      metadata: dto.metadata ?? {},
    };
    const dedupeKey = dedupeKeyFor(item);

    const existing = await this.opportunityRepository.findOne({
      where: { dedupeKey },
    });
    if (existing) {
      return existing;
    }

    return this.opportunityRepository.save(
      this.opportunityRepository.create({ ...item, dedupeKey }),
    );
  }

  /** Catalog read by matching runs, newest first. */
  async findAll(filter: CatalogFilter = {}): Promise<Opportunity[]> {
    const opportunities = await this.opportunityRepository.find({
      where: filter.type ? { type: filter.type } : {},
      order: { publishedAt: 'DESC' },
    });

    const { industry } = filter;
    return industry
      ? opportunities.filter((opportunity) => mentionsIndustry(opportunity, industry))
      : opportunities;
  }

  async collect(): Promise<CollectionResult> {
    const collected = await this.collector.collect();

    // Same URL twice in one batch still stores once
    const byKey = new Map<string, CollectedOpportunity>();
    for (const item of collected) {
      const key = dedupeKeyFor(item);
      if (!byKey.has(key)) byKey.set(key, item);
    }

    const keys = [...byKey.keys()];
    const existing =
      keys.length > 0
        ? await this.opportunityRepository.find({
            where: { dedupeKey: In(keys) },
            select: { dedupeKey: true },
          })
        : [];
    const known = new Set(existing.map((opportunity) => opportunity.dedupeKey));

    const fresh = keys
      .filter((key) => !known.has(key))
      .map((key) => {
        const item = byKey.get(key);
        return item ? this.opportunityRepository.create({ ...item, dedupeKey: key }) : null;
      })
      .filter((opportunity): opportunity is Opportunity => opportunity !== null);

    if (fresh.length > 0) {
      await this.opportunityRepository.save(fresh);
    }

    const result: CollectionResult = {
      collector: this.collector.name,
      collected: collected.length,
      stored: fresh.length,
      skipped: collected.length - fresh.length,
    };
    this.logger.log(
      `Collected ${result.collected} opportunities from ${result.collector}: ${result.stored} new, ${result.skipped} skipped`,
    );
    return result;
  }
}
