import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import demoOpportunities from '../data/demo-opportunities.json';
import { OpportunityType } from '../../matching/interfaces/matching.types';
import type {
  CollectedOpportunity,
  OpportunityCollector,
} from '../interfaces/opportunity-collector.interface';

const DAY_MS = 24 * 60 * 60 * 1000;

const DemoOpportunitySchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  content: z.string(),
  source: z.string(),
  sourceUrl: z.string().url(),
  type: z.nativeEnum(OpportunityType),
  tags: z.array(z.string()),
  publishedDaysAgo: z.number().int().nonnegative(),
  metadata: z.record(z.unknown()),
});

/** Serves a bundled catalog so the pipeline can run without live sources. */
@Injectable()
export class DemoOpportunityCollector implements OpportunityCollector {
  readonly name = 'demo';
  private readonly logger = new Logger(DemoOpportunityCollector.name);

  collect(): Promise<CollectedOpportunity[]> {
    const now = Date.now();
    const items = z
      .array(DemoOpportunitySchema)
      .parse(demoOpportunities)
      .map(({ publishedDaysAgo, ...item }) => ({
        ...item,
        publishedAt: new Date(now - publishedDaysAgo * DAY_MS),
      }));

    this.logger.log(`Collected ${items.length} demo opportunities`);
    return Promise.resolve(items);
  }
}
