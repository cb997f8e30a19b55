import type { OpportunityInput } from '../../matching/interfaces/matching.types';

export type CollectedOpportunity = Omit<OpportunityInput, 'id'>;

export interface OpportunityCollector {
  readonly name: string;
  collect(): Promise<CollectedOpportunity[]>;
}

export const OPPORTUNITY_COLLECTOR = 'OPPORTUNITY_COLLECTOR';
