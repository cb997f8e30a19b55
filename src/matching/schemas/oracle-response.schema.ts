import { z } from 'zod';
import {
  BusinessStage,
  GeographicScope,
  TechnologyAdoption,
} from '../interfaces/matching.types';

// Oracles answer in free-form JSON; every field degrades to a default
// instead of failing the whole object.

const stringList = z
  .union([z.array(z.unknown()), z.string()])
  .transform((value) =>
    (typeof value === 'string' ? value.split(',') : value)
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )
  .catch([]);

const optionalText = z.string().trim().catch('');

function lenientEnum<T extends Record<string, string>>(values: T, fallback: T[keyof T]) {
  return z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.nativeEnum(values))
    .catch(fallback);
}

export const CharacterizationResponseSchema = z.object({
  industry_focus: optionalText,
  business_stage: lenientEnum(BusinessStage, BusinessStage.UNKNOWN),
  target_customers: stringList,
  growth_priorities: stringList,
  technology_adoption: lenientEnum(TechnologyAdoption, TechnologyAdoption.UNKNOWN),
  geographic_scope: lenientEnum(GeographicScope, GeographicScope.UNKNOWN),
  key_capabilities: stringList,
  partnership_interests: stringList,
});

export type CharacterizationResponse = z.infer<typeof CharacterizationResponseSchema>;

export const ScoringResponseSchema = z.object({
  // Range checks happen after parsing so out-of-range values can be clamped.
  relevance_score: z.unknown(),
  reasoning: optionalText,
  key_match_factors: stringList,
  actionability: z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .catch(''),
});

export type ScoringResponse = z.infer<typeof ScoringResponseSchema>;
