import { registerAs } from '@nestjs/config';
import { DEFAULT_MIN_SCORE } from '../matching/scoring';

export enum OracleProviderName {
  GEMINI = 'GEMINI',
  OPENAI = 'OPENAI',
  HEURISTIC = 'HEURISTIC',
}

export interface MatchingConfig {
  minScore: number;
  concurrency: number;
  oracleTimeoutMs: number;
  contentPreviewLength: number;
  oracleProvider: OracleProviderName;
}

export const MATCHING_CONFIG = 'matching';

function readNumber(
  raw: string | undefined,
  fallback: number,
  isValid: (value: number) => boolean,
): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && isValid(value) ? value : fallback;
}

function readProvider(raw: string | undefined): OracleProviderName {
  const name = (raw ?? '').trim().toUpperCase();
  switch (name) {
    case OracleProviderName.GEMINI:
      return OracleProviderName.GEMINI;
    case OracleProviderName.OPENAI:
      return OracleProviderName.OPENAI;
    default:
      return OracleProviderName.HEURISTIC;
  }
}

export function loadMatchingConfig(env: NodeJS.ProcessEnv = process.env): MatchingConfig {
  return {
    minScore: readNumber(env.MATCH_MIN_SCORE, DEFAULT_MIN_SCORE, (v) => v >= 0 && v <= 1),
    concurrency: readNumber(env.MATCH_CONCURRENCY, 5, (v) => Number.isInteger(v) && v > 0),
    oracleTimeoutMs: readNumber(env.ORACLE_TIMEOUT_MS, 30000, (v) => v > 0),
    contentPreviewLength: readNumber(
      env.CONTENT_PREVIEW_LENGTH,
      500,
      (v) => Number.isInteger(v) && v >= 0,
    ),
    oracleProvider: readProvider(env.ORACLE_PROVIDER),
  };
}

export default registerAs(MATCHING_CONFIG, (): MatchingConfig => loadMatchingConfig());
