import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const OPPORTUNITIES_SCORED_TOTAL = 'opportunities_scored_total';
export const MATCHING_RUNS_TOTAL = 'matching_runs_total';
export const ORACLE_CALL_DURATION = 'oracle_call_duration_seconds';

export const metricsProviders = [
  makeCounterProvider({
    name: OPPORTUNITIES_SCORED_TOTAL,
    help: 'Total number of opportunity scoring attempts',
    labelNames: ['outcome'],
  }),
  makeCounterProvider({
    name: MATCHING_RUNS_TOTAL,
    help: 'Total number of company matching runs',
    labelNames: ['status'],
  }),
  makeHistogramProvider({
    name: ORACLE_CALL_DURATION,
    help: 'Duration of analysis and scoring oracle calls in seconds',
    labelNames: ['oracle'],
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  }),
];
