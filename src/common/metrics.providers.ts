import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const ACCOUNT_ENRICHMENTS_TOTAL = 'account_enrichments_total';
export const AGENT_DISPATCH_DURATION = 'agent_dispatch_duration_seconds';

export const metricsProviders = [
  makeCounterProvider({
    name: ACCOUNT_ENRICHMENTS_TOTAL,
    help: 'Total number of finished account enrichments',
    labelNames: ['outcome'],
  }),
  makeHistogramProvider({
    name: AGENT_DISPATCH_DURATION,
    help: 'Duration of the outbound agent call in seconds',
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  }),
];
