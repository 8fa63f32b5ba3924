export type EnrichmentOutcome = 'succeeded' | 'failed';

/** Pushed to the subscribers of an account when its enrichment finishes. */
export interface EnrichmentCompleteEvent {
  type: 'enrichment_complete';
  accountId: number;
  requestId: string;
  status: EnrichmentOutcome;
  account: Record<string, unknown>;
  error?: string;
}
