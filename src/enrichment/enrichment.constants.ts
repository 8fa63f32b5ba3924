export const ENRICHMENT_QUEUE = 'account-enrichment';

export enum EnrichmentJob {
  DISPATCH = 'dispatch',
  EXPIRE = 'expire',
}

export interface EnrichmentJobData {
  accountId: number;
  requestId: string;
  instructions?: string;
}
