import type { Account } from '../accounts/account.entity';

export function buildPrompt(account: Account, instructions?: string): string {
  const prompt: Record<string, unknown> = {
    account: {
      id: account.id,
      name: account.name,
      industry: account.industry,
      website: account.website,
      notes: account.notes,
    },
  };

  const trimmed = instructions?.trim();
  if (trimmed) {
    prompt.instructions = trimmed;
  }

  return JSON.stringify(prompt, null, 2);
}

/** Callback URL handed to the agent; `request` ties the answer to its run. */
export function webhookUrl(
  baseUrl: string,
  accountId: number,
  requestId: string,
): string {
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}/webhook/${accountId}?request=${encodeURIComponent(requestId)}`;
}
