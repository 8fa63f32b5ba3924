import { z } from 'zod';
import { INDUSTRIES, Industry } from '../accounts/industry.enum';

function toIndustry(value: string): Industry | undefined {
  const wanted = value.trim().toLowerCase();
  return INDUSTRIES.find((industry) => industry.toLowerCase() === wanted);
}

// null, blank or non-string values count as absent
const optionalText = z.string().trim().min(1).optional().catch(undefined);

/**
 * Account fields an agent may fill in. Each field is checked on its own, so
 * one bad value never discards the rest. Unknown keys are dropped.
 */
export const EnrichmentFieldsSchema = z.object({
  name: optionalText,
  industry: z.string().transform(toIndustry).optional().catch(undefined),
  website: optionalText,
  notes: optionalText,
});

export type EnrichmentFields = z.infer<typeof EnrichmentFieldsSchema>;

export type EnrichmentResult =
  | { status: 'succeeded'; fields: EnrichmentFields }
  | { status: 'failed'; error: string };

export const NO_ACCOUNT_DATA = 'Agent response contained no account data';

function extractJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  try {
    return JSON.parse(trimmed);
  } catch {
    // Agents often wrap the object in prose or a code fence
    const jsonMatch = trimmed.match(/\{[\s\S]*\}/);
    if (!jsonMatch) return undefined;
    try {
      return JSON.parse(jsonMatch[0]);
    } catch {
      return undefined;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the enrichable fields out of an agent answer: a JSON object, text
 * containing one, or either of those under a `result` key. Returns null when
 * no object can be found or the object is empty.
 */
export function parseAgentOutput(
  output: unknown,
  depth = 0,
): EnrichmentFields | null {
  const value = typeof output === 'string' ? extractJson(output) : output;
  if (!isRecord(value) || Object.keys(value).length === 0) return null;

  if (depth === 0 && 'result' in value) {
    return parseAgentOutput(value.result, depth + 1);
  }

  const parsed = EnrichmentFieldsSchema.safeParse(value);
  if (!parsed.success) return null;

  const fields: EnrichmentFields = {};
  if (parsed.data.name !== undefined) fields.name = parsed.data.name;
  if (parsed.data.industry !== undefined) fields.industry = parsed.data.industry;
  if (parsed.data.website !== undefined) fields.website = parsed.data.website;
  if (parsed.data.notes !== undefined) fields.notes = parsed.data.notes;
  return fields;
}

export function toEnrichmentResult(output: unknown): EnrichmentResult {
  const fields = parseAgentOutput(output);
  return fields
    ? { status: 'succeeded', fields }
    : { status: 'failed', error: NO_ACCOUNT_DATA };
}
