import {
  NO_ACCOUNT_DATA,
  parseAgentOutput,
  toEnrichmentResult,
} from './enrichment-output';
import { Industry } from '../accounts/industry.enum';

describe('parseAgentOutput', () => {
  it('should read a plain object', () => {
    expect(parseAgentOutput({ website: 'https://acme.com' })).toEqual({
      website: 'https://acme.com',
    });
  });

  it('should unwrap a result key', () => {
    expect(
      parseAgentOutput({ result: { notes: 'Series B, 120 staff' } }),
    ).toEqual({ notes: 'Series B, 120 staff' });
  });

  it('should find the object inside surrounding text', () => {
    const text = 'Here is what I found:\n```json\n{"website": "https://acme.com"}\n```';

    expect(parseAgentOutput(text)).toEqual({ website: 'https://acme.com' });
  });

  it('should read JSON text under a result key', () => {
    expect(parseAgentOutput({ result: '{"name": "Acme Corp"}' })).toEqual({
      name: 'Acme Corp',
    });
  });

  it('should drop unknown keys', () => {
    expect(
      parseAgentOutput({ website: 'https://acme.com', employees: 120, id: 9 }),
    ).toEqual({ website: 'https://acme.com' });
  });

  it('should match industries case-insensitively and drop unknown ones', () => {
    expect(parseAgentOutput({ industry: ' technology ' })).toEqual({
      industry: Industry.TECHNOLOGY,
    });
    expect(parseAgentOutput({ industry: 'Space Mining' })).toEqual({});
  });

  it('should trim values and drop blank ones', () => {
    expect(parseAgentOutput({ notes: '  Renewal in March  ' })).toEqual({
      notes: 'Renewal in March',
    });
    expect(parseAgentOutput({ name: '   ' })).toEqual({});
  });

  it('should keep valid fields next to null, empty or mistyped ones', () => {
    expect(
      parseAgentOutput({ website: 'https://acme.com', industry: null }),
    ).toEqual({ website: 'https://acme.com' });
    expect(parseAgentOutput({ website: 'https://acme.com', notes: '' })).toEqual(
      { website: 'https://acme.com' },
    );
    expect(parseAgentOutput({ name: 'Acme', website: 42, industry: 7 })).toEqual(
      { name: 'Acme' },
    );
  });

  it('should return null when no object can be read', () => {
    expect(parseAgentOutput('no json here')).toBeNull();
    expect(parseAgentOutput('{not json}')).toBeNull();
    expect(parseAgentOutput([{ website: 'https://acme.com' }])).toBeNull();
    expect(parseAgentOutput(undefined)).toBeNull();
    expect(parseAgentOutput({})).toBeNull();
    expect(parseAgentOutput({ result: {} })).toBeNull();
  });
});

describe('toEnrichmentResult', () => {
  it('should succeed with the parsed fields', () => {
    expect(toEnrichmentResult({ website: 'https://acme.com' })).toEqual({
      status: 'succeeded',
      fields: { website: 'https://acme.com' },
    });
  });

  it('should succeed when one field is null', () => {
    expect(
      toEnrichmentResult({ website: 'https://acme.com', industry: null }),
    ).toEqual({
      status: 'succeeded',
      fields: { website: 'https://acme.com' },
    });
  });

  it('should fail on an empty body', () => {
    expect(toEnrichmentResult({})).toEqual({
      status: 'failed',
      error: NO_ACCOUNT_DATA,
    });
  });

  it('should fail when the output has no account data', () => {
    expect(toEnrichmentResult('Sorry, I could not find anything.')).toEqual({
      status: 'failed',
      error: NO_ACCOUNT_DATA,
    });
  });
});
