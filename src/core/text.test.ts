import { describe, it, expect } from 'vitest';
import { compact, summarize, truncateBytes } from './text.js';
import { maskValue, redactText } from './redact.js';

describe('compact', () => {
  it('should collapse whitespace', () => {
    expect(compact('  a \n\t b  ', 10)).toBe('a b');
  });

  it('should cap at maxChars including the ellipsis', () => {
    expect(compact('abcdefgh', 5)).toBe('abcd…');
    expect(compact('abcde', 5)).toBe('abcde');
    expect(compact('abc', 0)).toBe('');
  });

  it('should count code points, not UTF-16 units', () => {
    expect(compact('😀😀😀', 2)).toBe('😀…');
  });
});

describe('truncateBytes', () => {
  it('should leave short text alone', () => {
    expect(truncateBytes('abc', 3)).toEqual({ text: 'abc', truncated: false });
  });

  it('should never split a multi-byte character', () => {
    // "é" is two bytes
    expect(truncateBytes('aé', 2)).toEqual({ text: 'a', truncated: true });
    expect(truncateBytes('aé', 3)).toEqual({ text: 'aé', truncated: false });
  });
});

describe('redaction', () => {
  it('should mask short and long values differently', () => {
    expect(maskValue('short')).toBe('***REDACTED***');
    expect(maskValue('abcdefghijkl')).toBe('abcd***ijkl');
  });

  it('should mask bearer tokens and report what it found', () => {
    const { redacted, findings } = redactText('auth: Bearer test-token-value');
    expect(redacted).toBe('auth: Bear***alue');
    expect(findings).toEqual([{ type: 'bearer', masked: 'Bear***alue' }]);
  });

  it('should mask sk- style keys', () => {
    const key = `sk-${'x'.repeat(24)}`;
    expect(redactText(`key=${key}`).redacted).toBe('key=sk-x***xxxx');
  });

  it('should leave ordinary text untouched', () => {
    expect(redactText('nothing secret here')).toEqual({ redacted: 'nothing secret here', findings: [] });
  });

  it('should redact before compacting', () => {
    expect(summarize('Bearer test-token-value   trailing', 100)).toBe('Bear***alue trailing');
  });
});
