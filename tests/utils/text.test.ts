import { describe, it, expect } from 'vitest';
import { sanitizeText, isSanitizedText } from '@ledgerline/types';

describe('sanitizeText', () => {
  it('should replace punctuation with spaces and collapse whitespace', () => {
    expect(sanitizeText('  Online   Transfer - Ref#123 ')).toBe('Online Transfer Ref 123');
  });

  it('should drop apostrophes without splitting the word', () => {
    expect(sanitizeText("Joe's Coffee")).toBe('Joes Coffee');
  });

  it('should return an empty string for punctuation only', () => {
    expect(sanitizeText('*** --- ...')).toBe('');
  });

  it('should produce text that passes isSanitizedText', () => {
    const cleaned = sanitizeText('ACH: Payroll / Jan (2023)');
    expect(cleaned).toBe('ACH Payroll Jan 2023');
    expect(isSanitizedText(cleaned)).toBe(true);
    expect(isSanitizedText('ACH: Payroll')).toBe(false);
  });
});
