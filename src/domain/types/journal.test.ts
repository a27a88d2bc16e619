import { describe, it, expect } from 'vitest';
import { DateKeySchema } from './journal.js';

describe('DateKeySchema', () => {
  it('accepts a calendar date', () => {
    expect(DateKeySchema.parse('2024-01-01')).toBe('2024-01-01');
    expect(DateKeySchema.parse('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects impossible dates and other shapes', () => {
    for (const value of ['2023-02-29', '2024-13-01', '2024-1-1', '20240101', 'today']) {
      expect(DateKeySchema.safeParse(value).success).toBe(false);
    }
  });
});
