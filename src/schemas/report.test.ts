import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { parseDateRange } from './report';

function rejectionIssues(input: unknown): unknown {
  try {
    parseDateRange(input);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.details?.issues;
    }
    throw error;
  }
  throw new Error('expected parseDateRange to reject');
}

describe('parseDateRange', () => {
  it('accepts an inclusive range, including a single day', () => {
    expect(parseDateRange({ startDate: '2024-02-01', endDate: '2024-02-29' })).toEqual({
      startDate: '2024-02-01',
      endDate: '2024-02-29',
    });
    expect(parseDateRange({ startDate: '2024-05-01', endDate: '2024-05-01' })).toEqual({
      startDate: '2024-05-01',
      endDate: '2024-05-01',
    });
  });

  it('rejects days that do not exist in the month', () => {
    expect(rejectionIssues({ startDate: '2024-02-01', endDate: '2024-02-31' })).toEqual(
      expect.arrayContaining(['endDate: Invalid calendar date'])
    );
    expect(rejectionIssues({ startDate: '2023-02-29', endDate: '2023-03-01' })).toEqual(
      expect.arrayContaining(['startDate: Invalid calendar date'])
    );
    expect(rejectionIssues({ startDate: '2024-13-01', endDate: '2024-13-02' })).toEqual(
      expect.arrayContaining(['startDate: Invalid calendar date', 'endDate: Invalid calendar date'])
    );
  });

  it('rejects other formats', () => {
    expect(() => parseDateRange({ startDate: '05/01/2024', endDate: '2024-05-02' })).toThrow('Invalid date range');
  });
});
