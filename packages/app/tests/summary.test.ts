import { describe, it, expect } from 'vitest';
import { formatDistributionMessage, formatSessionLookup } from '../src/formatters/summary.js';

describe('formatDistributionMessage', () => {
  it('should list former and redistricted counts', () => {
    expect(formatDistributionMessage({ total: 541, former: 3, redistricted: 1 })).toBe(
      'including 3 former, 1 redistricted'
    );
  });

  it('should leave out zero counts', () => {
    expect(formatDistributionMessage({ total: 541, former: 3, redistricted: 0 })).toBe('including 3 former');
    expect(formatDistributionMessage({ total: 541, former: 0, redistricted: 2 })).toBe('including 2 redistricted');
  });

  it('should be empty when there is nothing to report', () => {
    expect(formatDistributionMessage({ total: 100, former: 0, redistricted: 0 })).toBe('');
  });
});

describe('formatSessionLookup', () => {
  it('should describe an even year', () => {
    expect(formatSessionLookup(2014)).toEqual(['Congress in session during 2014:', '  113th Congress (2013-2015)']);
  });

  it('should describe the 1933 handover', () => {
    expect(formatSessionLookup(1933)).toEqual([
      'Congress in session during 1933:',
      '  72nd Congress (1931-March 1933) & 73rd Congress (January 1933-1935)',
    ]);
  });
});
