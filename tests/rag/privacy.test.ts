import { describe, it, expect } from 'vitest';

import {
  PERSONAL_INFO_WARNING,
  containsPersonalNames,
  detectPersonalNames,
} from '../../lib/src/rag/index.js';

describe('detectPersonalNames', () => {
  it('should find capitalised word pairs', () => {
    expect(detectPersonalNames('can John Smith take leave after Mary Jones returns?')).toEqual([
      'John Smith',
      'Mary Jones',
    ]);
  });

  it('should ignore lowercase and single capitalised words', () => {
    expect(detectPersonalNames('how many vacation days does Sarah get?')).toEqual([]);
    expect(containsPersonalNames('what is the dress code')).toBe(false);
  });

  it('should flag any capitalised pair, including non-names', () => {
    expect(containsPersonalNames('Is Remote Work allowed?')).toBe(true);
  });
});

describe('PERSONAL_INFO_WARNING', () => {
  it('should end with a blank line so it can prefix an answer', () => {
    expect(PERSONAL_INFO_WARNING.endsWith('\n\n')).toBe(true);
  });
});
