import { describe, it, expect } from 'vitest';
import { canTransition } from '../../../src/domain/model/ReaderState.js';

describe('ReaderState state machine', () => {
  it('should allow UNOPENED → OPEN', () => {
    expect(canTransition('UNOPENED', 'OPEN')).toBe(true);
  });

  it('should allow OPEN → ITERATING', () => {
    expect(canTransition('OPEN', 'ITERATING')).toBe(true);
  });

  it('should allow ITERATING → EXHAUSTED', () => {
    expect(canTransition('ITERATING', 'EXHAUSTED')).toBe(true);
  });

  it('should allow CLOSED from every non-terminal state', () => {
    expect(canTransition('UNOPENED', 'CLOSED')).toBe(true);
    expect(canTransition('OPEN', 'CLOSED')).toBe(true);
    expect(canTransition('ITERATING', 'CLOSED')).toBe(true);
    expect(canTransition('EXHAUSTED', 'CLOSED')).toBe(true);
  });

  it('should not allow leaving CLOSED', () => {
    expect(canTransition('CLOSED', 'OPEN')).toBe(false);
    expect(canTransition('CLOSED', 'ITERATING')).toBe(false);
    expect(canTransition('CLOSED', 'UNOPENED')).toBe(false);
  });

  it('should not allow going back from EXHAUSTED', () => {
    expect(canTransition('EXHAUSTED', 'ITERATING')).toBe(false);
    expect(canTransition('EXHAUSTED', 'OPEN')).toBe(false);
  });

  it('should not allow skipping OPEN', () => {
    expect(canTransition('UNOPENED', 'ITERATING')).toBe(false);
  });
});
