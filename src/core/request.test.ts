import { describe, expect, it } from 'vitest';
import { AppError, ERROR_CODES } from './errors';
import { RequestLifecycle, isTerminal, type StateChange } from './request';

describe('RequestLifecycle', () => {
  it('walks the happy path and records every change', () => {
    const seen: StateChange[] = [];
    let tick = 0;
    const lifecycle = new RequestLifecycle((change) => seen.push(change), () => ++tick);

    lifecycle.advance('metadataFetched');
    lifecycle.advance('downloading');
    lifecycle.advance('processing');
    lifecycle.advance('complete');

    expect(lifecycle.state).toBe('complete');
    expect(lifecycle.history.map((c) => c.to)).toEqual(['metadataFetched', 'downloading', 'processing', 'complete']);
    expect(seen).toEqual(lifecycle.history);
    expect(seen[0]).toEqual({ from: 'pending', to: 'metadataFetched', at: 1 });
  });

  it('can fail from any non-terminal state and keeps the error', () => {
    const lifecycle = new RequestLifecycle();
    lifecycle.advance('metadataFetched');
    const cause = new Error('network down');

    lifecycle.fail(cause);

    expect(lifecycle.state).toBe('failed');
    expect(lifecycle.error).toBe(cause);
  });

  it('rejects skipping a state', () => {
    const lifecycle = new RequestLifecycle();
    try {
      lifecycle.advance('downloading');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: ERROR_CODES.ERR_INVALID_STATE });
    }
    expect(lifecycle.state).toBe('pending');
  });

  it('does not leave a terminal state', () => {
    const failed = new RequestLifecycle();
    failed.fail(new Error('x'));
    expect(() => failed.advance('metadataFetched')).toThrow('Illegal transition failed -> metadataFetched');
    expect(() => failed.fail(new Error('y'))).toThrow(AppError);
  });

  it('requires fail() for the failed state', () => {
    const lifecycle = new RequestLifecycle();
    expect(() => lifecycle.advance('failed')).toThrow('Use fail() to mark a request as failed');
  });

  it('classifies terminal states', () => {
    expect(isTerminal('complete')).toBe(true);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('processing')).toBe(false);
  });
});
