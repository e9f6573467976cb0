import { AppError, ERROR_CODES } from './errors';

export type RequestState = 'pending' | 'metadataFetched' | 'downloading' | 'processing' | 'complete' | 'failed';

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  pending: ['metadataFetched', 'failed'],
  metadataFetched: ['downloading', 'failed'],
  downloading: ['processing', 'failed'],
  processing: ['complete', 'failed'],
  complete: [],
  failed: [],
};

export interface StateChange {
  from: RequestState;
  to: RequestState;
  at: number;
}

export type TransitionListener = (change: StateChange) => void;

export function isTerminal(state: RequestState): boolean {
  return TRANSITIONS[state].length === 0;
}

/** Lifecycle of one download request. Terminal states are final; a retry starts a new request. */
export class RequestLifecycle {
  private current: RequestState = 'pending';
  private readonly changes: StateChange[] = [];
  private failure: unknown;

  constructor(
    private readonly listener?: TransitionListener,
    private readonly now: () => number = Date.now
  ) {}

  get state(): RequestState {
    return this.current;
  }

  get history(): readonly StateChange[] {
    return this.changes;
  }

  get error(): unknown {
    return this.failure;
  }

  advance(to: RequestState): void {
    if (to === 'failed') {
      throw new AppError(ERROR_CODES.ERR_INVALID_STATE, 'Use fail() to mark a request as failed');
    }
    this.transition(to);
  }

  fail(error: unknown): void {
    this.failure = error;
    this.transition('failed');
  }

  private transition(to: RequestState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) {
      throw new AppError(ERROR_CODES.ERR_INVALID_STATE, `Illegal transition ${from} -> ${to}`, { from, to });
    }
    const change: StateChange = { from, to, at: this.now() };
    this.current = to;
    this.changes.push(change);
    this.listener?.(change);
  }
}
