export type RefreshPhase = 'init' | 'steady' | 'reset';

export interface RefreshState {
  ticker: string;
  phase: RefreshPhase;
  lastRefreshAt: Date | null;
  lastClose: number | null;
  cycleCount: number;
}

export type TickOutcome =
  | 'gate-closed' // nobody has logged in yet
  | 'busy' // previous cycle still in flight
  | 'not-due'
  | 'superseded' // ticker changed while the cycle was fetching; result dropped
  | 'cycled';

export const initialRefreshState = (ticker: string): RefreshState => ({
  ticker,
  phase: 'init',
  lastRefreshAt: null,
  lastClose: null,
  cycleCount: 0,
});
