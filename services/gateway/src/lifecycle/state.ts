import { HostGuard } from '../guard/hostGuard';

export type Phase = 'starting' | 'ready' | 'draining' | 'stopped';

/**
 * Process-wide gateway state, created once and shared by reference.
 * `guard` is swapped exactly once, before `phase` becomes 'ready';
 * after that nothing in here changes except `phase`.
 */
export interface GatewayState {
  phase: Phase;
  guard: HostGuard;
  publicAddress: string | null;
}

export function initialState(hosts: Iterable<string>): GatewayState {
  return { phase: 'starting', guard: new HostGuard(hosts), publicAddress: null };
}
