const lifecycleStates = ['uninitialized', 'initializing', 'ready', 'running', 'shutting_down', 'stopped'] as const;
export type LifecycleState = (typeof lifecycleStates)[number];

/**
 * Whether `from -> to` is a legal lifecycle step.
 *
 * The only backwards edge is `running -> ready` once a unit of work finishes.
 * Every state may move to `shutting_down`, and `shutting_down` only ends in `stopped`.
 */
export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  if (to === 'shutting_down') return from !== 'stopped' && from !== 'shutting_down';
  if (to === 'stopped') return from === 'shutting_down';
  if (from === 'uninitialized') return to === 'initializing';
  if (from === 'initializing') return to === 'ready';
  if (from === 'ready') return to === 'running';
  if (from === 'running') return to === 'ready';
  return false;
}
