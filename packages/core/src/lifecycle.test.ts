import { describe, expect, it } from 'vitest';

import { canTransition } from './lifecycle.js';

describe('canTransition', () => {
  it('allows the forward path', () => {
    expect(canTransition('uninitialized', 'initializing')).toBe(true);
    expect(canTransition('initializing', 'ready')).toBe(true);
    expect(canTransition('ready', 'running')).toBe(true);
    expect(canTransition('running', 'ready')).toBe(true);
    expect(canTransition('shutting_down', 'stopped')).toBe(true);
  });

  it('lets any live state shut down', () => {
    for (const from of ['uninitialized', 'initializing', 'ready', 'running'] as const) {
      expect(canTransition(from, 'shutting_down')).toBe(true);
    }
    expect(canTransition('stopped', 'shutting_down')).toBe(false);
  });

  it('rejects skipping states', () => {
    expect(canTransition('uninitialized', 'ready')).toBe(false);
    expect(canTransition('ready', 'initializing')).toBe(false);
    expect(canTransition('running', 'stopped')).toBe(false);
  });
});
