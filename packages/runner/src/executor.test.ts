import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MaxRetriesExceededError, TimeoutError, createRetryPolicy, type Capability } from '@patchwarden/core';

import { CapabilityExecutor } from './executor.js';
import { ProcessManager } from './processManager.js';
import { RetryExecutor } from './retryExecutor.js';
import { countInvocations, recordInvocation, writeFakeBinary } from './testHelpers.js';

function makeCapability(overrides: Partial<Capability['options']> = {}): Capability {
  return {
    name: 'review',
    version: '1',
    description: '',
    prompt: 'Review:\n{{diff}}',
    inputs: [{ name: 'diff', type: 'string', required: true }],
    options: { allowedTools: [], ...overrides },
    sourcePath: '/caps/review/CAPABILITY.md',
  };
}

function makeExecutor(binary: string, maxRetries = 0, skipPermissions = false): CapabilityExecutor {
  return new CapabilityExecutor({
    manager: new ProcessManager({ binary }),
    retry: new RetryExecutor({ policy: createRetryPolicy({ maxRetries, initialDelayMs: 1, maxDelayMs: 2 }) }),
    skipPermissions,
  });
}

describe('CapabilityExecutor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwarden-exec-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('builds CLI arguments from the capability', () => {
    const executor = makeExecutor('claude', 0, true);
    const args = executor.buildArgs(makeCapability({ timeoutSeconds: 60, allowedTools: ['Read', 'Grep'], maxTokens: 100 }));

    expect(args).toEqual([
      '-p',
      '--dangerously-skip-permissions',
      '--timeout',
      '60',
      '--allowedTools',
      'Read',
      '--allowedTools',
      'Grep',
      '--max-tokens',
      '100',
    ]);
    expect(makeExecutor('claude').buildArgs(makeCapability())).toEqual(['-p']);
  });

  it('prepares a dry run without spawning', () => {
    const prepared = makeExecutor('patchwarden-missing-binary').prepare(makeCapability(), { diff: '+line' });
    expect(prepared.prompt).toBe('Review:\n+line');
    expect(prepared.args).toEqual(['-p']);
  });

  it('sends the prompt and returns stdout', async () => {
    const binary = await writeFakeBinary(dir, 'fake-claude', 'process.stdout.write(JSON.stringify({ args, prompt }));');
    const executor = makeExecutor(binary);
    const prepared = executor.prepare(makeCapability({ allowedTools: ['Read'] }), { diff: '+x' });

    const result = await executor.execute(prepared);

    expect(JSON.parse(result.output)).toEqual({ args: ['-p', '--allowedTools', 'Read'], prompt: 'Review:\n+x' });
    expect(result.attempts).toBe(1);
  });

  it('retries retryable failures', async () => {
    const counter = path.join(dir, 'count');
    const binary = await writeFakeBinary(
      dir,
      'flaky',
      [
        recordInvocation(counter),
        `const n = fs.readFileSync(${JSON.stringify(counter)}, 'utf-8').split('\\n').filter(Boolean).length;`,
        "if (n < 3) { process.stderr.write('upstream 503'); process.exit(1); }",
        "process.stdout.write('third time lucky');",
      ].join('\n'),
    );
    const executor = makeExecutor(binary, 3);

    const result = await executor.execute(executor.prepare(makeCapability(), { diff: 'd' }));

    expect(result.output).toBe('third time lucky');
    expect(result.attempts).toBe(3);
    expect(await countInvocations(counter)).toBe(3);
  });

  it('kills an attempt that outlives the capability time limit', async () => {
    const binary = await writeFakeBinary(dir, 'hang', 'setTimeout(() => {}, 60000);');
    const executor = makeExecutor(binary, 0);

    const err = await executor.execute(executor.prepare(makeCapability({ timeoutSeconds: 1 }), { diff: 'd' })).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MaxRetriesExceededError);
    expect(err instanceof Error ? err.cause : null).toBeInstanceOf(TimeoutError);
  });

  it('rejects with TimeoutError once the overall deadline passes', async () => {
    const binary = await writeFakeBinary(dir, 'hang', 'setTimeout(() => {}, 60000);');
    const executor = makeExecutor(binary, 3);

    const err = await executor.execute(executor.prepare(makeCapability(), { diff: 'd' }), { timeoutMs: 200 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err instanceof Error ? err.message : '').toBe("capability 'review' timed out after 200ms");
  });
});
