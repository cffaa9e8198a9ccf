import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileCapabilityProvider, parseCapabilityMarkdown } from './capability.js';
import { CapabilityNotFoundError, CapabilityValidationError } from './errors.js';

async function writeCapability(dir: string, name: string, content: string): Promise<void> {
  await fs.mkdir(path.join(dir, name), { recursive: true });
  await fs.writeFile(path.join(dir, name, 'CAPABILITY.md'), content, 'utf-8');
}

const SUMMARY_CAPABILITY = [
  '---',
  'name: summarize',
  'version: 2',
  'description: Summarizes a diff',
  'options:',
  '  timeout: 60',
  'tools:',
  '  allow: [Read]',
  'inputs:',
  '  - name: diff',
  '    required: true',
  '---',
  '',
  'Summarize:',
  '{{diff}}',
  '',
].join('\n');

describe('parseCapabilityMarkdown', () => {
  it('splits frontmatter from the prompt body', () => {
    const capability = parseCapabilityMarkdown(SUMMARY_CAPABILITY, '/caps/summarize/CAPABILITY.md');

    expect(capability).toEqual({
      name: 'summarize',
      version: '2',
      description: 'Summarizes a diff',
      prompt: 'Summarize:\n{{diff}}',
      inputs: [{ name: 'diff', type: 'string', required: true }],
      options: { allowedTools: ['Read'], timeoutSeconds: 60 },
      sourcePath: '/caps/summarize/CAPABILITY.md',
    });
  });

  it('requires frontmatter', () => {
    expect(() => parseCapabilityMarkdown('# just markdown', 'x.md')).toThrow(CapabilityValidationError);
  });

  it('requires a name and version', () => {
    expect(() => parseCapabilityMarkdown('---\nname: a\n---\nbody', 'x.md')).toThrow(/version/);
    expect(() => parseCapabilityMarkdown('---\nname: Bad Name\nversion: 1\n---\nbody', 'x.md')).toThrow(/name/);
  });

  it('rejects duplicate inputs', () => {
    const text = '---\nname: a\nversion: 1\ninputs:\n  - name: x\n  - name: x\n---\nbody';
    expect(() => parseCapabilityMarkdown(text, 'x.md')).toThrow("x.md: duplicate input name 'x'");
  });

  it('rejects unknown input types', () => {
    const text = '---\nname: a\nversion: 1\ninputs:\n  - name: x\n    type: date\n---\nbody';
    expect(() => parseCapabilityMarkdown(text, 'x.md')).toThrow(CapabilityValidationError);
  });
});

describe('FileCapabilityProvider', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwarden-caps-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('discovers capabilities across directories, skipping missing ones', async () => {
    const first = path.join(root, 'first');
    const second = path.join(root, 'second');
    await writeCapability(first, 'summarize', SUMMARY_CAPABILITY);
    await writeCapability(second, 'audit', SUMMARY_CAPABILITY.replace('name: summarize', 'name: audit'));
    await fs.mkdir(path.join(second, 'empty-dir'), { recursive: true });

    const provider = new FileCapabilityProvider([first, path.join(root, 'missing'), second]);
    expect(await provider.discover()).toEqual(['audit', 'summarize']);
  });

  it('loads from the first directory that defines the name', async () => {
    const first = path.join(root, 'first');
    const second = path.join(root, 'second');
    await writeCapability(first, 'summarize', SUMMARY_CAPABILITY);
    await writeCapability(second, 'summarize', SUMMARY_CAPABILITY.replace('version: 2', 'version: 9'));

    const capability = await new FileCapabilityProvider([first, second]).load('summarize');
    expect(capability.version).toBe('2');
    expect(capability.sourcePath).toBe(path.join(first, 'summarize', 'CAPABILITY.md'));
  });

  it('throws CapabilityNotFoundError for unknown names', async () => {
    const provider = new FileCapabilityProvider([root]);
    await expect(provider.load('absent')).rejects.toBeInstanceOf(CapabilityNotFoundError);
    await expect(provider.load('../escape')).rejects.toBeInstanceOf(CapabilityNotFoundError);
  });

  it('rejects a frontmatter name that differs from its directory', async () => {
    await writeCapability(root, 'other', SUMMARY_CAPABILITY);
    await expect(new FileCapabilityProvider([root]).load('other')).rejects.toThrow(/does not match directory 'other'/);
  });

  it('loads the bundled code-review capability', async () => {
    const dir = fileURLToPath(new URL('../../../capabilities', import.meta.url));
    const capability = await new FileCapabilityProvider([dir]).load('code-review');

    expect(capability.version).toBe('1.0.0');
    expect(capability.options).toEqual({ allowedTools: ['Read', 'Grep', 'Glob'], maxTokens: 8192, timeoutSeconds: 240 });
    expect(capability.inputs.map((input) => input.name)).toEqual(['diff', 'focus']);
    expect(capability.prompt.startsWith('# Code review')).toBe(true);
  });
});
