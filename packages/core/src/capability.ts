import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { MAX_TIMEOUT_SECONDS } from './config.js';
import { CapabilityNotFoundError, CapabilityValidationError } from './errors.js';

export const CAPABILITY_FILE = 'CAPABILITY.md';

export const capabilityInputTypes = ['string', 'int', 'float', 'bool', 'array', 'object'] as const;
export type CapabilityInputType = (typeof capabilityInputTypes)[number];

export type CapabilityInput = Readonly<{
  name: string;
  type: CapabilityInputType;
  required: boolean;
  default?: unknown;
  description?: string;
}>;

export type CapabilityOptions = Readonly<{
  allowedTools: readonly string[];
  maxTokens?: number;
  timeoutSeconds?: number;
}>;

export type Capability = Readonly<{
  name: string;
  version: string;
  description: string;
  prompt: string;
  inputs: readonly CapabilityInput[];
  options: CapabilityOptions;
  sourcePath: string;
}>;

/** Where capabilities come from. The runner only depends on this seam. */
export interface CapabilityProvider {
  discover(): Promise<readonly string[]>;
  load(name: string): Promise<Capability>;
}

const CAPABILITY_NAME_RE = /^[a-z0-9][a-z0-9._-]*$/;

const inputSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(capabilityInputTypes).optional().default('string'),
    required: z.boolean().optional().default(false),
    default: z.unknown().optional(),
    description: z.string().optional(),
  })
  .passthrough();

const frontmatterSchema = z
  .object({
    name: z.string().regex(CAPABILITY_NAME_RE, 'must be lower-case letters, digits, ".", "_" or "-"'),
    version: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
    description: z.string().optional().default(''),
    options: z
      .object({
        max_tokens: z.number().int().positive().optional(),
        timeout: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).optional(),
      })
      .passthrough()
      .optional()
      .default({}),
    tools: z
      .object({
        allow: z.array(z.string().min(1)).optional().default([]),
      })
      .passthrough()
      .optional()
      .default({}),
    inputs: z.array(inputSchema).optional().default([]),
  })
  .passthrough();

const FRONTMATTER_RE = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)([\s\S]*)$/;

function splitFrontmatter(text: string, sourceName: string): { frontmatter: string; body: string } {
  const match = FRONTMATTER_RE.exec(text.replace(/^﻿/, ''));
  if (!match) {
    throw new CapabilityValidationError(`${sourceName}: missing YAML frontmatter`);
  }
  return { frontmatter: match[1] ?? '', body: match[2] ?? '' };
}

export function parseCapabilityMarkdown(text: string, sourcePath: string): Capability {
  const { frontmatter, body } = splitFrontmatter(text, sourcePath);

  let raw: unknown;
  try {
    raw = parseYaml(frontmatter);
  } catch (err) {
    throw new CapabilityValidationError(`${sourcePath}: invalid frontmatter: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  const parsed = frontmatterSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new CapabilityValidationError(`${sourcePath}: ${details}`, { cause: parsed.error });
  }
  const value = parsed.data;

  const seen = new Set<string>();
  for (const input of value.inputs) {
    if (seen.has(input.name)) {
      throw new CapabilityValidationError(`${sourcePath}: duplicate input name '${input.name}'`);
    }
    seen.add(input.name);
  }

  return {
    name: value.name,
    version: value.version,
    description: value.description,
    prompt: body.trim(),
    inputs: value.inputs.map((input) => ({
      name: input.name,
      type: input.type,
      required: input.required,
      ...(input.default !== undefined ? { default: input.default } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
    })),
    options: {
      allowedTools: value.tools.allow,
      ...(value.options.max_tokens !== undefined ? { maxTokens: value.options.max_tokens } : {}),
      ...(value.options.timeout !== undefined ? { timeoutSeconds: value.options.timeout } : {}),
    },
    sourcePath,
  };
}

async function isFile(filePath: string): Promise<boolean> {
  const stat = await fs.stat(filePath).catch(() => null);
  return stat !== null && stat.isFile();
}

/**
 * Reads capabilities from `<dir>/<name>/CAPABILITY.md`.
 *
 * Directories are searched in order; the first one defining a name wins.
 * Missing directories are skipped.
 */
export class FileCapabilityProvider implements CapabilityProvider {
  readonly dirs: readonly string[];

  constructor(dirs: readonly string[]) {
    this.dirs = dirs.map((dir) => path.resolve(dir));
  }

  async discover(): Promise<readonly string[]> {
    const names = new Set<string>();
    for (const dir of this.dirs) {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === 'ENOENT') continue;
        throw err;
      }
      for (const entry of entries) {
        if (!entry.isDirectory() || !CAPABILITY_NAME_RE.test(entry.name)) continue;
        if (await isFile(path.join(dir, entry.name, CAPABILITY_FILE))) names.add(entry.name);
      }
    }
    return [...names].sort((a, b) => a.localeCompare(b));
  }

  async load(name: string): Promise<Capability> {
    if (!CAPABILITY_NAME_RE.test(name)) throw new CapabilityNotFoundError(name);

    for (const dir of this.dirs) {
      const filePath = path.join(dir, name, CAPABILITY_FILE);
      if (!(await isFile(filePath))) continue;

      const capability = parseCapabilityMarkdown(await fs.readFile(filePath, 'utf-8'), filePath);
      if (capability.name !== name) {
        throw new CapabilityValidationError(`${filePath}: frontmatter name '${capability.name}' does not match directory '${name}'`);
      }
      return capability;
    }
    throw new CapabilityNotFoundError(name);
  }
}
