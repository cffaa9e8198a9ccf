import type { Capability } from './capability.js';
import { CapabilityValidationError } from './errors.js';

export type InputValues = Readonly<Record<string, unknown>>;

const PLACEHOLDER_RE = /\{\{\s*([^{}]+?)\s*\}\}/g;

export function formatInputValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Merges declared defaults with the provided values.
 *
 * Unknown names and missing required inputs throw `CapabilityValidationError`.
 * A capability that declares no inputs accepts anything.
 */
export function resolveInputs(capability: Capability, provided: InputValues): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const input of capability.inputs) {
    if (input.default !== undefined) resolved[input.name] = input.default;
  }

  const declared = new Set(capability.inputs.map((input) => input.name));
  for (const [name, value] of Object.entries(provided)) {
    if (declared.size > 0 && !declared.has(name)) {
      throw new CapabilityValidationError(`capability '${capability.name}': unknown input '${name}'`);
    }
    resolved[name] = value;
  }

  const missing = capability.inputs.filter((input) => input.required && resolved[input.name] === undefined);
  if (missing.length > 0) {
    throw new CapabilityValidationError(
      `capability '${capability.name}': missing required input${missing.length > 1 ? 's' : ''} ${missing
        .map((input) => `'${input.name}'`)
        .join(', ')}`,
    );
  }
  return resolved;
}

function lookup(values: InputValues, name: string): { found: boolean; value: unknown } {
  for (const candidate of [name, name.toLowerCase(), name.toUpperCase()]) {
    if (Object.hasOwn(values, candidate)) return { found: true, value: values[candidate] };
  }
  return { found: false, value: undefined };
}

/**
 * Replaces every `{{name}}` in the prompt.
 *
 * Names match exactly, then lower-cased, then upper-cased, so `{{DIFF}}` and
 * `{{diff}}` both read input `diff`. Unmatched names render as
 * `<name not provided>`.
 */
export function substitutePlaceholders(prompt: string, values: InputValues): string {
  return prompt.replace(PLACEHOLDER_RE, (_whole, rawName: string) => {
    const { found, value } = lookup(values, rawName);
    return found ? formatInputValue(value) : `<${rawName} not provided>`;
  });
}

export type BuildPromptOptions = Readonly<{
  /** Prepended on its own line. */
  basePrompt?: string;
}>;

export function buildPrompt(capability: Capability, provided: InputValues, options: BuildPromptOptions = {}): string {
  const values = resolveInputs(capability, provided);
  const body = capability.prompt || `# Capability: ${capability.name}\n\nYou are the ${capability.name} capability.`;
  const substituted = substitutePlaceholders(body, values);

  const base = options.basePrompt ?? '';
  if (!base) return substituted;
  return `${base.endsWith('\n') ? base : `${base}\n`}${substituted}`;
}
