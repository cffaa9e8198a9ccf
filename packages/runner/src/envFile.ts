import fs from 'node:fs/promises';

// Only the keys the config layer reads; anything else in .env belongs to other tools.
const ENV_LINE_RE = /^\s*(?:export\s+)?(PATCHWARDEN_[A-Z0-9_]+)\s*=\s*(.*?)\s*$/;

function unquote(raw: string): string {
  const quote = raw.charAt(0);
  if (raw.length >= 2 && (quote === '"' || quote === "'") && raw.endsWith(quote)) return raw.slice(1, -1);
  const comment = raw.indexOf(' #');
  return (comment >= 0 ? raw.slice(0, comment) : raw).trimEnd();
}

/** `PATCHWARDEN_*` assignments from dotenv-style text; later lines win. */
export function parseEnvFile(text: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const match = ENV_LINE_RE.exec(line);
    const key = match?.[1];
    if (!match || !key) continue;
    values[key] = unquote(match[2] ?? '');
  }
  return values;
}

/**
 * Copies the file's `PATCHWARDEN_*` values into `env` without overriding
 * variables that are already set. A missing file applies nothing. Returns
 * the keys that were applied.
 */
export async function applyEnvFile(file: string, env: NodeJS.ProcessEnv = process.env): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseEnvFile(text))) {
    if (env[key] !== undefined) continue;
    env[key] = value;
    applied.push(key);
  }
  return applied;
}
