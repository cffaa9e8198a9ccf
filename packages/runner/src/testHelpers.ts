import fs from 'node:fs/promises';
import path from 'node:path';

/**
 * Writes an executable stand-in for the analysis CLI: a CommonJS node script
 * that ignores its arguments unless `body` uses them. `body` runs after stdin
 * was read into `prompt`. Returns the absolute path.
 */
export async function writeFakeBinary(dir: string, name: string, body: string): Promise<string> {
  const file = path.join(dir, `${name}.cjs`);
  const script = [
    `#!${process.execPath}`,
    "const fs = require('node:fs');",
    'const args = process.argv.slice(2);',
    "let prompt = '';",
    "process.stdin.setEncoding('utf-8');",
    "process.stdin.on('data', (chunk) => { prompt += chunk; });",
    "process.stdin.on('end', () => {",
    body,
    '});',
    '',
  ].join('\n');
  await fs.writeFile(file, script, { mode: 0o755 });
  return file;
}

/** Appends one line per invocation to `counterFile`; read it back with `countInvocations`. */
export function recordInvocation(counterFile: string): string {
  return `fs.appendFileSync(${JSON.stringify(counterFile)}, 'x\\n');`;
}

export async function countInvocations(counterFile: string): Promise<number> {
  const raw = await fs.readFile(counterFile, 'utf-8').catch(() => '');
  return raw.split('\n').filter((line) => line.length > 0).length;
}
