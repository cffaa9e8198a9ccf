import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigError, WorkspaceNotGitError } from '@patchwarden/core';

export type WorkspaceInfo = Readonly<{
  workDir: string;
  /** `.git` directory, or the `gitdir:` target of a worktree's `.git` file. */
  gitDir: string | null;
  hasClaudeMd: boolean;
}>;

async function readGitDirPointer(dotGitPath: string, workDir: string): Promise<string | null> {
  const raw = await fs.readFile(dotGitPath, 'utf-8');
  const m = raw.trim().match(/^gitdir:\s*(.+)\s*$/i);
  const gitDir = m?.[1]?.trim();
  if (!gitDir) return null;
  return path.isAbsolute(gitDir) ? gitDir : path.resolve(workDir, gitDir);
}

export async function inspectWorkspace(workDir: string): Promise<WorkspaceInfo> {
  const resolved = path.resolve(workDir);
  const stat = await fs.stat(resolved).catch(() => null);
  if (!stat || !stat.isDirectory()) throw new ConfigError(`work dir is not a directory: ${resolved}`);

  const dotGitPath = path.join(resolved, '.git');
  const dotGit = await fs.stat(dotGitPath).catch(() => null);
  let gitDir: string | null = null;
  if (dotGit?.isDirectory()) gitDir = dotGitPath;
  else if (dotGit?.isFile()) gitDir = await readGitDirPointer(dotGitPath, resolved);

  const claudeMd = await fs.stat(path.join(resolved, 'CLAUDE.md')).catch(() => null);
  return { workDir: resolved, gitDir, hasClaudeMd: claudeMd?.isFile() ?? false };
}

export function assertGitWorkspace(info: WorkspaceInfo): void {
  if (!info.gitDir) throw new WorkspaceNotGitError(info.workDir);
}
