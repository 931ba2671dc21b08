import { nullLogger, type Logger, type WorkspaceRef } from '@scan-harvest/shared';
import { wildcardToRegExp } from './glob.js';

/**
 * Presents candidates to the operator and returns the picked indexes.
 * An empty pick means "all shown".
 */
export type WorkspacePrompt = (candidates: WorkspaceRef[]) => Promise<number[]>;

export interface SelectWorkspacesOptions {
  likePattern?: string;
  interactive?: boolean;
  prompt?: WorkspacePrompt;
  logger?: Logger;
}

export type SelectionResult =
  | { ok: true; ids: string[]; candidates: number }
  | { ok: false; reason: string };

export function isScannableWorkspace(workspace: WorkspaceRef): boolean {
  return workspace.state === 'Active' && workspace.type === 'Workspace';
}

/**
 * Narrows the enumerated workspaces into the scan target list.
 *
 * Reports (does not throw) when nothing is left to scan; callers treat that
 * as fatal.
 */
export async function selectWorkspaces(
  all: WorkspaceRef[],
  options: SelectWorkspacesOptions = {}
): Promise<SelectionResult> {
  const log = options.logger ?? nullLogger;
  const matcher = options.likePattern ? wildcardToRegExp(options.likePattern) : null;

  const candidates = all.filter(
    (workspace) => isScannableWorkspace(workspace) && (!matcher || matcher.test(workspace.name))
  );

  log.info('Workspaces filtered', {
    enumerated: all.length,
    candidates: candidates.length,
    likePattern: options.likePattern,
  });

  if (candidates.length === 0) {
    return {
      ok: false,
      reason: options.likePattern
        ? `No active workspaces match '${options.likePattern}'`
        : 'No active workspaces found',
    };
  }

  if (!options.interactive) {
    return { ok: true, ids: candidates.map((w) => w.id), candidates: candidates.length };
  }

  if (!options.prompt) {
    return { ok: false, reason: 'Interactive selection requested but no prompt is available' };
  }

  const picked = await options.prompt(candidates);
  if (picked.length === 0) {
    return { ok: true, ids: candidates.map((w) => w.id), candidates: candidates.length };
  }

  const seen = new Set<number>();
  const ids: string[] = [];
  for (const index of picked) {
    const workspace = candidates[index];
    if (!workspace || seen.has(index)) continue;
    seen.add(index);
    ids.push(workspace.id);
  }

  if (ids.length === 0) {
    return { ok: false, reason: 'Selection did not match any listed workspace' };
  }
  return { ok: true, ids, candidates: candidates.length };
}
