import { createInterface } from 'node:readline/promises';
import type { WorkspaceRef } from '@scan-harvest/shared';
import type { WorkspacePrompt } from '@scan-harvest/scan-pipeline';

/**
 * Parses "1,3-5 8" (1-based, as shown) into 0-based indexes. A blank answer
 * is `[]` ("all"); a non-blank answer that names no listed workspace is
 * `null`, so a typo never widens into a full-tenant scan.
 */
export function parseSelection(answer: string, count: number): number[] | null {
  if (answer.trim() === '') return [];

  const indexes: number[] = [];
  for (const token of answer.split(/[\s,]+/)) {
    const range = token.match(/^(\d+)(?:-(\d+))?$/);
    if (!range?.[1]) continue;

    const first = Number(range[1]);
    const last = range[2] ? Number(range[2]) : first;
    const from = Math.max(Math.min(first, last), 1);
    const to = Math.min(Math.max(first, last), count);
    for (let n = from; n <= to; n++) indexes.push(n - 1);
  }
  return indexes.length > 0 ? indexes : null;
}

export function formatChoices(candidates: readonly WorkspaceRef[]): string {
  const width = String(candidates.length).length;
  return candidates
    .map((workspace, i) => `  ${String(i + 1).padStart(width)}. ${workspace.name}  (${workspace.id})`)
    .join('\n');
}

export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
  maxAttempts = 3
): WorkspacePrompt {
  return async (candidates) => {
    const rl = createInterface({ input, output });
    try {
      output.write(`${formatChoices(candidates)}\n`);
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const answer = await rl.question('Workspaces to scan (e.g. 1,3-5; empty for all): ');
        const picked = parseSelection(answer, candidates.length);
        if (picked) return picked;
        output.write(`'${answer.trim()}' matches none of the ${candidates.length} listed workspaces\n`);
      }
      throw new Error(`No valid workspace selection after ${maxAttempts} attempts`);
    } finally {
      rl.close();
    }
  };
}
