import { appendFileSync } from 'node:fs';
import type { ChangePayload } from './diff.js';

/**
 * Append step outputs in the GitHub Actions `$GITHUB_OUTPUT` format
 * (`name=value` lines). `payloads` is written as single-line JSON.
 */
export function formatCiOutputs(payloads: readonly ChangePayload[]): string {
  const lines = [`has_changes=${payloads.length > 0}`, `payloads_count=${payloads.length}`];
  if (payloads.length > 0) {
    lines.push(`payloads=${JSON.stringify(payloads)}`);
  }
  return lines.join('\n') + '\n';
}

export function writeCiOutputs(filePath: string, payloads: readonly ChangePayload[]): void {
  appendFileSync(filePath, formatCiOutputs(payloads), 'utf8');
}
