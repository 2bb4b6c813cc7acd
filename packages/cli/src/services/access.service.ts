/**
 * Access Service
 * Works out where the installation will be reachable for a given selection.
 */

import chalk from 'chalk';
import type { SelectionSet } from '../catalog';

export interface AccessEntry {
  label: string;
  url: string;
}

export interface AccessOptions {
  domain: string;
  localPort: number;
}

/**
 * With traefik in front, n8n is served over HTTPS on the configured domain
 * and qdrant gets its own subdomain. Without it, only the local port is
 * reachable.
 */
export function summarizeAccess(selection: SelectionSet, options: AccessOptions): AccessEntry[] {
  if (!selection.has('traefik')) {
    return [{ label: 'n8n', url: `http://localhost:${options.localPort}` }];
  }

  const entries: AccessEntry[] = [{ label: 'n8n', url: `https://${options.domain}` }];

  if (selection.has('qdrant')) {
    entries.push({ label: 'Qdrant', url: `https://qdrant.${options.domain}` });
  }

  return entries;
}

export function renderAccessInfo(entries: readonly AccessEntry[]): void {
  console.log(chalk.green.bold('\n  Access your services at:'));
  for (const entry of entries) {
    console.log(`    • ${entry.label}: ${chalk.cyan(entry.url)}`);
  }
  console.log('');
}
