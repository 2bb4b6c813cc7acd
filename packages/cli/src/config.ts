/**
 * Project configuration
 *
 * Read from .n8n-setup/config.json in the working directory. The file is
 * optional and every field has a default.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { SETUP_DIR } from './logger';
import { validateSelection, type ServiceCatalog } from './catalog';

export const CONFIG_FILENAME = 'config.json';

const HOSTNAME = /^(?=.{1,253}$)[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)*$/i;

export const configSchema = z
  .object({
    domain: z.string().regex(HOSTNAME, 'must be a hostname such as n8n.example.com').default('your-domain.com'),
    localPort: z.number().int().min(1).max(65535).default(5678),
    defaultServices: z.array(z.string().min(1)).default(['traefik']),
    backend: z
      .object({
        command: z.string().min(1).default('docker'),
        args: z.array(z.string()).default(['compose']),
      })
      .strict()
      .default({}),
  })
  .strict();

export type SetupConfig = z.infer<typeof configSchema>;

export function getConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, SETUP_DIR, CONFIG_FILENAME);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validate raw config data. The default service list is checked against
 * the catalog so an unknown id fails at startup rather than mid-prompt.
 */
export function parseConfig(data: unknown, catalog: ServiceCatalog, source = 'config'): SetupConfig {
  const result = configSchema.safeParse(data);

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigurationError(`Invalid ${source}: ${field} ${issue.message}`);
  }

  try {
    validateSelection(catalog, result.data.defaultServices);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid ${source}: defaultServices. ${reason}`);
  }

  return result.data;
}

export async function loadConfig(
  catalog: ServiceCatalog,
  configPath: string = getConfigPath()
): Promise<SetupConfig> {
  let content: string;

  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return parseConfig({}, catalog);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read ${configPath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new ConfigurationError(`${configPath} is not valid JSON`);
  }

  return parseConfig(data, catalog, configPath);
}
