/**
 * Catalog and config shared by every command
 */

import type { Command } from 'commander';
import { createCatalog, type ServiceCatalog } from '../catalog';
import { getConfigPath, loadConfig, type SetupConfig } from '../config';
import type { SpawnBackend } from '../services/compose.service';

export interface CommandContext {
  catalog: ServiceCatalog;
  config: SetupConfig;
}

/**
 * Collaborators the commands use in place of the real backend and terminal
 */
export interface CommandDeps {
  spawn?: SpawnBackend;
  interactive?: boolean;
}

export async function loadCommandContext(command: Command): Promise<CommandContext> {
  const { config: configPath } = command.optsWithGlobals<{ config?: string }>();
  const catalog = createCatalog();
  const config = await loadConfig(catalog, configPath ?? getConfigPath());
  return { catalog, config };
}
