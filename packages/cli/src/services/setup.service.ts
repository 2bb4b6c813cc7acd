/**
 * Setup Service
 * Drives the setup workflow: select services, confirm, run the steps and
 * report where the installation can be reached.
 */

import chalk from 'chalk';
import { orderSelection, type SelectionSet, type ServiceCatalog } from '../catalog';
import type { SetupConfig } from '../config';
import { renderServicesTable } from '../display';
import { createCommandLogger, type CommandLogger } from '../logger';
import { confirmSetup, type ConfirmPrompt } from '../prompts/confirm';
import { selectServices, type CheckboxPrompt } from '../prompts/selection';
import { renderAccessInfo, summarizeAccess, type AccessEntry } from './access.service';
import type { RuntimeBridge } from './compose.service';
import { runSteps, type ProgressReporter, type SetupStep, type StepRunSummary } from './progress.service';

/**
 * Whatever actually writes configuration and starts containers. The
 * workflow only sequences calls into it.
 */
export interface DeploymentBackend {
  checkDependencies(): Promise<void>;
  configureService(id: string, selection: SelectionSet): Promise<void>;
  applyConfiguration(selection: SelectionSet): Promise<void>;
}

export interface SetupSession {
  selection: SelectionSet;
  debugMode: boolean;
}

export type SetupState =
  | 'Idle'
  | 'CatalogShown'
  | 'Selecting'
  | 'Selected'
  | 'Confirming'
  | 'Cancelled'
  | 'Running'
  | 'Completed'
  | 'Failed';

const TRANSITIONS: Record<SetupState, readonly SetupState[]> = {
  Idle: ['CatalogShown', 'Selected'],
  CatalogShown: ['Selecting'],
  Selecting: ['Selected'],
  Selected: ['Confirming', 'Cancelled'],
  Confirming: ['Cancelled', 'Running'],
  Running: ['Completed', 'Failed'],
  Cancelled: [],
  Completed: [],
  Failed: [],
};

export interface SetupWorkflowOptions {
  /** Services given with --service or --preset */
  supplied?: Iterable<string>;
  debugMode: boolean;
}

export interface SetupWorkflowDeps {
  catalog: ServiceCatalog;
  config: SetupConfig;
  backend: DeploymentBackend;
  interactive?: boolean;
  selectPrompt?: CheckboxPrompt;
  confirmPrompt?: ConfirmPrompt;
  reporter?: ProgressReporter;
  logger?: CommandLogger;
  onStateChange?: (from: SetupState, to: SetupState) => void;
}

export interface SetupOutcome {
  state: Extract<SetupState, 'Cancelled' | 'Completed'>;
  selection: SelectionSet;
  summary?: StepRunSummary;
  access: AccessEntry[];
}

/**
 * Backend that checks docker compose is installed and records what would be
 * configured. Writing compose files and starting containers happens outside
 * this tool.
 */
export function createComposeDeploymentBackend(
  bridge: Pick<RuntimeBridge, 'checkAvailable'>,
  logger: CommandLogger = createCommandLogger('deploy')
): DeploymentBackend {
  return {
    async checkDependencies() {
      const version = await bridge.checkAvailable();
      logger.info('Container backend available', { version });
    },
    async configureService(id, selection) {
      logger.info(`Configuration requested for ${id}`, { selection: [...selection] });
    },
    async applyConfiguration(selection) {
      logger.info('Configuration files requested', { services: [...selection] });
    },
  };
}

export function buildSetupSteps(
  selection: SelectionSet,
  catalog: ServiceCatalog,
  backend: DeploymentBackend
): SetupStep[] {
  return [
    { description: 'Checking dependencies...', work: () => backend.checkDependencies() },
    ...orderSelection(catalog, selection).map((id) => ({
      description: `Configuring ${id}...`,
      work: () => backend.configureService(id, selection),
    })),
    { description: 'Generating configuration files...', work: () => backend.applyConfiguration(selection) },
  ];
}

export async function runSetupWorkflow(
  options: SetupWorkflowOptions,
  deps: SetupWorkflowDeps
): Promise<SetupOutcome> {
  const { catalog, config } = deps;
  const logger = deps.logger ?? createCommandLogger('setup');
  const defaults = new Set(config.defaultServices);
  let state: SetupState = 'Idle';

  const moveTo = (next: SetupState): void => {
    if (!TRANSITIONS[state].includes(next)) {
      throw new Error(`Invalid setup transition: ${state} -> ${next}`);
    }
    logger.debug(`State ${state} -> ${next}`);
    deps.onStateChange?.(state, next);
    state = next;
  };

  let selection: SelectionSet;

  if (options.supplied !== undefined) {
    selection = await selectServices(catalog, { supplied: options.supplied, defaults });
    moveTo('Selected');
  } else {
    renderServicesTable(catalog);
    moveTo('CatalogShown');
    moveTo('Selecting');
    selection = await selectServices(catalog, {
      defaults,
      interactive: deps.interactive,
      prompt: deps.selectPrompt,
      logger,
    });
    moveTo('Selected');
  }

  const session: SetupSession = { selection, debugMode: options.debugMode };
  logger.info('Session created', { services: [...session.selection], debugMode: session.debugMode });

  if (selection.size === 0) {
    console.log(chalk.yellow('  No services selected. Exiting.\n'));
    moveTo('Cancelled');
    return { state: 'Cancelled', selection, access: [] };
  }

  console.log(chalk.blue.bold('\n  Selected services: ') + orderSelection(catalog, selection).join(', '));

  if (session.debugMode) {
    console.log(chalk.yellow("  Debug mode: Configuration will be generated but services won't start"));
  }
  console.log('');

  moveTo('Confirming');
  const confirmed = await confirmSetup({
    debugMode: session.debugMode,
    defaultAnswer: true,
    interactive: deps.interactive,
    prompt: deps.confirmPrompt,
    logger,
  });

  if (!confirmed) {
    console.log(chalk.yellow('\n  Setup cancelled.\n'));
    moveTo('Cancelled');
    return { state: 'Cancelled', selection, access: [] };
  }

  moveTo('Running');
  let summary: StepRunSummary;
  try {
    summary = await runSteps(buildSetupSteps(selection, catalog, deps.backend), {
      dryRun: session.debugMode,
      reporter: deps.reporter,
    });
  } catch (error) {
    moveTo('Failed');
    throw error;
  }
  moveTo('Completed');

  if (summary.dryRun) {
    console.log(chalk.green.bold('\n  Dry run completed, no services were started.'));
  } else {
    console.log(chalk.green.bold('\n  Setup completed successfully!'));
  }

  const access = summarizeAccess(selection, { domain: config.domain, localPort: config.localPort });
  renderAccessInfo(access);

  return { state: 'Completed', selection, summary, access };
}
