/**
 * Yes/no gate before setup steps run
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import type { CommandLogger } from '../logger';
import { isInteractive } from '../terminal';

export type ConfirmPrompt = (message: string, defaultAnswer: boolean) => Promise<boolean>;

export interface ConfirmSetupOptions {
  debugMode: boolean;
  defaultAnswer?: boolean;
  interactive?: boolean;
  prompt?: ConfirmPrompt;
  logger?: CommandLogger;
}

export const inquirerConfirm: ConfirmPrompt = async (message, defaultAnswer) => {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message,
      default: defaultAnswer,
    },
  ]);
  return confirm;
};

export async function confirmSetup(options: ConfirmSetupOptions): Promise<boolean> {
  const defaultAnswer = options.defaultAnswer ?? true;

  // Debug runs are dry runs, nothing to confirm
  if (options.debugMode) {
    return true;
  }

  if (!(options.interactive ?? isInteractive())) {
    console.log(
      chalk.yellow(`  No interactive terminal, answering "${defaultAnswer ? 'yes' : 'no'}" to: Continue with setup?`)
    );
    options.logger?.warn('Confirmation answered with default', { defaultAnswer });
    return defaultAnswer;
  }

  const prompt = options.prompt ?? inquirerConfirm;
  return prompt('Continue with setup?', defaultAnswer);
}
