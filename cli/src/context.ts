import ora from 'ora';
import type { Ora } from 'ora';
import { ConfigManager, logger } from '@icepanel/utils';
import type { IcePanelConfig, Logger } from '@icepanel/utils';
import { IcePanel } from '@icepanel/sdk';
import { createConsoleOutput } from './output.js';
import type { Output } from './output.js';
import { inquirerPrompter } from './prompts.js';
import type { Prompter } from './prompts.js';

export interface CliContext {
  config: IcePanelConfig;
  panel: IcePanel;
  logger: Logger;
  out: Output;
  prompter: Prompter;
  spinner(text: string): Ora;
  beep(): void;
  /** Resolves when the user asks a long-running command to stop. */
  waitForInterrupt(): Promise<void>;
}

export function createContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const config = new ConfigManager(env).load();
  logger.setLevel(config.logLevel);
  if (config.logFile) {
    logger.setLogFile(config.logFile);
  }

  return {
    config,
    panel: new IcePanel(config),
    logger,
    out: createConsoleOutput(),
    prompter: inquirerPrompter,
    spinner: (text) => ora(text),
    beep: () => {
      process.stdout.write('\x07');
    },
    waitForInterrupt: () =>
      new Promise((resolve) => {
        process.once('SIGINT', () => resolve());
      }),
  };
}
