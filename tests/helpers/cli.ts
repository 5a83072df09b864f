import path from 'path';
import { stripVTControlCharacters } from 'util';
import ora from 'ora';
import { logger } from '@icepanel/utils';
import type { IcePanelConfig } from '@icepanel/utils';
import { IcePanel } from '@icepanel/sdk';
import type { ZoneinfoLayout } from '@icepanel/sdk';
import type { CliContext } from '../../cli/src/context.js';
import type { Output } from '../../cli/src/output.js';
import type { Prompter } from '../../cli/src/prompts.js';
import { FakeRunner } from './fake-runner.js';

export type Level = 'log' | 'info' | 'success' | 'warn' | 'error';

export class RecordingOutput implements Output {
  lines: Array<{ level: Level; text: string }> = [];
  written = '';

  log(message = '') {
    this.push('log', message);
  }
  write(text: string) {
    this.written += stripVTControlCharacters(text);
  }
  info(message: string) {
    this.push('info', message);
  }
  success(message: string) {
    this.push('success', message);
  }
  warn(message: string) {
    this.push('warn', message);
  }
  error(message: string) {
    this.push('error', message);
  }

  text(level?: Level): string[] {
    return this.lines.filter((l) => level === undefined || l.level === level).map((l) => l.text);
  }

  private push(level: Level, message: string) {
    for (const line of stripVTControlCharacters(message).split('\n')) {
      this.lines.push({ level, text: line });
    }
  }
}

/** Answers prompts from a queue; confirmUntil waits for the deadline. */
export class ScriptedPrompter implements Prompter {
  answers: Array<string | boolean> = [];
  questions: string[] = [];

  async confirm(message: string): Promise<boolean> {
    this.questions.push(message);
    const answer = this.answers.shift();
    return typeof answer === 'boolean' ? answer : false;
  }

  async input(message: string): Promise<string> {
    this.questions.push(message);
    const answer = this.answers.shift();
    return typeof answer === 'string' ? answer : '';
  }

  async select(message: string, choices: string[]): Promise<string> {
    this.questions.push(message);
    const answer = this.answers.shift();
    return typeof answer === 'string' ? answer : choices[0];
  }

  async confirmUntil(message: string, deadline: Promise<unknown>): Promise<boolean | undefined> {
    this.questions.push(message);
    const answer = this.answers.shift();
    if (typeof answer === 'boolean') return answer;
    await deadline;
    return undefined;
  }
}

export interface TestContext extends CliContext {
  out: RecordingOutput;
  prompter: ScriptedPrompter;
  runner: FakeRunner;
  beeps: number;
}

export function createTestContext(
  home: string,
  options: { desktop?: string; sessionType?: string; layout?: ZoneinfoLayout } = {},
): TestContext {
  const config: IcePanelConfig = {
    home,
    keysFile: path.join(home, '.icewm', 'keys'),
    cursorDir: path.join(home, '.icewm', 'cursors'),
    historyFile: path.join(home, '.config', 'icepanel', 'run-history'),
    logLevel: 'error',
    session: { type: options.sessionType ?? 'x11', desktop: options.desktop ?? 'ICEWM' },
  };
  const runner = new FakeRunner();
  const ctx: TestContext = {
    config,
    runner,
    panel: new IcePanel(config, { runner, layout: options.layout }),
    logger,
    out: new RecordingOutput(),
    prompter: new ScriptedPrompter(),
    spinner: (text) => ora({ text, isSilent: true }),
    beeps: 0,
    beep: () => {
      ctx.beeps += 1;
    },
    waitForInterrupt: () => Promise.resolve(),
  };
  return ctx;
}
