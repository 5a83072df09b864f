import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { CommandNotFoundError, ValidationError } from '@icepanel/utils';
import { FALLBACK_SUGGESTION, HISTORY_HEADER, RunHistory, runCommand } from '@icepanel/sdk';
import { FakeRunner } from '../helpers/fake-runner.js';

describe('RunHistory', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'icepanel-history-'));
    file = path.join(dir, 'run-history');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should suggest xterm when empty', async () => {
    const history = await new RunHistory(file).load();
    expect(history.list()).toEqual([]);
    expect(history.suggestions()).toEqual([FALLBACK_SUGGESTION]);
  });

  it('should move a repeated command to the front', () => {
    const history = new RunHistory(file);
    history.add('xterm');
    history.add('gimp');
    history.add('xterm');
    history.add('  ');
    expect(history.list()).toEqual(['xterm', 'gimp']);
  });

  it('should load oldest first and skip comments', async () => {
    writeFileSync(file, `${HISTORY_HEADER}\nxterm\n\ngimp\n# note\nfirefox\n`);
    const history = await new RunHistory(file).load();
    expect(history.list()).toEqual(['firefox', 'gimp', 'xterm']);
  });

  it('should save at most twenty entries', async () => {
    const history = new RunHistory(file);
    for (let i = 1; i <= 25; i++) history.add(`app${i}`);
    await history.save();

    const lines = readFileSync(file, 'utf-8').split('\n');
    expect(lines[0]).toBe(HISTORY_HEADER);
    expect(lines[1]).toBe('app6');
    expect(lines[20]).toBe('app25');
    expect(lines).toHaveLength(22);
    expect(lines[21]).toBe('');

    const reloaded = await new RunHistory(file).load();
    expect(reloaded.list()[0]).toBe('app25');
    expect(reloaded.list()).toHaveLength(20);
  });
});

describe('runCommand', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'icepanel-run-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should record and launch the command', async () => {
    const runner = new FakeRunner();
    const history = new RunHistory(path.join(dir, 'run-history'));

    await runCommand(runner, history, ' xterm -title "My Term" ');

    expect(runner.launched()).toEqual([['xterm', '-title', 'My Term']]);
    expect(readFileSync(history.file, 'utf-8')).toBe(`${HISTORY_HEADER}\nxterm -title "My Term"\n`);
  });

  it('should refuse an empty command', async () => {
    const runner = new FakeRunner();
    await expect(runCommand(runner, new RunHistory(path.join(dir, 'h')), '  ')).rejects.toThrow(ValidationError);
    expect(runner.calls).toEqual([]);
  });

  it('should surface a missing program', async () => {
    const runner = new FakeRunner().respond('no-such-app', new CommandNotFoundError('no-such-app'));
    const history = new RunHistory(path.join(dir, 'run-history'));

    await expect(runCommand(runner, history, 'no-such-app')).rejects.toBeInstanceOf(CommandNotFoundError);
  });
});
