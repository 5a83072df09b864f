import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { NotFoundError, UnsupportedEnvironmentError } from '@icepanel/utils';
import { CURSOR_ROLES, findCursorRole, installCursor, listCursors, restartIceWm } from '@icepanel/sdk';
import { FakeRunner } from '../helpers/fake-runner.js';

describe('cursors', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'icepanel-cursors-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should know the eleven IceWM cursor files', () => {
    expect(CURSOR_ROLES).toHaveLength(11);
    expect(CURSOR_ROLES[0]).toEqual({ name: 'Normal Pointer', file: 'left.xpm' });
  });

  it('should find roles by name or file ignoring case', () => {
    expect(findCursorRole('move pointer').file).toBe('move.xpm');
    expect(findCursorRole('SIZETL.XPM').name).toBe('Resize Top-Left');
    expect(() => findCursorRole('spinner')).toThrow(NotFoundError);
  });

  it('should report which cursors are installed', async () => {
    const cursorDir = path.join(dir, 'cursors');
    mkdirSync(cursorDir);
    writeFileSync(path.join(cursorDir, 'right.xpm'), '/* XPM */');

    const entries = await listCursors(cursorDir);
    expect(entries.filter((e) => e.installed).map((e) => e.file)).toEqual(['right.xpm']);
    expect(entries[0]).toEqual({
      name: 'Normal Pointer',
      file: 'left.xpm',
      path: path.join(cursorDir, 'left.xpm'),
      installed: false,
    });
  });

  it('should copy the image under the role file name', async () => {
    const source = path.join(dir, 'my-arrow.xpm');
    writeFileSync(source, '/* XPM */ arrow');
    const cursorDir = path.join(dir, 'cursors');

    const entry = await installCursor(cursorDir, 'Normal Pointer', source);
    expect(entry.path).toBe(path.join(cursorDir, 'left.xpm'));
    expect(readFileSync(entry.path, 'utf-8')).toBe('/* XPM */ arrow');
  });

  it('should refuse a missing image', async () => {
    await expect(installCursor(dir, 'left.xpm', path.join(dir, 'missing.xpm'))).rejects.toThrow(
      `Cursor image not found: ${path.join(dir, 'missing.xpm')}`,
    );
  });
});

describe('restartIceWm', () => {
  it('should signal IceWM in an IceWM session', async () => {
    const runner = new FakeRunner();
    await restartIceWm(runner, { type: 'x11', desktop: 'ICEWM' });
    expect(runner.commands()).toEqual(['killall -HUP icewm']);
  });

  it('should require force elsewhere', async () => {
    const runner = new FakeRunner();
    await expect(restartIceWm(runner, { type: 'x11', desktop: 'XFCE' })).rejects.toBeInstanceOf(
      UnsupportedEnvironmentError,
    );
    expect(runner.calls).toEqual([]);

    await restartIceWm(runner, { type: 'x11', desktop: 'XFCE' }, { force: true });
    expect(runner.commands()).toEqual(['killall -HUP icewm']);
  });
});
