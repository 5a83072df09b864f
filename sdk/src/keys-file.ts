import { FileUtils, NotFoundError, ValidationError, logger, splitArgs } from '@icepanel/utils';
import type { CommandRunner } from './command-runner.js';
import type { KeyBinding, KeyCombo } from './types.js';

export const KEYS_FILE_HEADER = '# IceWM custom keyboard shortcuts\n# Generated by icepanel\n\n';

const MODIFIERS = ['Ctrl', 'Alt', 'Shift', 'Super'] as const;
type Modifier = (typeof MODIFIERS)[number];

const KEY_LINE = /^key\s+(?:"([^"]*)"|(\S+))\s+(.+)$/;

function isModifier(part: string): part is Modifier {
  return MODIFIERS.some((m) => m === part);
}

export function buildCombo(combo: KeyCombo): string {
  const parts: string[] = [];
  if (combo.ctrl) parts.push('Ctrl');
  if (combo.alt) parts.push('Alt');
  if (combo.shift) parts.push('Shift');
  if (combo.super) parts.push('Super');
  const key = combo.key.trim();
  if (key) parts.push(key);
  return parts.join('+');
}

export function parseCombo(value: string): KeyCombo {
  const parts = value.split('+').filter((p) => p !== '');
  const present = new Set(parts.filter(isModifier));
  return {
    ctrl: present.has('Ctrl'),
    alt: present.has('Alt'),
    shift: present.has('Shift'),
    super: present.has('Super'),
    key: parts.filter((p) => !isModifier(p)).join('+'),
  };
}

/** Bring user-typed combos into the order the file is written with. */
export function normalizeCombo(value: string): string {
  return buildCombo(parseCombo(value.trim()));
}

/**
 * Parse a single `key "Combo" command` line. Anything else, including
 * comments and other directives, yields `undefined`.
 */
export function parseKeyLine(line: string): KeyBinding | undefined {
  const match = KEY_LINE.exec(line.trim());
  if (!match) return undefined;

  const combo = (match[1] ?? match[2]).trim();
  const command = match[3].trim();
  if (!combo || !command) return undefined;

  return { combo, command };
}

export class KeyBindingSet {
  private bindings = new Map<string, string>();

  constructor(initial: KeyBinding[] = []) {
    for (const { combo, command } of initial) {
      this.bindings.set(combo, command);
    }
  }

  get size(): number {
    return this.bindings.size;
  }

  get(combo: string): string | undefined {
    return this.bindings.get(combo);
  }

  /** The stored combo naming the same keystroke as `combo`, if any. */
  findCombo(combo: string): string | undefined {
    const typed = combo.trim();
    if (this.bindings.has(typed)) return typed;
    const wanted = normalizeCombo(typed);
    for (const stored of this.bindings.keys()) {
      if (normalizeCombo(stored) === wanted) return stored;
    }
    return undefined;
  }

  list(): KeyBinding[] {
    return [...this.bindings.keys()]
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((combo) => ({ combo, command: this.bindings.get(combo) ?? '' }));
  }

  add(combo: string, command: string): KeyBinding {
    const key = combo.trim();
    const cmd = command.trim();
    if (!key || !cmd) {
      throw new ValidationError('Both a key and a command must be specified.');
    }
    const existing = this.findCombo(key);
    if (existing !== undefined) {
      throw new ValidationError(`The key '${existing}' already exists.`, { combo: existing });
    }
    this.bindings.set(key, cmd);
    return { combo: key, command: cmd };
  }

  update(combo: string, command: string): KeyBinding {
    const key = combo.trim();
    const cmd = command.trim();
    if (!this.bindings.has(key)) {
      throw new NotFoundError(`No shortcut is bound to '${key}'.`, { combo: key });
    }
    if (!cmd) {
      throw new ValidationError('Command cannot be empty.');
    }
    this.bindings.set(key, cmd);
    return { combo: key, command: cmd };
  }

  remove(combo: string): KeyBinding {
    const key = combo.trim();
    const command = this.bindings.get(key);
    if (command === undefined) {
      throw new NotFoundError(`No shortcut is bound to '${key}'.`, { combo: key });
    }
    this.bindings.delete(key);
    return { combo: key, command };
  }
}

export function parseKeysFile(content: string): KeyBindingSet {
  const bindings: KeyBinding[] = [];
  for (const line of content.split('\n')) {
    const binding = parseKeyLine(line);
    if (binding) bindings.push(binding);
  }
  return new KeyBindingSet(bindings);
}

export function serializeKeysFile(set: KeyBindingSet): string {
  return KEYS_FILE_HEADER + set.list().map(({ combo, command }) => `key "${combo}"\t\t${command}\n`).join('');
}

export interface LoadedKeysFile {
  bindings: KeyBindingSet;
  existed: boolean;
}

export async function loadKeysFile(filePath: string): Promise<LoadedKeysFile> {
  const content = await FileUtils.readTextIfExists(filePath);
  if (content === undefined) {
    logger.debug('keys file not found, starting empty', { file: filePath });
    return { bindings: new KeyBindingSet(), existed: false };
  }
  const bindings = parseKeysFile(content);
  logger.debug('keys file loaded', { file: filePath, bindings: bindings.size });
  return { bindings, existed: true };
}

export async function saveKeysFile(filePath: string, set: KeyBindingSet): Promise<void> {
  await FileUtils.writeAtomic(filePath, serializeKeysFile(set));
}

/** Launch a binding's command in the background to try it out. */
export async function testBinding(runner: CommandRunner, command: string): Promise<void> {
  const argv = splitArgs(command.trim());
  if (argv.length === 0) {
    throw new ValidationError('Command cannot be empty.');
  }
  await runner.launch(argv[0], argv.slice(1));
}
