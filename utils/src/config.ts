import { readFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { ValidationError } from './error-handler.js';
import { Validator } from './validator.js';

export interface SessionInfo {
  /** XDG_SESSION_TYPE, e.g. `x11` or `wayland` */
  type: string;
  /** XDG_CURRENT_DESKTOP, e.g. `ICEWM` */
  desktop: string;
}

export interface IcePanelConfig {
  home: string;
  keysFile: string;
  cursorDir: string;
  historyFile: string;
  tzDir?: string;
  logLevel: string;
  logFile?: string;
  session: SessionInfo;
}

type FileConfig = Partial<Pick<IcePanelConfig, 'keysFile' | 'cursorDir' | 'historyFile' | 'tzDir' | 'logLevel' | 'logFile'>>;

const FILE_KEYS = ['keysFile', 'cursorDir', 'historyFile', 'tzDir', 'logLevel', 'logFile'] as const;

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function expandHome(value: string, home: string): string {
  if (value === '~') return home;
  if (value.startsWith('~/')) return path.join(home, value.slice(2));
  return value;
}

/**
 * Resolves settings from built-in defaults, an optional JSON file and the
 * environment, in increasing order of precedence.
 */
export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;
  private cached?: IcePanelConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  get home(): string {
    return nonBlank(this.env.HOME) ?? os.homedir();
  }

  get configFile(): string {
    return nonBlank(this.env.ICEPANEL_CONFIG) ?? path.join(this.home, '.config', 'icepanel', 'config.json');
  }

  load(): IcePanelConfig {
    if (this.cached) return this.cached;

    const home = this.home;
    const file = this.readFileConfig();
    const pick = (envKey: string, key: keyof FileConfig): string | undefined =>
      nonBlank(this.env[envKey]) ?? file[key];

    this.cached = {
      home,
      keysFile: expandHome(pick('ICEPANEL_KEYS_FILE', 'keysFile') ?? path.join(home, '.icewm', 'keys'), home),
      cursorDir: expandHome(pick('ICEPANEL_CURSOR_DIR', 'cursorDir') ?? path.join(home, '.icewm', 'cursors'), home),
      historyFile: expandHome(
        pick('ICEPANEL_HISTORY_FILE', 'historyFile') ?? path.join(home, '.config', 'icepanel', 'run-history'),
        home,
      ),
      tzDir: pick('TZDIR', 'tzDir'),
      logLevel: pick('LOG_LEVEL', 'logLevel') ?? 'info',
      logFile: pick('ICEPANEL_LOG_FILE', 'logFile'),
      session: {
        type: this.env.XDG_SESSION_TYPE ?? '',
        desktop: this.env.XDG_CURRENT_DESKTOP ?? '',
      },
    };
    return this.cached;
  }

  get<K extends keyof IcePanelConfig>(key: K): IcePanelConfig[K] {
    return this.load()[key];
  }

  private readFileConfig(): FileConfig {
    let raw: string;
    try {
      raw = readFileSync(this.configFile, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return {};
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Invalid JSON in ${this.configFile}: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!Validator.isRecord(parsed)) {
      throw new ValidationError(`${this.configFile} must contain a JSON object`);
    }

    const config: FileConfig = {};
    for (const key of FILE_KEYS) {
      const value = parsed[key];
      if (value === undefined) continue;
      if (typeof value !== 'string') {
        throw new ValidationError(`"${key}" in ${this.configFile} must be a string`, { key });
      }
      config[key] = value;
    }
    return config;
  }
}
