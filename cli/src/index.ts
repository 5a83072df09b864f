#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Validator } from '@icepanel/utils';
import { createContext } from './context.js';
import { runCli } from './program.js';

function readVersion(): string | undefined {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  return Validator.isRecord(manifest) && typeof manifest.version === 'string' ? manifest.version : undefined;
}

process.exitCode = await runCli(createContext(), process.argv, readVersion());
