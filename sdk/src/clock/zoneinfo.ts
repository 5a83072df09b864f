import { promises as fs } from 'fs';
import path from 'path';
import { FileUtils, NotFoundError, logger } from '@icepanel/utils';

export const DEFAULT_ZONE_DIRS = [
  '/usr/share/zoneinfo/',
  '/usr/lib/zoneinfo/',
  '/usr/share/lib/zoneinfo/',
  '/usr/local/share/zoneinfo/',
  '/usr/local/share/lib/zoneinfo/',
  '/etc/zoneinfo/',
];

export const DEFAULT_LOCALTIME = '/etc/localtime';
export const DEFAULT_TIMEZONE_FILE = '/etc/timezone';

const CALENDAR_FILE = /\.(ics|ICS)$/;
const CALENDAR_SUBDIRS = ['America', 'posix', 'Africa', 'Canada', 'Asia', 'right', 'Indian'];

export const UNKNOWN_ZONE = 'Unknown';

/** Where to look for zone data, in order of preference. */
export interface ZoneinfoLayout {
  zoneDirs: string[];
  localtimeFiles: string[];
  timezoneFiles: string[];
}

export function defaultLayout(tzDir?: string): ZoneinfoLayout {
  const zoneDirs = [...DEFAULT_ZONE_DIRS];
  const custom = tzDir?.trim();
  if (custom) {
    zoneDirs.unshift(custom.endsWith('/') ? custom : `${custom}/`);
  }
  return {
    zoneDirs,
    localtimeFiles: [DEFAULT_LOCALTIME, ...zoneDirs.map((d) => path.join(d, 'localtime'))],
    timezoneFiles: [DEFAULT_TIMEZONE_FILE],
  };
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

async function readNames(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return [];
    }
    throw error;
  }
}

/**
 * A compiled (glibc style) zone directory. Calendar-file trees that share the
 * zoneinfo name do not count.
 */
export async function isGlibcZoneDir(dir: string): Promise<boolean> {
  if (!(await FileUtils.isDirectory(dir))) return false;

  for (const sub of ['', ...CALENDAR_SUBDIRS]) {
    const names = await readNames(path.join(dir, sub));
    if (names.some((name) => CALENDAR_FILE.test(name))) return false;
  }
  return true;
}

export async function locateZoneinfo(layout: ZoneinfoLayout): Promise<string> {
  for (const dir of layout.zoneDirs) {
    if (await isGlibcZoneDir(dir)) {
      logger.debug('zoneinfo located', { dir });
      return dir;
    }
  }
  throw new NotFoundError("Could not locate 'zoneinfo' files.", { searched: layout.zoneDirs });
}

export async function locateLocaltime(layout: ZoneinfoLayout): Promise<string> {
  for (const file of layout.localtimeFiles) {
    if (await lexists(file)) return file;
  }
  return layout.localtimeFiles[0] ?? DEFAULT_LOCALTIME;
}

export async function locateTimezoneFile(layout: ZoneinfoLayout): Promise<string | undefined> {
  for (const file of layout.timezoneFiles) {
    if (await FileUtils.exists(file)) return file;
  }
  return undefined;
}

/** True for regular files and for dangling or valid symlinks. */
async function lexists(file: string): Promise<boolean> {
  try {
    await fs.lstat(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Name of the zone `localtime` links to, relative to `zoneDir`. Anything that
 * is not a link into the zone directory reads as `Unknown`.
 */
export async function currentZoneName(localtime: string, zoneDir: string): Promise<string> {
  try {
    const stat = await fs.lstat(localtime);
    if (!stat.isSymbolicLink()) return UNKNOWN_ZONE;

    const target = await fs.realpath(localtime);
    const root = await fs.realpath(zoneDir);
    const relative = path.relative(root, target);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return UNKNOWN_ZONE;
    return relative;
  } catch (error) {
    logger.debug('could not resolve current zone', { localtime, error: String(error) });
    return UNKNOWN_ZONE;
  }
}

async function isDirectoryLink(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isDirectory();
  } catch {
    return false;
  }
}

function isZoneName(segment: string): boolean {
  return !segment.includes('.') && !segment.endsWith('~');
}

/**
 * Every zone file below `zoneDir` as a relative path, sorted. Files or
 * directories named with a dot or a trailing `~` are not zones.
 */
export async function listZones(zoneDir: string): Promise<string[]> {
  const zones: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (isZoneName(entry.name)) await walk(full);
        continue;
      }
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      if (entry.isSymbolicLink() && (await isDirectoryLink(full))) continue;
      if (!isZoneName(entry.name)) continue;
      zones.push(path.relative(zoneDir, full));
    }
  };

  await walk(zoneDir);
  return zones.sort(compareCodePoints);
}

/**
 * Absolute path of `zone` inside `zoneDir`, refusing names that escape it,
 * do not exist or would not appear in {@link listZones}.
 */
export async function resolveZoneFile(zoneDir: string, zone: string): Promise<string> {
  const name = zone.trim();
  const root = path.resolve(zoneDir);
  const file = path.resolve(root, name);
  if (!name || !file.startsWith(root + path.sep)) {
    throw new NotFoundError(`Unknown time zone "${zone}"`, { zone });
  }
  if (!path.relative(root, file).split(path.sep).every(isZoneName)) {
    throw new NotFoundError(`Unknown time zone "${zone}"`, { zone });
  }
  const stat = await fs.stat(file).catch(() => undefined);
  if (!stat?.isFile()) {
    throw new NotFoundError(`Unknown time zone "${zone}"`, { zone });
  }
  return file;
}
