export { IcePanel } from './panel.js';
export type { PanelOptions } from './panel.js';
export { systemRunner } from './command-runner.js';
export type { CommandRunner } from './command-runner.js';
export { isWayland, isIceWmSession, assertX11 } from './environment.js';
export { XsetClient, parseXsetQuery } from './xset.js';
export {
  DpmsService,
  TIMEOUT_PRESETS,
  DPMS_FIELDS,
  labelForSeconds,
  parseTimeout,
  cascadeTimeouts,
} from './dpms.js';
export type { TimeoutPreset } from './dpms.js';
export {
  KeyboardRepeatService,
  KeyboardSoundService,
  REPEAT_RANGES,
  DEFAULT_REPEAT,
  SOUND_RANGES,
  DEFAULT_SOUND,
} from './keyboard.js';
export {
  MouseService,
  PointerTrial,
  POINTER_RANGES,
  DEFAULT_POINTER,
  REVERT_TIMEOUT_MS,
} from './mouse.js';
export type { PointerSnapshot, PointerReading, TrialOutcome } from './mouse.js';
export {
  KeyBindingSet,
  KEYS_FILE_HEADER,
  buildCombo,
  parseCombo,
  normalizeCombo,
  parseKeyLine,
  parseKeysFile,
  serializeKeysFile,
  loadKeysFile,
  saveKeysFile,
  testBinding,
} from './keys-file.js';
export type { LoadedKeysFile } from './keys-file.js';
export { CURSOR_ROLES, findCursorRole, listCursors, installCursor } from './cursors.js';
export { restartIceWm } from './icewm.js';
export type { RestartOptions } from './icewm.js';
export { RunHistory, runCommand, HISTORY_LIMIT, HISTORY_HEADER, FALLBACK_SUGGESTION } from './run-history.js';
export {
  ClockService,
  ClockTicker,
  to24Hour,
  formatDateTime,
  formatClock,
  parseDate,
  parseTime,
} from './clock/clock.js';
export type { ClockPaths, TickerOptions } from './clock/clock.js';
export { PrivilegedRunner } from './clock/privileged.js';
export {
  defaultLayout,
  isGlibcZoneDir,
  locateZoneinfo,
  locateLocaltime,
  locateTimezoneFile,
  currentZoneName,
  listZones,
  resolveZoneFile,
  DEFAULT_ZONE_DIRS,
  UNKNOWN_ZONE,
} from './clock/zoneinfo.js';
export type { ZoneinfoLayout } from './clock/zoneinfo.js';
export * from './types.js';
