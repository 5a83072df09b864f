export interface KeyboardState {
  autoRepeat: boolean;
  /** milliseconds before repeating starts */
  repeatDelay: number;
  /** repeats per second */
  repeatRate: number;
  clickPercent: number;
}

export interface BellState {
  percent: number;
  pitch: number;
  duration: number;
}

export interface Acceleration {
  numerator: number;
  denominator: number;
}

export interface PointerState {
  acceleration: Acceleration;
  threshold: number;
}

export interface DpmsSettings {
  enabled: boolean;
  standby: number;
  suspend: number;
  off: number;
}

export interface XsetState {
  keyboard: KeyboardState;
  bell: BellState;
  pointer: PointerState;
  dpms: DpmsSettings;
}

export type DpmsTimeoutField = 'standby' | 'suspend' | 'off';

export type DpmsTimeouts = Pick<DpmsSettings, DpmsTimeoutField>;

export interface RepeatSettings {
  enabled: boolean;
  rate: number;
  delay: number;
}

export interface SoundSettings {
  click: boolean;
  clickVolume: number;
  bell: boolean;
  bellVolume: number;
  bellPitch: number;
  bellDuration: number;
}

export interface PointerSettings {
  acceleration: number;
  threshold: number;
}

export interface KeyBinding {
  combo: string;
  command: string;
}

export interface KeyCombo {
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  super: boolean;
  key: string;
}

export interface CursorRole {
  name: string;
  file: string;
}

export interface CursorEntry extends CursorRole {
  path: string;
  installed: boolean;
}

export type Meridiem = 'AM' | 'PM';

export interface ClockStatus {
  zone: string;
  abbreviation: string;
  ntpActive: boolean;
  synchronized: boolean;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ClockChange {
  ntp: boolean;
  date?: CalendarDate;
  time?: TimeOfDay;
}
