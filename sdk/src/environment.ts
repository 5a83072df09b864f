import { UnsupportedEnvironmentError } from '@icepanel/utils';
import type { SessionInfo } from '@icepanel/utils';

export function isWayland(session: SessionInfo): boolean {
  return session.type === 'wayland';
}

export function isIceWmSession(session: SessionInfo): boolean {
  return session.desktop.toLowerCase().includes('icewm');
}

export function assertX11(session: SessionInfo): void {
  if (isWayland(session)) {
    throw new UnsupportedEnvironmentError(
      "This tool relies on 'xset', which is not supported in a Wayland session.",
    );
  }
}
