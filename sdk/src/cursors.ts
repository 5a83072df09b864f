import path from 'path';
import { FileUtils, NotFoundError } from '@icepanel/utils';
import type { CursorEntry, CursorRole } from './types.js';

export const CURSOR_ROLES: readonly CursorRole[] = [
  { name: 'Normal Pointer', file: 'left.xpm' },
  { name: 'Move Pointer', file: 'move.xpm' },
  { name: 'Right Pointer', file: 'right.xpm' },
  { name: 'Resize Bottom', file: 'sizeB.xpm' },
  { name: 'Resize Bottom-Left', file: 'sizeBL.xpm' },
  { name: 'Resize Bottom-Right', file: 'sizeBR.xpm' },
  { name: 'Resize Left', file: 'sizeL.xpm' },
  { name: 'Resize Right', file: 'sizeR.xpm' },
  { name: 'Resize Top', file: 'sizeT.xpm' },
  { name: 'Resize Top-Left', file: 'sizeTL.xpm' },
  { name: 'Resize Top-Right', file: 'sizeTR.xpm' },
];

/** Look a role up by display name or by file name, ignoring case. */
export function findCursorRole(nameOrFile: string): CursorRole {
  const wanted = nameOrFile.trim().toLowerCase();
  const role = CURSOR_ROLES.find(
    (r) => r.name.toLowerCase() === wanted || r.file.toLowerCase() === wanted,
  );
  if (!role) {
    throw new NotFoundError(`Unknown cursor "${nameOrFile}"`, {
      known: CURSOR_ROLES.map((r) => r.file),
    });
  }
  return role;
}

export async function listCursors(cursorDir: string): Promise<CursorEntry[]> {
  return Promise.all(
    CURSOR_ROLES.map(async (role) => {
      const file = path.join(cursorDir, role.file);
      return { ...role, path: file, installed: await FileUtils.exists(file) };
    }),
  );
}

export async function installCursor(cursorDir: string, role: string, source: string): Promise<CursorEntry> {
  const target = findCursorRole(role);
  if (!(await FileUtils.exists(source))) {
    throw new NotFoundError(`Cursor image not found: ${source}`, { source });
  }
  const file = path.join(cursorDir, target.file);
  await FileUtils.copyInto(source, file);
  return { ...target, path: file, installed: true };
}
