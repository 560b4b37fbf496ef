/**
 * Request menu: one single-key shortcut per request definition.
 */

import type { RequestDefinition } from '@/shared/types/project-types';

/** `q` is reserved for quitting */
export const MENU_SHORTCUTS = '0123456789abcdefghijklmnoprstuvwxyz';
export const QUIT_KEY = 'q';

export interface MenuEntry {
  key: string;
  definition: RequestDefinition;
}

/** Requests past the single-key shortcuts get their index as a key */
export function menuKey(index: number): string {
  return index < MENU_SHORTCUTS.length ? MENU_SHORTCUTS[index] : String(index);
}

export function buildMenu(requests: readonly RequestDefinition[]): MenuEntry[] {
  return requests.map((definition, index) => ({ key: menuKey(index), definition }));
}

export function findMenuEntry(entries: readonly MenuEntry[], input: string): MenuEntry | undefined {
  const key = input.trim().toLowerCase();
  return entries.find(entry => entry.key === key);
}

function entryLabel(definition: RequestDefinition): string {
  return definition.kind === 'socket' ? `${definition.desc} [Socket.IO]` : definition.desc;
}

export function formatMenu(projectName: string, entries: readonly MenuEntry[], hint: string | null): string {
  const lines = [
    '',
    `=== ${projectName} ===`,
    ...entries.map(entry => `  ${entry.key}) ${entryLabel(entry.definition)}`),
    `  ${QUIT_KEY}) Quit`,
  ];
  if (hint) {
    lines.push('', hint);
  }
  return lines.join('\n');
}
