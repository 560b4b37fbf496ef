/**
 * Unit Tests for the request menu
 */

import { describe, it, expect } from '@jest/globals';
import type { RequestDefinition } from '@/shared/types/project-types';
import { MENU_SHORTCUTS, buildMenu, findMenuEntry, formatMenu, menuKey } from './menu';

const requests: RequestDefinition[] = [
  { kind: 'http', desc: 'List items', method: 'GET', endpoint: '/items' },
  { kind: 'socket', desc: 'Live feed', endpoint: 'http://ws.test' },
];

describe('menuKey', () => {
  it('skips q', () => {
    expect(MENU_SHORTCUTS.includes('q')).toBe(false);
    expect(menuKey(0)).toBe('0');
    expect(menuKey(10)).toBe('a');
    expect(menuKey(25)).toBe('p');
    expect(menuKey(26)).toBe('r');
  });

  it('falls back to the index past the last shortcut', () => {
    expect(menuKey(MENU_SHORTCUTS.length)).toBe('35');
  });
});

describe('findMenuEntry', () => {
  it('matches keys ignoring case and whitespace', () => {
    const menu = buildMenu(requests);

    expect(findMenuEntry(menu, ' 1 ')?.definition.desc).toBe('Live feed');
    expect(findMenuEntry(menu, 'x')).toBeUndefined();
  });
});

describe('formatMenu', () => {
  it('lists entries, the quit key and the hint', () => {
    expect(formatMenu('shop', buildMenu(requests), 'next_id=2')).toBe([
      '',
      '=== shop ===',
      '  0) List items',
      '  1) Live feed [Socket.IO]',
      '  q) Quit',
      '',
      'next_id=2',
    ].join('\n'));
  });

  it('omits an empty hint', () => {
    expect(formatMenu('shop', [], null)).toBe('\n=== shop ===\n  q) Quit');
  });
});
