// Copyright (C) 2025 The Android Open Source Project
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//      http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import {
  checkAnyHotkey,
  checkHotkey,
  Hotkey,
  isHotkey,
  Modifiers,
  NO_MODIFIERS,
  parseHotkey,
} from './hotkeys';

function key(k: string, mods: Partial<Modifiers> = {}) {
  return {key: k, modifiers: {...NO_MODIFIERS, ...mods}};
}

test('parseHotkey', () => {
  expect(parseHotkey('A')).toEqual({key: 'A', modifier: ''});
  expect(parseHotkey('Shift+A')).toEqual({key: 'A', modifier: 'Shift+'});
  expect(parseHotkey('Mod+Shift+A')).toEqual({
    key: 'A',
    modifier: 'Mod+Shift+',
  });
  expect(parseHotkey('')).toBeUndefined();
});

test('isHotkey', () => {
  expect(isHotkey('Mod+A')).toBe(true);
  expect(isHotkey('Delete')).toBe(true);
  expect(isHotkey('Ctrl+Shift+9')).toBe(true);
  expect(isHotkey('a')).toBe(false);
  expect(isHotkey('Mod+Tab')).toBe(false);
  expect(isHotkey('Shift+Mod+A')).toBe(false);
});

describe('checkHotkey', () => {
  test('A', () => {
    expect(checkHotkey('A', key('a'))).toBe(true);
    expect(checkHotkey('A', key('A', {shift: true}))).toBe(false);
    expect(checkHotkey('A', key('a', {ctrl: true}))).toBe(false);
    expect(checkHotkey('A', key('a', {alt: true}))).toBe(false);
    expect(checkHotkey('A', key('a', {meta: true}))).toBe(false);
  });

  test('Special', () => {
    expect(checkHotkey('Enter', key('Enter'))).toBe(true);
    expect(checkHotkey('Escape', key('Escape'))).toBe(true);
    expect(checkHotkey('Space', key(' '))).toBe(true);
  });

  test('Shift+A', () => {
    const hotkey: Hotkey = 'Shift+A';
    expect(checkHotkey(hotkey, key('a'))).toBe(false);
    expect(checkHotkey(hotkey, key('A', {shift: true}))).toBe(true);
    expect(checkHotkey(hotkey, key('a', {ctrl: true}))).toBe(false);
  });

  test('Mod+A accepts Ctrl or Cmd but not both', () => {
    const hotkey: Hotkey = 'Mod+A';
    expect(checkHotkey(hotkey, key('a'))).toBe(false);
    expect(checkHotkey(hotkey, key('a', {ctrl: true}))).toBe(true);
    expect(checkHotkey(hotkey, key('a', {meta: true}))).toBe(true);
    expect(checkHotkey(hotkey, key('a', {ctrl: true, meta: true}))).toBe(
      false,
    );
    expect(checkHotkey(hotkey, key('A', {ctrl: true, shift: true}))).toBe(
      false,
    );
  });

  test('Ctrl+A', () => {
    const hotkey: Hotkey = 'Ctrl+A';
    expect(checkHotkey(hotkey, key('a', {ctrl: true}))).toBe(true);
    expect(checkHotkey(hotkey, key('a', {meta: true}))).toBe(false);
  });
});

test('checkAnyHotkey', () => {
  const hotkeys: Hotkey[] = ['Delete', 'Backspace'];
  expect(checkAnyHotkey(hotkeys, key('Backspace'))).toBe(true);
  expect(checkAnyHotkey(hotkeys, key('Enter'))).toBe(false);
  expect(checkAnyHotkey([], key('Delete'))).toBe(false);
});
