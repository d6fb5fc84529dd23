// Copyright (C) 2023 The Android Open Source Project
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

// This module provides hotkey detection using type-safe human-readable strings.
//
// Given a key event |event|, checking whether it contains the hotkey 'Mod+A'
// is done with:
//
//   checkHotkey('Mod+A', event);
//
// ...which evaluates to true only when A is pressed while the Mod key is held,
// and not if other modifiers such as Alt or Shift were also held.
//
// Modifiers include 'Shift', 'Ctrl', 'Alt', and 'Mod'. 'Mod' is satisfied by
// either Ctrl or Cmd (meta), as the host toolkit does not tell us which
// platform convention applies.

type Alphabet =
  | 'A'
  | 'B'
  | 'C'
  | 'D'
  | 'E'
  | 'F'
  | 'G'
  | 'H'
  | 'I'
  | 'J'
  | 'K'
  | 'L'
  | 'M'
  | 'N'
  | 'O'
  | 'P'
  | 'Q'
  | 'R'
  | 'S'
  | 'T'
  | 'U'
  | 'V'
  | 'W'
  | 'X'
  | 'Y'
  | 'Z';
type Number = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9';
type Special =
  | 'Enter'
  | 'Escape'
  | 'Delete'
  | 'Backspace'
  | 'Space'
  | 'ArrowUp'
  | 'ArrowDown'
  | 'ArrowLeft'
  | 'ArrowRight';
export type Key = Alphabet | Number | Special;
export type Modifier =
  | ''
  | 'Mod+'
  | 'Shift+'
  | 'Ctrl+'
  | 'Alt+'
  | 'Mod+Shift+'
  | 'Mod+Alt+'
  | 'Ctrl+Shift+';
export type Hotkey = `${Modifier}${Key}`;

// The modifier state carried by every normalised input event.
export interface Modifiers {
  readonly shift: boolean;
  readonly ctrl: boolean;
  readonly alt: boolean;
  readonly meta: boolean;
}

export const NO_MODIFIERS: Modifiers = {
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
};

export interface KeyEventLike {
  readonly key: string;
  readonly modifiers: Modifiers;
}

// Represents a deconstructed hotkey.
export interface HotkeyParts {
  // The name of the primary key of this hotkey.
  key: string;

  // All the modifiers as one chunk. E.g. 'Mod+Shift+'.
  modifier: string;
}

// Deconstruct a hotkey from its string representation into its constituent
// parts.
export function parseHotkey(hotkey: string): HotkeyParts | undefined {
  const regex = /^((?:Mod\+|Shift\+|Alt\+|Ctrl\+)*)(.+)$/;
  const result = hotkey.match(regex);

  if (!result) {
    return undefined;
  }

  return {
    modifier: result[1],
    key: result[2],
  };
}

const SPECIAL_KEYS: ReadonlyArray<Special> = [
  'Enter',
  'Escape',
  'Delete',
  'Backspace',
  'Space',
  'ArrowUp',
  'ArrowDown',
  'ArrowLeft',
  'ArrowRight',
];

const MODIFIERS: ReadonlyArray<Modifier> = [
  '',
  'Mod+',
  'Shift+',
  'Ctrl+',
  'Alt+',
  'Mod+Shift+',
  'Mod+Alt+',
  'Ctrl+Shift+',
];

// Runtime check for strings coming from user configuration.
export function isHotkey(value: string): value is Hotkey {
  const parts = parseHotkey(value);
  if (parts === undefined) return false;
  if (!MODIFIERS.some((m) => m === parts.modifier)) return false;
  return (
    /^[A-Z0-9]$/.test(parts.key) || SPECIAL_KEYS.some((k) => k === parts.key)
  );
}

// Check whether |hotkey| is present in the key event |event|.
export function checkHotkey(hotkey: Hotkey, event: KeyEventLike): boolean {
  const result = parseHotkey(hotkey);
  if (!result) {
    return false;
  }
  return compareKeys(event, result.key) && checkMods(event, result);
}

// True if any of |hotkeys| matches.
export function checkAnyHotkey(
  hotkeys: ReadonlyArray<Hotkey>,
  event: KeyEventLike,
): boolean {
  return hotkeys.some((hotkey) => checkHotkey(hotkey, event));
}

// Return true if |key| matches the event's key.
function compareKeys(e: KeyEventLike, key: string): boolean {
  const eventKey = e.key === ' ' ? 'Space' : e.key;
  return eventKey.toLowerCase() === key.toLowerCase();
}

// Return true if modifiers specified in |hotkey| match those in the event.
function checkMods(event: KeyEventLike, hotkey: HotkeyParts): boolean {
  const {modifier} = hotkey;
  const {ctrl, alt, shift, meta} = event.modifiers;

  const wantShift = modifier.includes('Shift');
  const wantAlt = modifier.includes('Alt');
  const wantMod = modifier.includes('Mod');
  const wantCtrl = modifier.includes('Ctrl');

  if (wantMod) {
    // Mod accepts exactly one of Ctrl or Cmd.
    if (ctrl === meta) return false;
  } else {
    if (wantCtrl !== ctrl) return false;
    if (meta) return false;
  }
  return wantShift === shift && wantAlt === alt;
}
