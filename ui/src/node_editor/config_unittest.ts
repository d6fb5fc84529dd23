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

import {DEFAULT_CONFIG, resolveConfig} from './config';

describe('resolveConfig', () => {
  test('fills in defaults', () => {
    const result = resolveConfig();
    expect(result.ok).toBe(true);
    expect(result.value).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.layout.defaultNodeWidth).toBe(120);
    expect(DEFAULT_CONFIG.layout.socketRadius).toBe(8);
    expect(DEFAULT_CONFIG.behavior.minZoom).toBe(0.2);
    expect(DEFAULT_CONFIG.behavior.maxZoom).toBe(3);
    expect(DEFAULT_CONFIG.interaction.keys.selectAll).toEqual(['Mod+A']);
    expect(DEFAULT_CONFIG.interaction.pasteOffset).toEqual({x: 50, y: 50});
  });

  test('partial overrides keep the other defaults', () => {
    const result = resolveConfig({
      behavior: {snapToGrid: true},
      layout: {gridSize: 10},
    });
    if (!result.ok) throw new Error(result.error);
    expect(result.value.behavior.snapToGrid).toBe(true);
    expect(result.value.behavior.showGrid).toBe(true);
    expect(result.value.layout.gridSize).toBe(10);
    expect(result.value.layout.nodeHeaderHeight).toBe(24);
  });

  test('custom key bindings', () => {
    const result = resolveConfig({
      interaction: {keys: {deleteSelection: ['X']}},
    });
    if (!result.ok) throw new Error(result.error);
    expect(result.value.interaction.keys.deleteSelection).toEqual(['X']);
    expect(result.value.interaction.keys.cancel).toEqual(['Escape']);
  });

  test('rejects an invalid hotkey', () => {
    const result = resolveConfig({interaction: {keys: {cancel: ['Esc']}}});
    expect(result.ok).toBe(false);
    expect(result.error).toBe(
      'Invalid node editor config: interaction.keys.cancel.0: Invalid hotkey',
    );
  });

  test('rejects a negative radius', () => {
    const result = resolveConfig({layout: {socketRadius: -1}});
    expect(result.ok).toBe(false);
    expect(result.error).toMatch(
      /^Invalid node editor config: layout\.socketRadius: /,
    );
  });

  test('rejects an inverted zoom range', () => {
    const result = resolveConfig({behavior: {minZoom: 2, maxZoom: 1}});
    expect(result.error).toBe(
      'Invalid node editor config: behavior: minZoom must not exceed maxZoom',
    );
  });
});
