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

import {DEFAULT_CONFIG} from './config';
import {connectionCurve} from './curves';
import {
  makePayload,
  minNodeHeight,
  socketOffset,
  TypeCompatibility,
} from './model';

const layout = DEFAULT_CONFIG.layout;

describe('TypeCompatibility', () => {
  test('equal types and the wildcard', () => {
    const types = new TypeCompatibility();
    expect(types.isCompatible('number', 'number')).toBe(true);
    expect(types.isCompatible('number', 'string')).toBe(false);
    expect(types.isCompatible('any', 'string')).toBe(true);
    expect(types.isCompatible('number', 'any')).toBe(true);
  });

  test('explicit pairs are directed', () => {
    const types = new TypeCompatibility().allow('number', 'string');
    expect(types.isCompatible('number', 'string')).toBe(true);
    expect(types.isCompatible('string', 'number')).toBe(false);
  });
});

test('makePayload', () => {
  expect(makePayload('Add')).toEqual({
    title: 'Add',
    kind: 'basic',
    metadata: {},
  });
  expect(makePayload('Pi', 'constant', {value: 3.14})).toEqual({
    title: 'Pi',
    kind: 'constant',
    metadata: {value: 3.14},
  });
});

test('socketOffset', () => {
  // Header 24, spacing 20.
  expect(socketOffset('input', 0, 120, layout)).toEqual({x: 0, y: 44});
  expect(socketOffset('input', 2, 120, layout)).toEqual({x: 0, y: 84});
  expect(socketOffset('output', 1, 120, layout)).toEqual({x: 120, y: 64});
});

test('minNodeHeight', () => {
  expect(minNodeHeight(0, layout)).toBe(44);
  expect(minNodeHeight(3, layout)).toBe(104);
});

describe('connectionCurve', () => {
  test('control offset grows with the horizontal gap', () => {
    const curve = connectionCurve({x: 0, y: 0}, {x: 300, y: 100}, layout);
    expect(curve.cp1).toEqual({x: 150, y: 0});
    expect(curve.cp2).toEqual({x: 150, y: 100});
  });

  test('control offset has a minimum', () => {
    const curve = connectionCurve({x: 0, y: 0}, {x: 40, y: 0}, layout);
    expect(curve.cp1).toEqual({x: 50, y: 0});
    expect(curve.cp2).toEqual({x: -10, y: 0});
  });

  test('a cached hint overrides the computed offset', () => {
    const curve = connectionCurve({x: 0, y: 0}, {x: 300, y: 0}, layout, 10);
    expect(curve.cp1).toEqual({x: 10, y: 0});
    expect(curve.cp2).toEqual({x: 290, y: 0});
  });
});
