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

import {rgb} from './color';

describe('RgbColor', () => {
  test('cssString', () => {
    expect(rgb(100, 200, 100).cssString).toBe('rgb(100 200 100)');
    expect(rgb(100, 200, 100, 0.25).cssString).toBe(
      'rgb(100 200 100 / 0.25)',
    );
  });

  test('channels are rounded and clamped', () => {
    expect(rgb(300, -5, 10.4).cssString).toBe('rgb(255 0 10)');
    expect(rgb(0, 0, 0, 2).cssString).toBe('rgb(0 0 0 / 1)');
    expect(rgb(0, 0, 0, -1).cssString).toBe('rgb(0 0 0 / 0)');
  });
});
