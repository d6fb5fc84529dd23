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

import {errResult, okResult, unwrapResult} from './result';

test('okResult', () => {
  const result = okResult(3);
  expect(result.ok).toBe(true);
  expect(unwrapResult(result)).toBe(3);
  expect(okResult()).toEqual({ok: true, value: undefined});
});

test('errResult', () => {
  const result = errResult('no such node');
  expect(result).toEqual({ok: false, error: 'no such node', value: undefined});
  expect(() => unwrapResult(result)).toThrow('no such node');
});

test('unwrapResult uses the message of structured errors', () => {
  const result = errResult({kind: 'NotFound', message: 'Node 4 not found'});
  expect(() => unwrapResult(result)).toThrow('Node 4 not found');
});
