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
  addErrorHandler,
  assertExists,
  assertFalse,
  assertTrue,
  assertUnreachable,
  ErrorDetails,
  removeErrorHandler,
  reportError,
} from './logging';

describe('assertExists', () => {
  test('returns value when not null or undefined', () => {
    expect(assertExists(42)).toBe(42);
    expect(assertExists(0)).toBe(0);
    expect(assertExists('')).toBe('');
    expect(assertExists(false)).toBe(false);
  });

  test('throws on null and undefined', () => {
    expect(() => assertExists(null)).toThrow("Value doesn't exist");
    expect(() => assertExists(undefined)).toThrow("Value doesn't exist");
  });
});

test('assertTrue and assertFalse', () => {
  expect(() => assertTrue(true)).not.toThrow();
  expect(() => assertTrue(false)).toThrow('Failed assertion');
  expect(() => assertTrue(false, 'zoom out of range')).toThrow(
    'zoom out of range',
  );
  expect(() => assertFalse(false)).not.toThrow();
  expect(() => assertFalse(true, 'dragging')).toThrow('dragging');
});

test('assertUnreachable', () => {
  const value = 'unexpected' as never;
  expect(() => assertUnreachable(value)).toThrow(
    'This code should not be reachable unexpected',
  );
});

describe('reportError', () => {
  const reports: ErrorDetails[] = [];
  const handler = (details: ErrorDetails) => reports.push(details);

  beforeEach(() => {
    reports.splice(0);
    addErrorHandler(handler);
  });

  afterEach(() => removeErrorHandler(handler));

  test('strips the Error: prefix and records the context', () => {
    reportError(new Error('Error: socket 3 vanished'), 'pointerdown');
    expect(reports.length).toBe(1);
    expect(reports[0].message).toBe('socket 3 vanished');
    expect(reports[0].context).toBe('pointerdown');
  });

  test('accepts non-Error values', () => {
    reportError('plain failure', 'paint');
    expect(reports[0]).toEqual({
      message: 'plain failure',
      context: 'paint',
      stack: [],
    });
  });

  test('handlers are registered once', () => {
    addErrorHandler(handler);
    reportError('twice?', 'keydown');
    expect(reports.length).toBe(1);
  });

  test('falls back to the console without handlers', () => {
    removeErrorHandler(handler);
    const spy = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      reportError('lost', 'wheel');
      expect(spy).toHaveBeenCalledWith('[wheel] lost', 'lost');
    } finally {
      spy.mockRestore();
    }
    expect(reports.length).toBe(0);
  });
});
