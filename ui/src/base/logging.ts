// Copyright (C) 2018 The Android Open Source Project
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

export interface ErrorDetails {
  message: string; // e.g. Cannot read properties of undefined
  context: string; // e.g. pointerdown
  stack: string[];
}

export type ErrorHandler = (err: ErrorDetails) => void;
const errorHandlers: ErrorHandler[] = [];

export function assertExists<A>(value: A | null | undefined): A {
  if (value === null || value === undefined) {
    throw new Error("Value doesn't exist");
  }
  return value;
}

export function assertTrue(value: boolean, optMsg?: string) {
  if (!value) {
    throw new Error(optMsg ?? 'Failed assertion');
  }
}

export function assertFalse(value: boolean, optMsg?: string) {
  assertTrue(!value, optMsg);
}

export function addErrorHandler(handler: ErrorHandler) {
  if (!errorHandlers.includes(handler)) {
    errorHandlers.push(handler);
  }
}

export function removeErrorHandler(handler: ErrorHandler) {
  const pos = errorHandlers.indexOf(handler);
  if (pos >= 0) {
    errorHandlers.splice(pos, 1);
  }
}

/**
 * Routes an unexpected exception to every handler registered through
 * addErrorHandler(), or to the console when nobody registered one. |context|
 * names the host callback the exception escaped from.
 */
export function reportError(err: unknown, context: string) {
  let message = err instanceof Error ? err.message : `${err}`;

  // Remove useless "Uncaught Error:" or "Error:" prefixes.
  message = message.replace(/^Uncaught Error:/, '');
  message = message.replace(/^Error:/, '');
  message = message.trim();

  const stack: string[] = [];
  if (err instanceof Error && err.stack !== undefined) {
    for (let line of err.stack.replaceAll(/\r/g, '').split('\n')) {
      line = line.replace(/^\s*at\s*/, '').trim();
      if (line === '' || message.includes(line)) continue;
      stack.push(line);
    }
  }

  const details: ErrorDetails = {message, context, stack};
  if (errorHandlers.length === 0) {
    console.error(`[${context}] ${message}`, err);
    return;
  }
  for (const handler of errorHandlers) {
    handler(details);
  }
}

// This function serves two purposes.
// 1) A runtime check - if we are ever called, we throw an exception.
// This is useful for checking that code we suspect should never be reached is
// actually never reached.
// 2) A compile time check where typescript asserts that the value passed can be
// cast to the "never" type.
// This is useful for ensuring we exhastively check union types.
export function assertUnreachable(value: never): never {
  throw new Error(`This code should not be reachable ${value as unknown}`);
}
