// Copyright (C) 2024 The Android Open Source Project
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

// A minimal stand-in for the ESnext explicit resource management types. It
// only relies on a plain dispose() method so it works on every runtime we
// target without Symbol.dispose.

// An object that can/should be disposed of to release resources or detach
// itself from something it registered with.
export interface Disposable {
  dispose(): void;
}

// A collection of Disposables, disposed LIFO. Typically filled during the
// lifetime of a component and emptied when it is torn down.
export class DisposableStack implements Disposable {
  private resources: Disposable[] = [];

  use<T extends Disposable>(d: T): T {
    this.resources.push(d);
    return d;
  }

  defer(onDispose: () => void): void {
    this.use({
      dispose: onDispose,
    });
  }

  dispose(): void {
    while (true) {
      const d = this.resources.pop();
      if (d === undefined) {
        break;
      }
      d.dispose();
    }
  }
}
