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

import {Disposable} from './disposable';

// We limit ourselves to listeners that have only one argument (or zero, if
// using void). API-wise it's more robust to wrap arguments in an interface,
// rather than passing them positionally.
export type EvtListener<T> = (args: T) => void;

// For use in interfaces, when we want to expose only the listen() method and
// not the emit().
export interface Evt<T> {
  addListener(listener: EvtListener<T>): Disposable;
}

/**
 * An explicit observer list. Listeners run synchronously, in registration
 * order, before notify() returns.
 *
 * Example usage:
 *
 * interface NodeRemovedArgs {nodeId: number};
 *
 * class Graph {
 *  readonly onNodeRemoved = new EvtSource<NodeRemovedArgs>();
 *
 *  private remove(nodeId: number) {
 *   this.onNodeRemoved.notify({nodeId});
 *  }
 * }
 *
 * const trash = new DisposableStack();
 * trash.use(graph.onNodeRemoved.addListener(({nodeId}) => forget(nodeId)));
 * ...
 * trash.dispose();
 */
export class EvtSource<T> implements Evt<T> {
  private listeners: EvtListener<T>[] = [];

  /**
   * Registers a new event listener.
   * @returns a Disposable object that will remove the listener on dispose.
   */
  addListener(listener: EvtListener<T>): Disposable {
    const listeners = this.listeners;
    listeners.push(listener);
    return {
      dispose() {
        // Erase the handler from the array. (splice(length, 1) is a no-op).
        const pos = listeners.indexOf(listener);
        listeners.splice(pos >= 0 ? pos : listeners.length, 1);
      },
    };
  }

  /**
   * Fires the event. A listener added or removed while notifying takes effect
   * from the next notification.
   */
  notify(args: T): void {
    for (const listener of [...this.listeners]) {
      listener(args);
    }
  }

  get listenerCount(): number {
    return this.listeners.length;
  }
}
