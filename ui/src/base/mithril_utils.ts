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

// Events dispatched by Mithril carry an extra |redraw| flag which controls
// whether Mithril schedules an automatic redraw once the handler returns.
export type MithrilEvent<T extends Event = Event> = T & {redraw: boolean};

/**
 * Wraps an event handler so that Mithril does not redraw after it runs. Used
 * for handlers that repaint a canvas themselves.
 */
export function quietHandler<T extends Event>(
  handler: (event: MithrilEvent<T>) => void,
): (event: MithrilEvent<T>) => void {
  return (event) => {
    event.redraw = false;
    handler(event);
  };
}
