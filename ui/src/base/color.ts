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

// Immutable colors with a precomputed CSS string.

export interface Color {
  readonly cssString: string;
}

export class RgbColor implements Color {
  readonly cssString: string;

  // Channels in the range 0-255, alpha in 0-1 (undefined when opaque).
  constructor(r: number, g: number, b: number, alpha?: number) {
    const [cr, cg, cb] = [r, g, b].map((c) => Math.round(clamp(c, 0, 255)));
    if (alpha === undefined) {
      this.cssString = `rgb(${cr} ${cg} ${cb})`;
    } else {
      this.cssString = `rgb(${cr} ${cg} ${cb} / ${clamp(alpha, 0, 1)})`;
    }
  }
}

// Shorthand for theme tables.
export function rgb(r: number, g: number, b: number, alpha?: number): RgbColor {
  return new RgbColor(r, g, b, alpha);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
