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

import {CubicBezier, Point2D} from '../base/geom';
import {LayoutConfig} from './config';

/**
 * Builds the S-shaped curve drawn for a connection leaving an output socket at
 * |from| and entering an input socket at |to|. Both control points extend
 * horizontally, away from the source and into the target, by a distance
 * proportional to the horizontal gap between the endpoints.
 *
 * |controlOffset| (a connection's cached hint) replaces the computed distance.
 */
export function connectionCurve(
  from: Point2D,
  to: Point2D,
  layout: LayoutConfig,
  controlOffset?: number,
): CubicBezier {
  const offset =
    controlOffset ??
    Math.max(
      layout.bezierMinControlOffset,
      Math.abs(to.x - from.x) * layout.bezierControlOffsetRatio,
    );
  return {
    from,
    cp1: {x: from.x + offset, y: from.y},
    cp2: {x: to.x - offset, y: to.y},
    to,
  };
}

// Applies |fn| (an affine map such as a viewport transform) to every point.
export function mapCurve(
  curve: CubicBezier,
  fn: (p: Point2D) => Point2D,
): CubicBezier {
  return {
    from: fn(curve.from),
    cp1: fn(curve.cp1),
    cp2: fn(curve.cp2),
    to: fn(curve.to),
  };
}
