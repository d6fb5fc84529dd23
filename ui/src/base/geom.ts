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

// 2D geometry shared by the node editor: points, vectors, axis-aligned
// rectangles and the cubic bezier helpers used to draw and hit-test
// connections.

export interface Point2D {
  readonly x: number;
  readonly y: number;
}

export interface Size2D {
  readonly width: number;
  readonly height: number;
}

export interface Bounds2D {
  readonly top: number;
  readonly bottom: number;
  readonly left: number;
  readonly right: number;
}

/**
 * Immutable 2D vector. Every operation returns a new instance.
 */
export class Vector2D implements Point2D {
  readonly x: number;
  readonly y: number;

  constructor({x, y}: Point2D) {
    this.x = x;
    this.y = y;
  }

  add(point: Point2D): Vector2D {
    return new Vector2D({x: this.x + point.x, y: this.y + point.y});
  }

  sub(point: Point2D): Vector2D {
    return new Vector2D({x: this.x - point.x, y: this.y - point.y});
  }

  scale(scalar: number): Vector2D {
    return new Vector2D({x: this.x * scalar, y: this.y * scalar});
  }

  // Euclidean length.
  get magnitude(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y);
  }

  equals(point: Point2D): boolean {
    return this.x === point.x && this.y === point.y;
  }
}

/**
 * Immutable axis-aligned rectangle which can be used polymorphically as a
 * Bounds2D, a Size2D or a Point2D (its top-left corner).
 */
export class Rect2D implements Bounds2D, Size2D, Point2D {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
  readonly x: number; // Always equal to left
  readonly y: number; // Always equal to top
  readonly width: number; // Always equal to (right - left)
  readonly height: number; // Always equal to (bottom - top)

  /**
   * Creates a rect spanning two corner points in any order, e.g. the anchor
   * and the current pointer position of a rubber band selection.
   */
  static fromPoints(a: Point2D, b: Point2D): Rect2D {
    return new Rect2D({
      top: Math.min(a.y, b.y),
      left: Math.min(a.x, b.x),
      right: Math.max(a.x, b.x),
      bottom: Math.max(a.y, b.y),
    });
  }

  static fromPointAndSize(pointAndSize: Point2D & Size2D): Rect2D {
    const {x, y, width, height} = pointAndSize;
    return new Rect2D({
      top: y,
      left: x,
      right: x + width,
      bottom: y + height,
    });
  }

  /**
   * Smallest rect enclosing every input, or undefined for an empty input.
   */
  static union(rects: Iterable<Bounds2D>): Rect2D | undefined {
    let result: Rect2D | undefined;
    for (const r of rects) {
      result =
        result === undefined
          ? new Rect2D(r)
          : new Rect2D({
              left: Math.min(result.left, r.left),
              top: Math.min(result.top, r.top),
              right: Math.max(result.right, r.right),
              bottom: Math.max(result.bottom, r.bottom),
            });
    }
    return result;
  }

  constructor({left, top, right, bottom}: Bounds2D) {
    this.left = this.x = left;
    this.top = this.y = top;
    this.right = right;
    this.bottom = bottom;
    this.width = right - left;
    this.height = bottom - top;
  }

  get center(): Vector2D {
    return new Vector2D({
      x: (this.left + this.right) / 2,
      y: (this.top + this.bottom) / 2,
    });
  }

  /**
   * Grows the rect on every side. A number applies evenly, a Size2D applies
   * |width| horizontally and |height| vertically.
   */
  expand(amount: number | Size2D): Rect2D {
    const dx = typeof amount === 'number' ? amount : amount.width;
    const dy = typeof amount === 'number' ? amount : amount.height;
    return new Rect2D({
      top: this.top - dy,
      left: this.left - dx,
      bottom: this.bottom + dy,
      right: this.right + dx,
    });
  }

  // True if |bounds| lies entirely within this rect.
  contains(bounds: Bounds2D): boolean {
    return !(
      bounds.top < this.top ||
      bounds.bottom > this.bottom ||
      bounds.left < this.left ||
      bounds.right > this.right
    );
  }

  // Half-open: the right and bottom edges are outside.
  containsPoint(point: Point2D): boolean {
    return (
      point.y >= this.top &&
      point.y < this.bottom &&
      point.x >= this.left &&
      point.x < this.right
    );
  }

  /**
   * True if the two rects share any area or touch along an edge. Box selection
   * relies on edge contact counting as an intersection so that a node sitting
   * flush against the rubber band is picked up.
   */
  intersects(bounds: Bounds2D): boolean {
    return (
      this.left <= bounds.right &&
      this.right >= bounds.left &&
      this.top <= bounds.bottom &&
      this.bottom >= bounds.top
    );
  }

  // Strict overlap: rects that only touch along an edge do not overlap.
  overlaps(bounds: Bounds2D): boolean {
    return (
      this.left < bounds.right &&
      this.right > bounds.left &&
      this.top < bounds.bottom &&
      this.bottom > bounds.top
    );
  }

  translate(point: Point2D): Rect2D {
    return new Rect2D({
      top: this.top + point.y,
      left: this.left + point.x,
      bottom: this.bottom + point.y,
      right: this.right + point.x,
    });
  }

  equals(bounds: Bounds2D): boolean {
    return (
      bounds.top === this.top &&
      bounds.left === this.left &&
      bounds.right === this.right &&
      bounds.bottom === this.bottom
    );
  }
}

export function distance(a: Point2D, b: Point2D): number {
  return new Vector2D(a).sub(b).magnitude;
}

/**
 * Shortest distance from |point| to the segment [a, b]. A degenerate segment
 * is treated as a single point.
 */
export function distanceToSegment(
  point: Point2D,
  a: Point2D,
  b: Point2D,
): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSquared = dx * dx + dy * dy;
  if (lengthSquared === 0) {
    return distance(point, a);
  }
  const t = Math.max(
    0,
    Math.min(1, ((point.x - a.x) * dx + (point.y - a.y) * dy) / lengthSquared),
  );
  return distance(point, {x: a.x + t * dx, y: a.y + t * dy});
}

// The four points of a cubic bezier curve.
export interface CubicBezier {
  readonly from: Point2D;
  readonly cp1: Point2D;
  readonly cp2: Point2D;
  readonly to: Point2D;
}

// Evaluates the curve at |t| in [0, 1].
export function cubicBezierPoint(curve: CubicBezier, t: number): Point2D {
  const {from, cp1, cp2, to} = curve;
  const u = 1 - t;
  const a = u * u * u;
  const b = 3 * u * u * t;
  const c = 3 * u * t * t;
  const d = t * t * t;
  return {
    x: a * from.x + b * cp1.x + c * cp2.x + d * to.x,
    y: a * from.y + b * cp1.y + c * cp2.y + d * to.y,
  };
}

/**
 * Approximates the curve with |segments| straight segments, returning
 * |segments| + 1 points from |from| to |to| inclusive.
 */
export function flattenCubicBezier(
  curve: CubicBezier,
  segments: number,
): Point2D[] {
  const count = Math.max(1, Math.floor(segments));
  const points: Point2D[] = [];
  for (let i = 0; i <= count; i++) {
    points.push(cubicBezierPoint(curve, i / count));
  }
  return points;
}

// Shortest distance from |point| to a polyline.
export function distanceToPolyline(
  point: Point2D,
  polyline: ReadonlyArray<Point2D>,
): number {
  if (polyline.length === 1) {
    return distance(point, polyline[0]);
  }
  let best = Infinity;
  for (let i = 0; i + 1 < polyline.length; i++) {
    best = Math.min(
      best,
      distanceToSegment(point, polyline[i], polyline[i + 1]),
    );
  }
  return best;
}
