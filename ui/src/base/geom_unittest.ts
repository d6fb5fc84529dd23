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

import {
  cubicBezierPoint,
  distance,
  distanceToPolyline,
  distanceToSegment,
  flattenCubicBezier,
  Rect2D,
  Vector2D,
} from './geom';

describe('Vector2D', () => {
  test('add', () => {
    const result = new Vector2D({x: 1, y: 2}).add({x: 3, y: 4});
    expect(result).toMatchObject({x: 4, y: 6});
  });

  test('sub', () => {
    const result = new Vector2D({x: 5, y: 7}).sub({x: 2, y: 3});
    expect(result).toMatchObject({x: 3, y: 4});
  });

  test('scale', () => {
    const result = new Vector2D({x: 2, y: 3}).scale(2);
    expect(result).toMatchObject({x: 4, y: 6});
  });

  test('magnitude', () => {
    expect(new Vector2D({x: 3, y: 4}).magnitude).toBe(5);
  });
});

describe('Rect2D', () => {
  test('asPoint and asSize', () => {
    const rect = new Rect2D({left: 1, top: 2, right: 3, bottom: 8});
    expect(rect).toMatchObject({x: 1, y: 2, width: 2, height: 6});
  });

  test('fromPoints orders the corners', () => {
    const rect = Rect2D.fromPoints({x: 10, y: 0}, {x: 0, y: 5});
    expect(rect).toMatchObject({left: 0, top: 0, right: 10, bottom: 5});
  });

  test('union', () => {
    const rect = Rect2D.union([
      {left: 0, top: 0, right: 10, bottom: 10},
      {left: -5, top: 3, right: 4, bottom: 20},
    ]);
    expect(rect).toMatchObject({left: -5, top: 0, right: 10, bottom: 20});
    expect(Rect2D.union([])).toBeUndefined();
  });

  test('expand', () => {
    const rect = new Rect2D({left: 1, top: 1, right: 3, bottom: 3});
    expect(rect.expand(1)).toMatchObject({
      left: 0,
      top: 0,
      right: 4,
      bottom: 4,
    });
    expect(rect.expand({width: 1, height: 2})).toMatchObject({
      left: 0,
      top: -1,
      right: 4,
      bottom: 5,
    });
  });

  test('containsPoint is half-open', () => {
    const rect = new Rect2D({left: 0, top: 0, right: 10, bottom: 10});
    expect(rect.containsPoint({x: 0, y: 0})).toBe(true);
    expect(rect.containsPoint({x: 9.9, y: 5})).toBe(true);
    expect(rect.containsPoint({x: 10, y: 5})).toBe(false);
    expect(rect.containsPoint({x: 5, y: 10})).toBe(false);
  });

  test('intersects counts touching edges', () => {
    const rect = new Rect2D({left: 0, top: 0, right: 10, bottom: 10});
    expect(rect.intersects({left: 10, top: 0, right: 20, bottom: 10})).toBe(
      true,
    );
    expect(rect.intersects({left: 11, top: 0, right: 20, bottom: 10})).toBe(
      false,
    );
    expect(rect.overlaps({left: 10, top: 0, right: 20, bottom: 10})).toBe(
      false,
    );
    expect(rect.overlaps({left: 9, top: 0, right: 20, bottom: 10})).toBe(true);
  });

  test('contains', () => {
    const rect = new Rect2D({left: 0, top: 0, right: 10, bottom: 10});
    expect(rect.contains({left: 0, top: 0, right: 10, bottom: 10})).toBe(true);
    expect(rect.contains({left: 1, top: 1, right: 11, bottom: 9})).toBe(false);
  });

  test('translate', () => {
    const rect = new Rect2D({left: 0, top: 0, right: 10, bottom: 10});
    expect(rect.translate({x: 5, y: -5})).toMatchObject({
      left: 5,
      top: -5,
      right: 15,
      bottom: 5,
    });
  });

  test('center', () => {
    const rect = new Rect2D({left: 0, top: 0, right: 10, bottom: 4});
    expect(rect.center).toMatchObject({x: 5, y: 2});
  });
});

describe('distances', () => {
  test('distance', () => {
    expect(distance({x: 0, y: 0}, {x: 6, y: 8})).toBe(10);
  });

  test('distanceToSegment', () => {
    const a = {x: 0, y: 0};
    const b = {x: 10, y: 0};
    // Perpendicular foot inside the segment.
    expect(distanceToSegment({x: 5, y: 3}, a, b)).toBe(3);
    // Beyond an endpoint, the endpoint is closest.
    expect(distanceToSegment({x: 13, y: 4}, a, b)).toBe(5);
    // Degenerate segment.
    expect(distanceToSegment({x: 3, y: 4}, a, a)).toBe(5);
  });

  test('distanceToPolyline', () => {
    const polyline = [
      {x: 0, y: 0},
      {x: 10, y: 0},
      {x: 10, y: 10},
    ];
    expect(distanceToPolyline({x: 12, y: 5}, polyline)).toBe(2);
    expect(distanceToPolyline({x: 3, y: 4}, [{x: 0, y: 0}])).toBe(5);
  });
});

describe('cubic bezier', () => {
  const curve = {
    from: {x: 0, y: 0},
    cp1: {x: 0, y: 10},
    cp2: {x: 10, y: 10},
    to: {x: 10, y: 0},
  };

  test('endpoints and midpoint', () => {
    expect(cubicBezierPoint(curve, 0)).toEqual({x: 0, y: 0});
    expect(cubicBezierPoint(curve, 1)).toEqual({x: 10, y: 0});
    // 0.125*0 + 0.375*0 + 0.375*10 + 0.125*10 for x, same weights for y.
    expect(cubicBezierPoint(curve, 0.5)).toEqual({x: 5, y: 7.5});
  });

  test('flatten', () => {
    const points = flattenCubicBezier(curve, 4);
    expect(points.length).toBe(5);
    expect(points[0]).toEqual({x: 0, y: 0});
    expect(points[2]).toEqual({x: 5, y: 7.5});
    expect(points[4]).toEqual({x: 10, y: 0});
  });
});
