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

import {ViewportChangedArgs, ViewportTransform} from './viewport';

function makeViewport() {
  return new ViewportTransform(0.2, 3);
}

describe('ViewportTransform', () => {
  test('starts at identity', () => {
    const viewport = makeViewport();
    expect(viewport.zoom).toBe(1);
    expect(viewport.pan).toEqual({x: 0, y: 0});
    expect(viewport.toScreen({x: 12, y: 34})).toEqual({x: 12, y: 34});
  });

  test('rejects an invalid zoom range', () => {
    expect(() => new ViewportTransform(2, 1)).toThrow('Invalid zoom range');
    expect(() => new ViewportTransform(0, 1)).toThrow('Invalid zoom range');
  });

  test('screen and canvas conversions are inverse', () => {
    const viewport = makeViewport();
    viewport.setZoom(2);
    viewport.setPan({x: 10, y: 20});
    expect(viewport.toScreen({x: 5, y: 5})).toEqual({x: 20, y: 30});
    expect(viewport.toCanvas({x: 20, y: 30})).toEqual({x: 5, y: 5});
  });

  test('rect conversions', () => {
    const viewport = makeViewport();
    viewport.setZoom(2);
    viewport.setPan({x: 10, y: 0});
    expect(
      viewport.toScreenRect({left: 0, top: 0, right: 10, bottom: 5}),
    ).toMatchObject({left: 10, top: 0, right: 30, bottom: 10});
    expect(
      viewport.toCanvasRect({left: 10, top: 0, right: 30, bottom: 10}),
    ).toMatchObject({left: 0, top: 0, right: 10, bottom: 5});
  });

  test('zooming keeps the pivot fixed', () => {
    const viewport = makeViewport();
    const pivot = {x: 100, y: 50};
    viewport.setZoom(2, pivot);
    expect(viewport.zoom).toBe(2);
    expect(viewport.pan).toEqual({x: -100, y: -50});
    expect(viewport.toCanvas(pivot)).toEqual({x: 100, y: 50});
  });

  test('zoom is clamped to the configured range', () => {
    const viewport = makeViewport();
    viewport.setZoom(10);
    expect(viewport.zoom).toBe(3);
    viewport.zoomBy(0.001);
    expect(viewport.zoom).toBe(0.2);
    viewport.zoomBy(NaN);
    expect(viewport.zoom).toBe(0.2);
  });

  test('panBy accumulates', () => {
    const viewport = makeViewport();
    viewport.panBy({x: 5, y: -5});
    viewport.panBy({x: 5, y: 0});
    expect(viewport.pan).toEqual({x: 10, y: -5});
  });

  test('frame fits the bounds', () => {
    const viewport = makeViewport();
    const bounds = {left: 0, top: 0, right: 100, bottom: 50};
    viewport.frame(bounds, {width: 200, height: 200});
    expect(viewport.zoom).toBe(2);
    expect(viewport.pan).toEqual({x: 0, y: 50});

    viewport.frame(bounds, {width: 200, height: 200}, 50);
    expect(viewport.zoom).toBe(1);
    expect(viewport.pan).toEqual({x: 50, y: 75});
  });

  test('frame clamps the zoom', () => {
    const viewport = makeViewport();
    viewport.frame(
      {left: 0, top: 0, right: 10, bottom: 10},
      {width: 1000, height: 1000},
    );
    expect(viewport.zoom).toBe(3);
    // Centre (5, 5) lands in the middle of the viewport.
    expect(viewport.toScreen({x: 5, y: 5})).toEqual({x: 500, y: 500});
  });

  test('frame ignores empty bounds', () => {
    const viewport = makeViewport();
    viewport.frame(
      {left: 5, top: 5, right: 5, bottom: 5},
      {width: 100, height: 100},
    );
    expect(viewport.zoom).toBe(1);
    expect(viewport.pan).toEqual({x: 0, y: 0});
  });

  test('onChange fires only on actual changes', () => {
    const viewport = makeViewport();
    const changes: ViewportChangedArgs[] = [];
    viewport.onChange.addListener((args) => changes.push(args));
    viewport.setPan({x: 0, y: 0});
    viewport.setZoom(1);
    expect(changes).toEqual([]);
    viewport.setPan({x: 3, y: 4});
    viewport.setZoom(2);
    expect(changes).toEqual([
      {pan: {x: 3, y: 4}, zoom: 1},
      {pan: {x: 3, y: 4}, zoom: 2},
    ]);
    viewport.reset();
    expect(viewport.pan).toEqual({x: 0, y: 0});
    expect(viewport.zoom).toBe(1);
    expect(changes.length).toBe(3);
  });
});
