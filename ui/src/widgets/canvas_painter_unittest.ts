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

import {Rect2D} from '../base/geom';
import {DrawPrimitive} from '../node_editor/renderer';
import {PaintContext, paintPrimitives} from './canvas_painter';

// Records every call, with the style in effect when painting.
class RecordingContext implements PaintContext {
  readonly calls: string[] = [];
  fillStyle: string | CanvasGradient | CanvasPattern = '';
  strokeStyle: string | CanvasGradient | CanvasPattern = '';
  lineWidth = 1;
  font = '';
  textAlign: CanvasTextAlign = 'start';
  textBaseline: CanvasTextBaseline = 'alphabetic';

  save() {
    this.calls.push('save');
  }
  restore() {
    this.calls.push('restore');
  }
  beginPath() {
    this.calls.push('beginPath');
  }
  moveTo(x: number, y: number) {
    this.calls.push(`moveTo ${x} ${y}`);
  }
  lineTo(x: number, y: number) {
    this.calls.push(`lineTo ${x} ${y}`);
  }
  bezierCurveTo(...args: [number, number, number, number, number, number]) {
    this.calls.push(`bezierCurveTo ${args.join(' ')}`);
  }
  arc(x: number, y: number, radius: number, start: number, end: number) {
    this.calls.push(`arc ${x} ${y} ${radius} ${start} ${end}`);
  }
  rect(x: number, y: number, w: number, h: number) {
    this.calls.push(`rect ${x} ${y} ${w} ${h}`);
  }
  roundRect(x: number, y: number, w: number, h: number, radii?: unknown) {
    this.calls.push(`roundRect ${x} ${y} ${w} ${h} ${String(radii)}`);
  }
  fill() {
    this.calls.push(`fill ${String(this.fillStyle)}`);
  }
  stroke() {
    this.calls.push(`stroke ${String(this.strokeStyle)} ${this.lineWidth}`);
  }
  fillText(text: string, x: number, y: number, maxWidth?: number) {
    const extra = maxWidth === undefined ? '' : ` max=${maxWidth}`;
    this.calls.push(
      `fillText ${text} ${x} ${y} ${this.font} ${this.textAlign} ` +
        `${this.textBaseline}${extra}`,
    );
  }
}

function paint(primitives: DrawPrimitive[]): string[] {
  const ctx = new RecordingContext();
  paintPrimitives(ctx, primitives);
  return ctx.calls;
}

const RECT = new Rect2D({left: 1, top: 2, right: 11, bottom: 7});

describe('paintPrimitives', () => {
  test('rects', () => {
    expect(
      paint([
        {kind: 'rect', rect: RECT, fill: 'red', stroke: 'blue', lineWidth: 2},
      ]),
    ).toEqual([
      'save',
      'beginPath',
      'rect 1 2 10 5',
      'fill red',
      'stroke blue 2',
      'restore',
    ]);
  });

  test('rounded rects', () => {
    expect(
      paint([{kind: 'rect', rect: RECT, stroke: 'blue', cornerRadius: 4}]),
    ).toEqual([
      'save',
      'beginPath',
      'roundRect 1 2 10 5 4',
      'stroke blue 1',
      'restore',
    ]);
  });

  test('lines and curves', () => {
    expect(
      paint([
        {
          kind: 'line',
          from: {x: 0, y: 0},
          to: {x: 5, y: 5},
          color: 'grey',
          width: 2,
        },
        {
          kind: 'bezier',
          curve: {
            from: {x: 0, y: 0},
            cp1: {x: 10, y: 0},
            cp2: {x: 20, y: 5},
            to: {x: 30, y: 5},
          },
          color: 'white',
          width: 3,
        },
      ]),
    ).toEqual([
      'save',
      'beginPath',
      'moveTo 0 0',
      'lineTo 5 5',
      'stroke grey 2',
      'beginPath',
      'moveTo 0 0',
      'bezierCurveTo 10 0 20 5 30 5',
      'stroke white 3',
      'restore',
    ]);
  });

  test('circles', () => {
    expect(
      paint([{kind: 'circle', center: {x: 3, y: 4}, radius: 8, fill: 'green'}]),
    ).toEqual([
      'save',
      'beginPath',
      `arc 3 4 8 0 ${2 * Math.PI}`,
      'fill green',
      'restore',
    ]);
  });

  test('text', () => {
    const base = {
      kind: 'text',
      position: {x: 4, y: 6},
      align: 'left',
      color: 'white',
      font: '12px sans-serif',
    } as const;
    expect(
      paint([
        {...base, text: 'Add'},
        {...base, text: 'Multiply', align: 'right', maxWidth: 50},
      ]),
    ).toEqual([
      'save',
      'fillText Add 4 6 12px sans-serif left middle',
      'fillText Multiply 4 6 12px sans-serif right middle max=50',
      'restore',
    ]);
  });

  test('the context is restored when painting fails', () => {
    const ctx = new RecordingContext();
    ctx.fill = () => {
      throw new Error('context lost');
    };
    expect(() =>
      paintPrimitives(ctx, [{kind: 'rect', rect: RECT, fill: 'red'}]),
    ).toThrow('context lost');
    expect(ctx.calls).toEqual([
      'save',
      'beginPath',
      'rect 1 2 10 5',
      'restore',
    ]);
  });
});
