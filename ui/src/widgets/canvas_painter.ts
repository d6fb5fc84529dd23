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

import {assertUnreachable} from '../base/logging';
import {
  BezierPrimitive,
  CirclePrimitive,
  DrawPrimitive,
  LinePrimitive,
  RectPrimitive,
  TextPrimitive,
} from '../node_editor/renderer';

// The subset of CanvasRenderingContext2D the painter needs.
export type PaintContext = Pick<
  CanvasRenderingContext2D,
  | 'save'
  | 'restore'
  | 'beginPath'
  | 'moveTo'
  | 'lineTo'
  | 'bezierCurveTo'
  | 'arc'
  | 'rect'
  | 'roundRect'
  | 'fill'
  | 'stroke'
  | 'fillText'
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
  | 'font'
  | 'textAlign'
  | 'textBaseline'
>;

// Replays |primitives| in order. The context state is restored afterwards.
export function paintPrimitives(
  ctx: PaintContext,
  primitives: ReadonlyArray<DrawPrimitive>,
): void {
  ctx.save();
  try {
    for (const p of primitives) {
      paintPrimitive(ctx, p);
    }
  } finally {
    ctx.restore();
  }
}

function paintPrimitive(ctx: PaintContext, p: DrawPrimitive): void {
  switch (p.kind) {
    case 'rect':
      return paintRect(ctx, p);
    case 'line':
      return paintLine(ctx, p);
    case 'circle':
      return paintCircle(ctx, p);
    case 'bezier':
      return paintBezier(ctx, p);
    case 'text':
      return paintText(ctx, p);
    default:
      assertUnreachable(p);
  }
}

function fillAndStroke(
  ctx: PaintContext,
  fill: string | undefined,
  stroke: string | undefined,
  lineWidth = 1,
): void {
  if (fill !== undefined) {
    ctx.fillStyle = fill;
    ctx.fill();
  }
  if (stroke !== undefined) {
    ctx.strokeStyle = stroke;
    ctx.lineWidth = lineWidth;
    ctx.stroke();
  }
}

function paintRect(ctx: PaintContext, p: RectPrimitive): void {
  const {x, y, width, height} = p.rect;
  ctx.beginPath();
  if (p.cornerRadius !== undefined && p.cornerRadius > 0) {
    ctx.roundRect(x, y, width, height, p.cornerRadius);
  } else {
    ctx.rect(x, y, width, height);
  }
  fillAndStroke(ctx, p.fill, p.stroke, p.lineWidth);
}

function paintLine(ctx: PaintContext, p: LinePrimitive): void {
  ctx.beginPath();
  ctx.moveTo(p.from.x, p.from.y);
  ctx.lineTo(p.to.x, p.to.y);
  fillAndStroke(ctx, undefined, p.color, p.width);
}

function paintCircle(ctx: PaintContext, p: CirclePrimitive): void {
  ctx.beginPath();
  ctx.arc(p.center.x, p.center.y, p.radius, 0, 2 * Math.PI);
  fillAndStroke(ctx, p.fill, p.stroke, p.lineWidth);
}

function paintBezier(ctx: PaintContext, p: BezierPrimitive): void {
  const {from, cp1, cp2, to} = p.curve;
  ctx.beginPath();
  ctx.moveTo(from.x, from.y);
  ctx.bezierCurveTo(cp1.x, cp1.y, cp2.x, cp2.y, to.x, to.y);
  fillAndStroke(ctx, undefined, p.color, p.width);
}

function paintText(ctx: PaintContext, p: TextPrimitive): void {
  ctx.font = p.font;
  ctx.fillStyle = p.color;
  ctx.textAlign = p.align;
  ctx.textBaseline = 'middle';
  if (p.maxWidth === undefined) {
    ctx.fillText(p.text, p.position.x, p.position.y);
  } else {
    ctx.fillText(p.text, p.position.x, p.position.y, p.maxWidth);
  }
}
