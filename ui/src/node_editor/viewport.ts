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

import {EvtSource} from '../base/events';
import {Bounds2D, Point2D, Rect2D, Size2D} from '../base/geom';
import {assertTrue} from '../base/logging';

export interface ViewportChangedArgs {
  readonly pan: Point2D;
  readonly zoom: number;
}

/**
 * Maps between canvas space (where nodes live) and screen space (pixels in
 * the panel) under a pan offset and a zoom factor:
 *
 *   screen = canvas * zoom + pan
 *
 * The pan offset is expressed in screen pixels. The zoom is always kept
 * within [minZoom, maxZoom]; out of range requests are clamped silently.
 */
export class ViewportTransform {
  readonly onChange = new EvtSource<ViewportChangedArgs>();
  private _pan: Point2D = {x: 0, y: 0};
  private _zoom = 1;

  constructor(
    readonly minZoom: number,
    readonly maxZoom: number,
  ) {
    assertTrue(minZoom > 0 && minZoom <= maxZoom, 'Invalid zoom range');
    this._zoom = this.clampZoom(1);
  }

  get pan(): Point2D {
    return this._pan;
  }

  get zoom(): number {
    return this._zoom;
  }

  toScreen(p: Point2D): Point2D {
    return {
      x: p.x * this._zoom + this._pan.x,
      y: p.y * this._zoom + this._pan.y,
    };
  }

  toCanvas(p: Point2D): Point2D {
    return {
      x: (p.x - this._pan.x) / this._zoom,
      y: (p.y - this._pan.y) / this._zoom,
    };
  }

  toScreenRect(r: Bounds2D): Rect2D {
    return Rect2D.fromPoints(
      this.toScreen({x: r.left, y: r.top}),
      this.toScreen({x: r.right, y: r.bottom}),
    );
  }

  toCanvasRect(r: Bounds2D): Rect2D {
    return Rect2D.fromPoints(
      this.toCanvas({x: r.left, y: r.top}),
      this.toCanvas({x: r.right, y: r.bottom}),
    );
  }

  clampZoom(zoom: number): number {
    if (Number.isNaN(zoom)) return this._zoom;
    return Math.max(this.minZoom, Math.min(this.maxZoom, zoom));
  }

  /**
   * Sets the zoom, keeping the canvas point under |pivot| (a screen point)
   * visually fixed. Without a pivot the screen origin is the anchor.
   */
  setZoom(zoom: number, pivot: Point2D = {x: 0, y: 0}): void {
    const newZoom = this.clampZoom(zoom);
    const pivotCanvas = this.toCanvas(pivot);
    this.update(
      {
        x: pivot.x - pivotCanvas.x * newZoom,
        y: pivot.y - pivotCanvas.y * newZoom,
      },
      newZoom,
    );
  }

  zoomBy(factor: number, pivot?: Point2D): void {
    this.setZoom(this._zoom * factor, pivot);
  }

  setPan(pan: Point2D): void {
    this.update(pan, this._zoom);
  }

  panBy(delta: Point2D): void {
    this.update(
      {x: this._pan.x + delta.x, y: this._pan.y + delta.y},
      this._zoom,
    );
  }

  /**
   * Fits |bounds| (canvas space) grown by |padding| into a viewport of
   * |viewportSize| pixels, centring it. The zoom is clamped, so very large or
   * very small content may not fill the viewport exactly.
   */
  frame(bounds: Bounds2D, viewportSize: Size2D, padding = 0): void {
    const padded = new Rect2D(bounds).expand(padding);
    if (padded.width <= 0 || padded.height <= 0) return;
    const zoom = this.clampZoom(
      Math.min(
        viewportSize.width / padded.width,
        viewportSize.height / padded.height,
      ),
    );
    const center = padded.center;
    this.update(
      {
        x: viewportSize.width / 2 - center.x * zoom,
        y: viewportSize.height / 2 - center.y * zoom,
      },
      zoom,
    );
  }

  reset(): void {
    this.update({x: 0, y: 0}, this.clampZoom(1));
  }

  private update(pan: Point2D, zoom: number): void {
    if (
      pan.x === this._pan.x &&
      pan.y === this._pan.y &&
      zoom === this._zoom
    ) {
      return;
    }
    this._pan = {x: pan.x, y: pan.y};
    this._zoom = zoom;
    this.onChange.notify({pan: this._pan, zoom});
  }
}
