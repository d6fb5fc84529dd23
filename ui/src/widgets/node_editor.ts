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

/**
 * Hosts a node editor on an HTML canvas.
 *
 * The component owns the viewport, the interaction controller and the
 * renderer; the graph itself lives in the GraphStore passed in, so the
 * embedder can keep mutating it (the canvas repaints on every change).
 *
 * Example:
 *
 * ```typescript
 * const store = new GraphStore();
 * store.addNode({x: 40, y: 40}, makePayload('Constant'), {
 *   outputs: [{type: 'number', label: 'value'}],
 * });
 *
 * m(NodeEditor, {
 *   store,
 *   config: {behavior: {snapToGrid: true}},
 *   onSelectionChanged: ({nodes}) => console.log([...nodes]),
 * });
 * ```
 */
import m from 'mithril';
import {DisposableStack} from '../base/disposable';
import {Point2D} from '../base/geom';
import {Modifiers} from '../base/hotkeys';
import {reportError} from '../base/logging';
import {MithrilEvent, quietHandler} from '../base/mithril_utils';
import {
  DEFAULT_CONFIG,
  NodeEditorConfig,
  NodeEditorConfigInput,
  resolveConfig,
} from '../node_editor/config';
import {GraphStore} from '../node_editor/graph_store';
import {
  ConnectRejectedArgs,
  ContextMenuArgs,
  InputEvent,
  InteractionController,
  PointerButton,
  Selection,
} from '../node_editor/interaction';
import {NodeEditorRenderer} from '../node_editor/renderer';
import {DEFAULT_THEME, ThemeProvider} from '../node_editor/theme';
import {ViewportTransform} from '../node_editor/viewport';
import {paintPrimitives} from './canvas_painter';

export interface NodeEditorAttrs {
  readonly store: GraphStore;
  // Read once, when the component is created.
  readonly config?: NodeEditorConfigInput;
  readonly theme?: ThemeProvider;
  readonly className?: string;
  // Gives access to the controller, e.g. to wire toolbar buttons.
  onReady?(controller: InteractionController): void;
  onSelectionChanged?(selection: Selection): void;
  // Without this handler, rejected connections are logged as warnings.
  onConnectRejected?(args: ConnectRejectedArgs): void;
  onContextMenu?(args: ContextMenuArgs): void;
}

// Indexed by MouseEvent.button.
const BUTTONS: ReadonlyArray<PointerButton> = [
  'primary',
  'middle',
  'secondary',
];

// WheelEvent.deltaMode values, and the pixel size of a line.
const DOM_DELTA_LINE = 1;
const DOM_DELTA_PAGE = 2;
const LINE_HEIGHT_PX = 16;

function wheelDeltaPixels(e: WheelEvent, pageHeight: number): number {
  switch (e.deltaMode) {
    case DOM_DELTA_LINE:
      return e.deltaY * LINE_HEIGHT_PX;
    case DOM_DELTA_PAGE:
      return e.deltaY * pageHeight;
    default:
      return e.deltaY;
  }
}

function modifiersOf(e: MouseEvent | KeyboardEvent): Modifiers {
  return {
    shift: e.shiftKey,
    ctrl: e.ctrlKey,
    alt: e.altKey,
    meta: e.metaKey,
  };
}

function resolveAttrsConfig(input?: NodeEditorConfigInput): NodeEditorConfig {
  if (input === undefined) return DEFAULT_CONFIG;
  const result = resolveConfig(input);
  if (!result.ok) {
    console.warn(`${result.error}. Falling back to the default config.`);
    return DEFAULT_CONFIG;
  }
  return result.value;
}

export class NodeEditor implements m.ClassComponent<NodeEditorAttrs> {
  private readonly controller: InteractionController;
  private readonly renderer: NodeEditorRenderer;
  private readonly trash = new DisposableStack();
  private attrs: NodeEditorAttrs;
  private canvas?: HTMLCanvasElement;
  private pendingFrame?: number;

  constructor({attrs}: m.CVnode<NodeEditorAttrs>) {
    this.attrs = attrs;
    const config = resolveAttrsConfig(attrs.config);
    const viewport = new ViewportTransform(
      config.behavior.minZoom,
      config.behavior.maxZoom,
    );
    this.controller = new InteractionController(attrs.store, viewport, config);
    this.renderer = new NodeEditorRenderer(
      config,
      attrs.theme ?? DEFAULT_THEME,
    );
    const controller = this.controller;
    this.trash.use(controller);
    this.trash.use(
      controller.onRedrawNeeded.addListener(() => this.scheduleRepaint()),
    );
    this.trash.use(
      controller.onSelectionChanged.addListener((selection) =>
        this.attrs.onSelectionChanged?.(selection),
      ),
    );
    this.trash.use(
      controller.onContextMenu.addListener((args) =>
        this.attrs.onContextMenu?.(args),
      ),
    );
    this.trash.use(
      controller.onConnectRejected.addListener((args) => {
        if (this.attrs.onConnectRejected !== undefined) {
          this.attrs.onConnectRejected(args);
        } else {
          console.warn(
            `Connection rejected (${args.error.kind}): ${args.error.message}`,
          );
        }
      }),
    );
  }

  oncreate({dom}: m.CVnodeDOM<NodeEditorAttrs>) {
    if (!(dom instanceof HTMLCanvasElement)) return;
    this.canvas = dom;
    // Wheel listeners must not be passive or the page scrolls along.
    dom.addEventListener('wheel', this.onWheel, {passive: false});
    this.attrs.onReady?.(this.controller);
    this.scheduleRepaint();
  }

  onremove() {
    this.canvas?.removeEventListener('wheel', this.onWheel);
    this.canvas = undefined;
    if (this.pendingFrame !== undefined) {
      cancelAnimationFrame(this.pendingFrame);
      this.pendingFrame = undefined;
    }
    this.trash.dispose();
  }

  view({attrs}: m.CVnode<NodeEditorAttrs>): m.Children {
    this.attrs = attrs;
    return m('canvas.node-editor', {
      className: attrs.className,
      tabindex: 0, // Focusable, to receive key events.
      oncontextmenu: (e: Event) => e.preventDefault(),
      onpointerdown: quietHandler((e: MithrilEvent<PointerEvent>) => {
        const button = BUTTONS[e.button];
        if (button === undefined || this.canvas === undefined) return;
        this.canvas.focus();
        this.canvas.setPointerCapture(e.pointerId);
        this.dispatch({
          kind: 'pointerdown',
          position: this.localPosition(e),
          button,
          modifiers: modifiersOf(e),
        });
      }),
      onpointermove: quietHandler((e: MithrilEvent<PointerEvent>) => {
        this.dispatch({
          kind: 'pointermove',
          position: this.localPosition(e),
          modifiers: modifiersOf(e),
        });
      }),
      onpointerup: quietHandler((e: MithrilEvent<PointerEvent>) => {
        const button = BUTTONS[e.button];
        if (this.canvas?.hasPointerCapture(e.pointerId)) {
          this.canvas.releasePointerCapture(e.pointerId);
        }
        if (button === undefined) return;
        this.dispatch({
          kind: 'pointerup',
          position: this.localPosition(e),
          button,
          modifiers: modifiersOf(e),
        });
      }),
      onpointercancel: quietHandler(() => {
        this.guard('pointercancel', () => this.controller.cancel());
      }),
      onkeydown: quietHandler((e: MithrilEvent<KeyboardEvent>) => {
        const consumed = this.dispatch({
          kind: 'keydown',
          key: e.key,
          modifiers: modifiersOf(e),
        });
        if (consumed) e.preventDefault();
      }),
    });
  }

  private readonly onWheel = (e: WheelEvent) => {
    const consumed = this.dispatch({
      kind: 'wheel',
      position: this.localPosition(e),
      deltaY: wheelDeltaPixels(e, this.canvas?.clientHeight ?? 0),
      modifiers: modifiersOf(e),
    });
    if (consumed) e.preventDefault();
  };

  private dispatch(event: InputEvent): boolean {
    return this.guard(event.kind, () => this.controller.handleEvent(event));
  }

  // Exceptions must not escape into the browser's event loop.
  private guard(context: string, fn: () => boolean): boolean {
    try {
      return fn();
    } catch (err) {
      reportError(err, context);
      return false;
    }
  }

  private localPosition(e: MouseEvent): Point2D {
    const rect = this.canvas?.getBoundingClientRect();
    return {x: e.clientX - (rect?.left ?? 0), y: e.clientY - (rect?.top ?? 0)};
  }

  private scheduleRepaint() {
    if (this.pendingFrame !== undefined || this.canvas === undefined) return;
    this.pendingFrame = requestAnimationFrame(() => {
      this.pendingFrame = undefined;
      this.guard('paint', () => {
        this.paint();
        return true;
      });
    });
  }

  private paint() {
    const canvas = this.canvas;
    if (canvas === undefined) return;
    const ctx = canvas.getContext('2d');
    if (ctx === null) return;
    const width = canvas.clientWidth;
    const height = canvas.clientHeight;
    const dpr = window.devicePixelRatio || 1;
    const pixelWidth = Math.round(width * dpr);
    const pixelHeight = Math.round(height * dpr);
    if (canvas.width !== pixelWidth || canvas.height !== pixelHeight) {
      canvas.width = pixelWidth;
      canvas.height = pixelHeight;
    }
    ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
    this.controller.setViewportSize({width, height});
    const primitives = this.renderer.render({
      store: this.controller.store,
      viewport: this.controller.viewport,
      overlay: this.controller.overlay,
      selection: this.controller.selection,
      viewportSize: {width, height},
    });
    paintPrimitives(ctx, primitives);
  }
}
