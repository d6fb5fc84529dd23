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

import {Modifiers, NO_MODIFIERS} from '../base/hotkeys';
import {
  DEFAULT_CONFIG,
  NodeEditorConfig,
  NodeEditorConfigInput,
  resolveConfig,
} from './config';
import {GraphStore} from './graph_store';
import {
  ConnectRejectedArgs,
  ContextMenuArgs,
  InteractionController,
  PointerButton,
  Selection,
  StateChangedArgs,
} from './interaction';
import {makePayload} from './model';
import {ViewportTransform} from './viewport';

function makeConfig(input: NodeEditorConfigInput): NodeEditorConfig {
  const result = resolveConfig(input);
  if (!result.ok) throw new Error(result.error);
  return result.value;
}

// Node 1 at (0, 0), 120x80, with a number output (socket 1) at (120, 44).
// Node 2 at (200, 0), 120x84, with a number input (socket 2) at (200, 44)
// and a string input (socket 3) at (200, 64).
// The viewport starts at identity, so screen and canvas coincide.
function setup(config = DEFAULT_CONFIG) {
  const store = new GraphStore({config});
  const a = store.addNode({x: 0, y: 0}, makePayload('A'), {
    outputs: [{type: 'number'}],
  });
  const b = store.addNode({x: 200, y: 0}, makePayload('B'), {
    inputs: [{type: 'number'}, {type: 'string'}],
  });
  const viewport = new ViewportTransform(
    config.behavior.minZoom,
    config.behavior.maxZoom,
  );
  const controller = new InteractionController(store, viewport, config);
  return {store, viewport, controller, a, b};
}

function mods(partial: Partial<Modifiers> = {}): Modifiers {
  return {...NO_MODIFIERS, ...partial};
}

function down(
  c: InteractionController,
  x: number,
  y: number,
  button: PointerButton = 'primary',
  modifiers: Partial<Modifiers> = {},
) {
  return c.handleEvent({
    kind: 'pointerdown',
    position: {x, y},
    button,
    modifiers: mods(modifiers),
  });
}

function move(c: InteractionController, x: number, y: number) {
  return c.handleEvent({
    kind: 'pointermove',
    position: {x, y},
    modifiers: mods(),
  });
}

function up(
  c: InteractionController,
  x: number,
  y: number,
  button: PointerButton = 'primary',
) {
  return c.handleEvent({
    kind: 'pointerup',
    position: {x, y},
    button,
    modifiers: mods(),
  });
}

function key(
  c: InteractionController,
  k: string,
  modifiers: Partial<Modifiers> = {},
) {
  return c.handleEvent({kind: 'keydown', key: k, modifiers: mods(modifiers)});
}

function click(c: InteractionController, x: number, y: number) {
  down(c, x, y);
  up(c, x, y);
}

describe('node dragging', () => {
  test('clicking a node selects it without moving it', () => {
    const {store, controller, a} = setup();
    expect(down(controller, 60, 60)).toBe(true);
    expect(controller.state.kind).toBe('draggingNode');
    expect([...controller.selection.nodes]).toEqual([a]);
    expect(up(controller, 60, 60)).toBe(true);
    expect(controller.state.kind).toBe('idle');
    expect(store.getNode(a)?.position).toEqual({x: 0, y: 0});
  });

  test('the store only changes on release', () => {
    const {store, controller, a} = setup();
    down(controller, 60, 60);
    move(controller, 80, 90);
    expect(controller.overlay.nodePositions.get(a)).toEqual({x: 20, y: 30});
    expect(store.getNode(a)?.position).toEqual({x: 0, y: 0});

    up(controller, 80, 90);
    expect(store.getNode(a)?.position).toEqual({x: 20, y: 30});
    expect(controller.overlay.nodePositions.size).toBe(0);
  });

  test('the whole selection moves together', () => {
    const {store, controller, a, b} = setup();
    click(controller, 60, 60);
    down(controller, 260, 60, 'primary', {shift: true});
    expect([...controller.selection.nodes]).toEqual([a, b]);
    move(controller, 270, 70);
    up(controller, 270, 70);
    expect(store.getNode(a)?.position).toEqual({x: 10, y: 10});
    expect(store.getNode(b)?.position).toEqual({x: 210, y: 10});
  });

  test('a modifier click toggles a selected node off', () => {
    const {controller} = setup();
    click(controller, 60, 60);
    down(controller, 60, 60, 'primary', {ctrl: true});
    expect(controller.selection.nodes.size).toBe(0);
    expect(controller.state.kind).toBe('idle');
  });

  test('snap to grid', () => {
    const {store, controller, a} = setup(
      makeConfig({behavior: {snapToGrid: true}}),
    );
    down(controller, 60, 60);
    // Unsnapped target (13, 15) rounds to the 20 unit grid.
    up(controller, 73, 75);
    expect(store.getNode(a)?.position).toEqual({x: 20, y: 20});
  });

  test('small movements below the drag threshold are ignored', () => {
    const {store, controller, a} = setup(
      makeConfig({interaction: {dragThreshold: 5}}),
    );
    down(controller, 60, 60);
    up(controller, 63, 60);
    expect(store.getNode(a)?.position).toEqual({x: 0, y: 0});
  });

  test('escape abandons the drag', () => {
    const {store, controller, a} = setup();
    down(controller, 60, 60);
    move(controller, 100, 100);
    expect(key(controller, 'Escape')).toBe(true);
    expect(controller.state.kind).toBe('idle');
    expect(controller.overlay.nodePositions.size).toBe(0);
    expect(up(controller, 100, 100)).toBe(false);
    expect(store.getNode(a)?.position).toEqual({x: 0, y: 0});
    expect([...controller.selection.nodes]).toEqual([a]);
  });

  test('state changes are reported', () => {
    const {controller} = setup();
    const changes: StateChangedArgs[] = [];
    controller.onStateChanged.addListener((args) => changes.push(args));
    click(controller, 60, 60);
    expect(changes).toEqual([
      {from: 'idle', to: 'draggingNode'},
      {from: 'draggingNode', to: 'idle'},
    ]);
  });
});

describe('connection dragging', () => {
  test('dragging from an output to an input connects them', () => {
    const {store, controller} = setup();
    expect(down(controller, 120, 44)).toBe(true);
    expect(controller.state).toEqual({kind: 'draggingConnection', socketId: 1});
    expect(controller.overlay.pendingConnection).toEqual({
      socketId: 1,
      pointer: {x: 120, y: 44},
    });
    move(controller, 150, 50);
    expect(controller.overlay.pendingConnection?.pointer).toEqual({
      x: 150,
      y: 50,
    });
    // Within snapping distance of socket 2.
    up(controller, 205, 46);
    expect(controller.state.kind).toBe('idle');
    expect(controller.overlay.pendingConnection).toBeUndefined();
    expect(store.getConnection(1)).toEqual({id: 1, source: 1, target: 2});
  });

  test('dragging backwards from an input works too', () => {
    const {store, controller} = setup();
    down(controller, 200, 44);
    up(controller, 120, 44);
    expect(store.incomingConnection(2)?.source).toBe(1);
  });

  test('rejections are reported', () => {
    const {store, controller} = setup();
    const rejected: ConnectRejectedArgs[] = [];
    controller.onConnectRejected.addListener((args) => rejected.push(args));
    down(controller, 120, 44);
    up(controller, 200, 64);
    expect(store.connectionCount).toBe(0);
    expect(rejected).toEqual([
      {
        source: 1,
        target: 3,
        error: {
          kind: 'TypeMismatch',
          message: "Cannot connect 'number' to 'string'",
        },
      },
    ]);
  });

  test('releasing over nothing drops the connection', () => {
    const {store, controller} = setup();
    const rejected: ConnectRejectedArgs[] = [];
    controller.onConnectRejected.addListener((args) => rejected.push(args));
    down(controller, 120, 44);
    up(controller, 500, 500);
    down(controller, 120, 44);
    up(controller, 121, 44);
    expect(store.connectionCount).toBe(0);
    expect(rejected).toEqual([]);
  });

  test('removing the origin socket aborts the drag', () => {
    const {store, controller} = setup();
    down(controller, 120, 44);
    expect(store.removeSocket(1).ok).toBe(true);
    expect(controller.state.kind).toBe('idle');
    expect(controller.overlay.pendingConnection).toBeUndefined();
    expect(() => up(controller, 200, 44)).not.toThrow();
    expect(store.connectionCount).toBe(0);
  });

  test('removing some other socket keeps the drag going', () => {
    const {store, controller} = setup();
    down(controller, 120, 44);
    store.removeSocket(3);
    expect(controller.state).toEqual({kind: 'draggingConnection', socketId: 1});
    up(controller, 200, 44);
    expect(store.incomingConnection(2)?.source).toBe(1);
  });

  test('removing the origin node aborts the drag', () => {
    const {store, controller, a} = setup();
    down(controller, 120, 44);
    store.removeNode(a);
    expect(controller.state.kind).toBe('idle');
    expect(controller.overlay.pendingConnection).toBeUndefined();
  });
});

describe('selection', () => {
  test('box selection', () => {
    const {controller, a, b} = setup();
    down(controller, -50, -50);
    expect(controller.state.kind).toBe('boxSelecting');
    move(controller, 150, 150);
    expect(controller.overlay.selectionRect).toMatchObject({
      left: -50,
      top: -50,
      right: 150,
      bottom: 150,
    });
    up(controller, 150, 150);
    expect(controller.overlay.selectionRect).toBeUndefined();
    expect([...controller.selection.nodes]).toEqual([a]);

    down(controller, 190, -10, 'primary', {shift: true});
    up(controller, 330, 100);
    expect([...controller.selection.nodes]).toEqual([a, b]);
  });

  test('box selection picks nodes touching the rectangle', () => {
    const store = new GraphStore();
    const inside = store.addNode({x: 10, y: 10}, makePayload('Inside'), {
      size: {width: 50, height: 50},
    });
    const straddling = store.addNode({x: 80, y: 80}, makePayload('Edge'));
    store.addNode({x: 300, y: 300}, makePayload('Outside'));
    const controller = new InteractionController(
      store,
      new ViewportTransform(0.2, 3),
      DEFAULT_CONFIG,
    );
    down(controller, 0, 0);
    move(controller, 100, 100);
    up(controller, 100, 100);
    expect([...controller.selection.nodes]).toEqual([inside, straddling]);
  });

  test('a plain box replaces the selection', () => {
    const {controller, b} = setup();
    click(controller, 60, 60);
    down(controller, 190, -10);
    up(controller, 330, 100);
    expect([...controller.selection.nodes]).toEqual([b]);
  });

  test('single selection mode', () => {
    const {controller, a} = setup(
      makeConfig({behavior: {allowMultipleSelection: false}}),
    );
    click(controller, 60, 60);
    // Modifiers don't add to the selection.
    down(controller, 260, 20, 'primary', {shift: true});
    up(controller, 260, 20);
    expect(controller.selection.nodes.size).toBe(1);

    // Empty canvas clears instead of box selecting.
    down(controller, -50, -50);
    expect(controller.state.kind).toBe('idle');
    expect(controller.selection.nodes.size).toBe(0);

    key(controller, 'a', {ctrl: true});
    expect(controller.selection.nodes.size).toBe(0);
    controller.selectNodes([a, 2]);
    expect([...controller.selection.nodes]).toEqual([a]);
  });

  test('clicking a connection selects it', () => {
    const {store, controller} = setup();
    store.connect(1, 2);
    click(controller, 60, 60);
    const selections: Selection[] = [];
    controller.onSelectionChanged.addListener((s) => selections.push(s));

    // The curve runs along y = 44 between the two sockets.
    expect(down(controller, 160, 46)).toBe(true);
    expect(controller.state.kind).toBe('idle');
    expect(selections).toEqual([
      {nodes: new Set(), connections: new Set([1])},
    ]);

    key(controller, 'Delete');
    expect(store.connectionCount).toBe(0);
    expect(controller.selection.connections.size).toBe(0);
    expect(store.nodeCount).toBe(2);
  });

  test('select all and delete', () => {
    const {store, controller} = setup();
    store.connect(1, 2);
    expect(key(controller, 'a', {meta: true})).toBe(true);
    expect([...controller.selection.nodes]).toEqual([1, 2]);
    expect(key(controller, 'Backspace')).toBe(true);
    expect(store.nodeCount).toBe(0);
    expect(store.connectionCount).toBe(0);
    expect(controller.selection.nodes.size).toBe(0);
  });

  test('removing a node outside the controller prunes the selection', () => {
    const {store, controller, a, b} = setup();
    controller.selectNodes([a, b]);
    store.removeNode(a);
    expect([...controller.selection.nodes]).toEqual([b]);
  });

  test('importing a graph clears the selection', () => {
    const {store, controller, a} = setup();
    controller.selectNodes([a]);
    store.importGraph(store.exportGraph());
    expect(controller.selection.nodes.size).toBe(0);
  });
});

describe('clipboard', () => {
  test('copy and paste', () => {
    const {store, controller, a} = setup();
    controller.selectNodes([a]);
    expect(key(controller, 'c', {ctrl: true})).toBe(true);
    expect(key(controller, 'v', {ctrl: true})).toBe(true);
    expect(store.nodeCount).toBe(3);
    expect(store.getNode(3)?.position).toEqual({x: 50, y: 50});
    expect([...controller.selection.nodes]).toEqual([3]);
  });

  test('duplicate keeps the clipboard', () => {
    const {store, controller, a, b} = setup();
    controller.selectNodes([b]);
    controller.copySelection();
    controller.selectNodes([a]);
    key(controller, 'd', {ctrl: true});
    expect(store.getNode(3)?.payload.title).toBe('A');
    expect(controller.paste()).toEqual([4]);
    expect(store.getNode(4)?.payload.title).toBe('B');
  });
});

describe('viewport', () => {
  test('middle button pans', () => {
    const {viewport, controller} = setup();
    down(controller, 10, 10, 'middle');
    expect(controller.state.kind).toBe('panning');
    move(controller, 30, 50);
    expect(viewport.pan).toEqual({x: 20, y: 40});
    up(controller, 30, 50, 'middle');
    expect(controller.state.kind).toBe('idle');
    expect(viewport.pan).toEqual({x: 20, y: 40});
  });

  test('alt drag pans and escape restores the pan', () => {
    const {viewport, controller} = setup();
    down(controller, 60, 60, 'primary', {alt: true});
    expect(controller.state.kind).toBe('panning');
    move(controller, 0, 0);
    expect(viewport.pan).toEqual({x: -60, y: -60});
    key(controller, 'Escape');
    expect(viewport.pan).toEqual({x: 0, y: 0});
  });

  test('panning can be disabled', () => {
    const {controller} = setup(makeConfig({behavior: {panEnabled: false}}));
    expect(down(controller, 10, 10, 'middle')).toBe(false);
    expect(controller.state.kind).toBe('idle');
  });

  test('wheel zooms around the pointer', () => {
    const {viewport, controller} = setup();
    expect(
      controller.handleEvent({
        kind: 'wheel',
        position: {x: 100, y: 100},
        deltaY: -100,
        modifiers: mods(),
      }),
    ).toBe(true);
    expect(viewport.zoom).toBeCloseTo(Math.exp(0.3));
    const pivot = viewport.toCanvas({x: 100, y: 100});
    expect(pivot.x).toBeCloseTo(100);
    expect(pivot.y).toBeCloseTo(100);
  });

  test('large wheel deltas still zoom gradually', () => {
    const wheel = (c: InteractionController, deltaY: number) =>
      c.handleEvent({
        kind: 'wheel',
        position: {x: 0, y: 0},
        deltaY,
        modifiers: mods(),
      });
    const once = setup();
    wheel(once.controller, 400);
    expect(once.viewport.zoom).toBeCloseTo(Math.exp(-1.2));
    expect(once.viewport.zoom).toBeGreaterThan(0.3);

    const twice = setup();
    wheel(twice.controller, 200);
    wheel(twice.controller, 200);
    expect(twice.viewport.zoom).toBeCloseTo(once.viewport.zoom);
  });

  test('wheel is ignored mid-gesture or when disabled', () => {
    const wheel = {
      kind: 'wheel',
      position: {x: 0, y: 0},
      deltaY: 100,
      modifiers: mods(),
    } as const;
    const {controller} = setup();
    down(controller, 60, 60);
    expect(controller.handleEvent(wheel)).toBe(false);

    const disabled = setup(makeConfig({behavior: {zoomEnabled: false}}));
    expect(disabled.controller.handleEvent(wheel)).toBe(false);
  });

  test('zoomIn and zoomOut pivot on the centre', () => {
    const {viewport, controller} = setup();
    controller.setViewportSize({width: 200, height: 100});
    controller.zoomIn();
    expect(viewport.zoom).toBeCloseTo(1.1);
    const centre = viewport.toCanvas({x: 100, y: 50});
    expect(centre.x).toBeCloseTo(100);
    expect(centre.y).toBeCloseTo(50);
    controller.zoomOut();
    expect(viewport.zoom).toBeCloseTo(0.99);
  });

  test('frameAll needs a viewport size', () => {
    const {viewport, controller} = setup();
    expect(controller.frameAll()).toBe(false);
    controller.setViewportSize({width: 800, height: 600});
    expect(key(controller, 'f')).toBe(true);
    // Bounds (0, 0)-(320, 84) plus 100 of padding: 520 wide, 284 high.
    expect(viewport.zoom).toBeCloseTo(800 / 520);
  });

  test('toggleGrid', () => {
    const {controller} = setup();
    expect(controller.overlay.showGrid).toBe(true);
    key(controller, 'g');
    expect(controller.overlay.showGrid).toBe(false);
  });
});

describe('hover and context menu', () => {
  test('hover follows the pointer', () => {
    const {controller} = setup();
    expect(move(controller, 60, 60)).toBe(true);
    expect(controller.overlay.hover).toEqual({kind: 'node', nodeId: 1});
    expect(move(controller, 61, 60)).toBe(false);
    move(controller, 120, 44);
    expect(controller.overlay.hover).toEqual({kind: 'socket', socketId: 1});
    move(controller, -100, -100);
    expect(controller.overlay.hover).toEqual({kind: 'none'});
  });

  test('hover is dropped with its socket', () => {
    const {store, controller} = setup();
    move(controller, 120, 44);
    expect(controller.overlay.hover).toEqual({kind: 'socket', socketId: 1});
    store.removeSocket(1);
    expect(controller.overlay.hover).toEqual({kind: 'none'});
  });

  test('hover is dropped with its node', () => {
    const {store, controller, a} = setup();
    move(controller, 60, 60);
    store.removeNode(a);
    expect(controller.overlay.hover).toEqual({kind: 'none'});
  });

  test('secondary button opens the context menu', () => {
    const {controller, viewport} = setup();
    viewport.setPan({x: 10, y: 0});
    const menus: ContextMenuArgs[] = [];
    controller.onContextMenu.addListener((args) => menus.push(args));
    expect(down(controller, 70, 60, 'secondary')).toBe(true);
    expect(controller.state.kind).toBe('idle');
    expect(menus).toEqual([
      {
        target: {kind: 'node', nodeId: 1},
        screenPosition: {x: 70, y: 60},
        canvasPosition: {x: 60, y: 60},
      },
    ]);
  });

  test('unbound keys are not consumed', () => {
    const {controller} = setup();
    expect(key(controller, 'Escape')).toBe(false);
    expect(key(controller, 'q')).toBe(false);
  });

  test('dispose detaches from the store', () => {
    const {store, controller} = setup();
    let redraws = 0;
    controller.onRedrawNeeded.addListener(() => redraws++);
    store.moveNode(1, {x: 5, y: 5});
    expect(redraws).toBe(1);
    controller.dispose();
    store.moveNode(1, {x: 6, y: 6});
    expect(redraws).toBe(1);
  });
});
