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

import {rgb} from '../base/color';
import {Point2D, Rect2D} from '../base/geom';
import {
  DEFAULT_CONFIG,
  NodeEditorConfig,
  NodeEditorConfigInput,
  resolveConfig,
} from './config';
import {GraphStore} from './graph_store';
import {InteractionOverlay} from './interaction';
import {makePayload} from './model';
import {DrawPrimitive, NodeEditorRenderer, Scene} from './renderer';
import {DEFAULT_THEME, ThemeProvider} from './theme';
import {ViewportTransform} from './viewport';

function makeConfig(input: NodeEditorConfigInput): NodeEditorConfig {
  const result = resolveConfig(input);
  if (!result.ok) throw new Error(result.error);
  return result.value;
}

// Node A at (0, 0) with a number output (socket 1, at (120, 44)).
// Node B at (200, 0) with a number input (socket 2, at (200, 44)) and a
// string input (socket 3, at (200, 64)).
function makeStore(labels = false) {
  const store = new GraphStore();
  store.addNode({x: 0, y: 0}, makePayload('A'), {
    outputs: [{type: 'number', label: labels ? 'out' : undefined}],
  });
  store.addNode({x: 200, y: 0}, makePayload('B'), {
    inputs: [
      {type: 'number', label: labels ? 'x' : undefined},
      {type: 'string'},
    ],
  });
  return store;
}

interface SceneOptions {
  overlay?: Partial<InteractionOverlay>;
  selectedNodes?: number[];
  selectedConnections?: number[];
  viewportSize?: {width: number; height: number};
}

function makeScene(store: GraphStore, options: SceneOptions = {}): Scene {
  return {
    store,
    viewport: new ViewportTransform(0.2, 3),
    overlay: {
      nodePositions: new Map(),
      hover: {kind: 'none'},
      showGrid: false,
      ...options.overlay,
    },
    selection: {
      nodes: new Set(options.selectedNodes),
      connections: new Set(options.selectedConnections),
    },
    viewportSize: options.viewportSize,
  };
}

function render(
  scene: Scene,
  config = DEFAULT_CONFIG,
  theme: ThemeProvider = DEFAULT_THEME,
): DrawPrimitive[] {
  return new NodeEditorRenderer(config, theme).render(scene);
}

function ofKind<K extends DrawPrimitive['kind']>(
  primitives: DrawPrimitive[],
  kind: K,
): Array<Extract<DrawPrimitive, {kind: K}>> {
  return primitives.filter(
    (p): p is Extract<DrawPrimitive, {kind: K}> => p.kind === kind,
  );
}

function circleAt(primitives: DrawPrimitive[], center: Point2D) {
  return ofKind(primitives, 'circle').filter(
    (c) => c.center.x === center.x && c.center.y === center.y,
  );
}

function texts(primitives: DrawPrimitive[]): string[] {
  return ofKind(primitives, 'text').map((t) => t.text);
}

describe('NodeEditorRenderer', () => {
  test('a single node', () => {
    const store = new GraphStore();
    store.addNode({x: 10, y: 20}, makePayload('Solo'));
    const primitives = render(makeScene(store));
    expect(primitives.map((p) => p.kind)).toEqual([
      'rect',
      'rect',
      'line',
      'text',
    ]);
    expect(primitives[0]).toMatchObject({
      rect: {left: 10, top: 20, right: 130, bottom: 100},
      fill: 'rgb(80 80 80)',
      stroke: 'rgb(100 100 100)',
      lineWidth: 2,
      cornerRadius: 0,
    });
    expect(primitives[1]).toMatchObject({
      rect: {left: 10, top: 20, right: 130, bottom: 44},
      fill: 'rgb(60 60 60)',
    });
    expect(primitives[2]).toEqual({
      kind: 'line',
      from: {x: 10, y: 44},
      to: {x: 130, y: 44},
      color: 'rgb(100 100 100)',
      width: 1,
    });
    expect(primitives[3]).toEqual({
      kind: 'text',
      text: 'Solo',
      position: {x: 14, y: 32},
      align: 'left',
      color: 'rgb(255 255 255)',
      font: '12px sans-serif',
      maxWidth: 112,
    });
  });

  test('paint order', () => {
    const store = makeStore();
    store.connect(1, 2);
    const primitives = render(
      makeScene(store, {
        viewportSize: {width: 400, height: 300},
        overlay: {
          pendingConnection: {socketId: 1, pointer: {x: 300, y: 300}},
          selectionRect: new Rect2D({left: 0, top: 0, right: 10, bottom: 10}),
        },
      }),
    );
    expect(primitives.map((p) => p.kind)).toEqual([
      'rect', // Background.
      'bezier',
      ...['rect', 'rect', 'line', 'text', 'circle', 'circle'],
      ...['rect', 'rect', 'line', 'text', 'circle', 'circle', 'circle'],
      'bezier', // Pending connection.
      'rect', // Selection rectangle.
    ]);
    expect(primitives[0]).toMatchObject({
      rect: {left: 0, top: 0, right: 400, bottom: 300},
      fill: 'rgb(30 30 30)',
    });
    expect(primitives[primitives.length - 1]).toMatchObject({
      rect: {left: 0, top: 0, right: 10, bottom: 10},
      fill: 'rgb(100 150 255 / 0.25)',
      stroke: 'rgb(100 150 255)',
      lineWidth: 1,
    });
  });

  test('nodes outside the viewport are culled', () => {
    const store = new GraphStore();
    store.addNode({x: 0, y: 0}, makePayload('Near'));
    store.addNode({x: 500, y: 500}, makePayload('Far'));
    const scene = makeScene(store, {viewportSize: {width: 100, height: 100}});
    expect(texts(render(scene))).toEqual(['Near']);
    const noCulling = makeConfig({behavior: {cullOffscreen: false}});
    expect(texts(render(scene, noCulling))).toEqual(['Near', 'Far']);
    // Without a known size nothing is culled.
    expect(texts(render(makeScene(store)))).toEqual(['Near', 'Far']);
  });

  test('connections outside the viewport are culled', () => {
    const store = new GraphStore();
    store.addNode({x: 1000, y: 0}, makePayload('A'), {
      outputs: [{type: 'number'}],
    });
    store.addNode({x: 1200, y: 0}, makePayload('B'), {
      inputs: [{type: 'number'}],
    });
    store.connect(1, 2);
    const scene = makeScene(store, {viewportSize: {width: 100, height: 100}});
    expect(ofKind(render(scene), 'bezier')).toEqual([]);
    const noCulling = makeConfig({behavior: {cullOffscreen: false}});
    expect(ofKind(render(scene, noCulling), 'bezier').length).toBe(1);
  });

  describe('grid', () => {
    const size = {width: 100, height: 60};

    test('lines on multiples of the grid size', () => {
      const scene = makeScene(new GraphStore(), {
        viewportSize: size,
        overlay: {showGrid: true},
      });
      const lines = ofKind(render(scene), 'line');
      const vertical = lines.filter((l) => l.from.x === l.to.x);
      const horizontal = lines.filter((l) => l.from.y === l.to.y);
      expect(lines.length).toBe(10);
      expect(vertical.map((l) => l.from.x)).toEqual([0, 20, 40, 60, 80, 100]);
      expect(vertical.map((l) => l.width)).toEqual([2, 1, 1, 1, 1, 2]);
      expect(vertical[0].color).toBe('rgb(50 50 50)');
      expect(vertical[1].color).toBe('rgb(40 40 40)');
      expect(vertical[1].to).toEqual({x: 20, y: 60});
      expect(horizontal.map((l) => l.from.y)).toEqual([0, 20, 40, 60]);
      expect(horizontal[2].to).toEqual({x: 100, y: 40});
    });

    test('lines follow the pan', () => {
      const scene = makeScene(new GraphStore(), {
        viewportSize: size,
        overlay: {showGrid: true},
      });
      scene.viewport.setPan({x: -30, y: 0});
      const vertical = ofKind(render(scene), 'line').filter(
        (l) => l.from.x === l.to.x,
      );
      expect(vertical.map((l) => l.from.x)).toEqual([10, 30, 50, 70, 90]);
      // Cell 5 is a major line.
      expect(vertical.map((l) => l.width)).toEqual([1, 1, 1, 2, 1]);
    });

    test('major lines can be turned off', () => {
      const scene = makeScene(new GraphStore(), {
        viewportSize: size,
        overlay: {showGrid: true},
      });
      const config = makeConfig({behavior: {showMajorGridLines: false}});
      const widths = ofKind(render(scene, config), 'line').map((l) => l.width);
      expect(new Set(widths)).toEqual(new Set([1]));
    });

    test('hidden or too dense grids are skipped', () => {
      const hidden = makeScene(new GraphStore(), {viewportSize: size});
      expect(render(hidden).length).toBe(1);

      const dense = makeScene(new GraphStore(), {
        viewportSize: size,
        overlay: {showGrid: true},
      });
      dense.viewport.setZoom(0.2);
      // 5 units at zoom 0.2 is a single pixel per cell.
      const config = makeConfig({layout: {gridSize: 5}});
      expect(render(dense, config).length).toBe(1);
    });
  });

  describe('connections', () => {
    function connectionColor(options: SceneOptions, config = DEFAULT_CONFIG) {
      const store = makeStore();
      store.connect(1, 2);
      const primitives = render(makeScene(store, options), config);
      return ofKind(primitives, 'bezier')[0].color;
    }

    test('colors', () => {
      const hover = {kind: 'connection', connectionId: 1} as const;
      expect(connectionColor({})).toBe('rgb(200 200 200)');
      expect(connectionColor({overlay: {hover}})).toBe('rgb(255 255 255)');
      expect(
        connectionColor({overlay: {hover}, selectedConnections: [1]}),
      ).toBe('rgb(255 255 0)');
      const noHover = makeConfig({
        behavior: {highlightHoveredElements: false},
      });
      expect(connectionColor({overlay: {hover}}, noHover)).toBe(
        'rgb(200 200 200)',
      );
    });

    test('geometry follows drag previews', () => {
      const store = makeStore();
      store.connect(1, 2);
      const primitives = render(
        makeScene(store, {
          overlay: {nodePositions: new Map([[1, {x: 50, y: 50}]])},
        }),
      );
      const [bezier] = ofKind(primitives, 'bezier');
      expect(bezier.curve.from).toEqual({x: 170, y: 94});
      expect(bezier.curve.to).toEqual({x: 200, y: 44});
      expect(bezier.width).toBe(3);
      expect(ofKind(primitives, 'rect')[0].rect).toMatchObject({
        left: 50,
        top: 50,
      });
    });

    test('pending connections run from the output side', () => {
      const store = makeStore();
      const primitives = render(
        makeScene(store, {
          overlay: {pendingConnection: {socketId: 2, pointer: {x: 0, y: 0}}},
        }),
      );
      const last = primitives[primitives.length - 1];
      expect(last).toMatchObject({
        kind: 'bezier',
        curve: {from: {x: 0, y: 0}, to: {x: 200, y: 44}},
        color: 'rgb(255 255 255 / 0.5)',
        width: 3,
      });
    });
  });

  describe('sockets', () => {
    test('compatible sockets are highlighted while connecting', () => {
      const primitives = render(
        makeScene(makeStore(), {
          overlay: {pendingConnection: {socketId: 1, pointer: {x: 0, y: 0}}},
        }),
      );
      expect(circleAt(primitives, {x: 200, y: 44})).toEqual([
        {
          kind: 'circle',
          center: {x: 200, y: 44},
          radius: 8,
          fill: 'rgb(100 200 100)',
          stroke: 'rgb(100 255 100)',
          lineWidth: 2,
        },
      ]);
      expect(circleAt(primitives, {x: 200, y: 64})).toEqual([
        {
          kind: 'circle',
          center: {x: 200, y: 64},
          radius: 8,
          fill: 'rgb(200 100 100)',
          stroke: 'rgb(200 200 200)',
          lineWidth: 1,
        },
      ]);
    });

    test('hover wins over compatibility', () => {
      const primitives = render(
        makeScene(makeStore(), {
          overlay: {
            pendingConnection: {socketId: 1, pointer: {x: 0, y: 0}},
            hover: {kind: 'socket', socketId: 2},
          },
        }),
      );
      expect(circleAt(primitives, {x: 200, y: 44})[0]).toMatchObject({
        stroke: 'rgb(255 255 255)',
        lineWidth: 2,
      });
    });

    test('connected sockets get a dot', () => {
      const store = makeStore();
      store.connect(1, 2);
      const circles = circleAt(render(makeScene(store)), {x: 120, y: 44});
      expect(circles.length).toBe(2);
      expect(circles[1]).toEqual({
        kind: 'circle',
        center: {x: 120, y: 44},
        radius: 6,
        fill: 'rgb(255 255 0)',
      });
    });

    test('labels sit inside the node', () => {
      const primitives = render(makeScene(makeStore(true)));
      expect(texts(primitives)).toEqual(['A', 'out', 'B', 'x']);
      const [, out, , x] = ofKind(primitives, 'text');
      expect(out).toMatchObject({
        position: {x: 112, y: 44},
        align: 'right',
        font: '10px sans-serif',
      });
      expect(x).toMatchObject({position: {x: 208, y: 44}, align: 'left'});

      const noLabels = makeConfig({behavior: {showSocketLabels: false}});
      expect(texts(render(makeScene(makeStore(true)), noLabels))).toEqual([
        'A',
        'B',
      ]);
    });
  });

  test('details fade out when zooming out', () => {
    const scene = makeScene(makeStore(true));
    scene.viewport.setZoom(0.5);
    expect(texts(render(scene))).toEqual(['A', 'B']);
    scene.viewport.setZoom(0.25);
    const zoomedOut = render(scene);
    expect(texts(zoomedOut)).toEqual([]);
    expect(ofKind(zoomedOut, 'circle').length).toBe(3);
    scene.viewport.setZoom(0.2);
    expect(ofKind(render(scene), 'circle').length).toBe(0);
  });

  test('node ids', () => {
    const store = new GraphStore();
    store.addNode({x: 0, y: 0}, makePayload('A'));
    const config = makeConfig({behavior: {showNodeIds: true}});
    const primitives = render(makeScene(store), config);
    expect(primitives[primitives.length - 1]).toEqual({
      kind: 'text',
      text: 'ID: 1',
      position: {x: 0, y: 87},
      align: 'left',
      color: 'rgb(255 255 255)',
      font: '10px sans-serif',
    });
  });

  test('selected nodes get an outline', () => {
    const store = new GraphStore();
    store.addNode({x: 0, y: 0}, makePayload('A'));
    const primitives = render(makeScene(store, {selectedNodes: [1]}));
    expect(primitives[0]).toMatchObject({
      kind: 'rect',
      rect: {left: -3, top: -3, right: 123, bottom: 83},
      stroke: 'rgb(255 255 0)',
      lineWidth: 3,
    });
    expect(primitives[0]).not.toHaveProperty('fill');
    expect(primitives[1]).toMatchObject({fill: 'rgb(80 80 80)'});
  });

  test('sizes scale with the zoom', () => {
    const store = new GraphStore();
    store.addNode({x: 0, y: 0}, makePayload('A'));
    const scene = makeScene(store);
    scene.viewport.setZoom(2);
    const [body, header, , title] = render(scene);
    expect(body).toMatchObject({
      rect: {left: 0, top: 0, right: 240, bottom: 160},
      lineWidth: 4,
    });
    expect(header).toMatchObject({rect: {bottom: 48}});
    expect(title).toMatchObject({font: '24px sans-serif', maxWidth: 224});
  });

  test('custom themes', () => {
    const theme = DEFAULT_THEME.with({
      socketColors: {number: rgb(1, 2, 3)},
      fontFamily: 'monospace',
    });
    expect(theme.socketColor('custom').cssString).toBe('rgb(128 128 128)');
    expect(DEFAULT_THEME.socketColor('number').cssString).toBe(
      'rgb(100 200 100)',
    );
    const primitives = render(makeScene(makeStore()), DEFAULT_CONFIG, theme);
    expect(circleAt(primitives, {x: 120, y: 44})[0].fill).toBe('rgb(1 2 3)');
    expect(ofKind(primitives, 'text')[0].font).toBe('12px monospace');
  });
});
