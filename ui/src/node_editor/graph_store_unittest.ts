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

import {resolveConfig} from './config';
import {GraphChange, GraphStore} from './graph_store';
import {makePayload, NodeId, TypeCompatibility} from './model';

// Node 1 at (0, 0) with one number output (socket 1).
// Node 2 at (200, 0) with a number input (socket 2) and a string input
// (socket 3).
function makeStore(store = new GraphStore()) {
  const a = store.addNode({x: 0, y: 0}, makePayload('A'), {
    outputs: [{type: 'number', label: 'out'}],
  });
  const b = store.addNode({x: 200, y: 0}, makePayload('B'), {
    inputs: [{type: 'number', label: 'x'}, {type: 'string', label: 's'}],
  });
  return {store, a, b};
}

function recordChanges(store: GraphStore): GraphChange[] {
  const changes: GraphChange[] = [];
  store.onChange.addListener((change) => changes.push(change));
  return changes;
}

function errorKind(result: {ok: boolean; error?: {kind: string}}) {
  return result.ok ? 'ok' : result.error?.kind;
}

describe('nodes', () => {
  test('addNode assigns increasing ids and lays out sockets', () => {
    const {store, a, b} = makeStore();
    expect([a, b]).toEqual([1, 2]);
    expect(store.nodeCount).toBe(2);

    const nodeA = store.getNode(a);
    expect(nodeA?.outputs).toEqual([1]);
    expect(nodeA?.size).toEqual({width: 120, height: 80});
    expect(store.getSocket(1)).toEqual({
      id: 1,
      nodeId: a,
      direction: 'output',
      type: 'number',
      label: 'out',
      offset: {x: 120, y: 44},
    });
    expect(store.socketPosition(1)).toEqual({x: 120, y: 44});
    expect(store.socketPosition(3)).toEqual({x: 200, y: 64});
    expect(store.socketsOf(b).map((s) => s.id)).toEqual([2, 3]);
  });

  test('nodes grow to fit their sockets', () => {
    const {store, b} = makeStore();
    // Header 24 + 3 rows of 20.
    expect(store.getNode(b)?.size).toEqual({width: 120, height: 84});
  });

  test('auto resize can be turned off', () => {
    const config = resolveConfig({behavior: {autoResizeNodes: false}});
    if (!config.ok) throw new Error(config.error);
    const {store, b} = makeStore(new GraphStore({config: config.value}));
    expect(store.getNode(b)?.size).toEqual({width: 120, height: 80});
  });

  test('explicit sizes', () => {
    const store = new GraphStore();
    const id = store.addNode({x: 0, y: 0}, makePayload('Wide'), {
      size: {width: 300},
    });
    expect(store.getNode(id)?.size).toEqual({width: 300, height: 80});
  });

  test('moveNode', () => {
    const {store, a} = makeStore();
    const changes = recordChanges(store);
    expect(store.moveNode(a, {x: 0, y: 0}).ok).toBe(true);
    expect(changes).toEqual([]);
    expect(store.moveNode(a, {x: 10, y: 20}).ok).toBe(true);
    expect(store.getNode(a)?.position).toEqual({x: 10, y: 20});
    expect(changes).toEqual([{kind: 'nodeChanged', nodeId: a}]);
    expect(errorKind(store.moveNode(42, {x: 0, y: 0}))).toBe('NotFound');
  });

  test('moveNodes is all or nothing', () => {
    const {store, a, b} = makeStore();
    const changes = recordChanges(store);
    expect(errorKind(store.moveNodes([a, 99], {x: 10, y: 10}))).toBe(
      'NotFound',
    );
    expect(store.getNode(a)?.position).toEqual({x: 0, y: 0});
    expect(changes).toEqual([]);

    expect(store.moveNodes([a, b], {x: 5, y: -5}).ok).toBe(true);
    expect(store.getNode(a)?.position).toEqual({x: 5, y: -5});
    expect(store.getNode(b)?.position).toEqual({x: 205, y: -5});
    expect(changes).toEqual([
      {kind: 'nodeChanged', nodeId: a},
      {kind: 'nodeChanged', nodeId: b},
    ]);
  });

  test('records are snapshots', () => {
    const {store, a} = makeStore();
    const before = store.getNode(a);
    store.moveNode(a, {x: 50, y: 50});
    expect(before?.position).toEqual({x: 0, y: 0});
  });

  test('resizeNode moves output sockets', () => {
    const {store, a} = makeStore();
    expect(store.resizeNode(a, {width: 200, height: 100}).ok).toBe(true);
    expect(store.socketPosition(1)).toEqual({x: 200, y: 44});
    expect(store.getNode(a)?.size).toEqual({width: 200, height: 100});
  });

  test('setPayload', () => {
    const {store, a} = makeStore();
    const payload = makePayload('Renamed', 'math', {op: 'add'});
    expect(store.setPayload(a, payload).ok).toBe(true);
    expect(store.getNode(a)?.payload).toEqual(payload);
  });

  test('removeNode leaves no dangling connections', () => {
    const {store, a} = makeStore();
    const conn = store.connect(1, 2);
    expect(conn.ok).toBe(true);
    const changes = recordChanges(store);

    expect(store.removeNode(a).ok).toBe(true);
    expect(store.getNode(a)).toBeUndefined();
    expect(store.getSocket(1)).toBeUndefined();
    expect(store.connectionCount).toBe(0);
    expect(store.isSocketConnected(2)).toBe(false);
    expect(changes).toEqual([
      {kind: 'connectionRemoved', connectionId: conn.value},
      {kind: 'nodeRemoved', nodeId: a, socketIds: [1]},
    ]);
    expect(errorKind(store.removeNode(a))).toBe('NotFound');
  });

  test('ids are never reused', () => {
    const {store, b} = makeStore();
    store.removeNode(b);
    const c = store.addNode({x: 0, y: 0}, makePayload('C'), {
      inputs: [{type: 'number'}],
    });
    expect(c).toBe(3);
    expect(store.getNode(c)?.inputs).toEqual([4]);
  });
});

describe('sockets', () => {
  test('addSocket appends and grows the node', () => {
    const {store, a} = makeStore();
    const result = store.addSocket(a, 'output', {type: 'string'});
    expect(result).toEqual({ok: true, value: 4});
    expect(store.getNode(a)?.outputs).toEqual([1, 4]);
    expect(store.socketPosition(4)).toEqual({x: 120, y: 64});
    // Two rows no longer fit in the default height.
    expect(store.getNode(a)?.size.height).toBe(84);
    expect(errorKind(store.addSocket(99, 'input', {type: 'x'}))).toBe(
      'NotFound',
    );
  });

  test('removeSocket drops its connections and closes ranks', () => {
    const {store, b} = makeStore();
    store.connect(1, 2);
    const changes = recordChanges(store);
    expect(store.removeSocket(2).ok).toBe(true);
    expect(store.connectionCount).toBe(0);
    expect(store.getNode(b)?.inputs).toEqual([3]);
    expect(store.socketPosition(3)).toEqual({x: 200, y: 44});
    expect(changes).toEqual([
      {kind: 'connectionRemoved', connectionId: 1},
      {kind: 'nodeChanged', nodeId: b},
    ]);
    expect(errorKind(store.removeSocket(2))).toBe('NotFound');
  });
});

describe('connections', () => {
  test('connect joins an output to an input', () => {
    const {store} = makeStore();
    const changes = recordChanges(store);
    const result = store.connect(1, 2);
    expect(result).toEqual({ok: true, value: 1});
    expect(store.getConnection(1)).toEqual({id: 1, source: 1, target: 2});
    expect(store.isSocketConnected(1)).toBe(true);
    expect(store.isSocketConnected(2)).toBe(true);
    expect(store.isSocketConnected(3)).toBe(false);
    expect(store.incomingConnection(2)?.id).toBe(1);
    expect(store.incomingConnection(1)).toBeUndefined();
    expect(changes).toEqual([{kind: 'connectionAdded', connectionId: 1}]);
  });

  test('type mismatch', () => {
    const {store} = makeStore();
    const result = store.connect(1, 3);
    expect(result.ok).toBe(false);
    expect(result.error).toEqual({
      kind: 'TypeMismatch',
      message: "Cannot connect 'number' to 'string'",
    });
    expect(store.connectionCount).toBe(0);
  });

  test('type checking can be relaxed', () => {
    const types = new TypeCompatibility().allow('number', 'string');
    const {store} = makeStore(new GraphStore({types}));
    expect(store.connect(1, 3).ok).toBe(true);

    const other = makeStore().store;
    other.setPolicy({typeChecking: false});
    expect(other.connect(1, 3).ok).toBe(true);
  });

  test('an input accepts a single connection', () => {
    const {store} = makeStore();
    const c = store.addNode({x: 0, y: 200}, makePayload('C'), {
      outputs: [{type: 'number'}],
    });
    const [otherOutput] = store.socketsOf(c);
    expect(store.connect(1, 2).ok).toBe(true);
    const result = store.connect(otherOutput.id, 2);
    expect(result.error?.kind).toBe('SlotOccupied');
    expect(store.connectionsOf(2).length).toBe(1);
  });

  test('an output may fan out', () => {
    const {store} = makeStore();
    const d = store.addNode({x: 400, y: 0}, makePayload('D'), {
      inputs: [{type: 'any'}],
    });
    const [input] = store.socketsOf(d);
    expect(store.connect(1, 2).ok).toBe(true);
    expect(store.connect(1, input.id).ok).toBe(true);
    expect(store.connectionsOf(1).map((c) => c.target)).toEqual([2, input.id]);
  });

  test('direction and existence checks', () => {
    const {store} = makeStore();
    expect(errorKind(store.connect(2, 1))).toBe('InvalidDirection');
    expect(errorKind(store.connect(1, 1))).toBe('InvalidDirection');
    expect(errorKind(store.connect(99, 2))).toBe('NotFound');
    expect(errorKind(store.connect(1, 99))).toBe('NotFound');
  });

  test('same node connections', () => {
    const store = new GraphStore();
    const n = store.addNode({x: 0, y: 0}, makePayload('Loop'), {
      inputs: [{type: 'string'}],
      outputs: [{type: 'number'}],
    });
    const [input, output] = store.socketsOf(n);
    // The same-node rule is checked before the types.
    expect(store.connect(output.id, input.id).error).toEqual({
      kind: 'SameNode',
      message: `Sockets ${output.id} and ${input.id} share a node`,
    });
    store.setPolicy({allowSameNodeConnections: true});
    expect(errorKind(store.connect(output.id, input.id))).toBe('TypeMismatch');
  });

  test('cycles are rejected when asked to', () => {
    const store = new GraphStore();
    const sockets = {inputs: [{type: 'number'}], outputs: [{type: 'number'}]};
    store.addNode({x: 0, y: 0}, makePayload('A'), sockets); // Sockets 1, 2.
    store.addNode({x: 200, y: 0}, makePayload('B'), sockets); // Sockets 3, 4.
    store.addNode({x: 400, y: 0}, makePayload('C'), sockets); // Sockets 5, 6.
    expect(store.connect(2, 3).ok).toBe(true);
    expect(store.connect(4, 5).ok).toBe(true);

    expect(store.wouldCreateCycle(6, 1)).toBe(true);
    expect(store.connect(6, 1).ok).toBe(true);
    store.disconnect(3);

    store.setPolicy({rejectCycles: true});
    expect(errorKind(store.connect(6, 1))).toBe('WouldCreateCycle');
    expect(store.wouldCreateCycle(2, 5)).toBe(false);
  });

  test('inputs never hold two connections', () => {
    const store = new GraphStore();
    const sources = [0, 1, 2].map((i) =>
      store.addNode({x: 0, y: i * 100}, makePayload(`S${i}`), {
        outputs: [{type: 'number'}],
      }),
    );
    const sink = store.addNode({x: 300, y: 0}, makePayload('Sink'), {
      inputs: [{type: 'number'}, {type: 'number'}],
    });
    const outputs = sources.map((id) => store.socketsOf(id)[0].id);
    const inputs = store.socketsOf(sink).map((s) => s.id);
    for (let step = 0; step < 30; step++) {
      const output = outputs[step % outputs.length];
      const input = inputs[step % inputs.length];
      const result = store.connect(output, input);
      if (step % 4 === 3 && result.ok) store.disconnect(result.value);
      if (step % 5 === 4) {
        const existing = store.incomingConnection(input);
        if (existing !== undefined) store.disconnect(existing.id);
      }
    }
    const targets = [...store.connections()].map((c) => c.target);
    expect(new Set(targets).size).toBe(targets.length);
    for (const input of inputs) {
      expect(store.connectionsOf(input).length).toBeLessThanOrEqual(1);
    }
  });

  test('canConnect changes nothing', () => {
    const {store} = makeStore();
    const changes = recordChanges(store);
    expect(store.canConnect(1, 2).ok).toBe(true);
    expect(store.connectionCount).toBe(0);
    expect(changes).toEqual([]);
  });

  test('disconnect twice fails the second time', () => {
    const {store} = makeStore();
    const id = store.connect(1, 2).value ?? 0;
    expect(store.disconnect(id).ok).toBe(true);
    const again = store.disconnect(id);
    expect(again.error).toEqual({
      kind: 'NotFound',
      message: `No such connection: ${id}`,
    });
    expect(store.isSocketConnected(2)).toBe(false);
  });

  test('setConnectionHint', () => {
    const {store} = makeStore();
    const id = store.connect(1, 2).value ?? 0;
    expect(store.setConnectionHint(id, 30).ok).toBe(true);
    expect(store.getConnection(id)?.controlOffset).toBe(30);
    expect(store.setConnectionHint(id, undefined).ok).toBe(true);
    expect(store.getConnection(id)).toEqual({id, source: 1, target: 2});
    expect(errorKind(store.setConnectionHint(99, 1))).toBe('NotFound');
  });
});

describe('hit testing', () => {
  test('findNodeAt returns the topmost node', () => {
    const store = new GraphStore();
    const below = store.addNode({x: 0, y: 0}, makePayload('Below'));
    const above = store.addNode({x: 50, y: 50}, makePayload('Above'));
    expect(store.findNodeAt({x: 60, y: 60})).toBe(above);
    expect(store.findNodeAt({x: 10, y: 10})).toBe(below);
    expect(store.findNodeAt({x: 500, y: 500})).toBeUndefined();
  });

  test('findSocketAt picks the nearest socket in range', () => {
    const {store} = makeStore();
    expect(store.findSocketAt({x: 125, y: 44}, 12)).toBe(1);
    expect(store.findSocketAt({x: 200, y: 60}, 12)).toBe(3);
    expect(store.findSocketAt({x: 160, y: 44}, 12)).toBeUndefined();
  });

  test('findSocketAt resolves ties by node order', () => {
    const store = new GraphStore();
    store.addNode({x: 0, y: 0}, makePayload('A'), {
      outputs: [{type: 'number'}],
    });
    // Input at (120, 44), on top of A's output.
    store.addNode({x: 120, y: 0}, makePayload('B'), {
      inputs: [{type: 'number'}],
    });
    expect(store.findSocketAt({x: 120, y: 44}, 12)).toBe(1);
  });

  test('findConnectionAt', () => {
    const {store} = makeStore();
    const id = store.connect(1, 2).value;
    // The curve from (120, 44) to (200, 44) stays on y = 44.
    expect(store.findConnectionAt({x: 160, y: 48}, 8)).toBe(id);
    expect(store.findConnectionAt({x: 160, y: 60}, 8)).toBeUndefined();
  });

  test('nodesInRect', () => {
    const store = new GraphStore();
    const ids: NodeId[] = [
      store.addNode({x: 0, y: 0}, makePayload('A')),
      store.addNode({x: 50, y: 50}, makePayload('B')),
      store.addNode({x: 100, y: 100}, makePayload('Touching')),
      store.addNode({x: 200, y: 200}, makePayload('Far')),
    ];
    const hits = store.nodesInRect({left: 0, top: 0, right: 100, bottom: 100});
    expect([...hits]).toEqual(ids.slice(0, 3));
  });

  test('bounds', () => {
    const {store} = makeStore();
    expect(store.bounds()).toMatchObject({
      left: 0,
      top: 0,
      right: 320,
      bottom: 84,
    });
    expect(new GraphStore().bounds()).toBeUndefined();
  });
});

describe('import and export', () => {
  test('round trip', () => {
    const {store} = makeStore();
    store.connect(1, 2);
    store.setConnectionHint(1, 25);
    const exported = store.exportGraph();

    const copy = new GraphStore();
    expect(copy.importGraph(JSON.parse(JSON.stringify(exported))).ok).toBe(
      true,
    );
    expect(copy.exportGraph()).toEqual(exported);
    expect(copy.getConnection(1)?.controlOffset).toBe(25);
    expect(copy.socketPosition(2)).toEqual({x: 200, y: 44});
  });

  test('id allocation resumes after the imported ids', () => {
    const {store} = makeStore();
    store.connect(1, 2);
    const copy = new GraphStore();
    copy.importGraph(store.exportGraph());
    const c = copy.addNode({x: 0, y: 300}, makePayload('C'), {
      outputs: [{type: 'string'}],
    });
    expect(c).toBe(3);
    expect(copy.getNode(c)?.outputs).toEqual([4]);
    expect(copy.connect(4, 3)).toEqual({ok: true, value: 2});
  });

  test('connections without an id get fresh ids', () => {
    const store = new GraphStore();
    const result = store.importGraph({
      version: 1,
      nodes: [
        {
          id: 7,
          position: {x: 0, y: 0},
          payload: {title: 'Source'},
          outputs: [{id: 5, type: 'number'}],
        },
        {
          id: 8,
          position: {x: 200, y: 0},
          payload: {title: 'Sink'},
          inputs: [{id: 6, type: 'number'}],
        },
      ],
      connections: [{source: 5, target: 6}],
    });
    expect(result.ok).toBe(true);
    expect(store.getConnection(1)).toEqual({id: 1, source: 5, target: 6});
    expect(store.getNode(7)?.payload).toEqual(makePayload('Source'));
    expect(store.getNode(8)?.size).toEqual({width: 120, height: 80});
  });

  test('a malformed graph changes nothing', () => {
    const {store} = makeStore();
    const changes = recordChanges(store);
    const result = store.importGraph({
      version: 1,
      nodes: [],
      connections: [{source: 1, target: 2}],
    });
    expect(result.error).toEqual({
      kind: 'MalformedGraph',
      message: 'Connection references unknown socket 1',
    });
    expect(store.nodeCount).toBe(2);
    expect(changes).toEqual([]);
  });

  test('import replaces the contents', () => {
    const {store} = makeStore();
    const changes = recordChanges(store);
    expect(store.importGraph({version: 1, nodes: []}).ok).toBe(true);
    expect(store.nodeCount).toBe(0);
    expect(changes).toEqual([{kind: 'graphReplaced'}]);
  });

  test('clear', () => {
    const {store} = makeStore();
    store.connect(1, 2);
    const changes = recordChanges(store);
    store.clear();
    expect(store.nodeCount).toBe(0);
    expect(store.connectionCount).toBe(0);
    expect(store.getSocket(1)).toBeUndefined();
    expect(changes).toEqual([{kind: 'graphReplaced'}]);
    // Ids keep increasing.
    expect(store.addNode({x: 0, y: 0}, makePayload('Next'))).toBe(3);
  });
});
