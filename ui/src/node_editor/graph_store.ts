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
 * The aggregate owning every node, socket and connection of a node graph.
 *
 * Records are immutable: a mutation replaces the affected record, so a Node or
 * Socket handed out earlier is a stable snapshot. Every mutation is atomic. It
 * either succeeds completely or returns an error and leaves the store as it
 * was.
 *
 * Example:
 *
 * ```typescript
 * const store = new GraphStore();
 * const a = store.addNode({x: 0, y: 0}, makePayload('A'), {
 *   outputs: [{type: 'number'}],
 * });
 * const b = store.addNode({x: 200, y: 0}, makePayload('B'), {
 *   inputs: [{type: 'number'}],
 * });
 * const [out] = store.socketsOf(a);
 * const [input] = store.socketsOf(b);
 * const res = store.connect(out.id, input.id);
 * if (!res.ok) console.warn(res.error.kind);
 * ```
 */
import {EvtSource} from '../base/events';
import {
  Bounds2D,
  distance,
  distanceToPolyline,
  flattenCubicBezier,
  Point2D,
  Rect2D,
  Size2D,
} from '../base/geom';
import {assertExists} from '../base/logging';
import {okResult} from '../base/result';
import {DEFAULT_CONFIG, LayoutConfig, NodeEditorConfig} from './config';
import {connectionCurve} from './curves';
import {graphError, GraphResult} from './graph_error';
import {SerializedGraph} from './graph_schema';
import {parseSerializedGraph, serializeGraph} from './graph_serialization';
import {
  Connection,
  ConnectionId,
  minNodeHeight,
  Node,
  NodeId,
  NodePayload,
  Socket,
  SocketDirection,
  SocketId,
  socketOffset,
  SocketSpec,
  TypeCompatibility,
} from './model';

export interface AddNodeOptions {
  readonly size?: Partial<Size2D>;
  readonly inputs?: ReadonlyArray<SocketSpec>;
  readonly outputs?: ReadonlyArray<SocketSpec>;
}

// Rules applied by connect() on top of the direction and occupancy checks.
export interface ConnectionPolicy {
  // Reject joining sockets whose type tags are incompatible.
  typeChecking: boolean;
  // Allow an output to feed an input of its own node.
  allowSameNodeConnections: boolean;
  // Reject connections that would close a cycle between nodes.
  rejectCycles: boolean;
}

export type GraphChange =
  | {readonly kind: 'nodeAdded'; readonly nodeId: NodeId}
  | {
      readonly kind: 'nodeRemoved';
      readonly nodeId: NodeId;
      readonly socketIds: ReadonlyArray<SocketId>;
    }
  | {readonly kind: 'nodeChanged'; readonly nodeId: NodeId}
  | {readonly kind: 'connectionAdded'; readonly connectionId: ConnectionId}
  | {readonly kind: 'connectionRemoved'; readonly connectionId: ConnectionId}
  | {readonly kind: 'graphReplaced'};

export interface GraphStoreOptions {
  readonly config?: NodeEditorConfig;
  readonly types?: TypeCompatibility;
}

export class GraphStore {
  // Notified synchronously after every successful mutation.
  readonly onChange = new EvtSource<GraphChange>();
  readonly types: TypeCompatibility;
  readonly policy: ConnectionPolicy;

  private readonly layout: LayoutConfig;
  private readonly autoResizeNodes: boolean;

  // Maps keep insertion order, which is also the draw order.
  private nodeMap = new Map<NodeId, Node>();
  private socketMap = new Map<SocketId, Socket>();
  private connectionMap = new Map<ConnectionId, Connection>();
  // Connections touching each socket. Input sockets hold at most one.
  private socketConnections = new Map<SocketId, Set<ConnectionId>>();

  private nextNodeId: NodeId = 1;
  private nextSocketId: SocketId = 1;
  private nextConnectionId: ConnectionId = 1;

  constructor(options: GraphStoreOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    this.layout = config.layout;
    this.autoResizeNodes = config.behavior.autoResizeNodes;
    this.types = options.types ?? new TypeCompatibility();
    this.policy = {
      typeChecking: config.behavior.typeChecking,
      allowSameNodeConnections: config.behavior.allowSameNodeConnections,
      rejectCycles: config.behavior.rejectCycles,
    };
  }

  setPolicy(policy: Partial<ConnectionPolicy>): void {
    Object.assign(this.policy, policy);
  }

  // Lookups

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get connectionCount(): number {
    return this.connectionMap.size;
  }

  nodes(): IterableIterator<Node> {
    return this.nodeMap.values();
  }

  connections(): IterableIterator<Connection> {
    return this.connectionMap.values();
  }

  getNode(id: NodeId): Node | undefined {
    return this.nodeMap.get(id);
  }

  getSocket(id: SocketId): Socket | undefined {
    return this.socketMap.get(id);
  }

  getConnection(id: ConnectionId): Connection | undefined {
    return this.connectionMap.get(id);
  }

  // Inputs first, then outputs, each in declaration order.
  socketsOf(nodeId: NodeId): Socket[] {
    const node = this.nodeMap.get(nodeId);
    if (node === undefined) return [];
    return [...node.inputs, ...node.outputs].map((id) =>
      assertExists(this.socketMap.get(id)),
    );
  }

  connectionsOf(socketId: SocketId): Connection[] {
    const ids = this.socketConnections.get(socketId);
    if (ids === undefined) return [];
    return [...ids].map((id) => assertExists(this.connectionMap.get(id)));
  }

  incomingConnection(inputSocketId: SocketId): Connection | undefined {
    const socket = this.socketMap.get(inputSocketId);
    if (socket === undefined || socket.direction !== 'input') return undefined;
    return this.connectionsOf(inputSocketId)[0];
  }

  // Occupancy is derived from the connection table, never stored.
  isSocketConnected(socketId: SocketId): boolean {
    return (this.socketConnections.get(socketId)?.size ?? 0) > 0;
  }

  nodeRect(nodeId: NodeId): Rect2D | undefined {
    const node = this.nodeMap.get(nodeId);
    return node && Rect2D.fromPointAndSize({...node.position, ...node.size});
  }

  // Absolute canvas position of a socket's centre.
  socketPosition(socketId: SocketId): Point2D | undefined {
    const socket = this.socketMap.get(socketId);
    if (socket === undefined) return undefined;
    const node = assertExists(this.nodeMap.get(socket.nodeId));
    return {
      x: node.position.x + socket.offset.x,
      y: node.position.y + socket.offset.y,
    };
  }

  // Union of every node rectangle, or undefined for an empty graph.
  bounds(): Rect2D | undefined {
    const rects: Rect2D[] = [];
    for (const node of this.nodeMap.values()) {
      rects.push(Rect2D.fromPointAndSize({...node.position, ...node.size}));
    }
    return Rect2D.union(rects);
  }

  // Nodes

  /**
   * Adds a node and its initial sockets. Always succeeds and returns a fresh
   * id. Missing size components fall back to the configured defaults.
   */
  addNode(
    position: Point2D,
    payload: NodePayload,
    options: AddNodeOptions = {},
  ): NodeId {
    const id = this.nextNodeId++;
    const node: Node = {
      id,
      position: {x: position.x, y: position.y},
      size: {
        width: options.size?.width ?? this.layout.defaultNodeWidth,
        height: options.size?.height ?? this.layout.defaultNodeHeight,
      },
      inputs: (options.inputs ?? []).map((spec) =>
        this.createSocket(id, 'input', spec),
      ),
      outputs: (options.outputs ?? []).map((spec) =>
        this.createSocket(id, 'output', spec),
      ),
      payload,
    };
    this.nodeMap.set(id, this.layoutNode(node));
    this.onChange.notify({kind: 'nodeAdded', nodeId: id});
    return id;
  }

  /**
   * Removes a node, its sockets and every connection touching them.
   * Listeners hear about each removed connection before the node itself.
   */
  removeNode(nodeId: NodeId): GraphResult {
    const node = this.nodeMap.get(nodeId);
    if (node === undefined) {
      return graphError('NotFound', `No such node: ${nodeId}`);
    }
    const socketIds = [...node.inputs, ...node.outputs];
    const removedConnections: ConnectionId[] = [];
    for (const socketId of socketIds) {
      for (const conn of this.connectionsOf(socketId)) {
        this.deleteConnection(conn);
        removedConnections.push(conn.id);
      }
      this.socketMap.delete(socketId);
      this.socketConnections.delete(socketId);
    }
    this.nodeMap.delete(nodeId);
    for (const connectionId of removedConnections) {
      this.onChange.notify({kind: 'connectionRemoved', connectionId});
    }
    this.onChange.notify({kind: 'nodeRemoved', nodeId, socketIds});
    return okResult();
  }

  moveNode(nodeId: NodeId, position: Point2D): GraphResult {
    const node = this.nodeMap.get(nodeId);
    if (node === undefined) {
      return graphError('NotFound', `No such node: ${nodeId}`);
    }
    if (node.position.x === position.x && node.position.y === position.y) {
      return okResult();
    }
    this.nodeMap.set(nodeId, {
      ...node,
      position: {x: position.x, y: position.y},
    });
    this.onChange.notify({kind: 'nodeChanged', nodeId});
    return okResult();
  }

  /**
   * Translates several nodes by the same delta (a group drag). Fails with
   * NotFound, moving nothing, if any id is unknown.
   */
  moveNodes(nodeIds: Iterable<NodeId>, delta: Point2D): GraphResult {
    const ids = [...new Set(nodeIds)];
    for (const id of ids) {
      if (!this.nodeMap.has(id)) {
        return graphError('NotFound', `No such node: ${id}`);
      }
    }
    if (delta.x === 0 && delta.y === 0) return okResult();
    for (const id of ids) {
      const node = assertExists(this.nodeMap.get(id));
      this.nodeMap.set(id, {
        ...node,
        position: {x: node.position.x + delta.x, y: node.position.y + delta.y},
      });
    }
    for (const nodeId of ids) {
      this.onChange.notify({kind: 'nodeChanged', nodeId});
    }
    return okResult();
  }

  // Resizes a node and re-lays out its sockets.
  resizeNode(nodeId: NodeId, size: Size2D): GraphResult {
    const node = this.nodeMap.get(nodeId);
    if (node === undefined) {
      return graphError('NotFound', `No such node: ${nodeId}`);
    }
    this.nodeMap.set(
      nodeId,
      this.layoutNode({
        ...node,
        size: {
          width: Math.max(1, size.width),
          height: Math.max(1, size.height),
        },
      }),
    );
    this.onChange.notify({kind: 'nodeChanged', nodeId});
    return okResult();
  }

  setPayload(nodeId: NodeId, payload: NodePayload): GraphResult {
    const node = this.nodeMap.get(nodeId);
    if (node === undefined) {
      return graphError('NotFound', `No such node: ${nodeId}`);
    }
    this.nodeMap.set(nodeId, {...node, payload});
    this.onChange.notify({kind: 'nodeChanged', nodeId});
    return okResult();
  }

  // Sockets

  addSocket(
    nodeId: NodeId,
    direction: SocketDirection,
    spec: SocketSpec,
  ): GraphResult<SocketId> {
    const node = this.nodeMap.get(nodeId);
    if (node === undefined) {
      return graphError('NotFound', `No such node: ${nodeId}`);
    }
    const socketId = this.createSocket(nodeId, direction, spec);
    this.nodeMap.set(
      nodeId,
      this.layoutNode({
        ...node,
        inputs:
          direction === 'input' ? [...node.inputs, socketId] : node.inputs,
        outputs:
          direction === 'output' ? [...node.outputs, socketId] : node.outputs,
      }),
    );
    this.onChange.notify({kind: 'nodeChanged', nodeId});
    return okResult(socketId);
  }

  // Removes a socket and its connections; the remaining sockets close ranks.
  removeSocket(socketId: SocketId): GraphResult {
    const socket = this.socketMap.get(socketId);
    if (socket === undefined) {
      return graphError('NotFound', `No such socket: ${socketId}`);
    }
    const node = assertExists(this.nodeMap.get(socket.nodeId));
    const removed = this.connectionsOf(socketId);
    for (const conn of removed) {
      this.deleteConnection(conn);
    }
    this.socketMap.delete(socketId);
    this.socketConnections.delete(socketId);
    this.nodeMap.set(
      node.id,
      this.layoutNode({
        ...node,
        inputs: node.inputs.filter((id) => id !== socketId),
        outputs: node.outputs.filter((id) => id !== socketId),
      }),
    );
    for (const conn of removed) {
      this.onChange.notify({kind: 'connectionRemoved', connectionId: conn.id});
    }
    this.onChange.notify({kind: 'nodeChanged', nodeId: node.id});
    return okResult();
  }

  // Connections

  /**
   * Checks whether connect(outputSocketId, inputSocketId) would succeed,
   * without changing anything. Checks run in this order: NotFound,
   * InvalidDirection, SameNode, TypeMismatch, SlotOccupied, WouldCreateCycle.
   */
  canConnect(outputSocketId: SocketId, inputSocketId: SocketId): GraphResult {
    const source = this.socketMap.get(outputSocketId);
    if (source === undefined) {
      return graphError('NotFound', `No such socket: ${outputSocketId}`);
    }
    const target = this.socketMap.get(inputSocketId);
    if (target === undefined) {
      return graphError('NotFound', `No such socket: ${inputSocketId}`);
    }
    if (source.direction !== 'output') {
      return graphError(
        'InvalidDirection',
        `Socket ${outputSocketId} is not an output`,
      );
    }
    if (target.direction !== 'input') {
      return graphError(
        'InvalidDirection',
        `Socket ${inputSocketId} is not an input`,
      );
    }
    if (
      source.nodeId === target.nodeId &&
      !this.policy.allowSameNodeConnections
    ) {
      return graphError(
        'SameNode',
        `Sockets ${outputSocketId} and ${inputSocketId} share a node`,
      );
    }
    if (
      this.policy.typeChecking &&
      !this.types.isCompatible(source.type, target.type)
    ) {
      return graphError(
        'TypeMismatch',
        `Cannot connect '${source.type}' to '${target.type}'`,
      );
    }
    if (this.isSocketConnected(inputSocketId)) {
      return graphError(
        'SlotOccupied',
        `Input socket ${inputSocketId} is already connected`,
      );
    }
    if (
      this.policy.rejectCycles &&
      this.wouldCreateCycle(outputSocketId, inputSocketId)
    ) {
      return graphError(
        'WouldCreateCycle',
        `Connecting ${outputSocketId} to ${inputSocketId} would create a cycle`,
      );
    }
    return okResult();
  }

  connect(
    outputSocketId: SocketId,
    inputSocketId: SocketId,
  ): GraphResult<ConnectionId> {
    const check = this.canConnect(outputSocketId, inputSocketId);
    if (!check.ok) return check;
    const id = this.nextConnectionId++;
    this.insertConnection({id, source: outputSocketId, target: inputSocketId});
    this.onChange.notify({kind: 'connectionAdded', connectionId: id});
    return okResult(id);
  }

  disconnect(connectionId: ConnectionId): GraphResult {
    const conn = this.connectionMap.get(connectionId);
    if (conn === undefined) {
      return graphError('NotFound', `No such connection: ${connectionId}`);
    }
    this.deleteConnection(conn);
    this.onChange.notify({kind: 'connectionRemoved', connectionId});
    return okResult();
  }

  // Sets or clears the curve shaping hint of a connection.
  setConnectionHint(
    connectionId: ConnectionId,
    controlOffset: number | undefined,
  ): GraphResult {
    const conn = this.connectionMap.get(connectionId);
    if (conn === undefined) {
      return graphError('NotFound', `No such connection: ${connectionId}`);
    }
    const {controlOffset: _, ...rest} = conn;
    this.connectionMap.set(
      connectionId,
      controlOffset === undefined ? rest : {...rest, controlOffset},
    );
    return okResult();
  }

  /**
   * True if a connection from |outputSocketId| to |inputSocketId| would close
   * a cycle, i.e. the source node is already reachable downstream of the
   * target node. A connection between two sockets of one node always counts.
   */
  wouldCreateCycle(outputSocketId: SocketId, inputSocketId: SocketId): boolean {
    const source = this.socketMap.get(outputSocketId);
    const target = this.socketMap.get(inputSocketId);
    if (source === undefined || target === undefined) return false;
    const visited = new Set<NodeId>();
    const stack: NodeId[] = [target.nodeId];
    while (stack.length > 0) {
      const nodeId = assertExists(stack.pop());
      if (nodeId === source.nodeId) return true;
      if (visited.has(nodeId)) continue;
      visited.add(nodeId);
      const node = assertExists(this.nodeMap.get(nodeId));
      for (const out of node.outputs) {
        for (const conn of this.connectionsOf(out)) {
          const downstream = assertExists(this.socketMap.get(conn.target));
          stack.push(downstream.nodeId);
        }
      }
    }
    return false;
  }

  // Hit-testing. All coordinates are in canvas space.

  /**
   * Returns the socket nearest to |point| within |hitRadius|. Equidistant
   * sockets resolve to the one on the node with the lowest id (the earliest
   * inserted), then to the first in the node's socket order.
   */
  findSocketAt(point: Point2D, hitRadius: number): SocketId | undefined {
    let best: {socket: Socket; dist: number} | undefined;
    for (const node of this.nodeMap.values()) {
      for (const socket of this.socketsOf(node.id)) {
        const dist = distance(point, {
          x: node.position.x + socket.offset.x,
          y: node.position.y + socket.offset.y,
        });
        if (dist > hitRadius) continue;
        if (
          best === undefined ||
          dist < best.dist ||
          (dist === best.dist && socket.nodeId < best.socket.nodeId)
        ) {
          best = {socket, dist};
        }
      }
    }
    return best?.socket.id;
  }

  // Topmost (last drawn) node whose rectangle contains |point|.
  findNodeAt(point: Point2D): NodeId | undefined {
    let found: NodeId | undefined;
    for (const node of this.nodeMap.values()) {
      const rect = Rect2D.fromPointAndSize({...node.position, ...node.size});
      if (rect.containsPoint(point)) {
        found = node.id;
      }
    }
    return found;
  }

  // Connection whose curve passes closest to |point|, within |tolerance|.
  findConnectionAt(
    point: Point2D,
    tolerance: number,
  ): ConnectionId | undefined {
    let best: {id: ConnectionId; dist: number} | undefined;
    for (const conn of this.connectionMap.values()) {
      const from = assertExists(this.socketPosition(conn.source));
      const to = assertExists(this.socketPosition(conn.target));
      const curve = connectionCurve(from, to, this.layout, conn.controlOffset);
      const polyline = flattenCubicBezier(curve, this.layout.bezierSegments);
      const dist = distanceToPolyline(point, polyline);
      if (dist <= tolerance && (best === undefined || dist < best.dist)) {
        best = {id: conn.id, dist};
      }
    }
    return best?.id;
  }

  // Nodes whose bounding rectangle intersects |rect| (touching counts).
  nodesInRect(rect: Bounds2D): Set<NodeId> {
    const query = new Rect2D(rect);
    const result = new Set<NodeId>();
    for (const node of this.nodeMap.values()) {
      const nodeRect = Rect2D.fromPointAndSize({
        ...node.position,
        ...node.size,
      });
      if (query.intersects(nodeRect)) {
        result.add(node.id);
      }
    }
    return result;
  }

  // Whole-graph operations

  clear(): void {
    this.nodeMap = new Map();
    this.socketMap = new Map();
    this.connectionMap = new Map();
    this.socketConnections = new Map();
    this.onChange.notify({kind: 'graphReplaced'});
  }

  // Nodes in insertion order, with their sockets, then every connection.
  exportGraph(): SerializedGraph {
    return serializeGraph(
      this.nodeMap.values(),
      this.connectionMap.values(),
      (id) => assertExists(this.socketMap.get(id)),
    );
  }

  /**
   * Replaces the whole contents of the store with |data| (typically the
   * output of JSON.parse()). Fails with MalformedGraph, changing nothing, if
   * the data doesn't validate or a connection references a missing socket.
   * Id allocation resumes after the largest imported id of each kind.
   */
  importGraph(data: unknown): GraphResult {
    const parsed = parseSerializedGraph(data);
    if (!parsed.ok) return parsed;
    const graph = parsed.value;

    const nodeMap = new Map<NodeId, Node>();
    const socketMap = new Map<SocketId, Socket>();
    const connectionMap = new Map<ConnectionId, Connection>();
    const socketConnections = new Map<SocketId, Set<ConnectionId>>();

    let maxNode = 0;
    let maxSocket = 0;
    let maxConnection = 0;
    for (const n of graph.nodes) {
      maxNode = Math.max(maxNode, n.id);
      for (const [direction, specs] of [
        ['input', n.inputs],
        ['output', n.outputs],
      ] as const) {
        for (const s of specs) {
          maxSocket = Math.max(maxSocket, s.id);
          socketMap.set(s.id, {
            id: s.id,
            nodeId: n.id,
            direction,
            type: s.type,
            label: s.label,
            offset: {x: 0, y: 0},
          });
        }
      }
      const node: Node = {
        id: n.id,
        position: n.position,
        size: n.size ?? {
          width: this.layout.defaultNodeWidth,
          height: this.layout.defaultNodeHeight,
        },
        inputs: n.inputs.map((s) => s.id),
        outputs: n.outputs.map((s) => s.id),
        payload: n.payload,
      };
      nodeMap.set(n.id, node);
    }
    for (const c of graph.connections) {
      if (c.id !== undefined) maxConnection = Math.max(maxConnection, c.id);
    }
    let nextConnectionId = maxConnection + 1;
    for (const c of graph.connections) {
      const id = c.id ?? nextConnectionId++;
      connectionMap.set(id, {
        id,
        source: c.source,
        target: c.target,
        ...(c.controlOffset === undefined
          ? {}
          : {controlOffset: c.controlOffset}),
      });
      for (const socketId of [c.source, c.target]) {
        let set = socketConnections.get(socketId);
        if (set === undefined) {
          set = new Set();
          socketConnections.set(socketId, set);
        }
        set.add(id);
      }
    }

    // Validation is complete: from here on nothing can fail.
    this.nodeMap = nodeMap;
    this.socketMap = socketMap;
    this.connectionMap = connectionMap;
    this.socketConnections = socketConnections;
    for (const node of nodeMap.values()) {
      nodeMap.set(node.id, this.layoutNode(node));
    }
    this.nextNodeId = Math.max(this.nextNodeId, maxNode + 1);
    this.nextSocketId = Math.max(this.nextSocketId, maxSocket + 1);
    this.nextConnectionId = Math.max(this.nextConnectionId, nextConnectionId);
    this.onChange.notify({kind: 'graphReplaced'});
    return okResult();
  }

  private createSocket(
    nodeId: NodeId,
    direction: SocketDirection,
    spec: SocketSpec,
  ): SocketId {
    const id = this.nextSocketId++;
    this.socketMap.set(id, {
      id,
      nodeId,
      direction,
      type: spec.type,
      label: spec.label ?? '',
      offset: {x: 0, y: 0},
    });
    return id;
  }

  // Recomputes socket offsets (and, if enabled, grows the node to fit them).
  private layoutNode(node: Node): Node {
    let size = node.size;
    if (this.autoResizeNodes) {
      const rows = Math.max(node.inputs.length, node.outputs.length);
      const height = Math.max(size.height, minNodeHeight(rows, this.layout));
      if (height !== size.height) {
        size = {width: size.width, height};
      }
    }
    const place = (ids: ReadonlyArray<SocketId>, dir: SocketDirection) => {
      ids.forEach((id, index) => {
        const socket = assertExists(this.socketMap.get(id));
        this.socketMap.set(id, {
          ...socket,
          offset: socketOffset(dir, index, size.width, this.layout),
        });
      });
    };
    place(node.inputs, 'input');
    place(node.outputs, 'output');
    return size === node.size ? node : {...node, size};
  }

  private insertConnection(conn: Connection): void {
    this.connectionMap.set(conn.id, conn);
    for (const socketId of [conn.source, conn.target]) {
      let set = this.socketConnections.get(socketId);
      if (set === undefined) {
        set = new Set();
        this.socketConnections.set(socketId, set);
      }
      set.add(conn.id);
    }
  }

  private deleteConnection(conn: Connection): void {
    this.connectionMap.delete(conn.id);
    this.socketConnections.get(conn.source)?.delete(conn.id);
    this.socketConnections.get(conn.target)?.delete(conn.id);
  }
}
