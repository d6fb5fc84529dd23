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
 * The state machine turning normalised input events into graph mutations,
 * selection changes and viewport changes.
 *
 *                    middle / Alt+primary
 *           +----------------------------------> Panning
 *           |        primary on socket
 *           +----------------------------------> DraggingConnection
 *   Idle ---+        primary on node
 *           +----------------------------------> DraggingNode
 *           |        primary on empty canvas
 *           +----------------------------------> BoxSelecting
 *
 * Every non-idle state returns to Idle on pointer-up (committing the gesture)
 * or on a cancel key (discarding it).
 *
 * While a gesture is in progress the store is left untouched: node drag
 * previews, the pending connection and the selection rectangle live in the
 * |overlay|, which the renderer reads on top of the store.
 */
import {Disposable, DisposableStack} from '../base/disposable';
import {EvtSource} from '../base/events';
import {distance, Point2D, Rect2D, Size2D} from '../base/geom';
import {checkAnyHotkey, Hotkey, Modifiers} from '../base/hotkeys';
import {assertExists, assertUnreachable} from '../base/logging';
import {unwrapResult} from '../base/result';
import {NodeClipboard} from './clipboard';
import {NodeEditorConfig} from './config';
import {GraphError} from './graph_error';
import {GraphChange, GraphStore} from './graph_store';
import {ConnectionId, NodeId, SocketId} from './model';
import {ViewportTransform} from './viewport';

export type PointerButton = 'primary' | 'middle' | 'secondary';

// Positions are screen pixels relative to the panel's top-left corner.
export type InputEvent =
  | {
      readonly kind: 'pointerdown';
      readonly position: Point2D;
      readonly button: PointerButton;
      readonly modifiers: Modifiers;
    }
  | {
      readonly kind: 'pointermove';
      readonly position: Point2D;
      readonly modifiers: Modifiers;
    }
  | {
      readonly kind: 'pointerup';
      readonly position: Point2D;
      readonly button: PointerButton;
      readonly modifiers: Modifiers;
    }
  | {
      readonly kind: 'wheel';
      readonly position: Point2D;
      // Pixels.
      readonly deltaY: number;
      readonly modifiers: Modifiers;
    }
  | {
      readonly kind: 'keydown';
      readonly key: string;
      readonly modifiers: Modifiers;
    };

// Canvas-space positions unless stated otherwise.
export type InteractionState =
  | {readonly kind: 'idle'}
  | {
      readonly kind: 'draggingNode';
      readonly nodeId: NodeId; // The grabbed node.
      readonly grabOffset: Point2D; // Pointer minus grabbed node position.
      readonly startPositions: ReadonlyMap<NodeId, Point2D>;
      readonly startPointer: Point2D; // Screen space.
    }
  | {
      readonly kind: 'draggingConnection';
      readonly socketId: SocketId;
    }
  | {
      readonly kind: 'boxSelecting';
      readonly anchor: Point2D;
      readonly additive: boolean;
    }
  | {
      readonly kind: 'panning';
      readonly startPointer: Point2D; // Screen space.
      readonly startPan: Point2D;
    };

export type InteractionStateKind = InteractionState['kind'];

export type HoverTarget =
  | {readonly kind: 'none'}
  | {readonly kind: 'node'; readonly nodeId: NodeId}
  | {readonly kind: 'socket'; readonly socketId: SocketId}
  | {readonly kind: 'connection'; readonly connectionId: ConnectionId};

export interface PendingConnection {
  readonly socketId: SocketId;
  // Loose end of the connection being dragged, in canvas space.
  readonly pointer: Point2D;
}

// What the renderer draws on top of the store.
export interface InteractionOverlay {
  // Preview positions of nodes being dragged. Absent nodes sit where the
  // store says.
  readonly nodePositions: ReadonlyMap<NodeId, Point2D>;
  readonly pendingConnection?: PendingConnection;
  // Canvas space.
  readonly selectionRect?: Rect2D;
  readonly hover: HoverTarget;
  readonly showGrid: boolean;
}

export interface Selection {
  readonly nodes: ReadonlySet<NodeId>;
  readonly connections: ReadonlySet<ConnectionId>;
}

export interface StateChangedArgs {
  readonly from: InteractionStateKind;
  readonly to: InteractionStateKind;
}

export interface ConnectRejectedArgs {
  readonly source: SocketId;
  readonly target: SocketId;
  readonly error: GraphError;
}

export interface ContextMenuArgs {
  readonly target: HoverTarget;
  readonly screenPosition: Point2D;
  readonly canvasPosition: Point2D;
}

const NO_HOVER: HoverTarget = {kind: 'none'};
const NONE: ReadonlySet<never> = new Set();

export class InteractionController implements Disposable {
  readonly onSelectionChanged = new EvtSource<Selection>();
  readonly onStateChanged = new EvtSource<StateChangedArgs>();
  readonly onConnectRejected = new EvtSource<ConnectRejectedArgs>();
  readonly onContextMenu = new EvtSource<ContextMenuArgs>();
  readonly onRedrawNeeded = new EvtSource<void>();

  private _state: InteractionState = {kind: 'idle'};
  private selectedNodes = new Set<NodeId>();
  private selectedConnections = new Set<ConnectionId>();
  private _overlay: InteractionOverlay;
  private viewportSize?: Size2D;
  private readonly clipboard: NodeClipboard;
  private readonly trash = new DisposableStack();

  constructor(
    readonly store: GraphStore,
    readonly viewport: ViewportTransform,
    readonly config: NodeEditorConfig,
    clipboard?: NodeClipboard,
  ) {
    this.clipboard =
      clipboard ?? new NodeClipboard(config.interaction.pasteOffset);
    this._overlay = {
      nodePositions: new Map(),
      hover: NO_HOVER,
      showGrid: config.behavior.showGrid,
    };
    this.trash.use(
      store.onChange.addListener((change) => this.onGraphChange(change)),
    );
    this.trash.use(
      viewport.onChange.addListener(() => this.onRedrawNeeded.notify()),
    );
  }

  dispose(): void {
    this.trash.dispose();
  }

  get state(): InteractionState {
    return this._state;
  }

  get overlay(): InteractionOverlay {
    return this._overlay;
  }

  get selection(): Selection {
    return {
      nodes: new Set(this.selectedNodes),
      connections: new Set(this.selectedConnections),
    };
  }

  // Needed to frame the graph and to cull off-screen items.
  setViewportSize(size: Size2D): void {
    this.viewportSize = {width: size.width, height: size.height};
  }

  getViewportSize(): Size2D | undefined {
    return this.viewportSize;
  }

  /**
   * Feeds one input event through the state machine. Returns true if the
   * event was consumed.
   */
  handleEvent(event: InputEvent): boolean {
    switch (event.kind) {
      case 'pointerdown':
        return this.onPointerDown(
          event.position,
          event.button,
          event.modifiers,
        );
      case 'pointermove':
        return this.onPointerMove(event.position);
      case 'pointerup':
        return this.onPointerUp(event.position);
      case 'wheel':
        return this.onWheel(event.position, event.deltaY);
      case 'keydown':
        return this.onKeyDown(event.key, event.modifiers);
      default:
        return assertUnreachable(event);
    }
  }

  // Commands. Each is also reachable through a key binding.

  // Abandons the current gesture, leaving store and selection as they were.
  cancel(): boolean {
    const state = this._state;
    switch (state.kind) {
      case 'idle':
        return false;
      case 'panning':
        this.viewport.setPan(state.startPan);
        break;
      case 'draggingNode':
      case 'draggingConnection':
      case 'boxSelecting':
        break;
      default:
        assertUnreachable(state);
    }
    this.setState({kind: 'idle'});
    return true;
  }

  selectAll(): void {
    if (!this.config.behavior.allowMultipleSelection) return;
    this.setSelection(
      new Set([...this.store.nodes()].map((n) => n.id)),
      NONE,
    );
  }

  clearSelection(): void {
    this.setSelection(NONE, NONE);
  }

  // Replaces the node selection (and clears the connection selection).
  selectNodes(nodeIds: Iterable<NodeId>): void {
    const ids = [...nodeIds].filter((id) => this.store.getNode(id));
    const nodes = this.config.behavior.allowMultipleSelection
      ? ids
      : ids.slice(0, 1);
    this.setSelection(new Set(nodes), NONE);
  }

  // Removes the selected connections, then the selected nodes.
  deleteSelection(): void {
    const connections = [...this.selectedConnections];
    const nodes = [...this.selectedNodes];
    for (const id of connections) {
      if (this.store.getConnection(id) !== undefined) {
        unwrapResult(this.store.disconnect(id));
      }
    }
    for (const id of nodes) {
      unwrapResult(this.store.removeNode(id));
    }
    // The store listener has pruned the selection by now.
  }

  copySelection(): void {
    this.clipboard.copy(this.store, this.selectedNodes);
  }

  // Pastes the clipboard and selects the pasted nodes.
  paste(anchor?: Point2D): NodeId[] {
    const created = this.clipboard.paste(this.store, anchor);
    if (created.length > 0) this.selectNodes(created);
    return created;
  }

  // Copies and pastes the selection in one go, leaving the clipboard as is.
  duplicateSelection(): NodeId[] {
    const scratch = new NodeClipboard(this.config.interaction.pasteOffset);
    scratch.copy(this.store, this.selectedNodes);
    const created = scratch.paste(this.store);
    if (created.length > 0) this.selectNodes(created);
    return created;
  }

  // Fits every node into the viewport. Needs a known viewport size.
  frameAll(): boolean {
    const bounds = this.store.bounds();
    if (bounds === undefined || this.viewportSize === undefined) return false;
    this.viewport.frame(
      bounds,
      this.viewportSize,
      this.config.layout.framePadding,
    );
    return true;
  }

  toggleGrid(): void {
    this.updateOverlay({showGrid: !this._overlay.showGrid});
  }

  zoomIn(): void {
    this.viewport.zoomBy(1 + this.config.interaction.zoomStep, this.center());
  }

  zoomOut(): void {
    this.viewport.zoomBy(1 - this.config.interaction.zoomStep, this.center());
  }

  // Pointer handling

  private onPointerDown(
    position: Point2D,
    button: PointerButton,
    modifiers: Modifiers,
  ): boolean {
    if (this._state.kind !== 'idle') return false;
    const behavior = this.config.behavior;

    if (button === 'middle' || (button === 'primary' && modifiers.alt)) {
      if (!behavior.panEnabled) return false;
      this.setState({
        kind: 'panning',
        startPointer: position,
        startPan: this.viewport.pan,
      });
      return true;
    }

    const canvas = this.viewport.toCanvas(position);

    if (button === 'secondary') {
      this.onContextMenu.notify({
        target: this.hitTest(position),
        screenPosition: position,
        canvasPosition: canvas,
      });
      return true;
    }

    const additive =
      behavior.allowMultipleSelection &&
      (modifiers.shift || modifiers.ctrl || modifiers.meta);

    const socketId = this.store.findSocketAt(
      canvas,
      this.config.interaction.socketHitRadius / this.viewport.zoom,
    );
    if (socketId !== undefined) {
      this.setState({kind: 'draggingConnection', socketId});
      this.updateOverlay({pendingConnection: {socketId, pointer: canvas}});
      return true;
    }

    const connectionId = this.store.findConnectionAt(
      canvas,
      this.config.layout.connectionHitTolerance / this.viewport.zoom,
    );
    if (connectionId !== undefined) {
      const connections = additive
        ? new Set(this.selectedConnections)
        : new Set<ConnectionId>();
      if (additive && connections.has(connectionId)) {
        connections.delete(connectionId);
      } else {
        connections.add(connectionId);
      }
      this.setSelection(additive ? this.selectedNodes : NONE, connections);
      return true;
    }

    const nodeId = this.store.findNodeAt(canvas);
    if (nodeId !== undefined) {
      return this.grabNode(nodeId, position, canvas, additive);
    }

    if (behavior.rectangleSelectionEnabled && behavior.allowMultipleSelection) {
      this.setState({kind: 'boxSelecting', anchor: canvas, additive});
      this.updateOverlay({selectionRect: Rect2D.fromPoints(canvas, canvas)});
    } else if (!additive) {
      this.clearSelection();
    }
    return true;
  }

  private grabNode(
    nodeId: NodeId,
    screen: Point2D,
    canvas: Point2D,
    additive: boolean,
  ): boolean {
    if (additive) {
      const nodes = new Set(this.selectedNodes);
      if (nodes.has(nodeId)) {
        nodes.delete(nodeId);
        this.setSelection(nodes, NONE);
        return true;
      }
      nodes.add(nodeId);
      this.setSelection(nodes, NONE);
    } else if (!this.selectedNodes.has(nodeId)) {
      this.setSelection(new Set([nodeId]), NONE);
    } else if (this.selectedConnections.size > 0) {
      this.setSelection(this.selectedNodes, NONE);
    }

    const startPositions = new Map<NodeId, Point2D>();
    for (const id of this.selectedNodes) {
      startPositions.set(id, assertExists(this.store.getNode(id)).position);
    }
    const grabbed = assertExists(startPositions.get(nodeId));
    this.setState({
      kind: 'draggingNode',
      nodeId,
      grabOffset: {x: canvas.x - grabbed.x, y: canvas.y - grabbed.y},
      startPositions,
      startPointer: screen,
    });
    return true;
  }

  private onPointerMove(position: Point2D): boolean {
    const state = this._state;
    const canvas = this.viewport.toCanvas(position);
    switch (state.kind) {
      case 'idle':
        return this.updateHover(position);
      case 'panning': {
        const speed = this.config.interaction.panSpeed;
        this.viewport.setPan({
          x: state.startPan.x + (position.x - state.startPointer.x) * speed,
          y: state.startPan.y + (position.y - state.startPointer.y) * speed,
        });
        return true;
      }
      case 'draggingNode': {
        const delta = this.dragDelta(state, position);
        const previews = new Map<NodeId, Point2D>();
        for (const [id, start] of state.startPositions) {
          previews.set(id, {x: start.x + delta.x, y: start.y + delta.y});
        }
        this.updateOverlay({nodePositions: previews});
        return true;
      }
      case 'draggingConnection':
        this.updateOverlay({
          pendingConnection: {socketId: state.socketId, pointer: canvas},
        });
        return true;
      case 'boxSelecting':
        this.updateOverlay({
          selectionRect: Rect2D.fromPoints(state.anchor, canvas),
        });
        return true;
      default:
        return assertUnreachable(state);
    }
  }

  private onPointerUp(position: Point2D): boolean {
    const state = this._state;
    switch (state.kind) {
      case 'idle':
        return false;
      case 'panning':
        this.setState({kind: 'idle'});
        return true;
      case 'draggingNode': {
        const delta = this.dragDelta(state, position);
        const ids = [...state.startPositions.keys()].filter((id) =>
          this.store.getNode(id),
        );
        unwrapResult(this.store.moveNodes(ids, delta));
        this.setState({kind: 'idle'});
        return true;
      }
      case 'draggingConnection':
        this.setState({kind: 'idle'});
        this.finishConnection(state.socketId, position);
        return true;
      case 'boxSelecting': {
        const rect = Rect2D.fromPoints(
          state.anchor,
          this.viewport.toCanvas(position),
        );
        this.setState({kind: 'idle'});
        const hits = this.store.nodesInRect(rect);
        const nodes = state.additive
          ? new Set([...this.selectedNodes, ...hits])
          : hits;
        this.setSelection(
          nodes,
          state.additive ? this.selectedConnections : NONE,
        );
        return true;
      }
      default:
        return assertUnreachable(state);
    }
  }

  // Releasing over nothing, or over the originating socket, just drops it.
  private finishConnection(origin: SocketId, position: Point2D): void {
    const canvas = this.viewport.toCanvas(position);
    const target = this.store.findSocketAt(
      canvas,
      this.config.interaction.connectionSnapDistance / this.viewport.zoom,
    );
    if (target === undefined || target === origin) return;
    const originSocket = this.store.getSocket(origin);
    if (originSocket === undefined) return;
    const [source, sink] =
      originSocket.direction === 'output' ? [origin, target] : [target, origin];
    const res = this.store.connect(source, sink);
    if (!res.ok) {
      this.onConnectRejected.notify({source, target: sink, error: res.error});
    }
  }

  private onWheel(position: Point2D, deltaY: number): boolean {
    if (this._state.kind !== 'idle' || !this.config.behavior.zoomEnabled) {
      return false;
    }
    // Stays positive for any delta.
    const factor = Math.exp(-deltaY * this.config.interaction.scrollZoomSpeed);
    this.viewport.zoomBy(factor, position);
    return true;
  }

  private onKeyDown(key: string, modifiers: Modifiers): boolean {
    const keys = this.config.interaction.keys;
    const event = {key, modifiers};
    const matches = (hotkeys: ReadonlyArray<Hotkey>) =>
      checkAnyHotkey(hotkeys, event);

    if (this._state.kind !== 'idle') {
      return matches(keys.cancel) && this.cancel();
    }
    if (matches(keys.deleteSelection)) {
      this.deleteSelection();
    } else if (matches(keys.selectAll)) {
      this.selectAll();
    } else if (matches(keys.copy)) {
      this.copySelection();
    } else if (matches(keys.paste)) {
      this.paste();
    } else if (matches(keys.duplicate)) {
      this.duplicateSelection();
    } else if (matches(keys.frameAll)) {
      this.frameAll();
    } else if (matches(keys.toggleGrid)) {
      this.toggleGrid();
    } else {
      return false;
    }
    return true;
  }

  // Offset of the whole dragged group, snapping the grabbed node if enabled.
  private dragDelta(
    state: Extract<InteractionState, {kind: 'draggingNode'}>,
    pointer: Point2D,
  ): Point2D {
    const threshold = this.config.interaction.dragThreshold;
    if (distance(pointer, state.startPointer) < threshold) {
      return {x: 0, y: 0};
    }
    const start = assertExists(state.startPositions.get(state.nodeId));
    const canvas = this.viewport.toCanvas(pointer);
    let target = {
      x: canvas.x - state.grabOffset.x,
      y: canvas.y - state.grabOffset.y,
    };
    if (this.config.behavior.snapToGrid) {
      const grid = this.config.layout.gridSize;
      target = {
        x: Math.round(target.x / grid) * grid,
        y: Math.round(target.y / grid) * grid,
      };
    }
    return {x: target.x - start.x, y: target.y - start.y};
  }

  // Sockets win over connections, connections over nodes.
  private hitTest(position: Point2D): HoverTarget {
    const canvas = this.viewport.toCanvas(position);
    const zoom = this.viewport.zoom;
    const socketId = this.store.findSocketAt(
      canvas,
      this.config.interaction.socketHitRadius / zoom,
    );
    if (socketId !== undefined) return {kind: 'socket', socketId};
    const connectionId = this.store.findConnectionAt(
      canvas,
      this.config.layout.connectionHitTolerance / zoom,
    );
    if (connectionId !== undefined) return {kind: 'connection', connectionId};
    const nodeId = this.store.findNodeAt(canvas);
    if (nodeId !== undefined) return {kind: 'node', nodeId};
    return NO_HOVER;
  }

  private updateHover(position: Point2D): boolean {
    if (!this.config.behavior.highlightHoveredElements) return false;
    const hover = this.hitTest(position);
    if (sameHover(hover, this._overlay.hover)) return false;
    this.updateOverlay({hover});
    return true;
  }

  private center(): Point2D {
    const size = this.viewportSize;
    return size ? {x: size.width / 2, y: size.height / 2} : {x: 0, y: 0};
  }

  // Keeps selection and in-flight gestures consistent with the store.
  private onGraphChange(change: GraphChange): void {
    switch (change.kind) {
      case 'nodeRemoved': {
        const state = this._state;
        if (
          (state.kind === 'draggingNode' &&
            state.startPositions.has(change.nodeId)) ||
          (state.kind === 'draggingConnection' &&
            change.socketIds.includes(state.socketId))
        ) {
          this.cancel();
        }
        if (this.selectedNodes.has(change.nodeId)) {
          const nodes = new Set(this.selectedNodes);
          nodes.delete(change.nodeId);
          this.setSelection(nodes, this.selectedConnections);
        }
        this.clearStaleHover();
        break;
      }
      case 'connectionRemoved':
        if (this.selectedConnections.has(change.connectionId)) {
          const connections = new Set(this.selectedConnections);
          connections.delete(change.connectionId);
          this.setSelection(this.selectedNodes, connections);
        }
        this.clearStaleHover();
        break;
      case 'graphReplaced':
        this.cancel();
        this.clearSelection();
        this.updateOverlay({hover: NO_HOVER});
        break;
      case 'nodeChanged': {
        // Covers removeSocket, which reports the node rather than the socket.
        const state = this._state;
        if (
          state.kind === 'draggingConnection' &&
          this.store.getSocket(state.socketId) === undefined
        ) {
          this.cancel();
        }
        this.clearStaleHover();
        break;
      }
      case 'nodeAdded':
      case 'connectionAdded':
        break;
      default:
        assertUnreachable(change);
    }
    this.onRedrawNeeded.notify();
  }

  private clearStaleHover(): void {
    const hover = this._overlay.hover;
    const stale =
      (hover.kind === 'node' && !this.store.getNode(hover.nodeId)) ||
      (hover.kind === 'socket' && !this.store.getSocket(hover.socketId)) ||
      (hover.kind === 'connection' &&
        !this.store.getConnection(hover.connectionId));
    if (stale) this.updateOverlay({hover: NO_HOVER});
  }

  private setState(next: InteractionState): void {
    const from = this._state.kind;
    this._state = next;
    if (next.kind === 'idle') {
      // Gesture previews never outlive their gesture.
      this.updateOverlay({
        nodePositions: new Map(),
        pendingConnection: undefined,
        selectionRect: undefined,
      });
    }
    if (from !== next.kind) {
      this.onStateChanged.notify({from, to: next.kind});
    }
  }

  private setSelection(
    nodes: ReadonlySet<NodeId>,
    connections: ReadonlySet<ConnectionId>,
  ): void {
    if (
      sameSet(nodes, this.selectedNodes) &&
      sameSet(connections, this.selectedConnections)
    ) {
      return;
    }
    this.selectedNodes = new Set(nodes);
    this.selectedConnections = new Set(connections);
    this.onSelectionChanged.notify(this.selection);
    this.onRedrawNeeded.notify();
  }

  private updateOverlay(patch: Partial<InteractionOverlay>): void {
    this._overlay = {...this._overlay, ...patch};
    this.onRedrawNeeded.notify();
  }
}

function sameSet<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a.size !== b.size) return false;
  for (const x of a) {
    if (!b.has(x)) return false;
  }
  return true;
}

function sameHover(a: HoverTarget, b: HoverTarget): boolean {
  switch (a.kind) {
    case 'none':
      return b.kind === 'none';
    case 'node':
      return b.kind === 'node' && b.nodeId === a.nodeId;
    case 'socket':
      return b.kind === 'socket' && b.socketId === a.socketId;
    case 'connection':
      return b.kind === 'connection' && b.connectionId === a.connectionId;
    default:
      return assertUnreachable(a);
  }
}
