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
 * Turns the editor state into a flat list of screen-space draw primitives.
 *
 * The renderer only reads: store, viewport and interaction overlay are never
 * modified, so rendering may happen at any point between two input events.
 * Replaying the primitives onto an actual surface is the embedder's job (see
 * widgets/canvas_painter.ts for a Canvas 2D one).
 *
 * Primitives come out in paint order: background, grid, connections, nodes,
 * the pending connection and finally the selection rectangle.
 */
import {CubicBezier, Point2D, Rect2D, Size2D} from '../base/geom';
import {NodeEditorConfig} from './config';
import {connectionCurve, mapCurve} from './curves';
import {GraphStore} from './graph_store';
import {InteractionOverlay, Selection} from './interaction';
import {Node, Socket, SocketId} from './model';
import {ThemeProvider} from './theme';
import {ViewportTransform} from './viewport';

export interface RectPrimitive {
  readonly kind: 'rect';
  readonly rect: Rect2D;
  readonly fill?: string;
  readonly stroke?: string;
  readonly lineWidth?: number;
  readonly cornerRadius?: number;
}

export interface LinePrimitive {
  readonly kind: 'line';
  readonly from: Point2D;
  readonly to: Point2D;
  readonly color: string;
  readonly width: number;
}

export interface CirclePrimitive {
  readonly kind: 'circle';
  readonly center: Point2D;
  readonly radius: number;
  readonly fill?: string;
  readonly stroke?: string;
  readonly lineWidth?: number;
}

export interface BezierPrimitive {
  readonly kind: 'bezier';
  readonly curve: CubicBezier;
  readonly color: string;
  readonly width: number;
}

export type TextAlign = 'left' | 'center' | 'right';

export interface TextPrimitive {
  readonly kind: 'text';
  readonly text: string;
  // Anchor point: horizontal per |align|, vertically centred.
  readonly position: Point2D;
  readonly align: TextAlign;
  readonly color: string;
  readonly font: string;
  readonly maxWidth?: number;
}

export type DrawPrimitive =
  | RectPrimitive
  | LinePrimitive
  | CirclePrimitive
  | BezierPrimitive
  | TextPrimitive;

// Everything a frame depends on.
export interface Scene {
  readonly store: GraphStore;
  readonly viewport: ViewportTransform;
  readonly overlay: InteractionOverlay;
  readonly selection: Selection;
  // Without a size there is no background, grid or culling.
  readonly viewportSize?: Size2D;
}

// Below these zoom levels some details are skipped.
const MIN_ZOOM_FOR_SOCKETS = 0.2;
const MIN_ZOOM_FOR_TITLES = 0.3;
const MIN_ZOOM_FOR_NODE_IDS = 0.5;
const MIN_ZOOM_FOR_SOCKET_LABELS = 0.6;

// Grids denser than this many pixels per cell are not drawn.
const MIN_GRID_SPACING_PX = 2;
// Upper bound of grid lines per axis.
const MAX_GRID_LINES = 500;

export class NodeEditorRenderer {
  constructor(
    private readonly config: NodeEditorConfig,
    private readonly theme: ThemeProvider,
  ) {}

  render(scene: Scene): DrawPrimitive[] {
    const out: DrawPrimitive[] = [];
    const screen =
      scene.viewportSize &&
      Rect2D.fromPointAndSize({x: 0, y: 0, ...scene.viewportSize});
    // Only cull against a known viewport.
    const visible = this.config.behavior.cullOffscreen ? screen : undefined;

    if (screen !== undefined) {
      out.push({
        kind: 'rect',
        rect: screen,
        fill: this.theme.colors.background.cssString,
      });
      if (scene.overlay.showGrid) {
        this.renderGrid(out, scene.viewport, screen);
      }
    }
    this.renderConnections(out, scene, visible);
    this.renderNodes(out, scene, visible);
    this.renderPendingConnection(out, scene);
    this.renderSelectionRect(out, scene);
    return out;
  }

  private renderGrid(
    out: DrawPrimitive[],
    viewport: ViewportTransform,
    screen: Rect2D,
  ): void {
    const layout = this.config.layout;
    const spacing = layout.gridSize * viewport.zoom;
    if (spacing < MIN_GRID_SPACING_PX) return;
    const colors = this.theme.colors;
    const showMajor = this.config.behavior.showMajorGridLines;
    const major = layout.gridMajorSpacing;

    // Lines sit on multiples of the grid size in canvas space, so they stay
    // put relative to the nodes while panning.
    const lines = (origin: number, extent: number) => {
      const result: Array<{offset: number; isMajor: boolean}> = [];
      const first = Math.ceil(-origin / spacing);
      const last = Math.min(
        Math.floor((extent - origin) / spacing),
        first + MAX_GRID_LINES - 1,
      );
      for (let i = first; i <= last; i++) {
        const isMajor = showMajor && ((i % major) + major) % major === 0;
        result.push({offset: origin + i * spacing, isMajor});
      }
      return result;
    };
    const style = (isMajor: boolean) => ({
      color: (isMajor ? colors.gridMajor : colors.grid).cssString,
      width: isMajor ? 2 : 1,
    });
    const pan = viewport.pan;
    for (const {offset: x, isMajor} of lines(pan.x, screen.width)) {
      out.push({
        kind: 'line',
        from: {x, y: 0},
        to: {x, y: screen.height},
        ...style(isMajor),
      });
    }
    for (const {offset: y, isMajor} of lines(pan.y, screen.height)) {
      out.push({
        kind: 'line',
        from: {x: 0, y},
        to: {x: screen.width, y},
        ...style(isMajor),
      });
    }
  }

  private renderConnections(
    out: DrawPrimitive[],
    scene: Scene,
    visible: Rect2D | undefined,
  ): void {
    const {store, viewport, overlay, selection} = scene;
    const colors = this.theme.colors;
    const highlightHover = this.config.behavior.highlightHoveredElements;
    const hover = overlay.hover;
    for (const conn of store.connections()) {
      const from = socketCanvasPosition(scene, conn.source);
      const to = socketCanvasPosition(scene, conn.target);
      if (from === undefined || to === undefined) continue;
      const curve = mapCurve(
        connectionCurve(from, to, this.config.layout, conn.controlOffset),
        (p) => viewport.toScreen(p),
      );
      if (visible !== undefined && !visible.intersects(curveHull(curve))) {
        continue;
      }
      let color = colors.connectionDefault;
      if (selection.connections.has(conn.id)) {
        color = colors.connectionSelected;
      } else if (
        highlightHover &&
        hover.kind === 'connection' &&
        hover.connectionId === conn.id
      ) {
        color = colors.connectionHover;
      }
      out.push({
        kind: 'bezier',
        curve,
        color: color.cssString,
        width: Math.max(1, this.config.layout.connectionWidth * viewport.zoom),
      });
    }
  }

  private renderNodes(
    out: DrawPrimitive[],
    scene: Scene,
    visible: Rect2D | undefined,
  ): void {
    const {store, viewport} = scene;
    const compatible = this.compatibleSockets(scene);
    for (const node of store.nodes()) {
      const position =
        scene.overlay.nodePositions.get(node.id) ?? node.position;
      const rect = viewport.toScreenRect(
        Rect2D.fromPointAndSize({...position, ...node.size}),
      );
      if (visible !== undefined && !visible.intersects(rect)) continue;
      this.renderNode(out, scene, node, rect, compatible);
    }
  }

  private renderNode(
    out: DrawPrimitive[],
    scene: Scene,
    node: Node,
    rect: Rect2D,
    compatible: ReadonlySet<SocketId>,
  ): void {
    const layout = this.config.layout;
    const behavior = this.config.behavior;
    const colors = this.theme.colors;
    const zoom = scene.viewport.zoom;
    const borderWidth = Math.max(1, layout.nodeBorderWidth * zoom);
    const cornerRadius = layout.nodeCornerRadius * zoom;

    if (scene.selection.nodes.has(node.id)) {
      const width = layout.selectionBorderWidth * zoom;
      out.push({
        kind: 'rect',
        rect: rect.expand(width),
        stroke: colors.selection.cssString,
        lineWidth: Math.max(1, width),
        cornerRadius,
      });
    }
    out.push({
      kind: 'rect',
      rect,
      fill: colors.nodeBodyBackground.cssString,
      stroke: colors.nodeBorder.cssString,
      lineWidth: borderWidth,
      cornerRadius,
    });
    const header = new Rect2D({
      left: rect.left,
      top: rect.top,
      right: rect.right,
      bottom: rect.top + Math.min(rect.height, layout.nodeHeaderHeight * zoom),
    });
    out.push({
      kind: 'rect',
      rect: header,
      fill: colors.nodeTitleBackground.cssString,
    });
    out.push({
      kind: 'line',
      from: {x: header.left, y: header.bottom},
      to: {x: header.right, y: header.bottom},
      color: colors.nodeBorder.cssString,
      width: Math.max(1, zoom),
    });

    if (zoom > MIN_ZOOM_FOR_TITLES) {
      const padding = layout.titlePadding * zoom;
      out.push({
        kind: 'text',
        text: node.payload.title,
        position: {x: header.left + padding, y: header.center.y},
        align: 'left',
        color: colors.nodeText.cssString,
        font: this.font(layout.titleFontSize * zoom),
        maxWidth: Math.max(0, header.width - 2 * padding),
      });
    }

    if (zoom > MIN_ZOOM_FOR_SOCKETS) {
      for (const socket of scene.store.socketsOf(node.id)) {
        this.renderSocket(out, scene, rect, socket, compatible.has(socket.id));
      }
    }

    if (behavior.showNodeIds && zoom > MIN_ZOOM_FOR_NODE_IDS) {
      out.push({
        kind: 'text',
        text: `ID: ${node.id}`,
        position: {
          x: rect.left,
          y: rect.bottom + (layout.socketLabelFontSize * zoom) / 2 + 2,
        },
        align: 'left',
        color: colors.nodeText.cssString,
        font: this.font(layout.socketLabelFontSize * zoom),
      });
    }
  }

  private renderSocket(
    out: DrawPrimitive[],
    scene: Scene,
    nodeRect: Rect2D,
    socket: Socket,
    isCompatible: boolean,
  ): void {
    const layout = this.config.layout;
    const colors = this.theme.colors;
    const zoom = scene.viewport.zoom;
    const center = {
      x: nodeRect.left + socket.offset.x * zoom,
      y: nodeRect.top + socket.offset.y * zoom,
    };
    const radius = Math.max(2, layout.socketRadius * zoom);
    const hover = scene.overlay.hover;
    const isHovered =
      this.config.behavior.highlightHoveredElements &&
      hover.kind === 'socket' &&
      hover.socketId === socket.id;

    let border = colors.socketBorder;
    if (isHovered) {
      border = colors.socketHover;
    } else if (isCompatible) {
      border = colors.socketCompatible;
    }
    out.push({
      kind: 'circle',
      center,
      radius,
      fill: this.theme.socketColor(socket.type).cssString,
      stroke: border.cssString,
      lineWidth: Math.max(1, zoom * (isHovered || isCompatible ? 2 : 1)),
    });
    if (scene.store.isSocketConnected(socket.id)) {
      out.push({
        kind: 'circle',
        center,
        radius: Math.max(1, radius - 2),
        fill: colors.socketConnected.cssString,
      });
    }

    if (
      this.config.behavior.showSocketLabels &&
      zoom > MIN_ZOOM_FOR_SOCKET_LABELS &&
      socket.label !== ''
    ) {
      const margin = layout.socketLabelMargin * zoom;
      const isInput = socket.direction === 'input';
      out.push({
        kind: 'text',
        text: socket.label,
        position: {x: center.x + (isInput ? margin : -margin), y: center.y},
        align: isInput ? 'left' : 'right',
        color: colors.nodeText.cssString,
        font: this.font(layout.socketLabelFontSize * zoom),
      });
    }
  }

  private renderPendingConnection(out: DrawPrimitive[], scene: Scene): void {
    const pending = scene.overlay.pendingConnection;
    if (pending === undefined) return;
    const socket = scene.store.getSocket(pending.socketId);
    const anchor = socketCanvasPosition(scene, pending.socketId);
    if (socket === undefined || anchor === undefined) return;
    // The curve always runs from the output side to the input side.
    const [from, to] =
      socket.direction === 'output'
        ? [anchor, pending.pointer]
        : [pending.pointer, anchor];
    out.push({
      kind: 'bezier',
      curve: mapCurve(connectionCurve(from, to, this.config.layout), (p) =>
        scene.viewport.toScreen(p),
      ),
      color: this.theme.colors.pendingConnection.cssString,
      width: Math.max(
        1,
        this.config.layout.connectionWidth * scene.viewport.zoom,
      ),
    });
  }

  private renderSelectionRect(out: DrawPrimitive[], scene: Scene): void {
    const rect = scene.overlay.selectionRect;
    if (rect === undefined) return;
    out.push({
      kind: 'rect',
      rect: scene.viewport.toScreenRect(rect),
      fill: this.theme.colors.selectionRect.cssString,
      stroke: this.theme.colors.selectionBorder.cssString,
      lineWidth: 1,
    });
  }

  // Sockets the pending connection (if any) could currently attach to.
  private compatibleSockets(scene: Scene): Set<SocketId> {
    const result = new Set<SocketId>();
    const pending = scene.overlay.pendingConnection;
    if (
      pending === undefined ||
      !this.config.behavior.highlightCompatibleSockets
    ) {
      return result;
    }
    const store = scene.store;
    const origin = store.getSocket(pending.socketId);
    if (origin === undefined) return result;
    for (const node of store.nodes()) {
      for (const socket of store.socketsOf(node.id)) {
        const check =
          origin.direction === 'output'
            ? store.canConnect(origin.id, socket.id)
            : store.canConnect(socket.id, origin.id);
        if (check.ok) result.add(socket.id);
      }
    }
    return result;
  }

  private font(sizePx: number): string {
    return `${Math.max(1, Math.round(sizePx))}px ${this.theme.fontFamily}`;
  }
}

// Socket centre in canvas space, following drag previews of its node.
function socketCanvasPosition(
  scene: Scene,
  socketId: SocketId,
): Point2D | undefined {
  const socket = scene.store.getSocket(socketId);
  if (socket === undefined) return undefined;
  const preview: Point2D | undefined = scene.overlay.nodePositions.get(
    socket.nodeId,
  );
  if (preview === undefined) return scene.store.socketPosition(socketId);
  return {x: preview.x + socket.offset.x, y: preview.y + socket.offset.y};
}

// A bezier lies within the bounding box of its four points.
function curveHull(curve: CubicBezier): Rect2D {
  const points = [curve.from, curve.cp1, curve.cp2, curve.to];
  const xs = points.map((p) => p.x);
  const ys = points.map((p) => p.y);
  return new Rect2D({
    left: Math.min(...xs),
    top: Math.min(...ys),
    right: Math.max(...xs),
    bottom: Math.max(...ys),
  });
}
