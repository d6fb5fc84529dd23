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

import {Point2D, Rect2D} from '../base/geom';
import {assertExists} from '../base/logging';
import {SerializedConnection, SerializedNode} from './graph_schema';
import {serializeNode} from './graph_serialization';
import {GraphStore} from './graph_store';
import {NodeId, SocketId} from './model';

// A detached copy of some nodes and the connections running between them.
export interface ClipboardContents {
  readonly nodes: ReadonlyArray<SerializedNode>;
  readonly connections: ReadonlyArray<SerializedConnection>;
}

/**
 * In-editor clipboard. Holds a snapshot rather than live references, so the
 * copied nodes may be moved or deleted before pasting.
 */
export class NodeClipboard {
  private contents?: ClipboardContents;

  constructor(private readonly pasteOffset: Point2D = {x: 50, y: 50}) {}

  get isEmpty(): boolean {
    return this.contents === undefined || this.contents.nodes.length === 0;
  }

  // Unknown ids are ignored. Copying nothing empties the clipboard.
  copy(store: GraphStore, nodeIds: Iterable<NodeId>): void {
    const nodes: SerializedNode[] = [];
    const copiedSockets = new Set<SocketId>();
    for (const id of new Set(nodeIds)) {
      const node = store.getNode(id);
      if (node === undefined) continue;
      nodes.push(
        serializeNode(node, (socketId) =>
          assertExists(store.getSocket(socketId)),
        ),
      );
      for (const socketId of [...node.inputs, ...node.outputs]) {
        copiedSockets.add(socketId);
      }
    }
    const connections: SerializedConnection[] = [];
    for (const conn of store.connections()) {
      if (copiedSockets.has(conn.source) && copiedSockets.has(conn.target)) {
        connections.push({
          source: conn.source,
          target: conn.target,
          ...(conn.controlOffset === undefined
            ? {}
            : {controlOffset: conn.controlOffset}),
        });
      }
    }
    this.contents = nodes.length > 0 ? {nodes, connections} : undefined;
  }

  /**
   * Recreates the copied nodes with fresh ids and rewires their internal
   * connections. Without |anchor| the copies are offset from the originals by
   * the paste offset; with it, the copied group is centred on |anchor|.
   * Returns the ids of the new nodes in copy order.
   */
  paste(store: GraphStore, anchor?: Point2D): NodeId[] {
    const contents = this.contents;
    if (contents === undefined) return [];
    const delta = this.pasteDelta(contents, anchor);
    const socketMap = new Map<SocketId, SocketId>();
    const created: NodeId[] = [];
    for (const node of contents.nodes) {
      const id = store.addNode(
        {x: node.position.x + delta.x, y: node.position.y + delta.y},
        {
          title: node.payload.title,
          kind: node.payload.kind,
          metadata: structuredClone(node.payload.metadata),
        },
        {size: node.size, inputs: node.inputs, outputs: node.outputs},
      );
      const copy = assertExists(store.getNode(id));
      node.inputs.forEach((s, i) => socketMap.set(s.id, copy.inputs[i]));
      node.outputs.forEach((s, i) => socketMap.set(s.id, copy.outputs[i]));
      created.push(id);
    }
    // The copies are fresh, so the only failures left are policy changes
    // made since the copy; such connections are dropped.
    for (const conn of contents.connections) {
      const source = assertExists(socketMap.get(conn.source));
      const target = assertExists(socketMap.get(conn.target));
      const res = store.connect(source, target);
      if (res.ok && conn.controlOffset !== undefined) {
        store.setConnectionHint(res.value, conn.controlOffset);
      }
    }
    return created;
  }

  private pasteDelta(contents: ClipboardContents, anchor?: Point2D): Point2D {
    if (anchor === undefined) return this.pasteOffset;
    const bounds = assertExists(
      Rect2D.union(
        contents.nodes.map((n) =>
          Rect2D.fromPointAndSize({
            ...n.position,
            width: n.size?.width ?? 0,
            height: n.size?.height ?? 0,
          }),
        ),
      ),
    );
    const center = bounds.center;
    return {x: anchor.x - center.x, y: anchor.y - center.y};
  }
}
