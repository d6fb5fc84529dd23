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
 * Entity types of the node editor: nodes, the typed sockets they own and the
 * connections joining an output socket to an input socket.
 *
 * Ids are small integers handed out in increasing order by the GraphStore, so
 * comparing two ids of the same kind also compares their insertion order.
 */
import {Point2D, Size2D} from '../base/geom';
import {LayoutConfig} from './config';

export type NodeId = number;
export type SocketId = number;
export type ConnectionId = number;

export type SocketDirection = 'input' | 'output';

// Type tag accepted by, and offered to, every other tag.
export const ANY_SOCKET_TYPE = 'any';

// Type tags the built-in theme knows colours for. Any other string is a valid
// tag too: node libraries are free to introduce their own.
export const BUILTIN_SOCKET_TYPES = [
  'exec',
  'number',
  'string',
  'boolean',
  'vector',
  'color',
  'object',
  ANY_SOCKET_TYPE,
] as const;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | {[key: string]: JsonValue};

export interface NodePayload {
  readonly title: string;
  // Free-form node kind, e.g. 'math' or 'constant'.
  readonly kind: string;
  readonly metadata: Readonly<Record<string, JsonValue>>;
}

export interface Node {
  readonly id: NodeId;
  readonly position: Point2D;
  readonly size: Size2D;
  readonly inputs: ReadonlyArray<SocketId>;
  readonly outputs: ReadonlyArray<SocketId>;
  readonly payload: NodePayload;
}

export interface Socket {
  readonly id: SocketId;
  readonly nodeId: NodeId; // Back-reference to the owning node.
  readonly direction: SocketDirection;
  readonly type: string;
  readonly label: string;
  // Centre of the socket relative to the node's top-left corner.
  readonly offset: Point2D;
}

export interface Connection {
  readonly id: ConnectionId;
  readonly source: SocketId; // Always an output socket.
  readonly target: SocketId; // Always an input socket.
  // Overrides the computed horizontal control point distance.
  readonly controlOffset?: number;
}

// What a caller supplies to create a socket.
export interface SocketSpec {
  readonly type: string;
  readonly label?: string;
}

export function makePayload(
  title: string,
  kind = 'basic',
  metadata: Record<string, JsonValue> = {},
): NodePayload {
  return {title, kind, metadata};
}

/**
 * Decides which socket type tags may be joined. Equal tags and the 'any'
 * wildcard are always compatible; further directed pairs can be allowed
 * explicitly, e.g. allow('number', 'string') for an implicit conversion.
 */
export class TypeCompatibility {
  private readonly extra = new Map<string, Set<string>>();

  allow(outputType: string, inputType: string): this {
    let targets = this.extra.get(outputType);
    if (targets === undefined) {
      targets = new Set();
      this.extra.set(outputType, targets);
    }
    targets.add(inputType);
    return this;
  }

  isCompatible(outputType: string, inputType: string): boolean {
    if (outputType === inputType) return true;
    if (outputType === ANY_SOCKET_TYPE || inputType === ANY_SOCKET_TYPE) {
      return true;
    }
    return this.extra.get(outputType)?.has(inputType) ?? false;
  }
}

// Centre of the |index|-th socket in the given direction on a node of |width|.
export function socketOffset(
  direction: SocketDirection,
  index: number,
  width: number,
  layout: LayoutConfig,
): Point2D {
  return {
    x: direction === 'input' ? 0 : width,
    y: layout.nodeHeaderHeight + (index + 1) * layout.socketSpacing,
  };
}

// Smallest node height that fits |socketRows| rows of sockets.
export function minNodeHeight(
  socketRows: number,
  layout: LayoutConfig,
): number {
  return layout.nodeHeaderHeight + (socketRows + 1) * layout.socketSpacing;
}
