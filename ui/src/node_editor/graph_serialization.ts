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

// The persistence boundary of the node editor. A graph is exported as a
// JSON-friendly POJO and imported back from the output of JSON.parse(). The
// storage format itself (file, database, clipboard) is up to the embedder.
//
//   {version: 1,
//    nodes: [{id, position, size, payload, inputs: [...], outputs: [...]}],
//    connections: [{id, source, target, controlOffset?}]}

import {okResult} from '../base/result';
import {graphError, GraphResult} from './graph_error';
import {
  SERIALIZED_GRAPH_SCHEMA,
  SERIALIZED_GRAPH_VERSION,
  SerializedGraph,
  SerializedNode,
  SerializedSocket,
} from './graph_schema';
import {Connection, Node, Socket, SocketDirection} from './model';

function serializeSocket(socket: Socket): SerializedSocket {
  return {id: socket.id, type: socket.type, label: socket.label};
}

export function serializeNode(
  node: Node,
  getSocket: (id: number) => Socket,
): SerializedNode {
  return {
    id: node.id,
    position: {x: node.position.x, y: node.position.y},
    size: {width: node.size.width, height: node.size.height},
    payload: {
      title: node.payload.title,
      kind: node.payload.kind,
      // Metadata values are JSON, a structured clone detaches them from the
      // live node.
      metadata: structuredClone({...node.payload.metadata}),
    },
    inputs: node.inputs.map((id) => serializeSocket(getSocket(id))),
    outputs: node.outputs.map((id) => serializeSocket(getSocket(id))),
  };
}

export function serializeGraph(
  nodes: Iterable<Node>,
  connections: Iterable<Connection>,
  getSocket: (id: number) => Socket,
): SerializedGraph {
  const result: SerializedGraph = {
    version: SERIALIZED_GRAPH_VERSION,
    nodes: [],
    connections: [],
  };
  for (const node of nodes) {
    result.nodes.push(serializeNode(node, getSocket));
  }
  for (const conn of connections) {
    result.connections.push({
      id: conn.id,
      source: conn.source,
      target: conn.target,
      ...(conn.controlOffset === undefined
        ? {}
        : {controlOffset: conn.controlOffset}),
    });
  }
  return result;
}

function malformed(message: string): GraphResult<SerializedGraph> {
  return graphError('MalformedGraph', message);
}

/**
 * Parses and checks the output of JSON.parse(). On top of the schema this
 * checks referential integrity: node, socket and connection ids are unique,
 * every connection joins an existing output socket to an existing input
 * socket, and no input socket receives more than one connection.
 *
 * Connection policies (type checking, same-node and cycle rules) are not
 * applied: an exported graph is trusted to have satisfied them when built.
 */
export function parseSerializedGraph(
  data: unknown,
): GraphResult<SerializedGraph> {
  const parsed = SERIALIZED_GRAPH_SCHEMA.safeParse(data);
  if (!parsed.success) {
    return malformed(parsed.error.toString());
  }
  const graph = parsed.data;
  if (graph.version !== SERIALIZED_GRAPH_VERSION) {
    return malformed(
      `Unsupported graph version ` +
        `(actual: ${graph.version}, expected: ${SERIALIZED_GRAPH_VERSION})`,
    );
  }

  const nodeIds = new Set<number>();
  const socketDirections = new Map<number, SocketDirection>();
  for (const node of graph.nodes) {
    if (nodeIds.has(node.id)) {
      return malformed(`Duplicate node id ${node.id}`);
    }
    nodeIds.add(node.id);
    const sockets: Array<[SerializedSocket, SocketDirection]> = [
      ...node.inputs.map((s): [SerializedSocket, SocketDirection] => [
        s,
        'input',
      ]),
      ...node.outputs.map((s): [SerializedSocket, SocketDirection] => [
        s,
        'output',
      ]),
    ];
    for (const [socket, direction] of sockets) {
      if (socketDirections.has(socket.id)) {
        return malformed(`Duplicate socket id ${socket.id}`);
      }
      socketDirections.set(socket.id, direction);
    }
  }

  const connectionIds = new Set<number>();
  const occupiedInputs = new Set<number>();
  for (const conn of graph.connections) {
    if (conn.id !== undefined) {
      if (connectionIds.has(conn.id)) {
        return malformed(`Duplicate connection id ${conn.id}`);
      }
      connectionIds.add(conn.id);
    }
    const sourceDir = socketDirections.get(conn.source);
    const targetDir = socketDirections.get(conn.target);
    if (sourceDir === undefined) {
      return malformed(`Connection references unknown socket ${conn.source}`);
    }
    if (targetDir === undefined) {
      return malformed(`Connection references unknown socket ${conn.target}`);
    }
    if (sourceDir !== 'output' || targetDir !== 'input') {
      return malformed(
        `Connection ${conn.source} -> ${conn.target} must go from an ` +
          `output to an input`,
      );
    }
    if (occupiedInputs.has(conn.target)) {
      return malformed(`Input socket ${conn.target} has several connections`);
    }
    occupiedInputs.add(conn.target);
  }
  return okResult(graph);
}
