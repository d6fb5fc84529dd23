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

import {parseSerializedGraph} from './graph_serialization';

function node(id: number, inputs: number[], outputs: number[]) {
  return {
    id,
    position: {x: id * 100, y: 0},
    payload: {title: `Node ${id}`},
    inputs: inputs.map((socketId) => ({id: socketId, type: 'number'})),
    outputs: outputs.map((socketId) => ({id: socketId, type: 'number'})),
  };
}

function parseError(data: unknown): string | undefined {
  const result = parseSerializedGraph(data);
  return result.error?.message;
}

describe('parseSerializedGraph', () => {
  test('fills in defaults', () => {
    const result = parseSerializedGraph({
      version: 1,
      nodes: [{id: 1, position: {x: 0, y: 0}, payload: {title: 'Bare'}}],
    });
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value).toEqual({
      version: 1,
      nodes: [
        {
          id: 1,
          position: {x: 0, y: 0},
          payload: {title: 'Bare', kind: 'basic', metadata: {}},
          inputs: [],
          outputs: [],
        },
      ],
      connections: [],
    });
  });

  test('keeps nested metadata', () => {
    const metadata = {tags: ['a', 'b'], limits: {min: 0, max: null}};
    const result = parseSerializedGraph({
      version: 1,
      nodes: [
        {
          id: 1,
          position: {x: 0, y: 0},
          payload: {title: 'Meta', kind: 'data', metadata},
        },
      ],
    });
    expect(result.value?.nodes[0].payload.metadata).toEqual(metadata);
  });

  test('rejects schema violations', () => {
    expect(parseSerializedGraph({nodes: []}).error?.kind).toBe(
      'MalformedGraph',
    );
    expect(parseSerializedGraph('not a graph').error?.kind).toBe(
      'MalformedGraph',
    );
    expect(
      parseSerializedGraph({
        version: 1,
        nodes: [{id: 1, position: {x: 'left', y: 0}, payload: {title: 'X'}}],
      }).ok,
    ).toBe(false);
  });

  test('rejects other versions', () => {
    expect(parseError({version: 2, nodes: []})).toBe(
      'Unsupported graph version (actual: 2, expected: 1)',
    );
  });

  test('rejects duplicate ids', () => {
    expect(
      parseError({version: 1, nodes: [node(1, [], []), node(1, [], [])]}),
    ).toBe('Duplicate node id 1');
    expect(
      parseError({version: 1, nodes: [node(1, [5], []), node(2, [], [5])]}),
    ).toBe('Duplicate socket id 5');
    expect(
      parseError({
        version: 1,
        nodes: [node(1, [], [1]), node(2, [2, 3], [])],
        connections: [
          {id: 4, source: 1, target: 2},
          {id: 4, source: 1, target: 3},
        ],
      }),
    ).toBe('Duplicate connection id 4');
  });

  test('rejects connections against the flow', () => {
    expect(
      parseError({
        version: 1,
        nodes: [node(1, [], [1]), node(2, [2], [])],
        connections: [{source: 2, target: 1}],
      }),
    ).toBe('Connection 2 -> 1 must go from an output to an input');
  });

  test('rejects a doubly connected input', () => {
    expect(
      parseError({
        version: 1,
        nodes: [node(1, [], [1, 2]), node(2, [3], [])],
        connections: [
          {source: 1, target: 3},
          {source: 2, target: 3},
        ],
      }),
    ).toBe('Input socket 3 has several connections');
  });

  test('accepts a valid graph', () => {
    const result = parseSerializedGraph({
      version: 1,
      nodes: [node(1, [], [1]), node(2, [2], [])],
      connections: [{id: 9, source: 1, target: 2, controlOffset: 12}],
    });
    expect(result.ok).toBe(true);
    expect(result.value?.connections).toEqual([
      {id: 9, source: 1, target: 2, controlOffset: 12},
    ]);
  });
});
