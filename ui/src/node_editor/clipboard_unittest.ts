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

import {NodeClipboard} from './clipboard';
import {GraphStore} from './graph_store';
import {makePayload} from './model';

function makeStore() {
  const store = new GraphStore();
  const a = store.addNode({x: 0, y: 0}, makePayload('A'), {
    outputs: [{type: 'number'}],
  });
  const b = store.addNode({x: 200, y: 0}, makePayload('B'), {
    inputs: [{type: 'number'}, {type: 'string'}],
  });
  store.connect(1, 2);
  return {store, a, b};
}

describe('NodeClipboard', () => {
  test('starts empty', () => {
    const {store} = makeStore();
    const clipboard = new NodeClipboard();
    expect(clipboard.isEmpty).toBe(true);
    expect(clipboard.paste(store)).toEqual([]);
    clipboard.copy(store, [99]);
    expect(clipboard.isEmpty).toBe(true);
  });

  test('paste recreates nodes and their internal connections', () => {
    const {store, a, b} = makeStore();
    store.setConnectionHint(1, 40);
    const clipboard = new NodeClipboard();
    clipboard.copy(store, [a, b]);
    expect(clipboard.isEmpty).toBe(false);

    const created = clipboard.paste(store);
    expect(created).toEqual([3, 4]);
    expect(store.getNode(3)?.position).toEqual({x: 50, y: 50});
    expect(store.getNode(4)?.position).toEqual({x: 250, y: 50});
    expect(store.getNode(3)?.outputs).toEqual([4]);
    expect(store.getNode(4)?.inputs).toEqual([5, 6]);
    expect(store.getSocket(6)?.type).toBe('string');
    expect(store.connectionCount).toBe(2);
    expect(store.getConnection(2)).toEqual({
      id: 2,
      source: 4,
      target: 5,
      controlOffset: 40,
    });
  });

  test('connections leaving the copied set are dropped', () => {
    const {store, b} = makeStore();
    const clipboard = new NodeClipboard();
    clipboard.copy(store, [b]);
    expect(clipboard.paste(store)).toEqual([3]);
    expect(store.connectionCount).toBe(1);
  });

  test('paste centres the copy on an anchor', () => {
    const {store, a} = makeStore();
    const clipboard = new NodeClipboard();
    clipboard.copy(store, [a]);
    // A is 120x80 at the origin, so its centre is (60, 40).
    const [id] = clipboard.paste(store, {x: 500, y: 500});
    expect(store.getNode(id)?.position).toEqual({x: 440, y: 460});
  });

  test('custom paste offset', () => {
    const {store, a} = makeStore();
    const clipboard = new NodeClipboard({x: 10, y: 0});
    clipboard.copy(store, [a]);
    const [first] = clipboard.paste(store);
    const [second] = clipboard.paste(store);
    expect(store.getNode(first)?.position).toEqual({x: 10, y: 0});
    expect(store.getNode(second)?.position).toEqual({x: 10, y: 0});
  });

  test('the clipboard holds a snapshot', () => {
    const store = new GraphStore();
    const metadata = {weights: [1, 2]};
    const id = store.addNode(
      {x: 0, y: 0},
      makePayload('Mixer', 'audio', metadata),
    );
    const clipboard = new NodeClipboard();
    clipboard.copy(store, [id]);
    store.removeNode(id);

    const [copy] = clipboard.paste(store);
    const payload = store.getNode(copy)?.payload;
    expect(payload?.title).toBe('Mixer');
    expect(payload?.kind).toBe('audio');
    expect(payload?.metadata).toEqual(metadata);
    expect(payload?.metadata).not.toBe(metadata);
  });
});
