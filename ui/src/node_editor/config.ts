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

import {z} from 'zod';
import {Hotkey, isHotkey} from '../base/hotkeys';
import {errResult, okResult, Result, unwrapResult} from '../base/result';

const HOTKEY = z.custom<Hotkey>(
  (v) => typeof v === 'string' && isHotkey(v),
  {message: 'Invalid hotkey'},
);

const POSITIVE = z.number().positive();
const NON_NEGATIVE = z.number().nonnegative();

// Geometry of nodes, sockets, connections and the background grid. All
// distances are in canvas units unless stated otherwise.
const LAYOUT_SCHEMA = z
  .object({
    defaultNodeWidth: POSITIVE.default(120),
    defaultNodeHeight: POSITIVE.default(80),
    nodeHeaderHeight: NON_NEGATIVE.default(24),
    nodeBorderWidth: NON_NEGATIVE.default(2),
    selectionBorderWidth: NON_NEGATIVE.default(3),
    nodeCornerRadius: NON_NEGATIVE.default(0),
    titlePadding: NON_NEGATIVE.default(4),
    titleFontSize: POSITIVE.default(12),

    socketRadius: POSITIVE.default(8),
    socketSpacing: POSITIVE.default(20),
    socketLabelMargin: NON_NEGATIVE.default(8),
    socketLabelFontSize: POSITIVE.default(10),

    connectionWidth: POSITIVE.default(3),
    // Screen distance within which a click picks a connection.
    connectionHitTolerance: NON_NEGATIVE.default(8),
    // Control points sit |ratio * |dx|| away from the endpoints, never closer
    // than |bezierMinControlOffset|.
    bezierControlOffsetRatio: NON_NEGATIVE.default(0.5),
    bezierMinControlOffset: NON_NEGATIVE.default(50),
    // Segments used to flatten a connection for hit-testing.
    bezierSegments: z.number().int().min(1).default(32),

    gridSize: POSITIVE.default(20),
    // Major grid lines every N grid cells.
    gridMajorSpacing: z.number().int().min(1).default(5),

    // Space kept around the nodes when framing them, in canvas units.
    framePadding: NON_NEGATIVE.default(100),
  })
  .default({});

const KEY_BINDINGS_SCHEMA = z
  .object({
    cancel: z.array(HOTKEY).default(['Escape']),
    deleteSelection: z.array(HOTKEY).default(['Delete', 'Backspace']),
    selectAll: z.array(HOTKEY).default(['Mod+A']),
    copy: z.array(HOTKEY).default(['Mod+C']),
    paste: z.array(HOTKEY).default(['Mod+V']),
    duplicate: z.array(HOTKEY).default(['Mod+D']),
    frameAll: z.array(HOTKEY).default(['F']),
    toggleGrid: z.array(HOTKEY).default(['G']),
  })
  .default({});

// Input handling. Distances here are in screen pixels.
const INTERACTION_SCHEMA = z
  .object({
    // Wheel zoom per pixel of delta: zoom *= exp(-deltaY * speed).
    scrollZoomSpeed: POSITIVE.default(0.003),
    // Factor used by zoomIn()/zoomOut().
    zoomStep: POSITIVE.default(0.1),
    panSpeed: POSITIVE.default(1),
    // A socket is grabbed when the pointer is within this radius of it.
    socketHitRadius: POSITIVE.default(12),
    // A dragged connection snaps to a socket within this distance on release.
    connectionSnapDistance: POSITIVE.default(20),
    // Pointer travel below which a node drag commits nothing.
    dragThreshold: NON_NEGATIVE.default(0),
    // Offset applied to pasted or duplicated nodes, in canvas units.
    pasteOffset: z
      .object({x: z.number().default(50), y: z.number().default(50)})
      .default({}),
    keys: KEY_BINDINGS_SCHEMA,
  })
  .default({});

const BEHAVIOR_SCHEMA = z
  .object({
    showGrid: z.boolean().default(true),
    showMajorGridLines: z.boolean().default(true),
    snapToGrid: z.boolean().default(false),

    zoomEnabled: z.boolean().default(true),
    panEnabled: z.boolean().default(true),
    minZoom: POSITIVE.default(0.2),
    maxZoom: POSITIVE.default(3),

    allowMultipleSelection: z.boolean().default(true),
    rectangleSelectionEnabled: z.boolean().default(true),

    // Connection policies checked by GraphStore.connect().
    typeChecking: z.boolean().default(true),
    allowSameNodeConnections: z.boolean().default(false),
    rejectCycles: z.boolean().default(false),

    // Grow a node's height when its sockets no longer fit.
    autoResizeNodes: z.boolean().default(true),

    showSocketLabels: z.boolean().default(true),
    showNodeIds: z.boolean().default(false),
    highlightCompatibleSockets: z.boolean().default(true),
    highlightHoveredElements: z.boolean().default(true),
    cullOffscreen: z.boolean().default(true),
  })
  .default({})
  .refine((b) => b.minZoom <= b.maxZoom, {
    message: 'minZoom must not exceed maxZoom',
  });

export const NODE_EDITOR_CONFIG_SCHEMA = z
  .object({
    layout: LAYOUT_SCHEMA,
    interaction: INTERACTION_SCHEMA,
    behavior: BEHAVIOR_SCHEMA,
  })
  .default({});

export type NodeEditorConfig = z.infer<typeof NODE_EDITOR_CONFIG_SCHEMA>;
export type LayoutConfig = NodeEditorConfig['layout'];
export type InteractionConfig = NodeEditorConfig['interaction'];
export type BehaviorConfig = NodeEditorConfig['behavior'];
export type KeyBindings = InteractionConfig['keys'];

// A user-supplied override of any subset of the configuration.
export type NodeEditorConfigInput = z.input<typeof NODE_EDITOR_CONFIG_SCHEMA>;

/**
 * Validates |input| and fills every missing field with its default. Fails
 * with a readable message naming the offending paths.
 */
export function resolveConfig(input: unknown = {}): Result<NodeEditorConfig> {
  const parsed = NODE_EDITOR_CONFIG_SCHEMA.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path === '' ? issue.message : `${path}: ${issue.message}`;
    });
    return errResult(`Invalid node editor config: ${issues.join('; ')}`);
  }
  return okResult(parsed.data);
}

export const DEFAULT_CONFIG: NodeEditorConfig = unwrapResult(resolveConfig());
