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

export {NodeClipboard} from './clipboard';
export type {ClipboardContents} from './clipboard';
export {
  DEFAULT_CONFIG,
  NODE_EDITOR_CONFIG_SCHEMA,
  resolveConfig,
} from './config';
export type {
  BehaviorConfig,
  InteractionConfig,
  KeyBindings,
  LayoutConfig,
  NodeEditorConfig,
  NodeEditorConfigInput,
} from './config';
export {connectionCurve} from './curves';
export {graphError} from './graph_error';
export type {GraphError, GraphErrorKind, GraphResult} from './graph_error';
export {
  SERIALIZED_GRAPH_SCHEMA,
  SERIALIZED_GRAPH_VERSION,
} from './graph_schema';
export type {
  SerializedConnection,
  SerializedGraph,
  SerializedNode,
  SerializedSocket,
} from './graph_schema';
export {parseSerializedGraph, serializeGraph} from './graph_serialization';
export {GraphStore} from './graph_store';
export type {
  AddNodeOptions,
  ConnectionPolicy,
  GraphChange,
  GraphStoreOptions,
} from './graph_store';
export {InteractionController} from './interaction';
export type {
  ConnectRejectedArgs,
  ContextMenuArgs,
  HoverTarget,
  InputEvent,
  InteractionOverlay,
  InteractionState,
  PendingConnection,
  PointerButton,
  Selection,
  StateChangedArgs,
} from './interaction';
export {
  ANY_SOCKET_TYPE,
  BUILTIN_SOCKET_TYPES,
  makePayload,
  TypeCompatibility,
} from './model';
export type {
  Connection,
  ConnectionId,
  JsonValue,
  Node,
  NodeId,
  NodePayload,
  Socket,
  SocketDirection,
  SocketId,
  SocketSpec,
} from './model';
export {NodeEditorRenderer} from './renderer';
export type {DrawPrimitive, Scene} from './renderer';
export {DEFAULT_THEME, NodeEditorTheme} from './theme';
export type {NodeEditorColors, ThemeOverrides, ThemeProvider} from './theme';
export {ViewportTransform} from './viewport';
export type {ViewportChangedArgs} from './viewport';
export {NodeEditor} from '../widgets/node_editor';
export type {NodeEditorAttrs} from '../widgets/node_editor';
