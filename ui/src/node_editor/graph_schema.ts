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
import {JsonValue} from './model';

// Bump when the exported shape changes in a way older importers can't read.
export const SERIALIZED_GRAPH_VERSION = 1;

const ID = z.number().int().nonnegative();

const JSON_VALUE: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JSON_VALUE),
    z.record(JSON_VALUE),
  ]),
);

const POINT_SCHEMA = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

const SIZE_SCHEMA = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
});

const SOCKET_SCHEMA = z.object({
  id: ID,
  type: z.string(),
  label: z.string().default(''),
});

const PAYLOAD_SCHEMA = z.object({
  title: z.string(),
  kind: z.string().default('basic'),
  metadata: z.record(JSON_VALUE).default({}),
});

const NODE_SCHEMA = z.object({
  id: ID,
  position: POINT_SCHEMA,
  // Missing sizes fall back to the configured default node size.
  size: SIZE_SCHEMA.optional(),
  payload: PAYLOAD_SCHEMA,
  inputs: z.array(SOCKET_SCHEMA).default([]),
  outputs: z.array(SOCKET_SCHEMA).default([]),
});

const CONNECTION_SCHEMA = z.object({
  // Connections without an id are given a fresh one on import.
  id: ID.optional(),
  source: ID,
  target: ID,
  controlOffset: z.number().finite().optional(),
});

export const SERIALIZED_GRAPH_SCHEMA = z.object({
  version: z.number().int(),
  nodes: z.array(NODE_SCHEMA),
  connections: z.array(CONNECTION_SCHEMA).default([]),
});

export type SerializedSocket = z.infer<typeof SOCKET_SCHEMA>;
export type SerializedNode = z.infer<typeof NODE_SCHEMA>;
export type SerializedConnection = z.infer<typeof CONNECTION_SCHEMA>;
export type SerializedGraph = z.infer<typeof SERIALIZED_GRAPH_SCHEMA>;
