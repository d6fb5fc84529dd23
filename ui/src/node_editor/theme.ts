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

import {Color, rgb} from '../base/color';

export interface NodeEditorColors {
  readonly background: Color;
  readonly grid: Color;
  readonly gridMajor: Color;

  readonly nodeBorder: Color;
  readonly nodeText: Color;
  readonly nodeTitleBackground: Color;
  readonly nodeBodyBackground: Color;

  // Outline of selected nodes.
  readonly selection: Color;
  readonly selectionRect: Color;
  readonly selectionBorder: Color;

  readonly socketBorder: Color;
  // Dot drawn inside sockets that have a connection.
  readonly socketConnected: Color;
  readonly socketHover: Color;
  // Border of sockets a pending connection could attach to.
  readonly socketCompatible: Color;

  readonly connectionDefault: Color;
  readonly connectionSelected: Color;
  readonly connectionHover: Color;
  readonly pendingConnection: Color;
}

// Supplies every color and font the renderer uses.
export interface ThemeProvider {
  readonly colors: NodeEditorColors;
  readonly fontFamily: string;
  socketColor(type: string): Color;
}

export interface ThemeOverrides {
  readonly colors?: Partial<NodeEditorColors>;
  readonly socketColors?: Readonly<Record<string, Color>>;
  readonly fallbackSocketColor?: Color;
  readonly fontFamily?: string;
}

export class NodeEditorTheme implements ThemeProvider {
  constructor(
    readonly colors: NodeEditorColors,
    private readonly socketColors: ReadonlyMap<string, Color>,
    private readonly fallbackSocketColor: Color,
    readonly fontFamily: string,
  ) {}

  // Color of a socket type tag. Unknown tags share the fallback color.
  socketColor(type: string): Color {
    return this.socketColors.get(type) ?? this.fallbackSocketColor;
  }

  // Returns a copy of this theme with some entries replaced.
  with(overrides: ThemeOverrides): NodeEditorTheme {
    const socketColors = new Map(this.socketColors);
    for (const [type, color] of Object.entries(overrides.socketColors ?? {})) {
      socketColors.set(type, color);
    }
    return new NodeEditorTheme(
      {...this.colors, ...overrides.colors},
      socketColors,
      overrides.fallbackSocketColor ?? this.fallbackSocketColor,
      overrides.fontFamily ?? this.fontFamily,
    );
  }
}

export const DEFAULT_THEME = new NodeEditorTheme(
  {
    background: rgb(30, 30, 30),
    grid: rgb(40, 40, 40),
    gridMajor: rgb(50, 50, 50),

    nodeBorder: rgb(100, 100, 100),
    nodeText: rgb(255, 255, 255),
    nodeTitleBackground: rgb(60, 60, 60),
    nodeBodyBackground: rgb(80, 80, 80),

    selection: rgb(255, 255, 0),
    selectionRect: rgb(100, 150, 255, 0.25),
    selectionBorder: rgb(100, 150, 255),

    socketBorder: rgb(200, 200, 200),
    socketConnected: rgb(255, 255, 0),
    socketHover: rgb(255, 255, 255),
    socketCompatible: rgb(100, 255, 100),

    connectionDefault: rgb(200, 200, 200),
    connectionSelected: rgb(255, 255, 0),
    connectionHover: rgb(255, 255, 255),
    pendingConnection: rgb(255, 255, 255, 0.5),
  },
  new Map([
    ['exec', rgb(255, 255, 255)],
    ['number', rgb(100, 200, 100)],
    ['string', rgb(200, 100, 100)],
    ['boolean', rgb(200, 200, 100)],
    ['vector', rgb(100, 100, 200)],
    ['color', rgb(200, 100, 200)],
    ['object', rgb(150, 150, 150)],
    ['any', rgb(100, 100, 100)],
  ]),
  rgb(128, 128, 128),
  'sans-serif',
);
