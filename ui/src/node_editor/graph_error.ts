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

import {ErrorResult, errResult, Result} from '../base/result';

export type GraphErrorKind =
  | 'NotFound'
  | 'InvalidDirection'
  | 'TypeMismatch'
  | 'SlotOccupied'
  | 'SameNode'
  | 'WouldCreateCycle'
  | 'MalformedGraph';

export interface GraphError {
  readonly kind: GraphErrorKind;
  readonly message: string;
}

export type GraphResult<T = void> = Result<T, GraphError>;

export function graphError(
  kind: GraphErrorKind,
  message: string,
): ErrorResult<GraphError> {
  return errResult({kind, message});
}
