/**
 * Manifest descriptors
 *
 * The shape `nvim --api-info` describes itself with, after projection from
 * the decoded value tree. Tables keyed by name are kept as arrays sorted by
 * name so nothing downstream depends on map iteration order.
 */

import type { ApiVersion } from '@nvrpc/runtime';

/**
 * A parsed type token. Tokens outside the grammar are kept verbatim as
 * `opaque`; functions that use one get no stub.
 */
export type TypeName =
  | { kind: 'scalar'; name: string }
  | { kind: 'dynamic-array'; element: string }
  | { kind: 'fixed-array'; element: string; size: number }
  | { kind: 'opaque'; token: string };

export interface Parameter {
  type: TypeName;
  name: string;
}

export interface FunctionDescriptor {
  name: string;
  parameters: Parameter[];
  returnType: TypeName;
  since: number;
  deprecatedSince?: number;
  method: boolean;
}

export interface UiEventDescriptor {
  name: string;
  parameters: Parameter[];
  since: number;
}

export interface ErrorTypeEntry {
  name: string;
  id: number;
}

export interface HandleTypeEntry {
  name: string;
  id: number;
  prefix: string;
}

export interface Manifest {
  version: ApiVersion;
  /** Sorted by name */
  errorTypes: ErrorTypeEntry[];
  /** Sorted by name */
  types: HandleTypeEntry[];
  functions: FunctionDescriptor[];
  uiOptions: string[];
  uiEvents: UiEventDescriptor[];
}
