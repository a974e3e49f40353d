/**
 * Projection of the decoded `--api-info` value tree onto manifest descriptors
 */

import {
  ManifestError,
  TypeNameError,
  ValueKind,
  compareStrings,
  mappingGet,
  type ApiVersion,
  type MappingValue,
  type Value,
} from '@nvrpc/runtime';
import { parseTypeName } from '../codegen/type-name';
import type {
  ErrorTypeEntry,
  FunctionDescriptor,
  HandleTypeEntry,
  Manifest,
  Parameter,
  TypeName,
  UiEventDescriptor,
} from './types';

/**
 * A value together with the dotted path it was reached by, so every failure
 * can name the exact field.
 */
class Node {
  constructor(
    readonly value: Value,
    readonly path: string
  ) {}

  invalid(expected: string): ManifestError {
    return ManifestError.invalid(this.path || '<root>', expected);
  }

  mapping(): MappingValue {
    if (this.value.kind !== ValueKind.Mapping) {
      throw this.invalid('a map');
    }
    return this.value;
  }

  field(key: string): Node {
    const value = mappingGet(this.mapping(), key);
    if (value === undefined) {
      throw ManifestError.invalid(this.child(key), 'a value');
    }
    return new Node(value, this.child(key));
  }

  optionalField(key: string): Node | undefined {
    const value = mappingGet(this.mapping(), key);
    if (value === undefined || value.kind === ValueKind.Nil) {
      return undefined;
    }
    return new Node(value, this.child(key));
  }

  /** String-keyed entries, in encounter order */
  entries(): Array<[string, Node]> {
    return this.mapping().entries.map(([key, value], index): [string, Node] => {
      if (key.kind !== ValueKind.String) {
        throw ManifestError.invalid(`${this.path}{${index}}`, 'a string key');
      }
      return [key.value, new Node(value, this.child(key.value))];
    });
  }

  items(): Node[] {
    if (this.value.kind !== ValueKind.Sequence) {
      throw this.invalid('an array');
    }
    return this.value.items.map((item, index) => new Node(item, `${this.path}[${index}]`));
  }

  string(): string {
    if (this.value.kind !== ValueKind.String) {
      throw this.invalid('a string');
    }
    return this.value.value;
  }

  boolean(): boolean {
    if (this.value.kind !== ValueKind.Boolean) {
      throw this.invalid('a boolean');
    }
    return this.value.value;
  }

  integer(): number {
    if (this.value.kind !== ValueKind.Integer) {
      throw this.invalid('an integer');
    }
    const result = Number(this.value.value);
    if (!Number.isSafeInteger(result)) {
      throw this.invalid('a safe integer');
    }
    return result;
  }

  /**
   * A token outside the grammar is kept as an opaque type rather than failing
   * the whole manifest.
   */
  typeName(): TypeName {
    const token = this.string();
    try {
      return parseTypeName(token);
    } catch (error) {
      if (error instanceof TypeNameError) {
        return { kind: 'opaque', token };
      }
      throw error;
    }
  }

  private child(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }
}

/**
 * Turns the decoded manifest into descriptors. Unknown keys are ignored.
 *
 * @throws ManifestError when a required field is missing or has the wrong shape
 */
export function projectManifest(value: Value): Manifest {
  const root = new Node(value, '');
  root.mapping();

  return {
    version: projectVersion(root.field('version')),
    errorTypes: projectErrorTypes(root.field('error_types')),
    types: projectHandleTypes(root.field('types')),
    functions: root.field('functions').items().map(projectFunction),
    uiOptions: (root.optionalField('ui_options')?.items() ?? []).map(node => node.string()),
    uiEvents: (root.optionalField('ui_events')?.items() ?? []).map(projectUiEvent),
  };
}

function projectVersion(node: Node): ApiVersion {
  return {
    apiCompatible: node.field('api_compatible').integer(),
    apiLevel: node.field('api_level').integer(),
    apiPrerelease: node.field('api_prerelease').boolean(),
    major: node.field('major').integer(),
    minor: node.field('minor').integer(),
    patch: node.field('patch').integer(),
    prerelease: node.optionalField('prerelease')?.boolean() ?? false,
  };
}

function projectErrorTypes(node: Node): ErrorTypeEntry[] {
  return node
    .entries()
    .map(([name, entry]) => ({ name, id: entry.field('id').integer() }))
    .sort((a, b) => compareStrings(a.name, b.name));
}

function projectHandleTypes(node: Node): HandleTypeEntry[] {
  return node
    .entries()
    .map(([name, entry]) => ({
      name,
      id: entry.field('id').integer(),
      prefix: entry.field('prefix').string(),
    }))
    .sort((a, b) => compareStrings(a.name, b.name));
}

function projectParameters(node: Node): Parameter[] {
  return node.items().map(pair => {
    const items = pair.items();
    if (items.length !== 2) {
      throw pair.invalid('a [type, name] pair');
    }
    const [type, name] = items;
    return { type: type.typeName(), name: name.string() };
  });
}

function projectFunction(node: Node): FunctionDescriptor {
  const descriptor: FunctionDescriptor = {
    name: node.field('name').string(),
    parameters: projectParameters(node.field('parameters')),
    returnType: node.field('return_type').typeName(),
    since: node.field('since').integer(),
    method: node.optionalField('method')?.boolean() ?? false,
  };
  const deprecatedSince = node.optionalField('deprecated_since');
  if (deprecatedSince) {
    descriptor.deprecatedSince = deprecatedSince.integer();
  }
  return descriptor;
}

function projectUiEvent(node: Node): UiEventDescriptor {
  return {
    name: node.field('name').string(),
    parameters: projectParameters(node.field('parameters')),
    since: node.field('since').integer(),
  };
}

