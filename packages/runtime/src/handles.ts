/**
 * Opaque remote handles
 *
 * A handle is a 64-bit id tagged with a small extension type. The concrete
 * kinds (Buffer, Window, Tabpage) are declared by generated bindings from the
 * manifest's type table; the registry is where the codec and the generated
 * code agree on the tag assignment.
 */

import { EncodingError, MarkerMismatchError } from './errors';
import { ValueKind } from './value';

export abstract class Handle {
  /**
   * Kind name as it appears in the manifest's type table
   */
  abstract readonly kind: string;

  constructor(readonly id: bigint) {}

  equals(other: Handle): boolean {
    return this.kind === other.kind && this.id === other.id;
  }

  toString(): string {
    return `${this.kind}(${this.id})`;
  }
}

export type HandleFactory<H extends Handle = Handle> = (id: bigint) => H;

export type HandleConstructor<H extends Handle> = new (id: bigint) => H;

export interface HandleKind {
  readonly name: string;
  readonly tag: number;
  readonly create: HandleFactory;
}

/**
 * Largest extension type an application may use; negative types are
 * reserved by MessagePack.
 */
export const MAX_HANDLE_TAG = 127;

export class HandleRegistry {
  private readonly byName = new Map<string, HandleKind>();
  private readonly byTag = new Map<number, HandleKind>();

  /**
   * Registers a handle kind under its extension tag. Names and tags are unique.
   */
  register(name: string, tag: number, create: HandleFactory): this {
    if (!Number.isInteger(tag) || tag < 0 || tag > MAX_HANDLE_TAG) {
      throw EncodingError.outOfRange(`Extension tag for handle kind '${name}'`, tag);
    }
    const existing = this.byName.get(name) ?? this.byTag.get(tag);
    if (existing) {
      throw new Error(
        `Handle kind '${name}' (tag ${tag}) conflicts with '${existing.name}' (tag ${existing.tag})`
      );
    }
    const kind: HandleKind = { name, tag, create };
    this.byName.set(name, kind);
    this.byTag.set(tag, kind);
    return this;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Extension tag used when encoding a handle of the given kind.
   */
  tagOf(kind: string | Handle): number {
    const name = typeof kind === 'string' ? kind : kind.kind;
    const entry = this.byName.get(name);
    if (!entry) {
      throw EncodingError.unknownHandleKind(name);
    }
    return entry.tag;
  }

  /**
   * Kind registered for a decoded extension tag. `marker` is the extension
   * marker that carried the tag, reported when the tag is unknown.
   */
  kindOf(tag: number, marker: number): HandleKind {
    const entry = this.byTag.get(tag);
    if (!entry) {
      throw new MarkerMismatchError(ValueKind.Handle, marker, `unknown extension type ${tag}`);
    }
    return entry;
  }

  create(tag: number, id: bigint, marker: number): Handle {
    return this.kindOf(tag, marker).create(id);
  }

  /**
   * Registered kinds ordered by name.
   */
  kinds(): HandleKind[] {
    return Array.from(this.byName.values()).sort((a, b) => compareStrings(a.name, b.name));
  }
}

/**
 * Code-unit string comparison, independent of the host locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
