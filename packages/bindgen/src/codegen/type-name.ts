/**
 * Manifest type-name grammar
 *
 *   Ident
 *   ArrayOf(Ident)
 *   ArrayOf(Ident, N)
 *
 * Identifiers are ASCII letters, N is a decimal literal. The scanner is
 * bounds-checked at every step and does not recurse: a nested ArrayOf is
 * rejected rather than guessed at.
 */

import { TypeNameError } from '@nvrpc/runtime';
import type { TypeName } from '../manifest/types';

const ARRAY_OF = 'ArrayOf';

class Scanner {
  private position = 0;

  constructor(private readonly token: string) {}

  atEnd(): boolean {
    return this.position >= this.token.length;
  }

  peek(): string | undefined {
    return this.atEnd() ? undefined : this.token[this.position];
  }

  expect(char: string): void {
    const actual = this.peek();
    if (actual !== char) {
      this.fail(actual === undefined ? `expected '${char}', got end of input` : `expected '${char}', got '${actual}'`);
    }
    this.position += 1;
  }

  identifier(): string {
    const start = this.position;
    while (!this.atEnd() && isAsciiLetter(this.token.charCodeAt(this.position))) {
      this.position += 1;
    }
    if (this.position === start) {
      const actual = this.peek();
      this.fail(actual === undefined ? 'expected an identifier, got end of input' : `expected an identifier, got '${actual}'`);
    }
    return this.token.slice(start, this.position);
  }

  integer(): number {
    const start = this.position;
    while (!this.atEnd() && isAsciiDigit(this.token.charCodeAt(this.position))) {
      this.position += 1;
    }
    if (this.position === start) {
      const actual = this.peek();
      this.fail(actual === undefined ? 'expected a size, got end of input' : `expected a size, got '${actual}'`);
    }
    const value = Number(this.token.slice(start, this.position));
    if (!Number.isSafeInteger(value)) {
      this.fail('array size is too large', start);
    }
    return value;
  }

  spaces(): void {
    while (this.peek() === ' ') {
      this.position += 1;
    }
  }

  fail(reason: string, at = this.position): never {
    throw new TypeNameError(this.token, at, reason);
  }
}

/**
 * Parses one manifest type-name token.
 *
 * @example
 * ```typescript
 * parseTypeName('ArrayOf(Buffer, 2)'); // { kind: 'fixed-array', element: 'Buffer', size: 2 }
 * ```
 */
export function parseTypeName(token: string): TypeName {
  const scanner = new Scanner(token);
  const name = scanner.identifier();

  if (name !== ARRAY_OF || scanner.atEnd()) {
    if (!scanner.atEnd()) {
      scanner.fail(`unexpected '${scanner.peek()}' after '${name}'`);
    }
    return { kind: 'scalar', name };
  }

  scanner.expect('(');
  const element = scanner.identifier();
  if (element === ARRAY_OF && scanner.peek() === '(') {
    scanner.fail('nested ArrayOf is not supported');
  }

  let type: TypeName;
  if (scanner.peek() === ',') {
    scanner.expect(',');
    scanner.spaces();
    const size = scanner.integer();
    type = { kind: 'fixed-array', element, size };
  } else {
    type = { kind: 'dynamic-array', element };
  }

  scanner.expect(')');
  if (!scanner.atEnd()) {
    scanner.fail(`unexpected '${scanner.peek()}' after ')'`);
  }
  return type;
}

/**
 * Renders a type name back into manifest syntax.
 */
export function formatTypeName(type: TypeName): string {
  switch (type.kind) {
    case 'scalar':
      return type.name;
    case 'dynamic-array':
      return `${ARRAY_OF}(${type.element})`;
    case 'fixed-array':
      return `${ARRAY_OF}(${type.element}, ${type.size})`;
    case 'opaque':
      return type.token;
  }
}

function isAsciiLetter(code: number): boolean {
  return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}

function isAsciiDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}
