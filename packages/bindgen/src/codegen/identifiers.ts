/**
 * Identifier helpers for emitted TypeScript
 */

const RESERVED_WORDS = new Set([
  'await', 'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger',
  'default', 'delete', 'do', 'else', 'enum', 'export', 'extends', 'false',
  'finally', 'for', 'function', 'if', 'implements', 'import', 'in',
  'instanceof', 'interface', 'let', 'new', 'null', 'package', 'private',
  'protected', 'public', 'return', 'static', 'super', 'switch', 'this',
  'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield',
  'arguments', 'eval',
]);

/**
 * Makes a manifest name usable as a TypeScript binding. Reserved words and
 * names in `taken` get a trailing underscore; anything that is not an
 * identifier character becomes an underscore.
 */
export function safeIdentifier(name: string, taken: ReadonlySet<string> = new Set()): string {
  let result = name.replace(/[^A-Za-z0-9_$]/g, '_');
  if (result.length === 0 || /^[0-9]/.test(result)) {
    result = `_${result}`;
  }
  while (RESERVED_WORDS.has(result) || taken.has(result)) {
    result = `${result}_`;
  }
  return result;
}

/**
 * `ext_cmdline` -> `ExtCmdline`. Segments are split on underscores, dashes and
 * spaces, capitalized and joined.
 */
export function pascalCase(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(segment => segment.length > 0)
    .map(segment => segment[0].toUpperCase() + segment.slice(1))
    .join('');
}

/**
 * `Tabpage` -> `TABPAGE`, `LuaRef` -> `LUA_REF`
 */
export function constantCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .toUpperCase();
}

/**
 * String literal for emitted code.
 */
export function quote(value: string): string {
  return JSON.stringify(value);
}

/**
 * Returns `base`, or `base2`, `base3`, ... for the first one not in `taken`,
 * and records the result in `taken`.
 */
export function uniqueName(base: string, taken: Set<string>): string {
  let candidate = base;
  for (let suffix = 2; taken.has(candidate); suffix += 1) {
    candidate = `${base}${suffix}`;
  }
  taken.add(candidate);
  return candidate;
}

/**
 * Text safe to place inside a block comment.
 */
export function commentSafe(text: string): string {
  return text.replace(/\*\//g, '*\\/').replace(/[\r\n]+/g, ' ');
}
