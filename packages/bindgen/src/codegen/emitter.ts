/**
 * Bindings emitter
 *
 * Renders a projected manifest as one TypeScript module: version constant,
 * error types, handle classes, UI tables and one async stub per API
 * function. Output depends only on the manifest and the options, so the same
 * manifest bytes always produce the same text.
 */

import type { FunctionDescriptor, Manifest, Parameter, UiEventDescriptor } from '../manifest/types';
import { emitHandleKinds, handleTagConstant } from './handles';
import { commentSafe, pascalCase, quote, safeIdentifier, uniqueName } from './identifiers';
import { formatTypeName } from './type-name';
import { TypeMapper, handleClassName, type MappedType } from './type-map';
import { emitUiOptions } from './ui-options';

export const GENERATOR_NAME = 'nvrpc-bindgen';

export const DEFAULT_RUNTIME_MODULE = '@nvrpc/runtime';

export interface EmitOptions {
  /** Module the generated code imports the runtime from */
  runtimeModule?: string;
  /** Hex SHA-256 of the manifest bytes, recorded in the header */
  digest?: string;
}

export interface SkippedFunction {
  name: string;
  reason: string;
}

export interface EmitResult {
  source: string;
  /** Names of the exported call stubs, in emission order */
  stubs: string[];
  /** Functions left without a stub because their signature cannot be expressed */
  skipped: SkippedFunction[];
}

/** Names a stub body binds itself */
const STUB_LOCALS = ['client', 'writer', 'reader', 'item'];

interface RenderedStub {
  lines: string[];
  uses: readonly string[];
}

export class StubEmitter {
  emit(manifest: Manifest, options: EmitOptions = {}): EmitResult {
    const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
    const mapper = new TypeMapper(manifest.types);
    const topLevel = new Set<string>([
      'Handle',
      'HandleRegistry',
      'ApiVersion',
      'RpcClient',
      'UiEventInfo',
      'Value',
      'API_VERSION',
      'ErrorType',
      'handles',
      'UiOption',
      'UI_OPTIONS',
      'parseUiOption',
      'UI_EVENTS',
    ]);
    for (const kind of manifest.types) {
      topLevel.add(handleClassName(kind.name));
      topLevel.add(handleTagConstant(kind.name));
    }
    const locals = new Set([...STUB_LOCALS, ...manifest.types.map(kind => handleClassName(kind.name))]);

    const stubs: string[] = [];
    const skipped: SkippedFunction[] = [];
    const typeImports = new Set<string>(['ApiVersion', 'UiEventInfo']);
    const body: string[] = [];

    for (const fn of manifest.functions) {
      const reason = unsupportedReason(fn, mapper);
      if (reason !== undefined) {
        skipped.push({ name: fn.name, reason });
        continue;
      }
      const name = uniqueName(safeIdentifier(fn.name), topLevel);
      const stub = renderStub(fn, name, mapper, locals);
      stubs.push(name);
      stub.uses.forEach(used => typeImports.add(used));
      body.push('', ...stub.lines);
    }
    if (stubs.length > 0) {
      typeImports.add('RpcClient');
    }

    const valueImports = manifest.types.length > 0 ? ['Handle', 'HandleRegistry'] : ['HandleRegistry'];
    const lines: string[] = [
      ...renderHeader(manifest, options.digest),
      '',
      `import { ${valueImports.join(', ')} } from ${quote(runtimeModule)};`,
      `import type { ${[...typeImports].sort().join(', ')} } from ${quote(runtimeModule)};`,
      '',
      ...renderVersion(manifest),
      '',
      ...renderErrorTypes(manifest),
      '',
      ...emitHandleKinds(manifest.types),
      '',
      ...emitUiOptions(manifest.uiOptions),
      '',
      ...renderUiEvents(manifest.uiEvents),
      ...body,
    ];

    return { source: `${lines.join('\n')}\n`, stubs, skipped };
  }
}

function unsupportedReason(fn: FunctionDescriptor, mapper: TypeMapper): string | undefined {
  for (const parameter of fn.parameters) {
    const reason = mapper.unsupportedReason(parameter.type);
    if (reason !== undefined) {
      return `parameter '${parameter.name}' ${reason}`;
    }
  }
  if (fn.returnType.kind === 'opaque') {
    return `return type ${JSON.stringify(fn.returnType.token)} is unparsable`;
  }
  return undefined;
}

function renderHeader(manifest: Manifest, digest: string | undefined): string[] {
  const lines = [
    '/**',
    ` * Neovim API bindings, API level ${manifest.version.apiLevel}.`,
    ' *',
    ` * Generated by ${GENERATOR_NAME}; regenerate instead of editing.`,
  ];
  if (digest !== undefined) {
    lines.push(` * Manifest sha256: ${commentSafe(digest)}`);
  }
  lines.push(' */');
  return lines;
}

function renderVersion(manifest: Manifest): string[] {
  const { version } = manifest;
  return [
    'export const API_VERSION: ApiVersion = Object.freeze({',
    `  apiCompatible: ${version.apiCompatible},`,
    `  apiLevel: ${version.apiLevel},`,
    `  apiPrerelease: ${version.apiPrerelease},`,
    `  major: ${version.major},`,
    `  minor: ${version.minor},`,
    `  patch: ${version.patch},`,
    `  prerelease: ${version.prerelease},`,
    '});',
  ];
}

function renderErrorTypes(manifest: Manifest): string[] {
  const taken = new Set<string>();
  return [
    'export enum ErrorType {',
    ...manifest.errorTypes.map(
      entry => `  ${uniqueName(safeIdentifier(pascalCase(entry.name)), taken)} = ${entry.id},`
    ),
    '}',
  ];
}

function renderParameters(parameters: readonly Parameter[]): string {
  return parameters
    .map(parameter => `{ name: ${quote(parameter.name)}, type: ${quote(formatTypeName(parameter.type))} }`)
    .join(', ');
}

function renderUiEvents(events: readonly UiEventDescriptor[]): string[] {
  if (events.length === 0) {
    return ['export const UI_EVENTS: readonly UiEventInfo[] = [];'];
  }
  return [
    'export const UI_EVENTS: readonly UiEventInfo[] = [',
    ...events.map(
      event =>
        `  { name: ${quote(event.name)}, since: ${event.since}, parameters: [${renderParameters(event.parameters)}] },`
    ),
    '];',
  ];
}

function renderStub(
  fn: FunctionDescriptor,
  name: string,
  mapper: TypeMapper,
  locals: ReadonlySet<string>
): RenderedStub {
  const taken = new Set<string>();
  const parameters = fn.parameters.map(parameter => ({
    name: uniqueName(safeIdentifier(parameter.name, locals), taken),
    type: mapper.map(parameter.type),
  }));
  const result = mapper.returnOf(fn.name, fn.returnType);

  const lines: string[] = ['/**', ` * \`${commentSafe(fn.name)}\``, ' *', ` * @since ${fn.since}`];
  if (fn.deprecatedSince !== undefined) {
    lines.push(` * @deprecated since API level ${fn.deprecatedSince}`);
  }
  lines.push(' */');

  const signature = [
    'client: RpcClient',
    ...parameters.map(parameter => `${parameter.name}: ${parameter.type.parameter}`),
  ].join(', ');
  lines.push(`export async function ${name}(${signature}): Promise<${result.result}> {`);
  lines.push(`  return client.call<${result.result}>(`);
  lines.push(`    ${quote(fn.name)},`);
  lines.push('    (writer) => {');
  lines.push(`      writer.writeArrayHeader(${parameters.length});`);
  for (const parameter of parameters) {
    for (const statement of parameter.type.write(parameter.name)) {
      lines.push(`      ${statement};`);
    }
  }
  lines.push('    },');
  lines.push(...renderReader(result));
  lines.push('  );');
  lines.push('}');

  return {
    lines,
    uses: [...result.uses, ...parameters.flatMap(parameter => parameter.type.uses)],
  };
}

function renderReader(result: MappedType): string[] {
  if (result.fixedSize === undefined) {
    return [`    (reader) => ${result.read}`];
  }
  return [
    '    (reader) => {',
    `      reader.readFixedArrayHeader(${result.fixedSize});`,
    `      return ${result.read};`,
    '    }',
  ];
}
