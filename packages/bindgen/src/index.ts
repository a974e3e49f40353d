/**
 * @nvrpc/bindgen - generator of typed Neovim API bindings
 *
 * @packageDocumentation
 */

export { generateBindings, writeBindings, writeOutputFile } from './generate';
export type { GenerateOptions, GenerateResult, WriteOptions } from './generate';

export { projectManifest } from './manifest/project';
export { BytesManifestSource, FileManifestSource, NvimProcessSource } from './manifest/source';
export type { ManifestSource } from './manifest/source';
export type {
  ErrorTypeEntry,
  FunctionDescriptor,
  HandleTypeEntry,
  Manifest,
  Parameter,
  TypeName,
  UiEventDescriptor,
} from './manifest/types';

export { parseTypeName, formatTypeName } from './codegen/type-name';
export { StubEmitter, DEFAULT_RUNTIME_MODULE, GENERATOR_NAME } from './codegen/emitter';
export type { EmitOptions, EmitResult, SkippedFunction } from './codegen/emitter';
export { TypeMapper, LUA_REF } from './codegen/type-map';
export type { MappedType } from './codegen/type-map';
export { uiOptionMembers } from './codegen/ui-options';
export type { UiOptionMember } from './codegen/ui-options';
export { analyzeBindings } from './codegen/validate';
export type { BindingsSummary } from './codegen/validate';

export { manifestDigest } from './utils/digest';
