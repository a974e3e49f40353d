/**
 * Integration tests for the generation pipeline
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ErrorCode } from '../../packages/runtime/src';
import { generateBindings, writeBindings } from '../../packages/bindgen/src/generate';
import {
  BytesManifestSource,
  FileManifestSource,
  NvimProcessSource,
} from '../../packages/bindgen/src/manifest/source';
import { manifestDigest } from '../../packages/bindgen/src/utils/digest';
import { encodeManifest, fixtureBytes, loadFixture } from '../fixtures/manifest';

const FIXTURE_STUBS = [
  'nvim_buf_line_count',
  'nvim_buf_set_lines',
  'nvim_buf_attach',
  'nvim_win_get_cursor',
  'nvim_win_set_cursor',
  'nvim_tabpage_get_number',
  'nvim_get_mode',
  'nvim_get_var',
  'nvim_call_function',
  'nvim_list_bufs',
  'nvim_get_current_win',
  'nvim_feedkeys',
  'nvim_ui_attach',
  'nvim_ui_pum_set_bounds',
  'buffer_get_line',
  'window_get_buffer',
];

function withoutDigest(source: string): string {
  return source.replace(/Manifest sha256: [0-9a-f]+/, 'Manifest sha256: -');
}

describe('generateBindings', () => {
  it('should emit a stub per representable function, in manifest order', () => {
    const result = generateBindings(fixtureBytes());

    expect(result.stubs).toEqual(FIXTURE_STUBS);
    expect(result.skipped).toEqual([{ name: 'nvim_buf_call', reason: "parameter 'fun' is a LuaRef" }]);
  });

  it('should record the manifest digest', () => {
    const bytes = fixtureBytes();
    const result = generateBindings(bytes);

    expect(result.digest).toBe(manifestDigest(bytes));
    expect(result.digest).toMatch(/^[0-9a-f]{64}$/);
    expect(result.source.split('\n')).toContain(` * Manifest sha256: ${result.digest}`);
  });

  it('should map the fixture signatures', () => {
    const lines = generateBindings(fixtureBytes()).source.split('\n');

    expect(lines).toContain(
      'export async function nvim_buf_set_lines(client: RpcClient, buffer: Buffer, start: bigint, end: bigint, strict_indexing: boolean, replacement: Iterable<string>): Promise<void> {'
    );
    expect(lines).toContain(
      'export async function nvim_buf_attach(client: RpcClient, buffer: Buffer, send_buffer: boolean, opts: ReadonlyMap<string, Value>): Promise<boolean> {'
    );
    expect(lines).toContain('export async function nvim_list_bufs(client: RpcClient): Promise<Buffer[]> {');
    expect(lines).toContain(
      'export async function nvim_get_mode(client: RpcClient): Promise<Map<string, Value>> {'
    );
    expect(lines).toContain(
      'export async function nvim_ui_pum_set_bounds(client: RpcClient, width: number, height: number, row: number, col: number): Promise<void> {'
    );
    expect(lines).toContain(
      'export async function window_get_buffer(client: RpcClient, window: Window): Promise<Buffer> {'
    );
    expect(lines).toContain('      writer.writeSequence(replacement, (item) => writer.writeString(item));');
  });

  it('should be deterministic for the same bytes', () => {
    const bytes = fixtureBytes();
    expect(generateBindings(bytes).source).toBe(generateBindings(bytes).source);
  });

  it('should not depend on the key order of the encoded manifest', () => {
    const fixture = loadFixture();
    const reordered: Record<string, unknown> = {};
    for (const key of Object.keys(fixture).reverse()) {
      reordered[key] = fixture[key];
    }

    const forward = generateBindings(encodeManifest(fixture));
    const backward = generateBindings(encodeManifest(reordered));

    expect(backward.digest).not.toBe(forward.digest);
    expect(withoutDigest(backward.source)).toBe(withoutDigest(forward.source));
  });

  it('should reject bytes after the manifest value', () => {
    const bytes = fixtureBytes();
    const padded = new Uint8Array(bytes.length + 1);
    padded.set(bytes);
    padded[bytes.length] = 0xc0;

    expect(() => generateBindings(padded)).toThrow(
      expect.objectContaining({ code: ErrorCode.CODEC_TRAILING_BYTES })
    );
  });

  it('should reject a truncated manifest', () => {
    const bytes = fixtureBytes();
    expect(() => generateBindings(bytes.subarray(0, bytes.length - 1))).toThrow(
      expect.objectContaining({ code: ErrorCode.TRANSPORT_UNEXPECTED_EOF })
    );
  });

  it('should honour the runtime module option', () => {
    const { source } = generateBindings(fixtureBytes(), { runtimeModule: './runtime' });
    expect(source.split('\n')).toContain('import { Handle, HandleRegistry } from "./runtime";');
  });
});

describe('writeBindings', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nvrpc-bindgen-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should write the generated module, creating directories', () => {
    const output = path.join(workDir, 'src', 'generated', 'nvim.ts');
    const result = writeBindings(new BytesManifestSource(fixtureBytes()), { output });

    expect(fs.readFileSync(output, 'utf-8')).toBe(result.source);
  });

  it('should read a captured manifest file', () => {
    const manifest = path.join(workDir, 'api-info.msgpack');
    fs.writeFileSync(manifest, fixtureBytes());
    const output = path.join(workDir, 'nvim.ts');

    const fromFile = writeBindings(new FileManifestSource(manifest), { output });

    expect(fromFile.stubs).toEqual(FIXTURE_STUBS);
    expect(fromFile.digest).toBe(manifestDigest(fixtureBytes()));
  });

  it('should fail when the manifest file is missing', () => {
    const missing = path.join(workDir, 'missing.msgpack');
    expect(() => writeBindings(new FileManifestSource(missing), { output: path.join(workDir, 'out.ts') })).toThrow(
      expect.objectContaining({ code: ErrorCode.MANIFEST_UNAVAILABLE })
    );
    expect(fs.existsSync(path.join(workDir, 'out.ts'))).toBe(false);
  });

  it('should fail when nvim cannot be started', () => {
    const source = new NvimProcessSource(path.join(workDir, 'no-such-nvim'));
    expect(() => source.read()).toThrow(expect.objectContaining({ code: ErrorCode.MANIFEST_UNAVAILABLE }));
  });
});
