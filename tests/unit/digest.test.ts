/**
 * Unit tests for manifest fingerprinting
 */

import { bytesToHex, manifestDigest } from '../../packages/bindgen/src/utils/digest';

describe('bytesToHex', () => {
  it('should render lowercase pairs', () => {
    expect(bytesToHex(new Uint8Array([0xde, 0xad, 0xbe, 0xef, 0x00, 0x0a]))).toBe('deadbeef000a');
    expect(bytesToHex(new Uint8Array(0))).toBe('');
  });
});

describe('manifestDigest', () => {
  it('should compute SHA-256', () => {
    expect(manifestDigest(new Uint8Array(0))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
    expect(manifestDigest(Uint8Array.of(0x61, 0x62, 0x63))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});
