/**
 * Ledger Identity - Wire Record Tests
 */

import { Keypair as StellarKeypair, xdr } from '@stellar/stellar-sdk';
import {
  Keypair,
  KeypairErrorCode,
  createDecoratedSignature,
  isKeypairError,
  packDecoratedSignature,
  packPublicKey,
  toXdrPublicKey,
  unpackDecoratedSignature,
  unpackPublicKey,
} from '../src/index';

const ZERO_SEED = new Uint8Array(32);
const SEQUENTIAL_SEED = Uint8Array.from({ length: 32 }, (_, i) => i);
const PAYLOAD = Uint8Array.from(Buffer.from('hello ledger', 'utf8'));

describe('publicKeyRecord', () => {
  it('should tag the raw key as ed25519', () => {
    const keypair = Keypair.fromRawSeed(SEQUENTIAL_SEED);
    const record = keypair.publicKeyRecord();

    expect(record.keyType).toBe('ed25519');
    expect(record.bytes).toEqual(keypair.rawPublicKey());
  });

  it('should be available on a verify-only keypair', () => {
    const publicOnly = Keypair.fromAddressText(Keypair.fromRawSeed(ZERO_SEED).address());

    expect(publicOnly.publicKeyRecord().bytes).toHaveLength(32);
  });

  it('should map to the XDR ed25519 arm', () => {
    const xdrKey = toXdrPublicKey(Keypair.fromRawSeed(ZERO_SEED).publicKeyRecord());

    expect(xdrKey.switch()).toEqual(xdr.PublicKeyType.publicKeyTypeEd25519());
    expect(xdrKey.ed25519().toString('hex')).toBe(
      '3b6a27bcceb6a42d62a3a8d02a6f0d73653215771de243a63ac048a18b59da29'
    );
  });
});

describe('packPublicKey', () => {
  it('should produce the known envelope for the zero seed', () => {
    expect(Keypair.fromRawSeed(ZERO_SEED).toXdr()).toBe(
      'AAAAADtqJ7zOtqQtYqOo0CpvDXNlMhV3HeJDpjrASKGLWdop'
    );
  });

  it('should round-trip through unpackPublicKey', () => {
    const record = Keypair.fromRawSeed(SEQUENTIAL_SEED).publicKeyRecord();

    expect(unpackPublicKey(packPublicKey(record))).toEqual(record);
  });

  it('should refuse a record with the wrong key length', () => {
    let caught: unknown;
    try {
      packPublicKey({ keyType: 'ed25519', bytes: new Uint8Array(33) });
    } catch (err) {
      caught = err;
    }
    expect(isKeypairError(caught, KeypairErrorCode.INVALID_WIRE_RECORD)).toBe(true);
  });
});

describe('packDecoratedSignature', () => {
  it('should produce the known envelope for the zero seed', () => {
    const decorated = Keypair.fromRawSeed(ZERO_SEED).signDecorated(PAYLOAD);

    expect(packDecoratedSignature(decorated)).toBe(
      'i1naKQAAAECNt4KPeHzoc4IrN/QKSsDi1yY/J1/CHDqJNfzyYkbHs6ruvNsqyCP8u9KtYRy3+zPvlC2Ejn8YZSMsFPe+RRwG'
    );
  });

  it('should match the Stellar SDK decorated signature', () => {
    const ours = Keypair.fromRawSeed(SEQUENTIAL_SEED).signDecorated(PAYLOAD);
    const theirs = StellarKeypair.fromRawEd25519Seed(Buffer.from(SEQUENTIAL_SEED)).signDecorated(
      Buffer.from(PAYLOAD)
    );

    expect(packDecoratedSignature(ours)).toBe(theirs.toXDR('base64'));
  });

  it('should round-trip through unpackDecoratedSignature', () => {
    const keypair = Keypair.fromRawSeed(SEQUENTIAL_SEED);
    const decorated = keypair.signDecorated(PAYLOAD);
    const restored = unpackDecoratedSignature(packDecoratedSignature(decorated));

    expect(restored).toEqual(decorated);
    expect(keypair.verifyDecorated(PAYLOAD, restored)).toBe(true);
  });
});

describe('unpacking malformed envelopes', () => {
  function decodeError(fn: () => unknown): unknown {
    try {
      fn();
    } catch (err) {
      return err;
    }
    return undefined;
  }

  it.each([
    { name: 'truncated public key', decode: () => unpackPublicKey('AAAA') },
    { name: 'unknown key type', decode: () => unpackPublicKey('AAAAAQ==') },
    { name: 'truncated decorated signature', decode: () => unpackDecoratedSignature('AAAA') },
  ])('should report a $name as INVALID_WIRE_RECORD', ({ decode }) => {
    const caught = decodeError(decode);

    expect(isKeypairError(caught, KeypairErrorCode.INVALID_WIRE_RECORD)).toBe(true);
    expect(caught).toHaveProperty('cause');
    expect(isKeypairError(caught) ? caught.cause : undefined).toBeInstanceOf(Error);
  });

  it('should name the envelope in the details', () => {
    const caught = decodeError(() => unpackDecoratedSignature('AAAA'));

    expect(isKeypairError(caught) ? caught.details : undefined).toEqual({
      record: 'DecoratedSignature',
    });
  });
});

describe('createDecoratedSignature', () => {
  it.each([
    { field: 'hint', hintLength: 3, signatureLength: 64 },
    { field: 'signature', hintLength: 4, signatureLength: 63 },
  ])('should reject a short $field', ({ hintLength, signatureLength }) => {
    expect(() =>
      createDecoratedSignature(new Uint8Array(hintLength), new Uint8Array(signatureLength))
    ).toThrow(/INVALID_WIRE_RECORD/);
  });
});
