import { describe, test, expect } from '@jest/globals';
import {
    canonicalize, hash, hashBytes, utf8, fromUtf8, toHex, fromHex, isAddress, addressFromDigest, addressFromPublicKey, generateActor
} from '../Crypto.js';
import { AddressGuard, OwnerGuard, SubjectIdGuard, InitializableGuard, enforce } from '../Guards.js';
import { MAX_SUBJECT_ID, NULL_ADDRESS } from '../Ontology.js';
import { ErrorCode } from '../../Errors.js';

describe('Crypto', () => {
    test('canonical form ignores key order', () => {
        expect(canonicalize({ b: 1, a: [true, null] })).toBe('{"a":[true,null],"b":1}');
        expect(canonicalize({ a: [true, null], b: 1 })).toBe(canonicalize({ b: 1, a: [true, null] }));
    });

    test('bigints and bytes have a stable textual form', () => {
        expect(canonicalize({ id: 12n, data: new Uint8Array([1, 255]) })).toBe('{"data":"01ff","id":"12"}');
    });

    test('hex and utf8 helpers are inverse', () => {
        expect(toHex(utf8('hi'))).toBe('6869');
        expect(fromUtf8(fromHex('0x6869'))).toBe('hi');
        expect(fromHex('')).toEqual(new Uint8Array(0));
    });

    test('addresses are the low 20 bytes of a digest', () => {
        const digest = hash('anything');
        const address = addressFromDigest(digest);
        expect(address).toBe(`0x${digest.slice(24)}`);
        expect(isAddress(address)).toBe(true);
        expect(isAddress('0xABCDEF0000000000000000000000000000000000')).toBe(false);
        expect(isAddress(NULL_ADDRESS)).toBe(true);
    });

    test('generated actors derive their address from the public key', async () => {
        const actor = await generateActor();
        expect(actor.publicKey).toMatch(/^[0-9a-f]{64}$/);
        expect(actor.privateKey).toMatch(/^[0-9a-f]{64}$/);
        expect(actor.address).toBe(addressFromPublicKey(fromHex(actor.publicKey)));
        expect(actor.address).toBe(`0x${hashBytes(fromHex(actor.publicKey)).slice(24)}`);
        expect(isAddress(actor.address)).toBe(true);

        const other = await generateActor();
        expect(other.address).not.toBe(actor.address);
    });
});

describe('Guards', () => {
    test('failures carry their error code', () => {
        const result = SubjectIdGuard({ id: MAX_SUBJECT_ID + 1n, role: 'subject' });
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.code).toBe(ErrorCode.INVALID_SUBJECT_ID);
    });

    test('enforce throws a coded error', () => {
        expect(() => enforce(AddressGuard({ value: 'nope', role: 'caller' }))).toThrow('[Credential:INVALID_ADDRESS] Malformed caller address: nope');
        expect(() => enforce(AddressGuard({ value: NULL_ADDRESS, role: 'caller' }))).not.toThrow();
    });

    test('a null owner admits no caller, not even the null address', () => {
        expect(OwnerGuard({ caller: NULL_ADDRESS, owner: NULL_ADDRESS }).ok).toBe(false);
    });

    test('only an uninitialized clone may initialize', () => {
        expect(InitializableGuard({ lifecycle: 'UNINITIALIZED' })).toEqual({ ok: true });
        expect(InitializableGuard({ lifecycle: 'TEMPLATE' }).ok).toBe(false);
        expect(InitializableGuard({ lifecycle: 'INITIALIZED' }).ok).toBe(false);
    });
});
