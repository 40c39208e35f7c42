// src/core/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';
import type { Address } from './Ontology.js';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

export function hashBytes(data: Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical Encoding
// Key order independent; bigint and bytes get a stable textual form.
export function canonicalize(value: unknown): string {
    if (value === null || value === undefined) return 'null';
    if (typeof value === 'bigint') return JSON.stringify(value.toString());
    if (typeof value === 'string') return JSON.stringify(value);
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (value instanceof Uint8Array) return JSON.stringify(toHex(value));
    if (Array.isArray(value)) return '[' + value.map(canonicalize).join(',') + ']';
    if (typeof value === 'object') {
        const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return '{' + entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',') + '}';
    }
    return JSON.stringify(String(value));
}

// 1.3 Byte Helpers
const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function utf8(text: string): Uint8Array {
    return encoder.encode(text);
}

export function fromUtf8(bytes: Uint8Array): string {
    return decoder.decode(bytes);
}

export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

export function fromHex(hex: string): Uint8Array {
    const body = hex.startsWith('0x') ? hex.slice(2) : hex;
    return new Uint8Array(Buffer.from(body, 'hex'));
}

// 1.4 Addresses
const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

export function isAddress(value: string): value is Address {
    return ADDRESS_PATTERN.test(value);
}

/**
 * Last 20 bytes of a 32-byte hex digest, as an address.
 */
export function addressFromDigest(digest: string): Address {
    return `0x${digest.slice(-40)}`;
}

export function addressFromPublicKey(publicKey: Uint8Array): Address {
    return addressFromDigest(hashBytes(publicKey));
}

// 1.5 Actor Identity (Ed25519)
export interface Actor {
    address: Address;
    publicKey: string; // hex
    privateKey: string; // hex
}

/**
 * Fresh Ed25519 key pair and the stable caller address derived from it.
 */
export async function generateActor(): Promise<Actor> {
    const privateKey = ed.utils.randomPrivateKey();
    const publicKey = await ed.getPublicKey(privateKey);
    return {
        address: addressFromPublicKey(publicKey),
        publicKey: toHex(publicKey),
        privateKey: toHex(privateKey)
    };
}
