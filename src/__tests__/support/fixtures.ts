import { jest } from '@jest/globals';
import { Substrate } from '../../core/L0/Substrate.js';
import type { Logger } from '../../core/L0/Config.js';
import { addressFromDigest, generateActor, hash } from '../../core/L0/Crypto.js';
import { DEFAULT_REGISTRY_ADDRESS } from '../../core/L0/Ontology.js';
import type { Address } from '../../core/L0/Ontology.js';
import { MemorySubjectRegistry } from '../../core/L1/MemorySubjectRegistry.js';
import { CredentialInstance } from '../../core/L2/CredentialInstance.js';
import { InstanceFactory } from '../../core/L3/InstanceFactory.js';
import type { EventLog } from '../../core/L5/EventLog.js';

export function quietLogger(): Logger {
    return { debug: jest.fn(), info: jest.fn(), warn: jest.fn() };
}

/** Deterministic test address for a label. */
export function addr(label: string): Address {
    return addressFromDigest(hash(`test-actor:${label}`));
}

/** Address of a freshly generated Ed25519 key pair. */
export async function generatedAddress(): Promise<Address> {
    return (await generateActor()).address;
}

export function salt(n: number): string {
    return n.toString(16).padStart(64, '0');
}

export interface World {
    substrate: Substrate;
    registry: MemorySubjectRegistry;
    deployer: Address;
}

/**
 * Substrate with a registry installed at the well-known default address.
 */
export function setupWorld(events?: EventLog): World {
    const substrate = new Substrate({ logger: quietLogger() }, events);
    const registry = new MemorySubjectRegistry();
    substrate.place(DEFAULT_REGISTRY_ADDRESS, { kind: 'REGISTRY', target: registry });
    return { substrate, registry, deployer: addr('deployer') };
}

export function setupFactory(world: World): InstanceFactory {
    const template = CredentialInstance.deployTemplate(world.substrate, world.deployer);
    return InstanceFactory.deploy(world.substrate, world.deployer, template);
}

export function instanceAt(world: World, address: Address): CredentialInstance {
    const instance = world.substrate.instanceAt(address);
    if (!instance) throw new Error(`No instance at ${address}`);
    return instance;
}

export function deployRegistry(world: World, label: string): { address: Address; registry: MemorySubjectRegistry } {
    const registry = new MemorySubjectRegistry();
    const address = addr(`registry:${label}`);
    world.substrate.place(address, { kind: 'REGISTRY', target: registry });
    return { address, registry };
}

export function text(bytes: Uint8Array): string {
    return new TextDecoder().decode(bytes);
}
