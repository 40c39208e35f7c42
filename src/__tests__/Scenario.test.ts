import { describe, test, expect, beforeAll, beforeEach } from '@jest/globals';
import { utf8 } from '../index.js';
import type { Address, CredentialInstance, MemorySubjectRegistry } from '../index.js';
import { addr, deployRegistry, generatedAddress, instanceAt, setupFactory, setupWorld, text } from './support/fixtures.js';
import type { World } from './support/fixtures.js';

describe('Credential lifecycle scenarios', () => {
    const owner = addr('subject-owner');
    const instanceOwner = addr('instance-owner');

    let intruder: Address;

    let world: World;
    let r: { address: Address; registry: MemorySubjectRegistry };
    let instance: CredentialInstance;

    beforeAll(async () => {
        intruder = await generatedAddress();
    });

    beforeEach(() => {
        world = setupWorld();
        r = deployRegistry(world, 'R');
        const factory = setupFactory(world);
        instance = instanceAt(world, factory.create(instanceOwner, r.address, 'Widget'));

        expect(r.registry.mint(owner)).toBe(1n);
        expect(r.registry.mint(addr('someone-else'))).toBe(2n);
    });

    test('metadata and reviews under registry R', () => {
        expect(text(instance.getInstanceMetadata('name'))).toBe('Widget');

        instance.setSubjectMetadata(owner, 1n, 'k', utf8('v1'));
        expect(() => instance.setSubjectMetadata(intruder, 1n, 'k', utf8('v2'))).toThrow(/Credential:NOT_AUTHORIZED/);
        expect(text(instance.getSubjectMetadata(1n, 'k'))).toBe('v1');

        instance.submitReview(owner, 1n, 2n, utf8('great'));
        expect(text(instance.getReview(1n, 2n))).toBe('great');
        expect(instance.getReview(2n, 1n).length).toBe(0);
    });

    test('swapping to a registry that lacks the subject turns writes into not-found', () => {
        instance.setSubjectMetadata(owner, 1n, 'k', utf8('v1'));

        const r2 = deployRegistry(world, 'R2');
        instance.setRegistry(instanceOwner, r2.address);

        expect(() => instance.setSubjectMetadata(owner, 1n, 'k', utf8('v2'))).toThrow(/Credential:AGENT_NOT_FOUND/);
        expect(text(instance.getSubjectMetadata(1n, 'k'))).toBe('v1');
    });
});
