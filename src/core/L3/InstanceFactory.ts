// src/core/L3/InstanceFactory.ts
import { ErrorCode, CredentialError } from '../Errors.js';
import { hash } from '../L0/Crypto.js';
import { NULL_ADDRESS } from '../L0/Ontology.js';
import type { Address } from '../L0/Ontology.js';
import { AddressGuard, NewOwnerGuard, RegistryGuard, enforce } from '../L0/Guards.js';
import { computeDeterministicAddress } from '../L0/Substrate.js';
import type { Substrate } from '../L0/Substrate.js';
import { CredentialInstance } from '../L2/CredentialInstance.js';

/**
 * Code identity of a clone of `template`. Clones of one template share it.
 */
export function cloneCodeHash(template: Address): string {
    return hash(`credential-clone:${template}`);
}

/**
 * Stamps out credential instances from one template.
 *
 * Both creation paths initialize and announce a clone in one transition,
 * so no instance is ever observable uninitialized.
 */
export class InstanceFactory {
    public readonly codeHash: string;

    private instances: Address[] = [];
    private byCreator: Map<Address, Address[]> = new Map();
    private created: Set<Address> = new Set();

    private constructor(
        public readonly address: Address,
        public readonly template: CredentialInstance,
        private readonly substrate: Substrate
    ) {
        this.codeHash = cloneCodeHash(template.address);
    }

    public static deploy(substrate: Substrate, deployer: Address, template: CredentialInstance): InstanceFactory {
        if (!template.isTemplate || substrate.instanceAt(template.address) !== template) {
            throw new CredentialError(ErrorCode.INVALID_TEMPLATE, `${template.address} is not a deployed template`);
        }
        const address = substrate.allocate(deployer);
        const factory = new InstanceFactory(address, template, substrate);
        substrate.place(address, { kind: 'FACTORY', target: factory });
        return factory;
    }

    // --- Creation ---

    public create(caller: Address, registry: Address, displayName: string): Address {
        this.validate(caller, registry);
        const address = this.substrate.allocate(this.address);
        return this.spawn(address, caller, registry, displayName);
    }

    /**
     * Lands on `predictAddress(salt)`. A salt whose address is already
     * occupied fails instead of aliasing the live instance.
     */
    public createDeterministic(caller: Address, registry: Address, displayName: string, salt: string): Address {
        this.validate(caller, registry);
        const address = this.substrate.allocateDeterministic(this.address, salt, this.codeHash);
        return this.spawn(address, caller, registry, displayName);
    }

    public predictAddress(salt: string): Address {
        return computeDeterministicAddress(this.address, salt, this.codeHash);
    }

    // --- Projections ---

    public listAll(): Address[] {
        return [...this.instances];
    }

    public listByCreator(creator: Address): Address[] {
        return [...(this.byCreator.get(creator) ?? [])];
    }

    public count(): number {
        return this.instances.length;
    }

    public countByCreator(creator: Address): number {
        return this.byCreator.get(creator)?.length ?? 0;
    }

    public isFromFactory(address: Address): boolean {
        return this.created.has(address);
    }

    // --- Internals ---

    // Everything that can reject is checked before an address is consumed.
    private validate(caller: Address, registry: Address): void {
        enforce(AddressGuard({ value: caller, role: 'caller' }));
        enforce(NewOwnerGuard({ owner: caller }));
        if (registry !== NULL_ADDRESS) enforce(RegistryGuard({ registry }));
    }

    // Initialization and the InstanceCreated announcement go out as one
    // batch; nothing is placed or tracked unless that batch is accepted.
    private spawn(address: Address, creator: Address, registry: Address, displayName: string): Address {
        const instance = CredentialInstance.spawn(
            this.substrate,
            this.template,
            address,
            { registry, owner: creator, displayName },
            (binding) => [{
                type: 'InstanceCreated',
                emitter: this.address,
                instance: address,
                registry: binding,
                name: displayName,
                creator
            }]
        );

        this.instances.push(address);
        const mine = this.byCreator.get(creator);
        if (mine) mine.push(address);
        else this.byCreator.set(creator, [address]);
        this.created.add(address);

        this.substrate.config.logger.info(`[InstanceFactory] Created ${address} for ${creator} (registry ${instance.registry})`);
        return address;
    }
}
