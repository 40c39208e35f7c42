// src/core/L0/Substrate.ts
import { ErrorCode, CredentialError } from '../Errors.js';
import { hash, addressFromDigest } from './Crypto.js';
import { resolveConfig } from './Config.js';
import type { CredentialConfig } from './Config.js';
import { AddressGuard, SaltGuard, enforce } from './Guards.js';
import type { Address, CredentialEvent, DeployedKind } from './Ontology.js';
import { EventLog } from '../L5/EventLog.js';
import type { EventRecord } from '../L5/EventLog.js';
import type { SubjectRegistry } from '../L1/Authorization.js';
import type { CredentialInstance } from '../L2/CredentialInstance.js';
import type { InstanceFactory } from '../L3/InstanceFactory.js';

export type Deployment =
    | { kind: 'INSTANCE'; target: CredentialInstance }
    | { kind: 'FACTORY'; target: InstanceFactory }
    | { kind: 'REGISTRY'; target: SubjectRegistry };

export function normalizeSalt(salt: string): string {
    enforce(SaltGuard({ salt }));
    return (salt.startsWith('0x') ? salt.slice(2) : salt).toLowerCase();
}

/**
 * Address a deterministic deployment lands on: a pure function of the
 * deployer, the salt and the deployed code identity.
 */
export function computeDeterministicAddress(deployer: Address, salt: string, codeHash: string): Address {
    enforce(AddressGuard({ value: deployer, role: 'deployer' }));
    return addressFromDigest(hash(`ff${deployer.slice(2)}${normalizeSalt(salt)}${codeHash}`));
}

/**
 * Execution substrate: the address space every instance, factory and
 * registry is deployed into, plus the notification sink.
 *
 * All operations are synchronous, so transitions are totally ordered by
 * the event loop.
 */
export class Substrate {
    public readonly config: CredentialConfig;
    public readonly events: EventLog;

    private deployments: Map<Address, Deployment> = new Map();
    private nonces: Map<Address, number> = new Map();

    constructor(config: Partial<CredentialConfig> = {}, events?: EventLog) {
        this.config = resolveConfig(config);
        this.events = events ?? new EventLog(undefined, this.config.logger);
    }

    // --- Address Allocation ---

    public nonceOf(deployer: Address): number {
        return this.nonces.get(deployer) ?? 0;
    }

    /**
     * Consumes the deployer's next nonce. The result depends on how many
     * deployments the deployer already made, so it is not known in advance
     * to anyone who cannot see that count.
     */
    public allocate(deployer: Address): Address {
        enforce(AddressGuard({ value: deployer, role: 'deployer' }));
        const nonce = this.nonceOf(deployer);
        const address = addressFromDigest(hash(`create:${deployer}:${nonce}`));
        this.nonces.set(deployer, nonce + 1);
        if (this.deployments.has(address)) {
            throw new CredentialError(ErrorCode.ADDRESS_OCCUPIED, `Address ${address} already occupied`, { address });
        }
        return address;
    }

    public allocateDeterministic(deployer: Address, salt: string, codeHash: string): Address {
        const address = computeDeterministicAddress(deployer, salt, codeHash);
        if (this.deployments.has(address)) {
            throw new CredentialError(ErrorCode.ADDRESS_OCCUPIED, `Address ${address} already occupied`, { address, salt });
        }
        return address;
    }

    public place(address: Address, deployment: Deployment): void {
        enforce(AddressGuard({ value: address, role: 'deployment' }));
        if (this.deployments.has(address)) {
            throw new CredentialError(ErrorCode.ADDRESS_OCCUPIED, `Address ${address} already occupied`, { address });
        }
        this.deployments.set(address, deployment);
    }

    // --- Lookup ---

    public isDeployed(address: Address): boolean {
        return this.deployments.has(address);
    }

    public kindAt(address: Address): DeployedKind | undefined {
        return this.deployments.get(address)?.kind;
    }

    public registryAt(address: Address): SubjectRegistry | undefined {
        const d = this.deployments.get(address);
        return d?.kind === 'REGISTRY' ? d.target : undefined;
    }

    public instanceAt(address: Address): CredentialInstance | undefined {
        const d = this.deployments.get(address);
        return d?.kind === 'INSTANCE' ? d.target : undefined;
    }

    public factoryAt(address: Address): InstanceFactory | undefined {
        const d = this.deployments.get(address);
        return d?.kind === 'FACTORY' ? d.target : undefined;
    }

    // --- Notifications ---

    public publish(events: CredentialEvent[]): EventRecord[] {
        return this.events.appendAll(events);
    }
}
