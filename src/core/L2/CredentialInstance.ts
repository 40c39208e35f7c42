// src/core/L2/CredentialInstance.ts
import { produce, freeze } from 'immer';
import type { Draft } from 'immer';
import { ErrorCode, CredentialError } from '../Errors.js';
import { NULL_ADDRESS } from '../L0/Ontology.js';
import type { Address, CredentialEvent, InstanceLifecycle, SlotMap, SubjectId } from '../L0/Ontology.js';
import { fromUtf8, utf8 } from '../L0/Crypto.js';
import {
    AddressGuard, SubjectIdGuard, RegistryGuard, NewOwnerGuard, OwnerGuard, InitializableGuard, enforce
} from '../L0/Guards.js';
import type { Substrate } from '../L0/Substrate.js';
import { AuthorizationGate } from '../L1/Authorization.js';
import { SUBJECT_METADATA, INSTANCE_METADATA, REVIEWS } from '../L1/NamespacedStore.js';
import { INTERFACE_IDS, isSupportedInterface } from './Interfaces.js';
import type { InterfaceName } from './Interfaces.js';

export const NAME_KEY = 'name';

interface InstanceState {
    lifecycle: InstanceLifecycle;
    owner: Address;
    registry: Address;
    slots: SlotMap;
}

export interface DirectDeployOptions {
    owner: Address;
    /** Null or omitted binds the configured default registry. */
    registry?: Address;
}

export interface CloneInit {
    /** Null binds the configured default registry. */
    registry: Address;
    owner: Address;
    displayName: string;
}

export interface MetadataEntryInput {
    key: string;
    value: Uint8Array;
}

type Emit = (event: CredentialEvent) => void;
type Refund = () => void;

/**
 * A credential instance: subject metadata, instance metadata and reviews,
 * each in its own namespaced region of this instance's private storage.
 *
 * Every instance runs the same logic; only the state snapshot differs.
 * Snapshots are immutable and replaced whole, so an operation that throws
 * leaves no trace.
 */
export class CredentialInstance {
    private state: InstanceState;
    private readonly gate: AuthorizationGate;

    private constructor(
        public readonly address: Address,
        /** Address of the logic body this instance executes. */
        public readonly implementation: Address,
        private readonly substrate: Substrate,
        initial: InstanceState
    ) {
        this.state = freeze(initial, true);
        this.gate = new AuthorizationGate(substrate.config.logger);
    }

    // --- Construction ---

    /**
     * Direct deployment: initialized at birth, bound to one owner and one registry.
     */
    public static deploy(substrate: Substrate, deployer: Address, options: DirectDeployOptions): CredentialInstance {
        enforce(NewOwnerGuard({ owner: options.owner }));
        const registry = CredentialInstance.bindingFor(substrate, options.registry ?? NULL_ADDRESS);

        const address = substrate.allocate(deployer);
        const instance = new CredentialInstance(address, address, substrate, {
            lifecycle: 'INITIALIZED',
            owner: options.owner,
            registry,
            slots: {}
        });
        substrate.publish([{ type: 'OwnershipTransferred', emitter: address, previousOwner: NULL_ADDRESS, newOwner: options.owner }]);
        substrate.place(address, { kind: 'INSTANCE', target: instance });
        return instance;
    }

    /**
     * The shared logic body. Permanently barred from initialization.
     */
    public static deployTemplate(substrate: Substrate, deployer: Address): CredentialInstance {
        const address = substrate.allocate(deployer);
        const template = new CredentialInstance(address, address, substrate, {
            lifecycle: 'TEMPLATE',
            owner: NULL_ADDRESS,
            registry: NULL_ADDRESS,
            slots: {}
        });
        substrate.place(address, { kind: 'INSTANCE', target: template });
        return template;
    }

    /**
     * Uninitialized clone at an already allocated address, executing the
     * template's logic against fresh storage.
     */
    public static clone(substrate: Substrate, template: CredentialInstance, address: Address): CredentialInstance {
        if (template.lifecycle !== 'TEMPLATE') {
            throw new CredentialError(ErrorCode.INVALID_TEMPLATE, `${template.address} is not a template`);
        }
        const instance = new CredentialInstance(address, template.address, substrate, {
            lifecycle: 'UNINITIALIZED',
            owner: NULL_ADDRESS,
            registry: NULL_ADDRESS,
            slots: {}
        });
        substrate.place(address, { kind: 'INSTANCE', target: instance });
        return instance;
    }

    /**
     * Clone, initialization and the caller's own notifications as one
     * transition. The clone is placed only after the notifications are
     * accepted, so a refused spawn leaves nothing at `address`.
     */
    public static spawn(
        substrate: Substrate,
        template: CredentialInstance,
        address: Address,
        init: CloneInit,
        announce: (binding: Address) => CredentialEvent[]
    ): CredentialInstance {
        if (template.lifecycle !== 'TEMPLATE') {
            throw new CredentialError(ErrorCode.INVALID_TEMPLATE, `${template.address} is not a template`);
        }
        if (substrate.isDeployed(address)) {
            throw new CredentialError(ErrorCode.ADDRESS_OCCUPIED, `Address ${address} already occupied`, { address });
        }
        const instance = new CredentialInstance(address, template.address, substrate, {
            lifecycle: 'UNINITIALIZED',
            owner: NULL_ADDRESS,
            registry: NULL_ADDRESS,
            slots: {}
        });
        instance.initializeWith(init.registry, init.owner, init.displayName, announce);
        substrate.place(address, { kind: 'INSTANCE', target: instance });
        return instance;
    }

    // Null maps to the default registry.
    private static bindingFor(substrate: Substrate, registry: Address): Address {
        if (registry === NULL_ADDRESS) return substrate.config.defaultRegistry;
        enforce(RegistryGuard({ registry }));
        return registry;
    }

    // --- Lifecycle ---

    public get lifecycle(): InstanceLifecycle { return this.state.lifecycle; }
    public get owner(): Address { return this.state.owner; }
    public get registry(): Address { return this.state.registry; }
    public get isTemplate(): boolean { return this.state.lifecycle === 'TEMPLATE'; }

    /**
     * Succeeds once per clone. Always fails on the template.
     */
    public initialize(registry: Address, owner: Address, displayName: string): void {
        this.initializeWith(registry, owner, displayName, () => []);
    }

    private initializeWith(
        registry: Address,
        owner: Address,
        displayName: string,
        announce: (binding: Address) => CredentialEvent[]
    ): void {
        enforce(InitializableGuard({ lifecycle: this.state.lifecycle }));
        enforce(NewOwnerGuard({ owner }));
        const binding = CredentialInstance.bindingFor(this.substrate, registry);

        this.commit((draft, emit) => {
            draft.lifecycle = 'INITIALIZED';
            draft.registry = binding;
            emit({ type: 'OwnershipTransferred', emitter: this.address, previousOwner: draft.owner, newOwner: owner });
            draft.owner = owner;

            if (displayName.length > 0) {
                const change = INSTANCE_METADATA.set(draft.slots, NAME_KEY, utf8(displayName));
                emit({ type: 'MetadataSet', emitter: this.address, subjectId: null, key: NAME_KEY, value: change.value });
            }
            for (const event of announce(binding)) emit(event);
        });
    }

    // --- Subject Metadata ---

    public setSubjectMetadata(caller: Address, subjectId: SubjectId, key: string, value: Uint8Array): void {
        this.setSubjectMetadataBatch(caller, subjectId, [{ key, value }]);
    }

    /**
     * Several keys under one authorization (one approval consumption).
     */
    public setSubjectMetadataBatch(caller: Address, subjectId: SubjectId, entries: readonly MetadataEntryInput[]): void {
        enforce(AddressGuard({ value: caller, role: 'caller' }));
        enforce(SubjectIdGuard({ id: subjectId, role: 'subject' }));
        const refund = this.requireStanding(caller, subjectId, ErrorCode.AGENT_NOT_FOUND);

        this.commit((draft, emit) => {
            for (const { key, value } of entries) {
                const change = SUBJECT_METADATA.set(draft.slots, { subjectId, key }, value);
                emit({ type: 'MetadataSet', emitter: this.address, subjectId, key, value: change.value });
            }
        }, refund);
    }

    public getSubjectMetadata(subjectId: SubjectId, key: string): Uint8Array {
        enforce(SubjectIdGuard({ id: subjectId, role: 'subject' }));
        return SUBJECT_METADATA.get(this.state.slots, { subjectId, key });
    }

    // --- Reviews ---

    /**
     * The reviewer is the party that must be authorized, not the reviewed one.
     */
    public submitReview(caller: Address, reviewerId: SubjectId, reviewedId: SubjectId, data: Uint8Array): void {
        enforce(AddressGuard({ value: caller, role: 'caller' }));
        enforce(SubjectIdGuard({ id: reviewerId, role: 'reviewer' }));
        enforce(SubjectIdGuard({ id: reviewedId, role: 'reviewed' }));
        const refund = this.requireStanding(caller, reviewerId, ErrorCode.REVIEWER_NOT_AGENT);

        this.commit((draft, emit) => {
            const change = REVIEWS.set(draft.slots, { reviewerId, reviewedId }, data);
            emit({ type: 'ReviewSubmitted', emitter: this.address, reviewerId, reviewedId, data: change.value });
        }, refund);
    }

    public getReview(reviewerId: SubjectId, reviewedId: SubjectId): Uint8Array {
        enforce(SubjectIdGuard({ id: reviewerId, role: 'reviewer' }));
        enforce(SubjectIdGuard({ id: reviewedId, role: 'reviewed' }));
        return REVIEWS.get(this.state.slots, { reviewerId, reviewedId });
    }

    // --- Instance Metadata ---

    public setInstanceMetadata(caller: Address, key: string, value: Uint8Array): void {
        enforce(OwnerGuard({ caller, owner: this.state.owner }));

        this.commit((draft, emit) => {
            const change = INSTANCE_METADATA.set(draft.slots, key, value);
            emit({ type: 'MetadataSet', emitter: this.address, subjectId: null, key, value: change.value });
        });
    }

    public getInstanceMetadata(key: string): Uint8Array {
        return INSTANCE_METADATA.get(this.state.slots, key);
    }

    public name(): string {
        return fromUtf8(this.getInstanceMetadata(NAME_KEY));
    }

    // --- Registry Binding ---

    public setRegistry(caller: Address, registry: Address): void {
        enforce(OwnerGuard({ caller, owner: this.state.owner }));
        enforce(RegistryGuard({ registry }));

        this.commit((draft, emit) => {
            emit({ type: 'RegistryUpdated', emitter: this.address, previousRegistry: draft.registry, newRegistry: registry });
            draft.registry = registry;
        });
    }

    // --- Ownership ---

    public transferOwnership(caller: Address, newOwner: Address): void {
        enforce(OwnerGuard({ caller, owner: this.state.owner }));
        enforce(NewOwnerGuard({ owner: newOwner }));
        this.moveOwnership(newOwner);
    }

    /**
     * Irreversible: nothing can claim an instance whose owner is null.
     */
    public renounceOwnership(caller: Address): void {
        enforce(OwnerGuard({ caller, owner: this.state.owner }));
        this.moveOwnership(NULL_ADDRESS);
    }

    private moveOwnership(newOwner: Address): void {
        this.commit((draft, emit) => {
            emit({ type: 'OwnershipTransferred', emitter: this.address, previousOwner: draft.owner, newOwner });
            draft.owner = newOwner;
        });
    }

    // --- Capability Declaration ---

    public supportsInterface(id: string): boolean {
        return isSupportedInterface(id);
    }

    public interfaces(): Record<InterfaceName, string> {
        return { ...INTERFACE_IDS };
    }

    // --- Internals ---

    /**
     * Throws unless `caller` may act for `subjectId`. Returns the undo for
     * any one-time approval the check spent.
     */
    private requireStanding(caller: Address, subjectId: SubjectId, notFound: ErrorCode): Refund {
        const registry = this.substrate.registryAt(this.state.registry);
        const decision = this.gate.decide(registry, caller, subjectId);
        const outcome = decision.outcome;

        if (outcome === 'NOT_FOUND') {
            throw new CredentialError(notFound, `Subject ${subjectId} is not known to registry ${this.state.registry}`, {
                subjectId: subjectId.toString(),
                registry: this.state.registry
            });
        }
        if (outcome === 'FORBIDDEN') {
            throw new CredentialError(ErrorCode.NOT_AUTHORIZED, `${caller} may not act for subject ${subjectId}`, {
                subjectId: subjectId.toString(),
                caller
            });
        }
        return () => this.gate.refund(registry, caller, subjectId, decision);
    }

    /**
     * Builds the next snapshot, publishes its notifications, then swaps it
     * in. A throw anywhere before the swap leaves the instance untouched;
     * `onRefused` undoes whatever the caller spent outside the snapshot.
     */
    private commit(recipe: (draft: Draft<InstanceState>, emit: Emit) => void, onRefused?: Refund): void {
        const events: CredentialEvent[] = [];
        const next = produce(this.state, (draft) => {
            recipe(draft, (event) => { events.push(event); });
        });
        try {
            this.substrate.publish(events);
        } catch (e) {
            onRefused?.();
            throw e;
        }
        this.state = next;
    }
}

