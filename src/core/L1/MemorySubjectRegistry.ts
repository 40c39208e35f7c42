// src/core/L1/MemorySubjectRegistry.ts
import { ErrorCode, CredentialError } from '../Errors.js';
import { NULL_ADDRESS } from '../L0/Ontology.js';
import type { Address, SubjectId } from '../L0/Ontology.js';
import { AddressGuard, SubjectIdGuard, enforce } from '../L0/Guards.js';
import type { SubjectRegistry } from './Authorization.js';

/**
 * In-process subject registry: sequential ids, single owner per subject,
 * blanket operators per owner and per-subject one-time approvals.
 */
export class MemorySubjectRegistry implements SubjectRegistry {
    private owners: Map<SubjectId, Address> = new Map();
    private operators: Map<Address, Set<Address>> = new Map();
    private allowances: Map<string, bigint> = new Map();
    private nextId: SubjectId = 1n;

    public mint(to: Address): SubjectId {
        enforce(AddressGuard({ value: to, role: 'owner' }));
        if (to === NULL_ADDRESS) throw new CredentialError(ErrorCode.INVALID_OWNER, 'Cannot mint to the null address');
        const id = this.nextId++;
        this.owners.set(id, to);
        return id;
    }

    public exists(subjectId: SubjectId): boolean {
        return this.owners.has(subjectId);
    }

    public ownerOf(subjectId: SubjectId): Address {
        enforce(SubjectIdGuard({ id: subjectId, role: 'subject' }));
        const owner = this.owners.get(subjectId);
        if (!owner) {
            throw new CredentialError(ErrorCode.SUBJECT_NOT_FOUND, `Subject ${subjectId} not registered`, { subjectId: subjectId.toString() });
        }
        return owner;
    }

    /**
     * Moves a subject. Outstanding approvals on it die with the old owner.
     */
    public transfer(caller: Address, to: Address, subjectId: SubjectId): void {
        const owner = this.ownerOf(subjectId);
        if (caller !== owner && !this.isOperator(owner, caller)) {
            throw new CredentialError(ErrorCode.NOT_AUTHORIZED, `${caller} cannot transfer subject ${subjectId}`);
        }
        enforce(AddressGuard({ value: to, role: 'recipient' }));
        if (to === NULL_ADDRESS) throw new CredentialError(ErrorCode.INVALID_OWNER, 'Cannot transfer to the null address');

        const suffix = `:${subjectId}`;
        for (const key of [...this.allowances.keys()]) {
            if (key.startsWith(`${owner}:`) && key.endsWith(suffix)) this.allowances.delete(key);
        }
        this.owners.set(subjectId, to);
    }

    // --- Operators ---

    public setOperator(caller: Address, operator: Address, approved: boolean): void {
        enforce(AddressGuard({ value: operator, role: 'operator' }));
        let set = this.operators.get(caller);
        if (!set) {
            set = new Set();
            this.operators.set(caller, set);
        }
        if (approved) set.add(operator);
        else set.delete(operator);
    }

    public isOperator(owner: Address, actor: Address): boolean {
        return this.operators.get(owner)?.has(actor) ?? false;
    }

    // --- One-time approvals ---

    public approve(caller: Address, actor: Address, subjectId: SubjectId): void {
        const owner = this.ownerOf(subjectId);
        if (caller !== owner) {
            throw new CredentialError(ErrorCode.NOT_AUTHORIZED, `${caller} does not own subject ${subjectId}`);
        }
        enforce(AddressGuard({ value: actor, role: 'approved actor' }));
        this.setAllowance(owner, actor, subjectId, 1n);
    }

    public revokeApproval(caller: Address, actor: Address, subjectId: SubjectId): void {
        const owner = this.ownerOf(subjectId);
        if (caller !== owner) {
            throw new CredentialError(ErrorCode.NOT_AUTHORIZED, `${caller} does not own subject ${subjectId}`);
        }
        this.setAllowance(owner, actor, subjectId, 0n);
    }

    public allowance(owner: Address, actor: Address, subjectId: SubjectId): bigint {
        return this.allowances.get(allowanceKey(owner, actor, subjectId)) ?? 0n;
    }

    public setAllowance(owner: Address, actor: Address, subjectId: SubjectId, amount: bigint): void {
        const key = allowanceKey(owner, actor, subjectId);
        if (amount === 0n) this.allowances.delete(key);
        else this.allowances.set(key, amount);
    }
}

function allowanceKey(owner: Address, actor: Address, subjectId: SubjectId): string {
    return `${owner}:${actor}:${subjectId}`;
}
