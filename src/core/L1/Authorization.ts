// src/core/L1/Authorization.ts
import type { Address, SubjectId } from '../L0/Ontology.js';
import type { Logger } from '../L0/Config.js';

/**
 * Subject Registry Port
 * The only facts the core asks of an ownership registry.
 */
export interface SubjectRegistry {
    /** Throws when the subject is unknown. */
    ownerOf(subjectId: SubjectId): Address;
    isOperator(owner: Address, actor: Address): boolean;
    /** Non-zero means approved. */
    allowance(owner: Address, actor: Address, subjectId: SubjectId): bigint;
    setAllowance(owner: Address, actor: Address, subjectId: SubjectId, amount: bigint): void;
}

export type AuthorizationOutcome = 'AUTHORIZED' | 'NOT_FOUND' | 'FORBIDDEN';

export type AuthorizationBasis = 'OWNER' | 'OPERATOR' | 'ONE_TIME_APPROVAL';

export interface AuthorizationDecision {
    outcome: AuthorizationOutcome;
    basis?: AuthorizationBasis;
    owner?: Address;
    /** Allowance cleared by a one-time approval. */
    consumed?: bigint;
}

/**
 * Resolves whether an actor may act for a subject by consulting the bound
 * registry.
 *
 * A one-time approval is consumed by the check that honours it: the read
 * and the reset happen in the same synchronous step, so exactly one call
 * can ever succeed on it.
 */
export class AuthorizationGate {
    constructor(private logger: Logger = console) { }

    public authorize(registry: SubjectRegistry | undefined, actor: Address, subjectId: SubjectId): AuthorizationOutcome {
        return this.decide(registry, actor, subjectId).outcome;
    }

    public decide(registry: SubjectRegistry | undefined, actor: Address, subjectId: SubjectId): AuthorizationDecision {
        if (!registry) {
            this.logger.debug(`[AuthorizationGate] No registry bound; subject ${subjectId} unresolvable`);
            return { outcome: 'NOT_FOUND' };
        }

        // 1. Ownership lookup; any failure means the subject is unknown
        let owner: Address;
        try {
            owner = registry.ownerOf(subjectId);
        } catch (e) {
            this.logger.debug(`[AuthorizationGate] ownerOf(${subjectId}) failed: ${describe(e)}`);
            return { outcome: 'NOT_FOUND' };
        }

        // 2. Owner
        if (actor === owner) return { outcome: 'AUTHORIZED', basis: 'OWNER', owner };

        // 3. Standing operator
        if (this.ask(() => registry.isOperator(owner, actor), false, 'isOperator')) {
            return { outcome: 'AUTHORIZED', basis: 'OPERATOR', owner };
        }

        // 4. One-time approval, consumed on use
        const allowance = this.ask(() => registry.allowance(owner, actor, subjectId), 0n, 'allowance');
        if (allowance !== 0n) {
            // an approval that cannot be spent grants nothing
            const spent = this.ask(() => { registry.setAllowance(owner, actor, subjectId, 0n); return true; }, false, 'setAllowance');
            if (!spent) return { outcome: 'FORBIDDEN', owner };
            return { outcome: 'AUTHORIZED', basis: 'ONE_TIME_APPROVAL', owner, consumed: allowance };
        }

        // 5.
        return { outcome: 'FORBIDDEN', owner };
    }

    /**
     * Puts back a one-time approval spent by `decision`, for a transition
     * that was refused after authorization.
     */
    public refund(registry: SubjectRegistry | undefined, actor: Address, subjectId: SubjectId, decision: AuthorizationDecision): void {
        if (!registry || decision.basis !== 'ONE_TIME_APPROVAL' || !decision.owner || decision.consumed === undefined) return;
        try {
            registry.setAllowance(decision.owner, actor, subjectId, decision.consumed);
        } catch (e) {
            this.logger.warn(`[AuthorizationGate] Approval for subject ${subjectId} could not be restored: ${describe(e)}`);
        }
    }

    // The subject is known at this point, so a failing query only means "no standing".
    private ask<T>(query: () => T, fallback: T, label: string): T {
        try {
            return query();
        } catch (e) {
            this.logger.debug(`[AuthorizationGate] ${label} failed: ${describe(e)}`);
            return fallback;
        }
    }
}

function describe(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
