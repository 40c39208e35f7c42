/**
 * Credential Error Taxonomy
 * Centralized error codes for rejected operations. Callers branch on `code`,
 * never on the message text.
 */

export enum ErrorCode {
    // I. Authorization
    NOT_AUTHORIZED = 'NOT_AUTHORIZED',
    AGENT_NOT_FOUND = 'AGENT_NOT_FOUND',
    REVIEWER_NOT_AGENT = 'REVIEWER_NOT_AGENT',
    NOT_OWNER = 'NOT_OWNER',

    // II. Configuration & Input
    INVALID_REGISTRY = 'INVALID_REGISTRY',
    INVALID_OWNER = 'INVALID_OWNER',
    INVALID_ADDRESS = 'INVALID_ADDRESS',
    INVALID_SUBJECT_ID = 'INVALID_SUBJECT_ID',
    INVALID_SALT = 'INVALID_SALT',
    INVALID_TEMPLATE = 'INVALID_TEMPLATE',
    NAMESPACE_COLLISION = 'NAMESPACE_COLLISION',

    // III. Lifecycle
    ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',

    // IV. Substrate
    ADDRESS_OCCUPIED = 'ADDRESS_OCCUPIED',

    // V. Reference Registry
    SUBJECT_NOT_FOUND = 'SUBJECT_NOT_FOUND',

    // VI. Persistence
    EVENT_STORE_FAILURE = 'EVENT_STORE_FAILURE',
}

export class CredentialError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Credential:${code}] ${message}`);
        this.name = 'CredentialError';
    }
}

export function isCredentialError(e: unknown, code?: ErrorCode): e is CredentialError {
    return e instanceof CredentialError && (code === undefined || e.code === code);
}
