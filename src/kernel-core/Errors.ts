/**
 * Registry Kernel Error Taxonomy
 * Centralized error codes for rejected operations and terminal failures.
 */

export enum ErrorCode {
    // I. Lifecycle & Capacity
    COUNTER_OVERFLOW = 'COUNTER_OVERFLOW',
    EXCEED_MAX_OWNED = 'EXCEED_MAX_OWNED',
    ASSET_NOT_FOUND = 'ASSET_NOT_FOUND',
    DUPLICATE_IDENTIFIER = 'DUPLICATE_IDENTIFIER',
    INVALID_DNA = 'INVALID_DNA',

    // II. Origin & Security
    UNAUTHENTICATED = 'UNAUTHENTICATED',
    REPLAY_DETECTED = 'REPLAY_DETECTED',

    // III. Market
    NOT_OWNER = 'NOT_OWNER',
    TRANSFER_TO_SELF = 'TRANSFER_TO_SELF',
    BUYER_IS_OWNER = 'BUYER_IS_OWNER',
    NOT_FOR_SALE = 'NOT_FOR_SALE',
    BID_PRICE_TOO_LOW = 'BID_PRICE_TOO_LOW',
    NOT_ENOUGH_BALANCE = 'NOT_ENOUGH_BALANCE',

    // IV. Internal
    CODEC_ERROR = 'CODEC_ERROR',
    INVALID_CONFIG = 'INVALID_CONFIG',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Registry:${code}] ${message}`);
        this.name = 'KernelError';
    }
}

export function isKernelError(e: unknown, code?: ErrorCode): e is KernelError {
    return e instanceof KernelError && (code === undefined || e.code === code);
}
