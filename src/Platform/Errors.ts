/**
 * Registry Platform: Domain Error Taxonomy
 * Translates kernel rejections into product-level exceptions.
 */
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';

export abstract class PlatformError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a market or ownership rule prevents execution.
 */
export class PolicyViolationError extends PlatformError {
    constructor(message: string, kernelCode: ErrorCode, details?: Record<string, unknown>) {
        super(message, 'POLICY_VIOLATION', { kernelCode, ...details });
    }
}

/**
 * Thrown when the origin cannot be authenticated or a command is replayed.
 */
export class SecurityViolationError extends PlatformError {
    constructor(message: string, origin: string, kernelCode: ErrorCode) {
        super(message, 'SECURITY_VIOLATION', { origin, kernelCode });
    }
}

/**
 * Thrown when a referenced asset does not exist.
 */
export class NotFoundError extends PlatformError {
    constructor(message: string, assetId?: string) {
        super(message, 'NOT_FOUND', { assetId });
    }
}

/**
 * Thrown when invariants are breached or identifiers collide.
 */
export class DataIntegrityError extends PlatformError {
    constructor(message: string, kernelCode: ErrorCode) {
        super(message, 'DATA_INTEGRITY_BREACH', { kernelCode });
    }
}

/**
 * Thrown when a hard limit is hit (owner capacity, global counter).
 */
export class ResourceExhaustionError extends PlatformError {
    constructor(message: string, resource: string) {
        super(message, 'RESOURCE_EXHAUSTED', { resource });
    }
}

/**
 * Thrown when a command is malformed.
 */
export class InvalidRequestError extends PlatformError {
    constructor(message: string) {
        super(message, 'INVALID_REQUEST');
    }
}

/**
 * Thrown when the environment fails (storage, unexpected exceptions).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, underlying?: unknown) {
        super(message, 'INFRASTRUCTURE_FAILURE', { underlying: underlying instanceof Error ? underlying.message : underlying });
    }
}

/**
 * Translates low-level kernel rejections into platform errors.
 */
export function translateError(e: unknown, origin: string = 'unknown'): PlatformError {
    if (e instanceof PlatformError) return e;
    if (!(e instanceof KernelError)) {
        if (e instanceof RangeError) return new InvalidRequestError(e.message);
        return new InfrastructureError(e instanceof Error ? e.message : 'Unknown Kernel Error', e);
    }

    switch (e.code) {
        case ErrorCode.UNAUTHENTICATED:
        case ErrorCode.REPLAY_DETECTED:
            return new SecurityViolationError(e.message, origin, e.code);
        case ErrorCode.ASSET_NOT_FOUND:
            return new NotFoundError(e.message, typeof e.metadata?.assetId === 'string' ? e.metadata.assetId : undefined);
        case ErrorCode.EXCEED_MAX_OWNED:
            return new ResourceExhaustionError(e.message, 'ownership');
        case ErrorCode.COUNTER_OVERFLOW:
            return new ResourceExhaustionError(e.message, 'asset-counter');
        case ErrorCode.DUPLICATE_IDENTIFIER:
        case ErrorCode.INTEGRITY_BREACH:
            return new DataIntegrityError(e.message, e.code);
        case ErrorCode.INVALID_DNA:
        case ErrorCode.CODEC_ERROR:
        case ErrorCode.INVALID_CONFIG:
            return new InvalidRequestError(e.message);
        default:
            return new PolicyViolationError(e.message, e.code, e.metadata);
    }
}
