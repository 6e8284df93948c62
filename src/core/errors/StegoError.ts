// src/core/errors/StegoError.ts

import type { IStegoFailure, StegoResult, StegoStatus } from '../../@types/index.ts';
import { StegoErrorKind } from '../../@types/index.ts';

/**
 * Error raised by the file pipelines for the failure kinds a caller is expected to handle.
 */
export class StegoError extends Error {
    constructor(
        readonly kind: StegoErrorKind,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'StegoError';
    }

    toFailure(): IStegoFailure {
        return { kind: this.kind, message: this.message };
    }
}

export function succeed<T>(value: T, status: StegoStatus = 'success'): StegoResult<T> {
    return { ok: true, value, status };
}

export function fail<T>(kind: StegoErrorKind, message: string): StegoResult<T> {
    return { ok: false, error: { kind, message } };
}

/**
 * Formats a caught value for inclusion in an error message.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
