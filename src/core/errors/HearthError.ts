// src/core/errors/HearthError.ts

import { ErrorContext } from './ErrorContext';

/**
 * Root of every error the host raises. `context.code` tells callers what
 * failed without matching on messages.
 */
export class HearthError extends Error {
    public readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'HearthError';
        this.context = context;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    public get code(): string {
        return this.context.code || 'ERROR';
    }

    /**
     * `[CODE] message`, plus the suggestion on its own line when there is one.
     */
    public toUserFriendly(): string {
        let msg = `[${this.code}] ${this.message}`;
        if (this.context.suggestion) {
            msg += `\nTip: ${this.context.suggestion}`;
        }
        return msg;
    }
}
