// src/core/errors/ErrorContext.ts

/**
 * What travels with a HearthError besides its message.
 */
export interface ErrorContext {
    code?: string;           // e.g. 'MANIFEST_ERROR', 'INSTALL_TIMEOUT'
    operation?: string;      // Host or module operation that raised it
    suggestion?: string;     // Shown to admins after the message
    component?: string;      // CORE_SETTINGS, CORE_MODULES, ...
    retryable?: boolean;     // Set on install failures
    details?: unknown;       // Underlying error or parse issues
}
