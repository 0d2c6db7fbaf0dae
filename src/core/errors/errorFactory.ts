// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ErrorContext } from './ErrorContext';

/**
 * Factory class to create consistent error instances across the application.
 */
export class ErrorFactory {
    static moduleNotFound(moduleId: string, context?: ErrorContext) {
        return new Errors.ModuleNotFoundError(moduleId, context);
    }

    static bundle(message: string, context?: ErrorContext) {
        return new Errors.BundleError(message, {
            suggestion: 'Remove the conflicting module or bundle and try again',
            ...context
        });
    }

    static install(message: string, failure: Errors.InstallFailure, context?: ErrorContext) {
        return new Errors.DependencyInstallError(message, failure, context);
    }
}
