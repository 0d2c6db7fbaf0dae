// src/core/extensions/HandlerRegistry.ts

import { HearthError } from '../errors';

export type Handler = (...args: unknown[]) => unknown;

export interface HandlerRegistration {
    readonly name: string;
    readonly owner: string;
    readonly handler: Handler;
}

/**
 * Named handlers (commands, event listeners) registered by extensions, each
 * tagged with the import string of the extension that owns it.
 */
export class HandlerRegistry {
    private handlers: Map<string, HandlerRegistration> = new Map();

    public register(owner: string, name: string, handler: Handler): HandlerRegistration {
        const existing = this.handlers.get(name);
        if (existing) {
            throw new HearthError(`Handler '${name}' is already registered by ${existing.owner}`, {
                code: 'HANDLER_CONFLICT',
                component: 'CORE_EXTENSIONS',
            });
        }
        const registration: HandlerRegistration = { name, owner, handler };
        this.handlers.set(name, registration);
        return registration;
    }

    /**
     * Drops every handler owned by an extension. Returns how many were removed.
     */
    public unregisterOwner(owner: string): number {
        let removed = 0;
        for (const [name, registration] of this.handlers) {
            if (registration.owner !== owner) continue;
            this.handlers.delete(name);
            removed++;
        }
        return removed;
    }

    public get(name: string): Handler | undefined {
        return this.handlers.get(name)?.handler;
    }

    public ownedBy(owner: string): string[] {
        return [...this.handlers.values()].filter(r => r.owner === owner).map(r => r.name);
    }

    public list(): HandlerRegistration[] {
        return [...this.handlers.values()];
    }

    public async invoke(name: string, ...args: unknown[]): Promise<unknown> {
        const handler = this.handlers.get(name);
        if (!handler) {
            throw new HearthError(`No handler named '${name}'`, { code: 'HANDLER_NOT_FOUND', component: 'CORE_EXTENSIONS' });
        }
        return handler.handler(...args);
    }
}
