// src/core/settings/SettingsNode.ts

import type { SettingsGroup } from './SettingsGroup';
import type { ObserverRegistry } from './ObserverRegistry';

export interface NodeOptions {
    description?: string;
    parent?: SettingsGroup | null;
    inSchema?: boolean;
}

/**
 * A node in a settings tree: either a Setting (leaf) or a SettingsGroup.
 */
export abstract class SettingsNode {
    public readonly key: string;
    public description: string;
    public parent: SettingsGroup | null;
    /** Declared by a loaded schema, as opposed to picked up from a settings file */
    public inSchema: boolean;

    protected constructor(key: string, options: NodeOptions = {}) {
        this.key = key;
        this.description = options.description ?? '';
        this.parent = options.parent ?? null;
        this.inSchema = options.inSchema ?? false;
    }

    /**
     * Nodes from the root down to this one.
     */
    public path(): SettingsNode[] {
        return this.parent === null ? [this] : [...this.parent.path(), this];
    }

    public pathId(): string {
        return this.path().map(node => node.key).join('.');
    }

    public root(): SettingsNode {
        return this.parent === null ? this : this.parent.root();
    }

    /**
     * The observer table of the tree, owned by the root group.
     */
    public observerRegistry(): ObserverRegistry | null {
        return this.parent === null ? null : this.parent.observerRegistry();
    }

    public toString(): string {
        return `<${this.constructor.name} ${this.pathId()}>`;
    }
}
