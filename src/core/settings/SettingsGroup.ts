// src/core/settings/SettingsGroup.ts

import fs from 'fs';
import { Logger } from '../logging/Logger';
import {
    SchemaError,
    SettingNotFoundError,
    SettingsConflictError,
    UndeclaredSettingError,
} from '../errors';
import { NodeOptions, SettingsNode } from './SettingsNode';
import { Setting } from './Setting';
import { ObserveOptions, Observer, ObserverRegistry, Subscription } from './ObserverRegistry';
import { isPlainObject } from './values';
import {
    DISABLED_MARKER,
    SchemaTable,
    UNRECOGNISED_MARKER,
    formatComment,
    formatKey,
    formatValue,
    parseSchemaDocument,
} from './tomlDocument';

export interface SetOptions {
    /** Reject keys the schema does not declare (default true) */
    strict?: boolean;
}

export interface DocumentOptions {
    /** Annotate settings that are not declared in the schema (default true) */
    warnSchema?: boolean;
}

export interface GroupOptions extends NodeOptions {
    /** Only given to a root group: the observer table for the whole tree */
    observers?: ObserverRegistry;
}

/**
 * A collection of settings and child groups. The internal node of a settings tree.
 *
 * The root group owns the ObserverRegistry; every other node reaches it through
 * its parent chain, so replacing a subtree never loses subscriptions.
 */
export class SettingsGroup extends SettingsNode {
    private readonly settings: Map<string, Setting> = new Map();
    private readonly children: Map<string, SettingsGroup> = new Map();
    public readonly observers: ObserverRegistry | null;

    constructor(key: string, options: GroupOptions = {}) {
        super(key, options);
        this.observers = options.observers ?? (options.parent ? null : new ObserverRegistry());
    }

    public override observerRegistry(): ObserverRegistry | null {
        return this.parent === null ? this.observers : this.parent.observerRegistry();
    }

    public override toString(): string {
        return `<SettingsGroup ${this.pathId()} settings:${this.settings.size} children:${this.children.size}>`;
    }

    // -------------------------------------------------------------------------
    // Lookup
    // -------------------------------------------------------------------------

    public has(key: string): boolean {
        return this.settings.has(key);
    }

    public hasChild(key: string): boolean {
        return this.children.has(key);
    }

    public keys(): string[] {
        return [...this.settings.keys()];
    }

    public childKeys(): string[] {
        return [...this.children.keys()];
    }

    public [Symbol.iterator](): IterableIterator<Setting> {
        return this.settings.values();
    }

    public get(key: string): Setting {
        const setting = this.settings.get(key);
        if (!setting) throw new SettingNotFoundError(`${this.pathId()}.${key}`);
        return setting;
    }

    public getChild(key: string, allowNew = false): SettingsGroup {
        const existing = this.children.get(key);
        if (existing) return existing;
        if (!allowNew) throw new SettingNotFoundError(`${this.pathId()}.${key}`);
        const child = new SettingsGroup(key, { parent: this });
        this.addChild(child);
        return child;
    }

    /**
     * Resolves a dot-separated path relative to this group, e.g. `reminders.interval`.
     */
    public resolve(path: string): Setting {
        const parts = path.split('.');
        let group: SettingsGroup = this;
        for (const part of parts.slice(0, -1)) {
            group = group.getChild(part);
        }
        return group.get(parts[parts.length - 1]);
    }

    /**
     * Every setting below this group, depth first, optionally with the groups themselves.
     */
    public *walk(options: { skipGroups?: boolean } = {}): Generator<Setting | SettingsGroup> {
        yield* this.settings.values();
        for (const child of this.children.values()) {
            if (!options.skipGroups) yield child;
            yield* child.walk(options);
        }
    }

    // -------------------------------------------------------------------------
    // Mutation
    // -------------------------------------------------------------------------

    public addChild(child: SettingsGroup): void {
        if (this.settings.has(child.key)) {
            throw new SettingsConflictError(`${this.pathId()}.${child.key}`);
        }
        child.parent = this;
        this.children.set(child.key, child);
    }

    /**
     * Writes a setting. Non-strict writes create undeclared settings, flagged
     * with `inSchema = false`.
     */
    public set(key: string, value: unknown, options: SetOptions = {}): Setting {
        const strict = options.strict ?? true;
        if (this.children.has(key)) {
            throw new SettingsConflictError(`${this.pathId()}.${key}`);
        }

        let setting = this.settings.get(key);
        if (strict && (!setting || !setting.inSchema)) {
            throw new UndeclaredSettingError(`${this.pathId()}.${key}`);
        }

        if (!setting) {
            setting = Setting.fromPlain(key, value, { parent: this, inSchema: false });
            this.settings.set(key, setting);
        }
        setting.value = value;
        return setting;
    }

    /**
     * Recursively merges nested data. Groups are created as needed whatever the
     * strictness; only leaf writes are checked.
     */
    public updateFromDict(data: Record<string, unknown>, options: SetOptions = {}): void {
        for (const [key, value] of Object.entries(data)) {
            const existing = this.settings.get(key);
            if (isPlainObject(value) && !(existing && existing.type === 'table')) {
                this.getChild(key, true).updateFromDict(value, options);
            } else {
                this.set(key, value, options);
            }
        }
    }

    public observe(target: string | Setting, callback: Observer, options: ObserveOptions = {}): Subscription {
        const registry = this.observerRegistry();
        if (!registry) {
            throw new SchemaError(`${this.pathId()} is not attached to a settings tree`);
        }
        const pathId = typeof target === 'string' ? `${this.pathId()}.${target}` : target.pathId();
        return registry.subscribe(pathId, callback, options);
    }

    public unobserve(subscription: Subscription | string): boolean {
        return this.observerRegistry()?.unsubscribe(subscription) ?? false;
    }

    // -------------------------------------------------------------------------
    // Schema
    // -------------------------------------------------------------------------

    /**
     * Applies a schema document to this group. Values already held for declared
     * keys are kept; the schema supplies shape, types, defaults and descriptions.
     */
    public loadSchema(source: string): void {
        this.applySchema(parseSchemaDocument(source));
    }

    public loadSchemaFile(filePath: string): void {
        let source: string;
        try {
            source = fs.readFileSync(filePath, 'utf-8');
        } catch (error) {
            throw new SchemaError(`Could not read schema ${filePath}`, { details: error, operation: 'loadSchemaFile' });
        }
        try {
            this.loadSchema(source);
        } catch (error) {
            if (error instanceof SchemaError) {
                throw new SchemaError(`${filePath}: ${error.message}`, { ...error.context, operation: 'loadSchemaFile' });
            }
            throw error;
        }
    }

    private applySchema(table: SchemaTable): void {
        for (const entry of table.entries) {
            if (entry.kind === 'group') {
                const child = this.getChild(entry.key, true);
                child.inSchema = true;
                if (entry.description) child.description = entry.description;
                child.applySchema(entry);
                continue;
            }

            if (this.children.has(entry.key)) {
                throw new SettingsConflictError(`${this.pathId()}.${entry.key}`);
            }
            const setting = new Setting(entry.key, entry.value, {
                description: entry.description,
                parent: this,
                inSchema: true,
            });
            const previous = this.settings.get(entry.key);
            if (previous) {
                try {
                    setting.adopt(previous.typed);
                } catch (error) {
                    const reason = error instanceof Error ? error.message : String(error);
                    throw new SchemaError(`${setting.pathId()}: stored value does not fit the schema (${reason})`, {
                        suggestion: 'Fix or remove the value in the settings file',
                    });
                }
            }
            this.settings.set(entry.key, setting);
        }
    }

    // -------------------------------------------------------------------------
    // Serialization
    // -------------------------------------------------------------------------

    /**
     * Serializes this group and its descendants as a commented TOML document.
     * Table headers are relative to this group.
     */
    public asDocument(options: DocumentOptions = {}): string {
        const lines: string[] = [];
        this.emit(lines, [], options.warnSchema ?? true);
        return lines.join('\n') + '\n';
    }

    private emit(lines: string[], tablePath: string[], warnSchema: boolean): void {
        let previousInSchema = false;
        for (const setting of this.settings.values()) {
            if (previousInSchema) {
                lines.push('');
                previousInSchema = false;
            }
            lines.push(...formatComment(setting.description));
            let line = `${formatKey(setting.key)} = ${formatValue(setting.typed)}`;
            if (setting.inSchema) {
                previousInSchema = true;
            } else if (warnSchema) {
                Logger.warn('Settings', `${setting.pathId()} is not declared in the schema`);
                line += `  # ${UNRECOGNISED_MARKER}`;
            }
            lines.push(line);
        }

        for (const child of this.children.values()) {
            const childPath = [...tablePath, child.key];
            if (lines.length > 0) lines.push('');
            lines.push(...formatComment(child.description));
            let header = `[${childPath.map(formatKey).join('.')}]`;
            if (!child.inSchema) header += `  # ${DISABLED_MARKER}`;
            lines.push(header);
            child.emit(lines, childPath, warnSchema && child.inSchema);
        }
    }

    /**
     * Plain nested object of every value below this group.
     */
    public toObject(): Record<string, unknown> {
        const out: Record<string, unknown> = {};
        for (const setting of this.settings.values()) out[setting.key] = setting.value;
        for (const child of this.children.values()) out[child.key] = child.toObject();
        return out;
    }
}
