// src/core/settings/Setting.ts

import { HearthError, SettingTypeError } from '../errors';
import { NodeOptions, SettingsNode } from './SettingsNode';
import { ObserveOptions, Observer, Subscription } from './ObserverRegistry';
import { PlainValue, SettingType, SettingValue, coerceToType, toPlain, toSettingValue } from './values';

/**
 * A single key-value pair plus its description. The leaf of a settings tree.
 *
 * The type is pinned from the value given at construction; later writes must
 * match it, except that integers widen to float.
 */
export class Setting extends SettingsNode {
    public readonly type: SettingType;
    private current: SettingValue;

    constructor(key: string, value: SettingValue, options: NodeOptions = {}) {
        super(key, options);
        this.type = value.type;
        this.current = value;
    }

    public static fromPlain(key: string, value: unknown, options: NodeOptions = {}): Setting {
        return new Setting(key, toSettingValue(value), options);
    }

    public get value(): PlainValue {
        return toPlain(this.current);
    }

    public set value(newValue: unknown) {
        this.assign(toSettingValue(newValue));
    }

    public get typed(): SettingValue {
        return this.current;
    }

    /**
     * Stores a tagged value and notifies observers of this setting's path id.
     */
    public assign(newValue: SettingValue): void {
        const stored = coerceToType(this.type, newValue);
        const oldValue = this.value;
        this.current = stored;
        this.observerRegistry()?.publish(this.pathId(), oldValue, this.value);
    }

    /**
     * Takes over a value kept from before a schema reload, without notifying observers.
     */
    public adopt(previous: SettingValue): void {
        this.current = coerceToType(this.type, previous);
    }

    public observe(callback: Observer, options: ObserveOptions = {}): Subscription {
        const registry = this.observerRegistry();
        if (!registry) {
            throw new HearthError(`${this.pathId()} is not attached to a settings tree`, {
                code: 'DETACHED_SETTING',
                component: 'CORE_SETTINGS',
            });
        }
        return registry.subscribe(this.pathId(), callback, options);
    }

    // Typed accessors for host and module code

    public asBoolean(): boolean {
        if (this.current.type !== 'boolean') throw this.mismatch('boolean');
        return this.current.value;
    }

    public asArray(): PlainValue[] {
        if (this.current.type !== 'array') throw this.mismatch('array');
        return this.current.value.map(toPlain);
    }

    public asStringArray(): string[] {
        return this.asArray().map(item => {
            if (typeof item !== 'string') throw this.mismatch('array of strings');
            return item;
        });
    }

    private mismatch(expected: string): SettingTypeError {
        return new SettingTypeError(`${this.pathId()} holds a ${this.type}, not a ${expected}`);
    }
}
