// src/core/settings/ObserverRegistry.ts

import { v4 as uuidv4 } from 'uuid';
import { PlainValue, valuesEqual } from './values';

export type Observer = (oldValue: PlainValue, newValue: PlainValue) => void;

export interface ObserveOptions {
    /** Fire even when the new value equals the old one */
    alwaysTrigger?: boolean;
}

export interface Subscription {
    readonly id: string;
    readonly pathId: string;
    readonly alwaysTrigger: boolean;
    readonly callback: Observer;
}

/**
 * Publish/subscribe table shared by a whole settings tree, keyed by setting path id.
 *
 * Subscribers may subscribe or unsubscribe from inside a callback: publish() fires
 * a snapshot of the list taken before the first callback runs.
 */
export class ObserverRegistry {
    private subscriptions: Map<string, Subscription[]> = new Map();

    public subscribe(pathId: string, callback: Observer, options: ObserveOptions = {}): Subscription {
        const subscription: Subscription = {
            id: uuidv4(),
            pathId,
            alwaysTrigger: options.alwaysTrigger ?? false,
            callback,
        };
        const list = this.subscriptions.get(pathId);
        if (list) {
            list.push(subscription);
        } else {
            this.subscriptions.set(pathId, [subscription]);
        }
        return subscription;
    }

    public unsubscribe(subscription: Subscription | string): boolean {
        const id = typeof subscription === 'string' ? subscription : subscription.id;
        for (const [pathId, list] of this.subscriptions) {
            const index = list.findIndex(sub => sub.id === id);
            if (index === -1) continue;
            list.splice(index, 1);
            if (list.length === 0) this.subscriptions.delete(pathId);
            return true;
        }
        return false;
    }

    /**
     * Notifies subscribers of `pathId`. Returns the number of callbacks invoked.
     */
    public publish(pathId: string, oldValue: PlainValue, newValue: PlainValue): number {
        const list = this.subscriptions.get(pathId);
        if (!list) return 0;

        const unchanged = valuesEqual(oldValue, newValue);
        let fired = 0;
        for (const subscription of [...list]) {
            if (unchanged && !subscription.alwaysTrigger) continue;
            subscription.callback(oldValue, newValue);
            fired++;
        }
        return fired;
    }

    public count(pathId?: string): number {
        if (pathId !== undefined) return this.subscriptions.get(pathId)?.length ?? 0;
        let total = 0;
        for (const list of this.subscriptions.values()) total += list.length;
        return total;
    }

    public clear(pathId?: string): void {
        if (pathId === undefined) {
            this.subscriptions.clear();
        } else {
            this.subscriptions.delete(pathId);
        }
    }
}
