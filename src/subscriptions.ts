import { StompAckMode } from './model';

export interface StompSubscription {
    readonly id: string;
    readonly destination: string;
    readonly ack: StompAckMode;
}

/**
 * Active subscriptions of a session, at most one per destination.
 */
export class StompSubscriptionRegistry {

    private readonly byDestination = new Map<string, StompSubscription>();

    get size() {
        return this.byDestination.size;
    }

    get(destination: string): StompSubscription | undefined {
        return this.byDestination.get(destination);
    }

    getById(id: string): StompSubscription | undefined {
        for (const subscription of this.byDestination.values()) {
            if (subscription.id === id) {
                return subscription;
            }
        }
        return undefined;
    }

    add(subscription: StompSubscription) {
        this.byDestination.set(subscription.destination, subscription);
    }

    removeById(id: string): StompSubscription | undefined {
        const subscription = this.getById(id);
        if (subscription) {
            this.byDestination.delete(subscription.destination);
        }
        return subscription;
    }

    list(): StompSubscription[] {
        return Array.from(this.byDestination.values());
    }

    clear() {
        this.byDestination.clear();
    }

}
