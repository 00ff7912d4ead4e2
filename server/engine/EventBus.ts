import { randomUUID } from 'crypto';
import {
    AnyGameEvent,
    GameEvent,
    GameEventListener,
    GameEventOf,
    GameEventPayloads,
    GameEventType,
} from '../types/GameTypes';
import { GAME_CONFIG } from '../config/game.config';
import { createLogger, Logger } from '../utils/logger';
import { deepFreeze } from '../utils/freeze';

/** Handle returned by `subscribe`, usable to unsubscribe that one registration. */
export interface Subscription {
    readonly id: number;
}

export interface EventBusOptions {
    historySize?: number;
    logger?: Logger;
}

export interface RecentEventsQuery {
    count?: number;
    type?: GameEventType;
}

interface Registration {
    id: number;
    listener: GameEventListener;
    // the function the caller passed in, used by unsubscribe(listener)
    original: unknown;
}

interface ListenerFailure {
    registration: Registration;
    error: unknown;
}

/**
 * Builds a frozen event value. Once created, neither the event nor its payload can change.
 */
export function createGameEvent<K extends GameEventType>(
    type: K,
    data: GameEventPayloads[K],
    source: string
): GameEvent<K> {
    return deepFreeze({
        id: randomUUID(),
        type,
        data,
        source,
        timestamp: new Date().toISOString(),
    });
}

export function isEventOf<K extends GameEventType>(event: AnyGameEvent, type: K): event is GameEventOf<K> {
    return event.type === type;
}

/**
 * Synchronous publish/subscribe channel between the game state and its observers
 * (game log, UI, persistence hooks).
 *
 * - Listeners run in subscription order, on the publisher's call stack.
 * - The same listener may be subscribed several times; every registration fires.
 * - A throwing listener is logged and skipped. Once the fan-out is over, each failure
 *   is published again as an ERROR event. Failures of ERROR listeners are only logged.
 * - The last `historySize` events are kept for inspection.
 */
export class EventBus {
    private registrations: Registration[] = [];
    private history: AnyGameEvent[] = [];
    private nextId: number = 1;

    private readonly historySize: number;
    private readonly logger: Logger;

    constructor(options: EventBusOptions = {}) {
        this.historySize = options.historySize ?? GAME_CONFIG.eventHistorySize;
        this.logger = options.logger ?? createLogger('EventBus');
    }

    public get listenerCount(): number {
        return this.registrations.length;
    }

    /**
     * Registers a listener for every event type.
     */
    public subscribe(listener: GameEventListener): Subscription {
        return this.register(null, listener, listener);
    }

    /**
     * Registers a listener for a single event type. The listener receives the narrowed event.
     */
    public subscribeTo<K extends GameEventType>(type: K, listener: (event: GameEventOf<K>) => void): Subscription {
        const filtered: GameEventListener = (event) => {
            if (isEventOf(event, type)) listener(event);
        };
        return this.register(type, filtered, listener);
    }

    /**
     * Removes one registration, either by its Subscription or by the listener function
     * (the earliest registration of that function goes first).
     * Returns false when nothing matched.
     */
    public unsubscribe(target: Subscription | ((event: never) => void)): boolean {
        const index = typeof target === 'function'
            ? this.registrations.findIndex(r => r.original === target)
            : this.registrations.findIndex(r => r.id === target.id);

        if (index === -1) {
            this.logger.debug('Unsubscribe ignored: no matching registration');
            return false;
        }

        const [removed] = this.registrations.splice(index, 1);
        this.logger.debug(`Unsubscribed #${removed.id}`);
        return true;
    }

    /**
     * Delivers the event to every registration present when publishing starts.
     */
    public publish(event: AnyGameEvent): void {
        this.addToHistory(event);
        this.logger.debug(`Event ${event.type} from ${event.source}`, event.data);

        const failures: ListenerFailure[] = [];
        for (const registration of [...this.registrations]) {
            try {
                registration.listener(event);
            } catch (error) {
                this.logger.error(`Listener #${registration.id} failed on ${event.type}: ${describeError(error)}`);
                failures.push({ registration, error });
            }
        }

        if (event.type === GameEventType.ERROR) return;

        for (const { registration, error } of failures) {
            this.publish(createGameEvent(GameEventType.ERROR, {
                errorName: error instanceof Error ? error.name : typeof error,
                errorMessage: describeError(error),
                originalEventType: event.type,
                subscriptionId: registration.id,
            }, 'event_bus'));
        }
    }

    public getRecentEvents(query: RecentEventsQuery = {}): AnyGameEvent[] {
        let events = query.type ? this.history.filter(e => e.type === query.type) : [...this.history];
        if (query.count !== undefined) {
            events = query.count > 0 ? events.slice(-query.count) : [];
        }
        return events;
    }

    /** Number of events of each type in the history; every type is present, zero included. */
    public getEventCounts(): Map<GameEventType, number> {
        const counts = new Map<GameEventType, number>(Object.values(GameEventType).map((type): [GameEventType, number] => [type, 0]));
        for (const event of this.history) {
            counts.set(event.type, (counts.get(event.type) ?? 0) + 1);
        }
        return counts;
    }

    public clearHistory(): void {
        this.history = [];
        this.logger.info('Event history cleared');
    }

    private register(type: GameEventType | null, listener: GameEventListener, original: unknown): Subscription {
        const id = this.nextId++;
        this.registrations.push({ id, listener, original });
        this.logger.debug(`Subscribed #${id}${type ? ` to ${type}` : ''}`);
        return Object.freeze({ id });
    }

    private addToHistory(event: AnyGameEvent): void {
        this.history.push(event);
        if (this.history.length > this.historySize) {
            this.history.splice(0, this.history.length - this.historySize);
        }
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
