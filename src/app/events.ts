import type { EchoSeedId } from 'game/echo-seeds';
import type { Season } from 'game/seasons';

export type RunOutcome = 'in-progress' | 'won' | 'failed';
export type FailureCause = 'hazard' | 'fell';

export interface SeasonCycledPayload {
    readonly runId: string;
    readonly previous: Season;
    readonly season: Season;
}

export interface SeasonCycleRejectedPayload {
    readonly runId: string;
    readonly season: Season;
    readonly remainingMs: number;
}

export interface JumpPerformedPayload {
    readonly runId: string;
    readonly roomIndex: number;
    readonly velocityY: number;
}

export interface RoomEnteredPayload {
    readonly runId: string;
    readonly roomIndex: number;
    readonly roomCount: number;
    readonly templateId: string;
}

export interface RunStartedPayload {
    readonly runId: string;
    readonly echoSeeds: readonly EchoSeedId[];
    readonly templateIds: readonly string[];
}

export interface RunEndedPayload {
    readonly runId: string;
    readonly outcome: Exclude<RunOutcome, 'in-progress'>;
    readonly cause: FailureCause | null;
    readonly roomsCleared: number;
    readonly roomCount: number;
    readonly durationMs: number;
}

export interface SeasonsEventMap {
    readonly RunStarted: RunStartedPayload;
    readonly SeasonCycled: SeasonCycledPayload;
    readonly SeasonCycleRejected: SeasonCycleRejectedPayload;
    readonly JumpPerformed: JumpPerformedPayload;
    readonly RoomEntered: RoomEnteredPayload;
    readonly RunEnded: RunEndedPayload;
}

export type SeasonsEventName = keyof SeasonsEventMap;

export const SEASONS_EVENT_NAMES: readonly SeasonsEventName[] = [
    'RunStarted',
    'SeasonCycled',
    'SeasonCycleRejected',
    'JumpPerformed',
    'RoomEntered',
    'RunEnded',
];

export interface EventEnvelope<EventName extends SeasonsEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: SeasonsEventMap[EventName];
}

export type EventListener<EventName extends SeasonsEventName> = (
    event: EventEnvelope<EventName>,
) => void;

export interface SeasonsEventBus {
    publish<EventName extends SeasonsEventName>(
        this: void,
        type: EventName,
        payload: SeasonsEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends SeasonsEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    subscribeOnce<EventName extends SeasonsEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    unsubscribe<EventName extends SeasonsEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): void;
    clear(this: void): void;
    listenerCount(this: void, type: SeasonsEventName): number;
}

export interface EventBusOptions {
    readonly now?: () => number;
}

type ListenerRegistry = { [Name in SeasonsEventName]: Set<EventListener<Name>> };

const createRegistry = (): ListenerRegistry => ({
    RunStarted: new Set(),
    SeasonCycled: new Set(),
    SeasonCycleRejected: new Set(),
    JumpPerformed: new Set(),
    RoomEntered: new Set(),
    RunEnded: new Set(),
});

export const createEventBus = (options: EventBusOptions = {}): SeasonsEventBus => {
    const registry = createRegistry();
    const resolveNow = options.now ?? Date.now;

    const publish: SeasonsEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const listeners = registry[type];
        if (listeners.size === 0) {
            return;
        }

        const envelope: EventEnvelope<typeof type> = { type, payload, timestamp };
        // Snapshot so listeners may unsubscribe while being notified.
        for (const listener of [...listeners]) {
            listener(envelope);
        }
    };

    const unsubscribe: SeasonsEventBus['unsubscribe'] = (type, listener) => {
        registry[type].delete(listener);
    };

    const subscribe: SeasonsEventBus['subscribe'] = (type, listener) => {
        registry[type].add(listener);
        return () => unsubscribe(type, listener);
    };

    const subscribeOnce: SeasonsEventBus['subscribeOnce'] = (type, listener) => {
        const wrapped: typeof listener = (event) => {
            unsubscribe(type, wrapped);
            listener(event);
        };
        return subscribe(type, wrapped);
    };

    const clear: SeasonsEventBus['clear'] = () => {
        for (const name of SEASONS_EVENT_NAMES) {
            registry[name].clear();
        }
    };

    const listenerCount: SeasonsEventBus['listenerCount'] = (type) => registry[type].size;

    return {
        publish,
        subscribe,
        subscribeOnce,
        unsubscribe,
        clear,
        listenerCount,
    };
};
