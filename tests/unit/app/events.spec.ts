import { describe, expect, it, vi } from 'vitest';
import { createEventBus, SEASONS_EVENT_NAMES } from 'app/events';

const cycled = { runId: 'run-1', previous: 'spring', season: 'summer' } as const;

describe('createEventBus', () => {
    it('delivers typed envelopes to subscribers', () => {
        const bus = createEventBus({ now: () => 42 });
        const listener = vi.fn();
        bus.subscribe('SeasonCycled', listener);

        bus.publish('SeasonCycled', cycled);

        expect(listener).toHaveBeenCalledWith({ type: 'SeasonCycled', payload: cycled, timestamp: 42 });
    });

    it('prefers an explicit timestamp over the clock', () => {
        const bus = createEventBus({ now: () => 42 });
        const listener = vi.fn();
        bus.subscribe('SeasonCycled', listener);

        bus.publish('SeasonCycled', cycled, 7);

        expect(listener).toHaveBeenCalledWith(expect.objectContaining({ timestamp: 7 }));
    });

    it('only notifies listeners of the published event', () => {
        const bus = createEventBus();
        const jump = vi.fn();
        bus.subscribe('JumpPerformed', jump);

        bus.publish('SeasonCycled', cycled);

        expect(jump).not.toHaveBeenCalled();
    });

    it('stops delivering after unsubscribe', () => {
        const bus = createEventBus();
        const listener = vi.fn();
        const dispose = bus.subscribe('SeasonCycled', listener);

        dispose();
        bus.publish('SeasonCycled', cycled);

        expect(listener).not.toHaveBeenCalled();
        expect(bus.listenerCount('SeasonCycled')).toBe(0);
    });

    it('delivers subscribeOnce listeners a single time', () => {
        const bus = createEventBus();
        const listener = vi.fn();
        bus.subscribeOnce('SeasonCycled', listener);

        bus.publish('SeasonCycled', cycled);
        bus.publish('SeasonCycled', cycled);

        expect(listener).toHaveBeenCalledTimes(1);
    });

    it('lets listeners unsubscribe others mid-dispatch without skipping them', () => {
        const bus = createEventBus();
        const second = vi.fn();
        bus.subscribe('SeasonCycled', () => bus.unsubscribe('SeasonCycled', second));
        bus.subscribe('SeasonCycled', second);

        bus.publish('SeasonCycled', cycled);
        bus.publish('SeasonCycled', cycled);

        expect(second).toHaveBeenCalledTimes(1);
    });

    it('clears every registry', () => {
        const bus = createEventBus();
        for (const name of SEASONS_EVENT_NAMES) {
            bus.subscribe(name, vi.fn());
        }

        bus.clear();

        expect(SEASONS_EVENT_NAMES.map((name) => bus.listenerCount(name))).toEqual([0, 0, 0, 0, 0, 0]);
    });
});
