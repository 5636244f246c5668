import { describe, expect, it } from 'vitest';
import { idleInput } from 'app/input';
import { createReplayBuffer, createReplayPlayer, isReplayRecording } from 'app/replay-buffer';

const held = (left: boolean, right: boolean) => ({ ...idleInput(0), left, right });

describe('createReplayBuffer', () => {
    it('records hold changes and presses per frame', () => {
        const buffer = createReplayBuffer();
        buffer.begin(42);

        buffer.record(0, held(false, true));
        buffer.record(1, held(false, true));
        buffer.record(2, { ...held(false, true), jump: true, cycleSeason: true });
        buffer.record(3, held(false, false));

        expect(buffer.snapshot()).toEqual({
            version: 1,
            seed: 42,
            echoSeeds: null,
            frames: 4,
            events: [
                { type: 'hold', frame: 0, left: false, right: true },
                { type: 'press', frame: 2, action: 'cycle-season' },
                { type: 'press', frame: 2, action: 'jump' },
                { type: 'hold', frame: 3, left: false, right: false },
            ],
        });
    });

    it('starts over on begin', () => {
        const buffer = createReplayBuffer();
        buffer.begin(1, ['tailwind']);
        buffer.record(0, { ...idleInput(0), restart: true });
        buffer.begin(null);

        expect(buffer.toJSON()).toEqual({ version: 1, seed: null, echoSeeds: null, frames: 0, events: [] });
    });

    it('keeps the fixed echo seed selection', () => {
        const buffer = createReplayBuffer();
        const selection = ['swiftstride', 'tailwind'] as const;
        buffer.begin(42, selection);

        expect(buffer.snapshot().echoSeeds).toEqual(['swiftstride', 'tailwind']);
        expect(buffer.snapshot().echoSeeds).not.toBe(selection);
    });

    it('returns copies that later recording does not change', () => {
        const buffer = createReplayBuffer();
        buffer.begin(1);
        buffer.record(0, held(true, false));
        const first = buffer.snapshot();

        buffer.record(1, held(false, false));

        expect(first.events).toHaveLength(1);
        expect(first.frames).toBe(1);
    });
});

describe('createReplayPlayer', () => {
    const recording = {
        version: 1,
        seed: 42,
        echoSeeds: null,
        frames: 4,
        events: [
            { type: 'hold', frame: 0, left: false, right: true },
            { type: 'press', frame: 2, action: 'jump' },
            { type: 'hold', frame: 3, left: false, right: false },
        ],
    } as const;

    it('plays holds until they change and presses on their frame only', () => {
        const player = createReplayPlayer(recording);

        expect(player.inputAt(0, 0)).toEqual({ now: 0, left: false, right: true, jump: false, cycleSeason: false, restart: false });
        expect(player.inputAt(1, 16).right).toBe(true);
        expect(player.inputAt(2, 32)).toMatchObject({ right: true, jump: true });
        expect(player.inputAt(3, 48)).toMatchObject({ right: false, jump: false });
    });

    it('skips presses for frames that were never requested', () => {
        const player = createReplayPlayer(recording);

        expect(player.inputAt(3, 48)).toMatchObject({ right: false, jump: false });
    });

    it('reports exhaustion past the recorded frames', () => {
        const player = createReplayPlayer(recording);
        expect(player.isExhausted(3)).toBe(false);
        expect(player.isExhausted(4)).toBe(true);
    });

    it('reproduces what the buffer recorded', () => {
        const buffer = createReplayBuffer();
        buffer.begin(9);
        const inputs = [
            held(true, false),
            { ...held(true, false), jump: true },
            { ...held(false, false), restart: true },
            { ...held(false, true), cycleSeason: true },
        ];
        inputs.forEach((input, frame) => buffer.record(frame, input));

        const player = createReplayPlayer(buffer.snapshot());

        expect(inputs.map((_, frame) => player.inputAt(frame, 0))).toEqual(inputs);
    });
});

describe('isReplayRecording', () => {
    const valid = {
        version: 1,
        seed: null,
        echoSeeds: ['tailwind'],
        frames: 2,
        events: [
            { type: 'hold', frame: 0, left: true, right: false },
            { type: 'press', frame: 1, action: 'cycle-season' },
        ],
    };

    it('accepts well-formed recordings', () => {
        expect(isReplayRecording(valid)).toBe(true);
        expect(isReplayRecording({ ...valid, echoSeeds: null, events: [] })).toBe(true);
    });

    it('rejects malformed headers', () => {
        expect(isReplayRecording({ ...valid, version: 2 })).toBe(false);
        expect(isReplayRecording({ ...valid, seed: 'x' })).toBe(false);
        expect(isReplayRecording({ ...valid, frames: -1 })).toBe(false);
        expect(isReplayRecording({ version: 1, seed: null, frames: 0, events: [] })).toBe(false);
        expect(isReplayRecording({ ...valid, echoSeeds: ['featherfall'] })).toBe(false);
        expect(isReplayRecording(null)).toBe(false);
        expect(isReplayRecording('replay')).toBe(false);
    });

    it('rejects malformed events', () => {
        expect(isReplayRecording({ ...valid, events: [{ type: 'press', frame: 0, action: 'dash' }] })).toBe(false);
        expect(isReplayRecording({ ...valid, events: [{ type: 'press', frame: 0 }] })).toBe(false);
        expect(isReplayRecording({ ...valid, events: [{ type: 'hold', frame: 0, left: 'yes', right: false }] })).toBe(false);
        expect(isReplayRecording({ ...valid, events: [{ type: 'hold', frame: 1.5, left: true, right: false }] })).toBe(false);
        expect(isReplayRecording({ ...valid, events: [{ type: 'tap', frame: 0 }] })).toBe(false);
        expect(isReplayRecording({ ...valid, events: [null] })).toBe(false);
    });
});
