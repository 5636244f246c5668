import { isEchoSeedId, type EchoSeedId } from 'game/echo-seeds';
import type { SessionInput } from './input';

export type ReplayPressAction = 'jump' | 'cycle-season' | 'restart';

export type ReplayEvent = ReplayHoldEvent | ReplayPressEvent;

export interface ReplayHoldEvent {
    readonly type: 'hold';
    readonly frame: number;
    readonly left: boolean;
    readonly right: boolean;
}

export interface ReplayPressEvent {
    readonly type: 'press';
    readonly frame: number;
    readonly action: ReplayPressAction;
}

export interface ReplayRecording {
    readonly version: 1;
    readonly seed: number | null;
    /** Fixed echo seed selection the run was built with; null when they were drawn. */
    readonly echoSeeds: readonly EchoSeedId[] | null;
    readonly frames: number;
    readonly events: readonly ReplayEvent[];
}

export interface ReplayBuffer {
    begin(seed: number | null, echoSeeds?: readonly EchoSeedId[] | null): void;
    record(frame: number, input: Omit<SessionInput, 'now'>): void;
    snapshot(): ReplayRecording;
    toJSON(): ReplayRecording;
}

const VERSION = 1;

const PRESS_FIELDS: readonly (readonly [ReplayPressAction, 'jump' | 'cycleSeason' | 'restart'])[] = [
    ['restart', 'restart'],
    ['cycle-season', 'cycleSeason'],
    ['jump', 'jump'],
];

const cloneEvent = (event: ReplayEvent): ReplayEvent => ({ ...event });

const cloneRecording = (recording: ReplayRecording): ReplayRecording => ({
    version: recording.version,
    seed: recording.seed,
    echoSeeds: recording.echoSeeds === null ? null : [...recording.echoSeeds],
    frames: recording.frames,
    events: recording.events.map(cloneEvent),
});

const normalizeFrame = (frame: number): number => {
    if (!Number.isFinite(frame) || frame <= 0) {
        return 0;
    }
    return Math.floor(frame);
};

export const createReplayBuffer = (): ReplayBuffer => {
    let seed: number | null = null;
    let echoSeeds: readonly EchoSeedId[] | null = null;
    let frames = 0;
    let events: ReplayEvent[] = [];
    let heldLeft = false;
    let heldRight = false;

    const begin: ReplayBuffer['begin'] = (nextSeed, selection = null) => {
        seed = typeof nextSeed === 'number' ? nextSeed : null;
        echoSeeds = selection === null ? null : [...selection];
        frames = 0;
        events = [];
        heldLeft = false;
        heldRight = false;
    };

    const record: ReplayBuffer['record'] = (rawFrame, input) => {
        const frame = normalizeFrame(rawFrame);
        frames = Math.max(frames, frame + 1);

        if (input.left !== heldLeft || input.right !== heldRight) {
            heldLeft = input.left;
            heldRight = input.right;
            events.push({ type: 'hold', frame, left: heldLeft, right: heldRight });
        }

        for (const [action, field] of PRESS_FIELDS) {
            if (input[field]) {
                events.push({ type: 'press', frame, action });
            }
        }
    };

    const snapshot = (): ReplayRecording => cloneRecording({ version: VERSION, seed, echoSeeds, frames, events });

    return {
        begin,
        record,
        snapshot,
        toJSON: snapshot,
    };
};

export interface ReplayPlayer {
    /** Input for `frame`; frames must be requested in increasing order. */
    inputAt(frame: number, now: number): SessionInput;
    isExhausted(frame: number): boolean;
}

export const createReplayPlayer = (recording: ReplayRecording): ReplayPlayer => {
    let cursor = 0;
    let left = false;
    let right = false;

    const inputAt: ReplayPlayer['inputAt'] = (frame, now) => {
        let jump = false;
        let cycleSeason = false;
        let restart = false;

        while (cursor < recording.events.length && recording.events[cursor].frame <= frame) {
            const event = recording.events[cursor];
            cursor += 1;

            // Events for frames already played are stale presses; holds still apply.
            if (event.type === 'hold') {
                left = event.left;
                right = event.right;
                continue;
            }
            if (event.frame < frame) {
                continue;
            }
            if (event.action === 'jump') {
                jump = true;
            } else if (event.action === 'cycle-season') {
                cycleSeason = true;
            } else if (event.action === 'restart') {
                restart = true;
            }
        }

        return { now, left, right, jump, cycleSeason, restart };
    };

    return {
        inputAt,
        isExhausted: (frame) => frame >= recording.frames,
    };
};

const PRESS_ACTIONS: readonly string[] = ['jump', 'cycle-season', 'restart'];

const isFrameIndex = (value: unknown): boolean =>
    typeof value === 'number' && Number.isInteger(value) && value >= 0;

const isReplayEvent = (value: unknown): value is ReplayEvent => {
    if (typeof value !== 'object' || value === null || !('type' in value) || !('frame' in value)) {
        return false;
    }
    if (!isFrameIndex(value.frame)) {
        return false;
    }
    if (value.type === 'hold') {
        return 'left' in value && typeof value.left === 'boolean'
            && 'right' in value && typeof value.right === 'boolean';
    }
    if (value.type === 'press') {
        return 'action' in value && typeof value.action === 'string' && PRESS_ACTIONS.includes(value.action);
    }
    return false;
};

const isEchoSeedSelection = (value: unknown): boolean =>
    value === null || (Array.isArray(value) && value.every((entry) => typeof entry === 'string' && isEchoSeedId(entry)));

export const isReplayRecording = (value: unknown): value is ReplayRecording => {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return 'version' in value && value.version === VERSION
        && 'frames' in value && isFrameIndex(value.frames)
        && 'events' in value && Array.isArray(value.events) && value.events.every(isReplayEvent)
        && 'echoSeeds' in value && isEchoSeedSelection(value.echoSeeds)
        && 'seed' in value && (value.seed === null || typeof value.seed === 'number');
};
