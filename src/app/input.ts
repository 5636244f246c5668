import type { Direction } from 'physics/actor';

/** Everything the core reads from the host for one frame, sampled once. */
export interface FrameInput {
    readonly now: number;
    readonly left: boolean;
    readonly right: boolean;
    /** Press edge, not held state. */
    readonly jump: boolean;
    /** Press edge, not held state. */
    readonly cycleSeason: boolean;
}

export interface SessionInput extends FrameInput {
    /** Press edge, not held state. */
    readonly restart: boolean;
}

export type InputAction = 'left' | 'right' | 'jump' | 'cycle-season' | 'restart';

export type KeyBindings = Readonly<Record<InputAction, readonly string[]>>;

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
    'left': ['KeyA', 'ArrowLeft'],
    'right': ['KeyD', 'ArrowRight'],
    'jump': ['Space'],
    'cycle-season': ['KeyQ'],
    'restart': ['KeyR'],
};

/** Opposing keys: holding both leaves right in charge. */
export const resolveDirection = (left: boolean, right: boolean): Direction => {
    if (right) {
        return 1;
    }
    if (left) {
        return -1;
    }
    return 0;
};

export const idleInput = (now: number): SessionInput => ({
    now,
    left: false,
    right: false,
    jump: false,
    cycleSeason: false,
    restart: false,
});

export interface KeyboardSampler {
    /**
     * Builds the frame's input from the keys held right now. Press actions
     * report true only on the first frame their key is seen held.
     */
    sample(heldKeys: ReadonlySet<string>, now: number): SessionInput;
    reset(): void;
}

const EDGE_ACTIONS = ['jump', 'cycle-season', 'restart'] as const;

type EdgeAction = (typeof EDGE_ACTIONS)[number];

export const createKeyboardSampler = (bindings: KeyBindings = DEFAULT_KEY_BINDINGS): KeyboardSampler => {
    const previouslyHeld = new Set<EdgeAction>();

    const isHeld = (action: InputAction, heldKeys: ReadonlySet<string>): boolean =>
        bindings[action].some((code) => heldKeys.has(code));

    const pressed = (action: EdgeAction, heldKeys: ReadonlySet<string>): boolean => {
        const held = isHeld(action, heldKeys);
        const wasHeld = previouslyHeld.has(action);
        if (held) {
            previouslyHeld.add(action);
        } else {
            previouslyHeld.delete(action);
        }
        return held && !wasHeld;
    };

    return {
        sample: (heldKeys, now) => ({
            now,
            left: isHeld('left', heldKeys),
            right: isHeld('right', heldKeys),
            jump: pressed('jump', heldKeys),
            cycleSeason: pressed('cycle-season', heldKeys),
            restart: pressed('restart', heldKeys),
        }),
        reset: () => {
            previouslyHeld.clear();
        },
    };
};
