import { sampleWithoutReplacement, type RandomSource } from 'util/random';

export type EchoSeedId =
    | 'swiftstride'
    | 'moonlight-bones'
    | 'brittle-thorns'
    | 'glacial-rhythm'
    | 'heavy-bloom'
    | 'tailwind';

export interface EchoSeed {
    readonly id: EchoSeedId;
    readonly name: string;
    readonly description: string;
}

export interface Modifiers {
    readonly speedMultiplier: number;
    readonly gravityMultiplier: number;
    readonly jumpMultiplier: number;
    readonly waterDragMultiplier: number;
    readonly windPush: number;
    readonly iceSlip: number;
    /** Spring thorns become lethal. */
    readonly brittleThorns: boolean;
    /** Season cycling uses the longer cooldown. */
    readonly slowCycle: boolean;
}

type ModifierDraft = { -readonly [Key in keyof Modifiers]: Modifiers[Key] };

export const DEFAULT_MODIFIERS: Modifiers = Object.freeze({
    speedMultiplier: 1,
    gravityMultiplier: 1,
    jumpMultiplier: 1,
    waterDragMultiplier: 1,
    windPush: 0.24,
    iceSlip: 1,
    brittleThorns: false,
    slowCycle: false,
});

export const ECHO_SEED_POOL: readonly EchoSeed[] = [
    { id: 'swiftstride', name: 'Swiftstride', description: '+20% movement speed.' },
    { id: 'moonlight-bones', name: 'Moonlight Bones', description: 'Lower gravity, slightly higher jump.' },
    { id: 'brittle-thorns', name: 'Brittle Thorns', description: 'Spring thorns are now dangerous.' },
    { id: 'glacial-rhythm', name: 'Glacial Rhythm', description: 'Season cycle cooldown increased.' },
    { id: 'heavy-bloom', name: 'Heavy Bloom', description: 'Spring/Summer water slows you more.' },
    { id: 'tailwind', name: 'Tailwind', description: 'Autumn wind pushes harder.' },
];

/*
 * Every transform touches its own fields only: multiplications on a field
 * commute with each other, boolean flags are only ever raised, and the one
 * assignment (tailwind) owns windPush outright. Folding the table in any order
 * therefore yields the same Modifiers. A new entry must keep that property.
 */
const ECHO_SEED_TRANSFORMS: Record<EchoSeedId, (draft: ModifierDraft) => void> = {
    'swiftstride': (draft) => {
        draft.speedMultiplier *= 1.2;
    },
    'moonlight-bones': (draft) => {
        draft.gravityMultiplier *= 0.82;
        draft.jumpMultiplier *= 1.08;
    },
    'brittle-thorns': (draft) => {
        draft.brittleThorns = true;
    },
    'glacial-rhythm': (draft) => {
        draft.slowCycle = true;
    },
    'heavy-bloom': (draft) => {
        draft.waterDragMultiplier *= 0.75;
    },
    'tailwind': (draft) => {
        draft.windPush = 0.45;
    },
};

export const isEchoSeedId = (value: string): value is EchoSeedId =>
    ECHO_SEED_POOL.some((seed) => seed.id === value);

export const resolveModifiers = (selected: readonly EchoSeedId[]): Modifiers => {
    const seen = new Set<EchoSeedId>();
    const draft: ModifierDraft = { ...DEFAULT_MODIFIERS };

    for (const id of selected) {
        // Selections can arrive from JSON payloads.
        if (!isEchoSeedId(id)) {
            throw new Error(`Unknown echo seed: ${String(id)}`);
        }
        if (seen.has(id)) {
            throw new Error(`Echo seed selected more than once: ${id}`);
        }
        seen.add(id);
        ECHO_SEED_TRANSFORMS[id](draft);
    }

    return Object.freeze(draft);
};

export const drawEchoSeeds = (random: RandomSource, count: number): EchoSeedId[] =>
    sampleWithoutReplacement(random, ECHO_SEED_POOL, count).map((seed) => seed.id);
