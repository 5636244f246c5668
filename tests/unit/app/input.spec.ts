import { describe, expect, it } from 'vitest';
import { createKeyboardSampler, idleInput, resolveDirection } from 'app/input';

describe('resolveDirection', () => {
    it('maps held keys to a direction with right winning ties', () => {
        expect(resolveDirection(false, false)).toBe(0);
        expect(resolveDirection(true, false)).toBe(-1);
        expect(resolveDirection(false, true)).toBe(1);
        expect(resolveDirection(true, true)).toBe(1);
    });
});

describe('idleInput', () => {
    it('holds nothing', () => {
        expect(idleInput(16)).toEqual({
            now: 16,
            left: false,
            right: false,
            jump: false,
            cycleSeason: false,
            restart: false,
        });
    });
});

describe('createKeyboardSampler', () => {
    it('reports held movement keys every frame', () => {
        const sampler = createKeyboardSampler();
        const held = new Set(['ArrowLeft']);
        expect(sampler.sample(held, 0).left).toBe(true);
        expect(sampler.sample(held, 16).left).toBe(true);
        expect(sampler.sample(new Set(['KeyD']), 32).right).toBe(true);
    });

    it('reports press actions only on the first held frame', () => {
        const sampler = createKeyboardSampler();
        const held = new Set(['Space', 'KeyQ']);

        const first = sampler.sample(held, 0);
        const second = sampler.sample(held, 16);
        sampler.sample(new Set(), 32);
        const third = sampler.sample(held, 48);

        expect([first.jump, first.cycleSeason]).toEqual([true, true]);
        expect([second.jump, second.cycleSeason]).toEqual([false, false]);
        expect([third.jump, third.cycleSeason]).toEqual([true, true]);
    });

    it('honours custom bindings and forgets held keys on reset', () => {
        const sampler = createKeyboardSampler({
            'left': ['KeyJ'],
            'right': ['KeyL'],
            'jump': ['KeyK'],
            'cycle-season': ['KeyE'],
            'restart': ['Backspace'],
        });
        const held = new Set(['Backspace']);

        expect(sampler.sample(held, 0).restart).toBe(true);
        sampler.reset();
        expect(sampler.sample(held, 16).restart).toBe(true);
        expect(sampler.sample(new Set(['KeyR']), 32).restart).toBe(false);
    });
});
