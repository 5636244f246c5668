import { describe, expect, it } from 'vitest';
import { runTuningBot } from 'cli/tuning-bot';

describe('runTuningBot', () => {
    it('runs consecutive seeds and summarises them', async () => {
        const { summary, runs } = await runTuningBot({ runs: 3, maxFrames: 1, seed: 40 });

        expect(runs.map((run) => run.seed)).toEqual([40, 41, 42]);
        expect(summary).toMatchObject({
            runCount: 3,
            wins: 0,
            winRate: 0,
            averageFinishMs: 0,
            outcomes: { won: 0, hazard: 0, fell: 0, unfinished: 3 },
            deterministicCheck: true,
        });
    });

    it('clamps the number of runs', async () => {
        expect((await runTuningBot({ runs: 0, maxFrames: 1 })).summary.runCount).toBe(1);
        expect((await runTuningBot({ runs: 500, maxFrames: 1 })).summary.runCount).toBe(50);
    });

    it('starts from the default seed', async () => {
        const { runs } = await runTuningBot({ runs: 1, maxFrames: 1 });
        expect(runs[0].seed).toBe(1);
    });

    it('tallies finished runs', async () => {
        const { summary, runs } = await runTuningBot({ runs: 4, maxFrames: 5400, seed: 3 });

        const finished = runs.filter((run) => run.outcome !== 'in-progress');
        expect(summary.outcomes.won + summary.outcomes.hazard + summary.outcomes.fell).toBe(finished.length);
        expect(summary.outcomes.unfinished).toBe(4 - finished.length);
        expect(summary.wins).toBe(summary.outcomes.won);
    });
});
