import type { FailureCause } from 'app/events';
import { gameConfig } from 'config/game';
import type { EchoSeedId } from 'game/echo-seeds';
import { clamp } from 'util/math';
import { runHeadlessSimulation, type SimulationInput, type SimulationResult } from './simulate';

export interface TuningBotOptions {
    readonly runs: number;
    readonly maxFrames: number;
    readonly seed?: number;
    readonly echoSeeds?: readonly EchoSeedId[];
}

export interface TuningBotSummary {
    readonly runCount: number;
    readonly wins: number;
    readonly winRate: number;
    readonly averageRoomsCleared: number;
    /** Mean simulated run time over runs that reached an outcome. */
    readonly averageFinishMs: number;
    readonly outcomes: Readonly<Record<FailureCause | 'won' | 'unfinished', number>>;
    readonly deterministicCheck: boolean;
}

export interface TuningBotResult {
    readonly summary: TuningBotSummary;
    readonly runs: readonly SimulationResult[];
}

const clampRuns = (value: number): number => {
    if (!Number.isFinite(value) || value <= 0) {
        return 1;
    }
    return clamp(Math.floor(value), 1, gameConfig.simulation.maxTuningRuns);
};

const round = (value: number, digits: number): number => Number(value.toFixed(digits));

export const runTuningBot = async (options: TuningBotOptions): Promise<TuningBotResult> => {
    const runCount = clampRuns(options.runs);
    const startSeed = typeof options.seed === 'number' ? options.seed : gameConfig.simulation.defaultSeed;
    const inputFor = (index: number): SimulationInput => ({
        mode: 'simulate',
        seed: startSeed + index,
        maxFrames: options.maxFrames,
        echoSeeds: options.echoSeeds,
    });

    const runs: SimulationResult[] = [];
    for (let index = 0; index < runCount; index += 1) {
        runs.push(await runHeadlessSimulation(inputFor(index)));
    }

    const outcomes = { won: 0, hazard: 0, fell: 0, unfinished: 0 };
    let totalRoomsCleared = 0;
    let finishedRuns = 0;
    let totalFinishMs = 0;

    for (const run of runs) {
        totalRoomsCleared += run.roomsCleared;
        if (run.outcome === 'won') {
            outcomes.won += 1;
        } else if (run.failureCause) {
            outcomes[run.failureCause] += 1;
        } else {
            outcomes.unfinished += 1;
        }
        if (run.elapsedMs !== null) {
            finishedRuns += 1;
            totalFinishMs += run.elapsedMs;
        }
    }

    const baseline = await runHeadlessSimulation(inputFor(0));
    const deterministicCheck = JSON.stringify(baseline) === JSON.stringify(runs[0]);

    const summary: TuningBotSummary = {
        runCount: runs.length,
        wins: outcomes.won,
        winRate: round(outcomes.won / runs.length, 3),
        averageRoomsCleared: round(totalRoomsCleared / runs.length, 2),
        averageFinishMs: finishedRuns > 0 ? round(totalFinishMs / finishedRuns, 1) : 0,
        outcomes,
        deterministicCheck,
    };

    return {
        summary,
        runs,
    } satisfies TuningBotResult;
};
