import { readFile } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import type { EventEnvelope, FailureCause, RunOutcome, SeasonsEventName } from 'app/events';
import { isReplayRecording, type ReplayRecording } from 'app/replay-buffer';
import { gameConfig } from 'config/game';
import type { EchoSeedId } from 'game/echo-seeds';
import { runHeadlessEngine, type HeadlessSimulationResult } from './headless-engine';

/** Stream access for the JSON-in/JSON-out command; stderr is optional. */
export interface SimulateCommandIO {
    readonly readStdin: () => Promise<string>;
    readonly writeStdout: (output: string) => Promise<void>;
    readonly writeStderr?: (message: string) => Promise<void> | void;
}

export interface SimulationOptions {
    readonly telemetry?: boolean;
    readonly recordInputs?: boolean;
}

export interface SimulationInput {
    readonly mode: 'simulate';
    readonly seed?: number;
    readonly maxFrames?: number;
    readonly echoSeeds?: readonly EchoSeedId[];
    readonly options?: SimulationOptions;
    readonly replayPath?: string;
    readonly replay?: ReplayRecording;
}

export interface SimulationResult {
    readonly ok: true;
    readonly sessionId: string;
    readonly seed: number;
    readonly outcome: RunOutcome;
    readonly failureCause: FailureCause | null;
    readonly roomsCleared: number;
    readonly roomCount: number;
    readonly frames: number;
    readonly durationMs: number;
    readonly elapsedMs: number | null;
    readonly echoSeeds: readonly EchoSeedId[];
    readonly templateIds: readonly string[];
    readonly events: number;
    readonly metrics: HeadlessSimulationResult['metrics'];
    readonly snapshot: HeadlessSimulationResult['snapshot'];
    readonly telemetry?: {
        readonly events: readonly EventEnvelope<SeasonsEventName>[];
    };
    readonly inputs?: ReplayRecording;
}

const DEFAULT_SEED = gameConfig.simulation.defaultSeed;
const DEFAULT_MAX_FRAMES = gameConfig.simulation.defaultMaxFrames;

const errorMessage = (error: unknown, fallback: string): string =>
    error instanceof Error ? error.message : fallback;

const loadReplayFile = async (relativePath: string): Promise<ReplayRecording> => {
    const contents = await readFile(resolvePath(process.cwd(), relativePath), 'utf8');
    const decoded: unknown = JSON.parse(contents);
    if (!isReplayRecording(decoded)) {
        throw new Error(`${relativePath} is not a replay recording`);
    }
    return decoded;
};

const pickReplay = async (input: SimulationInput): Promise<ReplayRecording | undefined> => {
    if (input.replay) {
        return input.replay;
    }
    if (!input.replayPath) {
        return undefined;
    }
    try {
        return await loadReplayFile(input.replayPath);
    } catch (error) {
        throw new Error(`Failed to load replay: ${errorMessage(error, 'Unknown error')}`);
    }
};

const toMs = (value: number | null): number | null => (value === null ? null : Number(value.toFixed(3)));

const summarize = (run: HeadlessSimulationResult, options: SimulationOptions): SimulationResult => {
    const { snapshot } = run;
    return {
        ok: true,
        sessionId: run.sessionId,
        seed: run.seed,
        outcome: snapshot.outcome,
        failureCause: snapshot.failureCause,
        roomsCleared: snapshot.roomsCleared,
        roomCount: snapshot.roomCount,
        frames: run.frames,
        durationMs: run.durationMs,
        elapsedMs: toMs(snapshot.elapsedMs),
        echoSeeds: snapshot.echoSeeds,
        templateIds: snapshot.templateIds,
        events: run.events.length,
        metrics: run.metrics,
        snapshot,
        telemetry: options.telemetry ? { events: run.events } : undefined,
        inputs: options.recordInputs ? run.inputs : undefined,
    };
};

export const runHeadlessSimulation = async (input: SimulationInput): Promise<SimulationResult> => {
    const options = input.options ?? {};
    const replay = await pickReplay(input);

    const run = runHeadlessEngine({
        seed: typeof input.seed === 'number' ? input.seed : DEFAULT_SEED,
        maxFrames: typeof input.maxFrames === 'number' ? Math.max(1, input.maxFrames) : DEFAULT_MAX_FRAMES,
        replay,
        echoSeeds: input.echoSeeds,
        telemetry: options.telemetry ?? false,
    });

    return summarize(run, options);
};

const isSimulationInput = (value: unknown): value is SimulationInput =>
    typeof value === 'object' && value !== null && 'mode' in value && value.mode === 'simulate';

type ParsedPayload = { readonly ok: true; readonly input: SimulationInput } | { readonly ok: false; readonly reason: string };

const parsePayload = (raw: string): ParsedPayload => {
    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch {
        return { ok: false, reason: 'Failed to read simulation input: invalid JSON payload' };
    }
    if (!isSimulationInput(decoded)) {
        return { ok: false, reason: 'Simulation command requires a payload with "mode": "simulate".' };
    }
    return { ok: true, input: decoded };
};

export interface SimulateCommand {
    readonly execute: () => Promise<number>;
}

export const createSimulateCommand = (io: SimulateCommandIO): SimulateCommand => {
    const report = async (message: string): Promise<void> => {
        await io.writeStderr?.(message);
    };

    const fail = async (message: string): Promise<number> => {
        await report(message);
        return 1;
    };

    const execute = async (): Promise<number> => {
        let raw: string;
        try {
            raw = await io.readStdin();
        } catch (error) {
            return fail(`Failed to read simulation input: ${errorMessage(error, String(error))}`);
        }

        const payload = parsePayload(raw);
        if (!payload.ok) {
            return fail(payload.reason);
        }

        await report(`Running simulate command for seed ${payload.input.seed ?? DEFAULT_SEED}.`);

        try {
            const result = await runHeadlessSimulation(payload.input);
            await io.writeStdout(JSON.stringify(result));
            return 0;
        } catch (error) {
            return fail(`Simulation failed: ${errorMessage(error, String(error))}`);
        }
    };

    return { execute };
};
