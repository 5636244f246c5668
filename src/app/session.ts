import type { GameConfig } from 'config/game';
import type { EchoSeedId } from 'game/echo-seeds';
import type { RoomTemplate } from 'game/rooms';
import type { Season } from 'game/seasons';
import { rootLogger, type Logger } from 'util/log';
import { createRandomManager } from 'util/random';
import type { SeasonsEventBus } from './events';
import type { SessionInput } from './input';
import { createGameLoop, type GameLoop, type LoopOptions } from './loop';
import type { ReplayBuffer } from './replay-buffer';
import { createRunState, type RunSnapshot, type RunState } from './run-state';

export interface RunSessionOptions {
    readonly sessionId?: string;
    readonly seed?: number | null;
    readonly startedAt?: number;
    readonly templates?: readonly RoomTemplate[];
    readonly roomCount?: number;
    readonly echoSeeds?: readonly EchoSeedId[];
    readonly initialSeason?: Season;
    readonly config?: GameConfig;
    readonly eventBus?: SeasonsEventBus;
    readonly logger?: Logger;
    readonly replay?: ReplayBuffer;
}

export interface RunSession {
    readonly sessionId: string;
    seed(): number;
    current(): RunState;
    runsStarted(): number;
    frame(): number;
    /** Discards the current run entirely and builds a fresh one from the session's random stream. */
    restart(now: number): RunState;
    update(input: SessionInput): RunSnapshot;
    snapshot(): RunSnapshot;
}

let sessionCounter = 0;

export const createRunSession = (options: RunSessionOptions = {}): RunSession => {
    sessionCounter += 1;
    const sessionId = options.sessionId ?? `session-${sessionCounter}`;
    const random = createRandomManager(options.seed);
    const logger = (options.logger ?? rootLogger).child(`session:${sessionId}`);
    const replay = options.replay;

    let runsStarted = 0;
    let frameIndex = 0;

    const buildRun = (now: number): RunState => {
        runsStarted += 1;
        return createRunState({
            runId: `${sessionId}-run-${runsStarted}`,
            templates: options.templates,
            roomCount: options.roomCount,
            echoSeeds: options.echoSeeds,
            initialSeason: options.initialSeason,
            random: random.random,
            startedAt: now,
            config: options.config,
            eventBus: options.eventBus,
            logger,
        });
    };

    replay?.begin(random.seed(), options.echoSeeds ?? null);
    let run = buildRun(options.startedAt ?? 0);

    const restart: RunSession['restart'] = (now) => {
        const previous = run;
        run = buildRun(now);
        logger.info('run restarted', {
            previousRunId: previous.runId,
            previousOutcome: previous.outcome(),
            runId: run.runId,
        });
        return run;
    };

    const update: RunSession['update'] = (input) => {
        replay?.record(frameIndex, input);
        frameIndex += 1;

        // A run in progress ignores restart; only a finished run can be replaced from input.
        if (input.restart && run.isTerminal()) {
            restart(input.now);
        }
        return run.step(input);
    };

    return {
        sessionId,
        seed: () => random.seed(),
        current: () => run,
        runsStarted: () => runsStarted,
        frame: () => frameIndex,
        restart,
        update,
        snapshot: () => run.snapshot(),
    };
};

export interface SessionLoopOptions {
    readonly session: RunSession;
    /**
     * Called once per logical frame with the frame's simulated timestamp; the
     * result is the only input that frame sees.
     */
    readonly sampleInput: (now: number) => SessionInput;
    readonly onFrame?: (snapshot: RunSnapshot, alpha: number) => void;
    readonly loop?: LoopOptions;
}

export const startSessionLoop = ({ session, sampleInput, onFrame, loop }: SessionLoopOptions): GameLoop => {
    const gameLoop = createGameLoop(
        ({ simulatedMs }) => {
            session.update(sampleInput(simulatedMs));
        },
        (alpha) => {
            onFrame?.(session.snapshot(), alpha);
        },
        loop,
    );
    gameLoop.start();
    return gameLoop;
};
