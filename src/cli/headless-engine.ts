import { createEventBus, SEASONS_EVENT_NAMES, type EventEnvelope, type SeasonsEventName } from 'app/events';
import { DEFAULT_STEP_MS } from 'app/loop';
import { createReplayBuffer, createReplayPlayer, type ReplayRecording } from 'app/replay-buffer';
import type { RunSnapshot } from 'app/run-state';
import { createRunSession } from 'app/session';
import type { EchoSeedId } from 'game/echo-seeds';
import type { Season } from 'game/seasons';
import { rootLogger, type Logger } from 'util/log';
import { createAutopilot } from './autopilot';

export interface HeadlessSimulationOptions {
    readonly seed: number;
    readonly maxFrames: number;
    readonly replay?: ReplayRecording;
    readonly echoSeeds?: readonly EchoSeedId[];
    readonly telemetry?: boolean;
    readonly logger?: Logger;
}

export interface HeadlessMetrics {
    readonly jumps: number;
    readonly seasonCycles: number;
    readonly rejectedCycles: number;
    readonly roomsEntered: number;
    readonly restarts: number;
    readonly framesBySeason: Readonly<Record<Season, number>>;
}

export interface HeadlessSimulationResult {
    readonly sessionId: string;
    readonly seed: number;
    readonly frames: number;
    readonly durationMs: number;
    readonly metrics: HeadlessMetrics;
    readonly events: readonly EventEnvelope<SeasonsEventName>[];
    readonly snapshot: RunSnapshot;
    readonly inputs: ReplayRecording;
}

const roundMs = (value: number): number => Number(value.toFixed(3));

const emptySeasonTally = (): Record<Season, number> => ({
    spring: 0,
    summer: 0,
    autumn: 0,
    winter: 0,
});

export const runHeadlessEngine = (options: HeadlessSimulationOptions): HeadlessSimulationResult => {
    const sessionId = `sim-${options.seed}`;
    const logger = (options.logger ?? rootLogger).child('headless');
    const bus = createEventBus({ now: () => 0 });
    const recorder = createReplayBuffer();
    const session = createRunSession({
        sessionId,
        seed: options.replay?.seed ?? options.seed,
        startedAt: 0,
        // A recording carries the selection it was made with; the stream depends on it.
        echoSeeds: options.replay ? (options.replay.echoSeeds ?? undefined) : options.echoSeeds,
        eventBus: bus,
        logger,
        replay: recorder,
    });

    const metrics = {
        jumps: 0,
        seasonCycles: 0,
        rejectedCycles: 0,
        roomsEntered: 1,
        restarts: 0,
    };
    const framesBySeason = emptySeasonTally();
    const collected: EventEnvelope<SeasonsEventName>[] = [];

    const unsubscribes = [
        bus.subscribe('JumpPerformed', () => {
            metrics.jumps += 1;
        }),
        bus.subscribe('SeasonCycled', () => {
            metrics.seasonCycles += 1;
        }),
        bus.subscribe('SeasonCycleRejected', () => {
            metrics.rejectedCycles += 1;
        }),
        bus.subscribe('RoomEntered', (event) => {
            if (event.payload.roomIndex > 0) {
                metrics.roomsEntered += 1;
            }
        }),
        ...(options.telemetry
            ? SEASONS_EVENT_NAMES.map((name) =>
                bus.subscribe(name, (event) => {
                    collected.push(event);
                }),
            )
            : []),
    ];

    const player = options.replay ? createReplayPlayer(options.replay) : null;
    const autopilot = createAutopilot();
    const maxFrames = Math.max(1, Math.floor(options.maxFrames));
    let frames = 0;

    while (frames < maxFrames) {
        const now = frames * DEFAULT_STEP_MS;
        const input = player ? player.inputAt(frames, now) : autopilot.decide(session.snapshot(), now);
        const runsBefore = session.runsStarted();
        const snapshot = session.update(input);
        if (session.runsStarted() > runsBefore) {
            metrics.restarts += 1;
        }
        framesBySeason[snapshot.season] += 1;
        frames += 1;

        // A recording plays to its own length; the autopilot stops at the outcome.
        if (player ? player.isExhausted(frames) : snapshot.outcome !== 'in-progress') {
            break;
        }
    }

    unsubscribes.forEach((unsubscribe) => {
        unsubscribe();
    });

    const snapshot = session.snapshot();
    logger.debug('simulation finished', { frames, outcome: snapshot.outcome });

    return {
        sessionId,
        seed: session.seed(),
        frames,
        durationMs: roundMs(frames * DEFAULT_STEP_MS),
        metrics: {
            ...metrics,
            framesBySeason: { ...framesBySeason },
        },
        events: collected,
        snapshot,
        inputs: recorder.snapshot(),
    };
};
