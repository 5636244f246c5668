import { gameConfig, type GameConfig } from 'config/game';
import { roomTemplates } from 'config/rooms';
import { drawEchoSeeds, resolveModifiers, type EchoSeedId, type Modifiers } from 'game/echo-seeds';
import { createRoom, describeRoom, hazardActive, type RoomGeometry, type RoomTemplate, type RoomView } from 'game/rooms';
import { createSeasonCycle, type Season, type SeasonCycle } from 'game/seasons';
import { createActor, resetActor, stepActor, tryJump, type Actor } from 'physics/actor';
import { intersectsAny, rectanglesIntersect, type Rectangle } from 'util/geometry';
import { rootLogger, type Logger } from 'util/log';
import { createRandomManager, pickOne, type RandomSource } from 'util/random';
import type { FailureCause, RunOutcome, SeasonsEventBus } from './events';
import { resolveDirection, type FrameInput } from './input';

export interface ActorSnapshot {
    readonly rect: Rectangle;
    readonly velocityX: number;
    readonly velocityY: number;
    readonly grounded: boolean;
}

export interface RunSnapshot {
    readonly runId: string;
    readonly outcome: RunOutcome;
    readonly failureCause: FailureCause | null;
    readonly season: Season;
    readonly seasonCooldownRemainingMs: number;
    readonly flashIntensity: number;
    readonly roomIndex: number;
    readonly roomCount: number;
    readonly roomsCleared: number;
    readonly templateIds: readonly string[];
    readonly echoSeeds: readonly EchoSeedId[];
    readonly modifiers: Modifiers;
    readonly actor: ActorSnapshot;
    readonly room: RoomView;
    readonly startedAt: number;
    readonly endedAt: number | null;
    /** Only known once the run has ended. */
    readonly elapsedMs: number | null;
}

export interface RunState {
    readonly runId: string;
    readonly rooms: readonly RoomGeometry[];
    readonly echoSeeds: readonly EchoSeedId[];
    readonly modifiers: Modifiers;
    outcome(): RunOutcome;
    isTerminal(): boolean;
    /** One logical frame. A finished run ignores input and returns its final snapshot. */
    step(frame: FrameInput): RunSnapshot;
    snapshot(): RunSnapshot;
}

export interface RunStateOptions {
    readonly runId?: string;
    readonly templates?: readonly RoomTemplate[];
    readonly roomCount?: number;
    /** Fixed selection instead of a random draw. */
    readonly echoSeeds?: readonly EchoSeedId[];
    readonly random?: RandomSource;
    readonly initialSeason?: Season;
    readonly startedAt?: number;
    readonly config?: GameConfig;
    readonly eventBus?: SeasonsEventBus;
    readonly logger?: Logger;
}

let runCounter = 0;

const nextRunId = (): string => {
    runCounter += 1;
    return `run-${runCounter}`;
};

const validateRoomCount = (roomCount: number): number => {
    if (!Number.isInteger(roomCount) || roomCount < 1) {
        throw new RangeError(`roomCount must be a positive integer, got ${roomCount}`);
    }
    return roomCount;
};

export const createRunState = (options: RunStateOptions = {}): RunState => {
    const config = options.config ?? gameConfig;
    const templates = options.templates ?? roomTemplates;
    if (templates.length === 0) {
        throw new Error('A run needs at least one room template');
    }
    const roomCount = validateRoomCount(options.roomCount ?? config.run.roomCount);
    const random = options.random ?? createRandomManager().random;
    const runId = options.runId ?? nextRunId();
    const logger = (options.logger ?? rootLogger).child(`run:${runId}`);
    const bus = options.eventBus;

    const rooms: readonly RoomGeometry[] = Array.from({ length: roomCount }, () => createRoom(pickOne(random, templates)));
    const echoSeeds = [...(options.echoSeeds ?? drawEchoSeeds(random, config.run.echoSeedPicks))];
    const modifiers = resolveModifiers(echoSeeds);
    const seasons: SeasonCycle = createSeasonCycle({
        cooldownMs: modifiers.slowCycle ? config.seasons.slowCooldownMs : config.seasons.cooldownMs,
        initialSeason: options.initialSeason,
        flash: config.seasons.flash,
    });
    const actor: Actor = createActor(config);
    const startedAt = options.startedAt ?? 0;
    const templateIds = rooms.map((room) => room.templateId);

    let roomIndex = 0;
    let outcome: RunOutcome = 'in-progress';
    let failureCause: FailureCause | null = null;
    let endedAt: number | null = null;
    let lastNow = startedAt;

    const currentRoom = (): RoomGeometry => rooms[Math.min(roomIndex, rooms.length - 1)];

    const finish = (result: 'won' | 'failed', cause: FailureCause | null, now: number) => {
        outcome = result;
        failureCause = cause;
        endedAt = now;
        const durationMs = now - startedAt;
        logger.info('run ended', { outcome: result, cause, roomsCleared: roomIndex, durationMs });
        bus?.publish(
            'RunEnded',
            {
                runId,
                outcome: result,
                cause,
                roomsCleared: roomIndex,
                roomCount,
                durationMs,
            },
            now,
        );
    };

    const advanceRoom = (now: number) => {
        roomIndex += 1;
        if (roomIndex >= rooms.length) {
            finish('won', null, now);
            return;
        }

        resetActor(actor, config.actor.spawn);
        logger.debug('room entered', { roomIndex, templateId: currentRoom().templateId });
        bus?.publish(
            'RoomEntered',
            { runId, roomIndex, roomCount, templateId: currentRoom().templateId },
            now,
        );
    };

    const handleSeasonRequest = (now: number) => {
        const previous = seasons.current();
        if (seasons.requestCycle(now)) {
            bus?.publish('SeasonCycled', { runId, previous, season: seasons.current() }, now);
            return;
        }
        bus?.publish(
            'SeasonCycleRejected',
            { runId, season: previous, remainingMs: seasons.cooldownRemaining(now) },
            now,
        );
    };

    const evaluateOutcome = (now: number) => {
        const room = currentRoom();
        const season = seasons.current();

        if (hazardActive(season, modifiers.brittleThorns) && intersectsAny(actor.rect, room.hazards)) {
            finish('failed', 'hazard', now);
            return;
        }

        if (actor.rect.y > config.world.height + config.world.fallOutMargin) {
            finish('failed', 'fell', now);
            return;
        }

        if (rectanglesIntersect(actor.rect, room.exit)) {
            advanceRoom(now);
        }
    };

    const snapshot: RunState['snapshot'] = () => {
        const season = seasons.current();
        return {
            runId,
            outcome,
            failureCause,
            season,
            seasonCooldownRemainingMs: seasons.cooldownRemaining(lastNow),
            flashIntensity: seasons.snapshot().flashIntensity,
            roomIndex,
            roomCount,
            roomsCleared: roomIndex,
            templateIds,
            echoSeeds,
            modifiers,
            actor: {
                rect: actor.rect,
                velocityX: actor.velocityX,
                velocityY: actor.velocityY,
                grounded: actor.grounded,
            },
            room: describeRoom(currentRoom(), season, modifiers),
            startedAt,
            endedAt,
            elapsedMs: endedAt === null ? null : endedAt - startedAt,
        };
    };

    const step: RunState['step'] = (frame) => {
        if (outcome !== 'in-progress') {
            return snapshot();
        }

        const now = frame.now;
        lastNow = now;

        if (frame.cycleSeason) {
            handleSeasonRequest(now);
        }

        if (frame.jump && tryJump(actor, modifiers, config)) {
            bus?.publish('JumpPerformed', { runId, roomIndex, velocityY: actor.velocityY }, now);
        }

        stepActor(actor, resolveDirection(frame.left, frame.right), {
            room: currentRoom(),
            season: seasons.current(),
            modifiers,
            config,
        });
        seasons.tick();

        evaluateOutcome(now);
        return snapshot();
    };

    logger.debug('run created', { roomCount, echoSeeds, templateIds });
    bus?.publish('RunStarted', { runId, echoSeeds, templateIds }, startedAt);
    bus?.publish('RoomEntered', { runId, roomIndex: 0, roomCount, templateId: rooms[0].templateId }, startedAt);

    return {
        runId,
        rooms,
        echoSeeds,
        modifiers,
        outcome: () => outcome,
        isTerminal: () => outcome !== 'in-progress',
        step,
        snapshot,
    };
};
