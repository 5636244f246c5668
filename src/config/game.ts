interface Point {
    readonly x: number;
    readonly y: number;
}

interface WorldConfig {
    readonly width: number;
    readonly height: number;
    readonly groundY: number;
    /** Distance below the bottom edge the actor's top must pass to count as fallen out. */
    readonly fallOutMargin: number;
    readonly clampBand: {
        readonly above: number;
        readonly below: number;
    };
}

interface ActorConfig {
    readonly width: number;
    readonly height: number;
    readonly spawn: Point;
    readonly baseSpeed: number;
    readonly baseJump: number;
    readonly baseGravity: number;
    readonly maxFallSpeed: number;
}

interface SurfaceConfig {
    readonly waterDrag: number;
    readonly iceSlip: number;
}

interface SeasonConfig {
    readonly cooldownMs: number;
    readonly slowCooldownMs: number;
    readonly flash: {
        readonly peak: number;
        readonly decayPerFrame: number;
    };
}

interface RunConfig {
    readonly roomCount: number;
    readonly echoSeedPicks: number;
}

interface LoopConfig {
    readonly fixedDelta: number;
    readonly maxStepsPerFrame: number;
    readonly maxFrameDeltaMs: number;
}

interface SimulationConfig {
    readonly defaultSeed: number;
    readonly defaultMaxFrames: number;
    readonly maxTuningRuns: number;
}

export interface GameConfig {
    readonly world: WorldConfig;
    readonly actor: ActorConfig;
    readonly surfaces: SurfaceConfig;
    readonly seasons: SeasonConfig;
    readonly run: RunConfig;
    readonly loop: LoopConfig;
    readonly simulation: SimulationConfig;
}

const WORLD_WIDTH = 960;
const WORLD_HEIGHT = 540;

export const gameConfig = {
    world: {
        width: WORLD_WIDTH,
        height: WORLD_HEIGHT,
        groundY: WORLD_HEIGHT - 42,
        fallOutMargin: 80,
        clampBand: {
            above: 200,
            below: 300,
        },
    },
    actor: {
        width: 34,
        height: 52,
        spawn: { x: 70, y: 420 },
        baseSpeed: 4.8,
        baseJump: 12.5,
        baseGravity: 0.58,
        maxFallSpeed: 15,
    },
    surfaces: {
        waterDrag: 0.45,
        iceSlip: 0.985,
    },
    seasons: {
        cooldownMs: 500,
        slowCooldownMs: 800,
        flash: {
            peak: 170,
            decayPerFrame: 8,
        },
    },
    run: {
        roomCount: 5,
        echoSeedPicks: 2,
    },
    loop: {
        fixedDelta: 1 / 60,
        maxStepsPerFrame: 5,
        maxFrameDeltaMs: 100,
    },
    simulation: {
        defaultSeed: 1,
        defaultMaxFrames: 60 * 90,
        maxTuningRuns: 50,
    },
} as const satisfies GameConfig;
