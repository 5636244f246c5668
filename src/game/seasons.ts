export type Season = 'spring' | 'summer' | 'autumn' | 'winter';

export const SEASON_ORDER: readonly Season[] = ['spring', 'summer', 'autumn', 'winter'];

export const nextSeason = (season: Season): Season => {
    const index = SEASON_ORDER.indexOf(season);
    return SEASON_ORDER[(index + 1) % SEASON_ORDER.length];
};

export interface SeasonCycleOptions {
    readonly cooldownMs: number;
    readonly initialSeason?: Season;
    readonly flash?: {
        readonly peak: number;
        readonly decayPerFrame: number;
    };
}

export interface SeasonCycleSnapshot {
    readonly season: Season;
    readonly cooldownMs: number;
    readonly lastCycleAt: number;
    readonly flashIntensity: number;
}

export interface SeasonCycle {
    current(): Season;
    canCycle(now: number): boolean;
    requestCycle(now: number): boolean;
    cooldownRemaining(now: number): number;
    /** Per-frame decay of the cycle flash. Cosmetic only. */
    tick(): void;
    snapshot(): SeasonCycleSnapshot;
}

const DEFAULT_FLASH = { peak: 170, decayPerFrame: 8 } as const;

export const createSeasonCycle = ({
    cooldownMs,
    initialSeason = 'spring',
    flash = DEFAULT_FLASH,
}: SeasonCycleOptions): SeasonCycle => {
    if (!Number.isFinite(cooldownMs) || cooldownMs < 0) {
        throw new RangeError(`season cooldown must be a non-negative finite duration, got ${cooldownMs}`);
    }

    let season = initialSeason;
    // Anchored one full cooldown in the past so the first request always lands.
    let lastCycleAt = -cooldownMs;
    let flashIntensity = 0;

    const canCycle: SeasonCycle['canCycle'] = (now) => now - lastCycleAt >= cooldownMs;

    const requestCycle: SeasonCycle['requestCycle'] = (now) => {
        if (!canCycle(now)) {
            return false;
        }
        season = nextSeason(season);
        lastCycleAt = now;
        flashIntensity = flash.peak;
        return true;
    };

    const cooldownRemaining: SeasonCycle['cooldownRemaining'] = (now) =>
        Math.max(0, cooldownMs - (now - lastCycleAt));

    const tick: SeasonCycle['tick'] = () => {
        if (flashIntensity > 0) {
            flashIntensity = Math.max(0, flashIntensity - flash.decayPerFrame);
        }
    };

    return {
        current: () => season,
        canCycle,
        requestCycle,
        cooldownRemaining,
        tick,
        snapshot: () => ({
            season,
            cooldownMs,
            lastCycleAt,
            flashIntensity,
        }),
    } satisfies SeasonCycle;
};
