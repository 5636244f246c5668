import type { Season } from 'game/seasons';
import type { Modifiers } from 'game/echo-seeds';
import { rectangleFromTuple, type Rectangle } from 'util/geometry';

export type RectTuple = readonly [x: number, y: number, width: number, height: number];

export type SeasonalPlatformKind = 'vine' | 'ice';

export interface SeasonalPlatformTemplate {
    readonly rect: RectTuple;
    readonly seasons: readonly Season[];
    readonly kind: SeasonalPlatformKind;
}

export interface RoomTemplate {
    readonly id: string;
    readonly platforms: readonly RectTuple[];
    readonly seasonalPlatforms: readonly SeasonalPlatformTemplate[];
    readonly hazards: readonly RectTuple[];
    readonly water: readonly RectTuple[];
    readonly wind: readonly RectTuple[];
    readonly exit: RectTuple;
}

export interface SeasonalPlatform {
    readonly rect: Rectangle;
    readonly seasons: ReadonlySet<Season>;
    readonly kind: SeasonalPlatformKind;
}

export interface RoomGeometry {
    readonly templateId: string;
    readonly basePlatforms: readonly Rectangle[];
    readonly seasonalPlatforms: readonly SeasonalPlatform[];
    readonly hazards: readonly Rectangle[];
    readonly water: readonly Rectangle[];
    readonly wind: readonly Rectangle[];
    readonly exit: Rectangle;
}

const freezeRects = (tuples: readonly RectTuple[]): readonly Rectangle[] =>
    Object.freeze(tuples.map((tuple) => Object.freeze(rectangleFromTuple(tuple))));

export const createRoom = (template: RoomTemplate): RoomGeometry => {
    const exit = rectangleFromTuple(template.exit);
    if (!(exit.width > 0 && exit.height > 0)) {
        throw new Error(`Room template "${template.id}" has an exit without area`);
    }

    return Object.freeze({
        templateId: template.id,
        basePlatforms: freezeRects(template.platforms),
        seasonalPlatforms: Object.freeze(
            template.seasonalPlatforms.map((entry) =>
                Object.freeze({
                    rect: Object.freeze(rectangleFromTuple(entry.rect)),
                    seasons: new Set(entry.seasons),
                    kind: entry.kind,
                }),
            ),
        ),
        hazards: freezeRects(template.hazards),
        water: freezeRects(template.water),
        wind: freezeRects(template.wind),
        exit: Object.freeze(exit),
    });
};

/** Water freezes into walkable ice in winter. */
export const isWaterSolid = (season: Season): boolean => season === 'winter';

export const activePlatforms = (room: RoomGeometry, season: Season): readonly Rectangle[] => {
    const active = [...room.basePlatforms];
    for (const entry of room.seasonalPlatforms) {
        if (entry.seasons.has(season)) {
            active.push(entry.rect);
        }
    }
    if (isWaterSolid(season)) {
        active.push(...room.water);
    }
    return active;
};

export const hazardActive = (season: Season, brittleThorns: boolean): boolean => {
    switch (season) {
        case 'summer':
        case 'autumn':
            return true;
        case 'spring':
            return brittleThorns;
        case 'winter':
            return false;
    }
};

/** Water slows movement while it is liquid and warm. */
export const isWaterDragging = (season: Season): boolean => season === 'spring' || season === 'summer';

export const isWindBlowing = (season: Season): boolean => season === 'autumn';

export interface RoomView {
    readonly templateId: string;
    readonly platforms: readonly Rectangle[];
    readonly seasonalPlatforms: readonly { readonly rect: Rectangle; readonly kind: SeasonalPlatformKind }[];
    readonly hazards: readonly Rectangle[];
    readonly hazardsArmed: boolean;
    readonly water: readonly Rectangle[];
    readonly waterFrozen: boolean;
    readonly wind: readonly Rectangle[];
    readonly windBlowing: boolean;
    readonly exit: Rectangle;
}

export const describeRoom = (
    room: RoomGeometry,
    season: Season,
    modifiers: Pick<Modifiers, 'brittleThorns'>,
): RoomView => ({
    templateId: room.templateId,
    platforms: activePlatforms(room, season),
    seasonalPlatforms: room.seasonalPlatforms
        .filter((entry) => entry.seasons.has(season))
        .map((entry) => ({ rect: entry.rect, kind: entry.kind })),
    hazards: room.hazards,
    hazardsArmed: hazardActive(season, modifiers.brittleThorns),
    water: room.water,
    waterFrozen: isWaterSolid(season),
    wind: room.wind,
    windBlowing: isWindBlowing(season),
    exit: room.exit,
});
