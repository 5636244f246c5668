/**
 * Actor physics.
 *
 * One call to `stepActor` is one fixed frame. Positions stay on whole pixels:
 * velocities are fractional but are rounded before they move the rectangle.
 *
 * Collision resolution is axis separated. The horizontal move is resolved
 * against every active platform before the vertical move happens, and the
 * vertical pass sees the already corrected x. Swapping the passes changes
 * which face wins at the inner corner of L-shaped platform pairs.
 */

import type { GameConfig } from 'config/game';
import type { Modifiers } from 'game/echo-seeds';
import { activePlatforms, isWaterDragging, isWaterSolid, isWindBlowing, type RoomGeometry } from 'game/rooms';
import type { Season } from 'game/seasons';
import {
    clampRectangleInside,
    createRectangle,
    intersectsAny,
    rectangleBottom,
    rectangleRight,
    rectanglesIntersect,
    type Rectangle,
    type Vector2,
} from 'util/geometry';
import { roundHalfEven } from 'util/math';

export type Direction = -1 | 0 | 1;

export interface Actor {
    rect: Rectangle;
    velocityX: number;
    velocityY: number;
    grounded: boolean;
}

export interface ActorPhysicsConfig {
    readonly actor: GameConfig['actor'];
    readonly surfaces: GameConfig['surfaces'];
    readonly world: Pick<GameConfig['world'], 'width' | 'height' | 'clampBand'>;
}

export interface ActorStepContext {
    readonly room: RoomGeometry;
    readonly season: Season;
    readonly modifiers: Modifiers;
    readonly config: ActorPhysicsConfig;
}

export const createActor = (config: Pick<ActorPhysicsConfig, 'actor'>, spawn: Vector2 = config.actor.spawn): Actor => ({
    rect: createRectangle(spawn.x, spawn.y, config.actor.width, config.actor.height),
    velocityX: 0,
    velocityY: 0,
    grounded: false,
});

export const resetActor = (actor: Actor, spawn: Vector2): void => {
    actor.rect = { ...actor.rect, x: spawn.x, y: spawn.y };
    actor.velocityX = 0;
    actor.velocityY = 0;
    actor.grounded = false;
};

const moveBy = (rect: Rectangle, dx: number, dy: number): Rectangle =>
    dx === 0 && dy === 0 ? rect : { ...rect, x: rect.x + dx, y: rect.y + dy };

const resolveHorizontal = (actor: Actor, platforms: readonly Rectangle[]): void => {
    for (const platform of platforms) {
        if (!rectanglesIntersect(actor.rect, platform)) {
            continue;
        }
        if (actor.velocityX > 0) {
            actor.rect = { ...actor.rect, x: platform.x - actor.rect.width };
        } else if (actor.velocityX < 0) {
            actor.rect = { ...actor.rect, x: rectangleRight(platform) };
        }
    }
};

const resolveVertical = (actor: Actor, platforms: readonly Rectangle[]): void => {
    for (const platform of platforms) {
        if (!rectanglesIntersect(actor.rect, platform)) {
            continue;
        }
        if (actor.velocityY > 0) {
            actor.rect = { ...actor.rect, y: platform.y - actor.rect.height };
            actor.velocityY = 0;
            actor.grounded = true;
        } else if (actor.velocityY < 0) {
            actor.rect = { ...actor.rect, y: rectangleBottom(platform) };
            actor.velocityY = 0;
        }
    }
};

/**
 * Numerical guard only: keeps coordinates finite-sized when the actor leaves
 * the screen. The band reaches further below the screen than the fall-out
 * line so falling can still end a run.
 */
export const clampToWorld = (rect: Rectangle, world: ActorPhysicsConfig['world']): Rectangle =>
    clampRectangleInside(rect, {
        x: 0,
        y: -world.clampBand.above,
        width: world.width,
        height: world.height + world.clampBand.above + world.clampBand.below,
    });

export const stepActor = (actor: Actor, direction: Direction, context: ActorStepContext): void => {
    const { room, season, modifiers, config } = context;
    const { actor: actorConfig, surfaces } = config;

    actor.velocityX = direction * actorConfig.baseSpeed * modifiers.speedMultiplier;

    // Sampled once, before movement, and reused for the ice slip below.
    const inWater = intersectsAny(actor.rect, room.water);
    if (inWater && isWaterDragging(season)) {
        actor.velocityX *= surfaces.waterDrag * modifiers.waterDragMultiplier;
    }

    if (isWindBlowing(season)) {
        for (const zone of room.wind) {
            if (rectanglesIntersect(actor.rect, zone)) {
                actor.velocityX += modifiers.windPush;
            }
        }
    }

    actor.velocityY = Math.min(
        actor.velocityY + actorConfig.baseGravity * modifiers.gravityMultiplier,
        actorConfig.maxFallSpeed,
    );

    const platforms = activePlatforms(room, season);

    actor.rect = moveBy(actor.rect, roundHalfEven(actor.velocityX), 0);
    resolveHorizontal(actor, platforms);

    actor.rect = moveBy(actor.rect, 0, roundHalfEven(actor.velocityY));
    actor.grounded = false;
    resolveVertical(actor, platforms);

    if (inWater && isWaterSolid(season)) {
        actor.velocityX *= surfaces.iceSlip * modifiers.iceSlip;
    }

    actor.rect = clampToWorld(actor.rect, config.world);
};

export const jumpVelocity = (modifiers: Pick<Modifiers, 'jumpMultiplier'>, config: Pick<ActorPhysicsConfig, 'actor'>): number =>
    config.actor.baseJump * modifiers.jumpMultiplier;

/** Edge-triggered; only a grounded actor can leave the ground. */
export const tryJump = (
    actor: Actor,
    modifiers: Pick<Modifiers, 'jumpMultiplier'>,
    config: Pick<ActorPhysicsConfig, 'actor'>,
): boolean => {
    if (!actor.grounded) {
        return false;
    }
    actor.velocityY = -jumpVelocity(modifiers, config);
    actor.grounded = false;
    return true;
};
