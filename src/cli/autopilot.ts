import type { SessionInput } from 'app/input';
import type { RunSnapshot } from 'app/run-state';
import { rectangleCenter } from 'util/geometry';

const ALIGN_DEAD_ZONE = 4;
const STUCK_FRAMES_BEFORE_JUMP = 2;
const CLIMB_REACH = 160;

export interface Autopilot {
    decide(snapshot: RunSnapshot, now: number): SessionInput;
}

/**
 * Scripted player for headless runs: walks toward the exit, hops when a wall
 * stops it or the exit sits above, and keeps cycling toward winter while
 * thorns are armed. Deterministic for a given snapshot sequence.
 */
export const createAutopilot = (): Autopilot => {
    let lastX: number | null = null;
    let lastRunId: string | null = null;
    let stuckFrames = 0;

    const decide: Autopilot['decide'] = (snapshot, now) => {
        if (snapshot.runId !== lastRunId) {
            lastRunId = snapshot.runId;
            lastX = null;
            stuckFrames = 0;
        }

        if (snapshot.outcome !== 'in-progress') {
            return { now, left: false, right: false, jump: false, cycleSeason: false, restart: false };
        }

        const { actor, room } = snapshot;
        const actorCenter = rectangleCenter(actor.rect);
        const exitCenter = rectangleCenter(room.exit);
        const dx = exitCenter.x - actorCenter.x;
        const right = dx > ALIGN_DEAD_ZONE;
        const left = dx < -ALIGN_DEAD_ZONE;

        stuckFrames = (left || right) && actor.rect.x === lastX ? stuckFrames + 1 : 0;
        lastX = actor.rect.x;

        const exitAbove = room.exit.y + room.exit.height < actor.rect.y && Math.abs(dx) < CLIMB_REACH;
        const jump = actor.grounded && (stuckFrames >= STUCK_FRAMES_BEFORE_JUMP || exitAbove);
        const cycleSeason = room.hazardsArmed && room.hazards.length > 0 && snapshot.season !== 'winter';

        return { now, left, right, jump, cycleSeason, restart: false };
    };

    return { decide };
};
