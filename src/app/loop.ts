import { gameConfig } from 'config/game';
import { clamp } from 'util/math';

export type FrameScheduler = (callback: (timestamp: number) => void) => number;
export type FrameCanceller = (handle: number) => void;

export const DEFAULT_FIXED_DELTA = gameConfig.loop.fixedDelta;
export const DEFAULT_STEP_MS = DEFAULT_FIXED_DELTA * 1000;

const pendingTimers = new Map<number, ReturnType<typeof setTimeout>>();
let timerSequence = 0;

const monotonicNow = (): number => performance.now();

/** Host-independent default: one wake-up per logical step. */
const timerScheduler: FrameScheduler = (callback) => {
    timerSequence += 1;
    const handle = timerSequence;
    pendingTimers.set(
        handle,
        setTimeout(() => {
            pendingTimers.delete(handle);
            callback(monotonicNow());
        }, DEFAULT_STEP_MS),
    );
    return handle;
};

const timerCanceller: FrameCanceller = (handle) => {
    const pending = pendingTimers.get(handle);
    if (pending !== undefined) {
        clearTimeout(pending);
        pendingTimers.delete(handle);
    }
};

export interface LoopOptions {
    readonly fixedDelta?: number;
    readonly maxStepsPerFrame?: number;
    readonly maxFrameDeltaMs?: number;
    readonly now?: () => number;
    readonly schedule?: FrameScheduler;
    readonly cancel?: FrameCanceller;
}

/** One logical frame. `simulatedMs` advances by exactly one step per frame. */
export interface LoopStep {
    readonly frame: number;
    readonly simulatedMs: number;
    readonly deltaSeconds: number;
}

export interface GameLoop {
    start(): void;
    stop(): void;
    isRunning(): boolean;
    framesStepped(): number;
}

export type StepCallback = (step: LoopStep) => void;
export type RenderCallback = (alpha: number) => void;

export class FixedStepLoop implements GameLoop {
    private readonly deltaSeconds: number;

    private readonly stepMs: number;

    private readonly stepCap: number;

    private readonly frameClampMs: number;

    private readonly clock: () => number;

    private readonly schedule: FrameScheduler;

    private readonly cancel: FrameCanceller;

    private backlogMs = 0;

    private previousWake = 0;

    private frame = 0;

    private handle: number | null = null;

    private active = false;

    constructor(
        private readonly onStep: StepCallback,
        private readonly onRender: RenderCallback,
        options: LoopOptions = {},
    ) {
        const requestedDelta = options.fixedDelta ?? DEFAULT_FIXED_DELTA;
        this.deltaSeconds = requestedDelta > 0 ? requestedDelta : DEFAULT_FIXED_DELTA;
        this.stepMs = this.deltaSeconds * 1000;
        this.stepCap = Math.max(1, Math.floor(options.maxStepsPerFrame ?? gameConfig.loop.maxStepsPerFrame));
        // Never below one step, or a slow host would stall the run.
        this.frameClampMs = Math.max(this.stepMs, options.maxFrameDeltaMs ?? gameConfig.loop.maxFrameDeltaMs);
        this.clock = options.now ?? monotonicNow;
        this.schedule = options.schedule ?? timerScheduler;
        this.cancel = options.cancel ?? timerCanceller;
    }

    start(): void {
        if (this.active) {
            return;
        }
        this.active = true;
        this.backlogMs = 0;
        this.previousWake = this.clock();
        this.handle = this.schedule(this.wake);
    }

    stop(): void {
        if (!this.active) {
            return;
        }
        this.active = false;
        if (this.handle !== null) {
            this.cancel(this.handle);
            this.handle = null;
        }
    }

    isRunning(): boolean {
        return this.active;
    }

    framesStepped(): number {
        return this.frame;
    }

    private readonly wake = (): void => {
        if (!this.active) {
            return;
        }

        const wokeAt = this.clock();
        this.backlogMs += clamp(wokeAt - this.previousWake, 0, this.frameClampMs);
        this.previousWake = wokeAt;

        let stepsThisWake = 0;
        while (this.backlogMs >= this.stepMs && stepsThisWake < this.stepCap) {
            this.backlogMs -= this.stepMs;
            stepsThisWake += 1;
            this.onStep({
                frame: this.frame,
                simulatedMs: this.frame * this.stepMs,
                deltaSeconds: this.deltaSeconds,
            });
            this.frame += 1;
            if (!this.active) {
                return;
            }
        }

        if (stepsThisWake === this.stepCap) {
            this.backlogMs = Math.min(this.backlogMs, this.stepMs);
        }

        this.onRender(Math.min(1, this.backlogMs / this.stepMs));
        this.handle = this.schedule(this.wake);
    };
}

export const createGameLoop = (onStep: StepCallback, onRender: RenderCallback, options?: LoopOptions): GameLoop =>
    new FixedStepLoop(onStep, onRender, options);
