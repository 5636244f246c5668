import { runHeadlessSimulation, type SimulationInput } from 'cli/simulate';

const INPUTS: readonly SimulationInput[] = [
    { mode: 'simulate', seed: 17, maxFrames: 3600 },
    { mode: 'simulate', seed: 42, maxFrames: 3600, echoSeeds: ['swiftstride', 'moonlight-bones'] },
];

const serialize = (value: unknown): string => JSON.stringify(value, null, 2);

const fail = (message: string, details?: { expected?: unknown; actual?: unknown }) => {
    console.error(`[simulate:verify] ${message}`);
    if (details?.expected !== undefined) {
        console.error(`[simulate:verify] expected: ${serialize(details.expected)}`);
    }
    if (details?.actual !== undefined) {
        console.error(`[simulate:verify] actual: ${serialize(details.actual)}`);
    }
    process.exit(1);
};

const main = async (): Promise<void> => {
    for (const input of INPUTS) {
        const first = await runHeadlessSimulation(input);
        const second = await runHeadlessSimulation(input);

        if (serialize(first) !== serialize(second)) {
            fail(`simulation for seed ${input.seed ?? 'default'} differed across runs`, {
                expected: first,
                actual: second,
            });
        }

        // Feeding the recorded inputs back must land on the same final state.
        const recorded = await runHeadlessSimulation({ ...input, options: { recordInputs: true } });
        if (!recorded.inputs) {
            fail('simulation did not return recorded inputs');
            return;
        }
        const replayed = await runHeadlessSimulation({ mode: 'simulate', maxFrames: input.maxFrames, replay: recorded.inputs });
        if (serialize(replayed.snapshot) !== serialize(first.snapshot)) {
            fail(`replay for seed ${input.seed ?? 'default'} diverged from the live run`, {
                expected: first.snapshot,
                actual: replayed.snapshot,
            });
        }

        console.log(
            `[simulate:verify] seed ${input.seed ?? 'default'}: outcome=${first.outcome}, rooms=${first.roomsCleared}/${first.roomCount}, frames=${first.frames}.`,
        );
    }
};

main().catch((error: unknown) => {
    fail(`unexpected error: ${error instanceof Error ? error.message : String(error)}`);
});
