import { isEchoSeedId, type EchoSeedId } from 'game/echo-seeds';
import { gameConfig } from 'config/game';
import { runHeadlessSimulation, type SimulationInput } from './simulate';
import { runTuningBot, type TuningBotOptions } from './tuning-bot';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

export const USAGE = 'Usage: echo-of-seasons <simulate|tune> [options]';

const VALUE_FLAGS = new Set(['--seed', '--frames', '--replay', '--echo-seeds', '--runs']);
const SWITCH_FLAGS = new Set(['--telemetry', '--record']);

/** `--flag value` pairs and bare switches; anything else is ignored. */
const readFlags = (args: readonly string[]): Map<string, string | true> => {
    const flags = new Map<string, string | true>();
    for (let index = 0; index < args.length; index += 1) {
        const arg = args[index];
        if (SWITCH_FLAGS.has(arg)) {
            flags.set(arg, true);
        } else if (VALUE_FLAGS.has(arg) && index + 1 < args.length) {
            flags.set(arg, args[index + 1]);
            index += 1;
        }
    }
    return flags;
};

const stringFlag = (flags: Map<string, string | true>, name: string): string | undefined => {
    const value = flags.get(name);
    return typeof value === 'string' ? value : undefined;
};

const integerFlag = (flags: Map<string, string | true>, name: string): number | undefined => {
    const raw = stringFlag(flags, name);
    if (raw === undefined) {
        return undefined;
    }
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : undefined;
};

// Unknown names are dropped.
const echoSeedsFlag = (flags: Map<string, string | true>): EchoSeedId[] | undefined =>
    stringFlag(flags, '--echo-seeds')
        ?.split(',')
        .map((part) => part.trim())
        .filter(isEchoSeedId);

const buildSimulationInput = (flags: Map<string, string | true>): SimulationInput => {
    const input: { -readonly [Key in keyof SimulationInput]: SimulationInput[Key] } = { mode: 'simulate' };

    const seed = integerFlag(flags, '--seed');
    const maxFrames = integerFlag(flags, '--frames');
    const replayPath = stringFlag(flags, '--replay');
    const echoSeeds = echoSeedsFlag(flags);
    if (seed !== undefined) {
        input.seed = seed;
    }
    if (maxFrames !== undefined) {
        input.maxFrames = maxFrames;
    }
    if (replayPath !== undefined) {
        input.replayPath = replayPath;
    }
    if (echoSeeds !== undefined) {
        input.echoSeeds = echoSeeds;
    }

    const telemetry = flags.has('--telemetry');
    const recordInputs = flags.has('--record');
    if (telemetry || recordInputs) {
        input.options = { telemetry, recordInputs };
    }
    return input;
};

const buildTuningOptions = (flags: Map<string, string | true>): TuningBotOptions => ({
    runs: integerFlag(flags, '--runs') ?? 10,
    maxFrames: integerFlag(flags, '--frames') ?? gameConfig.simulation.defaultMaxFrames,
    seed: integerFlag(flags, '--seed'),
    echoSeeds: echoSeedsFlag(flags),
});

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function createCli(argv: readonly string[] = process.argv.slice(2)): CliCommand {
    const execute = async (): Promise<number> => {
        const [command, ...rest] = argv;
        const flags = readFlags(rest);

        switch (command) {
            case 'simulate':
                try {
                    console.log(JSON.stringify(await runHeadlessSimulation(buildSimulationInput(flags))));
                    return 0;
                } catch (error) {
                    console.error(`Simulation failed: ${describeError(error)}`);
                    return 1;
                }
            case 'tune':
                try {
                    const { summary } = await runTuningBot(buildTuningOptions(flags));
                    console.log(JSON.stringify(summary));
                    return 0;
                } catch (error) {
                    console.error(`Tuning bot failed: ${describeError(error)}`);
                    return 1;
                }
            default:
                console.error(USAGE);
                return 1;
        }
    };

    return { execute };
}
