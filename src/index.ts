import { access } from 'fs/promises';
import path from 'path';
import { performance } from 'perf_hooks';
import { createInterface, type Interface } from 'readline/promises';
import { fileURLToPath } from 'url';

import { USAGE, parseCliArgs, parseUntilFlag, runUntil } from './cli';
import { type SimulationConfig, loadConfig } from './config';
import { SIMULATION_ERRORS, isSimulationError } from './errors';
import { parseStopTime } from './simulation/setup';
import type { SimulationData } from './types/records';
import { type Logger, silentLogger } from './types/simulation';
import { DataLoader } from './utils/data-loader';
import type { TimeOfDay } from './utils/time-utils';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_DATA_DIR = path.resolve(__dirname, '..', 'data');
const CONFIG_FILE = 'simulation.json';

/** `simulation.json` beside the data files, when there is one */
const findDefaultConfig = async (dataDir: string): Promise<string | undefined> => {
    const candidate = path.join(dataDir, CONFIG_FILE);
    try {
        await access(candidate);
        return candidate;
    } catch {
        return undefined;
    }
};

const printRun = (data: SimulationData, config: SimulationConfig, stopAt: TimeOfDay, logger: Logger) => {
    const start = performance.now();
    const lines = runUntil(data, config, stopAt, logger);
    const elapsed = performance.now() - start;

    console.log(lines.join('\n'));
    console.log(`Simulated in ${elapsed.toFixed(1)} ms`);
};

const askStopTime = async (rl: Interface, config: SimulationConfig): Promise<TimeOfDay> => {
    for (;;) {
        console.log('What time should the simulation stop?');
        console.log('Use the format HH:MM (24-hour)');

        try {
            return parseStopTime(await rl.question('Time: '), config);
        } catch (error) {
            if (!isSimulationError(error, SIMULATION_ERRORS.INVALID_TIME)) {
                throw error;
            }
            console.log(`Sorry, that selection is invalid. ${error.message}`);
        }
    }
};

const runMenu = async (data: SimulationData, config: SimulationConfig, logger: Logger) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });

    try {
        console.log('Welcome to the Delivery Day Simulator!');

        for (;;) {
            console.log('Please select from the following options:');
            console.log('1: Run until end of day');
            console.log('2: Run until a specific time');
            console.log('3: Exit');

            const selection = (await rl.question('Your selection: ')).trim();
            if (selection === '1') {
                printRun(data, config, config.endOfDay, logger);
            } else if (selection === '2') {
                printRun(data, config, await askStopTime(rl, config), logger);
            } else if (selection === '3') {
                return;
            } else {
                console.log('Sorry, that is an invalid selection.');
            }
            console.log('');
        }
    } finally {
        rl.close();
    }
};

async function main(): Promise<void> {
    const options = parseCliArgs(process.argv.slice(2));
    const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
    const config = await loadConfig(options.configFile ?? (await findDefaultConfig(dataDir)));
    const data = await new DataLoader().loadFromDirectory(dataDir);
    const logger: Logger = options.verbose ? console : silentLogger;

    if (options.until !== undefined) {
        printRun(data, config, parseUntilFlag(options.until, config), logger);
        return;
    }

    await runMenu(data, config, logger);
}

main().catch(error => {
    if (isSimulationError(error, SIMULATION_ERRORS.INVALID_USAGE)) {
        console.error(error.message);
        console.error(USAGE);
    } else {
        console.error('\nSimulation failed:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
});
