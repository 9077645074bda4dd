#!/usr/bin/env node
import { createDependencies } from './presentation/app';
import { defaultAutomationConfig, loadConfig, validateConfig } from './config';
import { assertAutomationConfig } from './config/automationConfig';
import { ConfigurationError, getErrorMessage } from './domain/errors';

export interface CliOptions {
    count?: number;
    reset: boolean;
}

/**
 * Parses `--count N` (or `--count=N`) and `--reset`.
 */
export function parseCliArgs(argv: string[]): CliOptions {
    const options: CliOptions = { reset: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--reset') {
            options.reset = true;
        } else if (arg === '--count' || arg.startsWith('--count=')) {
            const raw = arg === '--count' ? argv[++i] : arg.slice('--count='.length);
            const count = Number(raw);
            if (raw === undefined || !Number.isInteger(count) || count < 1) {
                throw new ConfigurationError(`--count must be an integer >= 1, got: ${raw ?? '(missing)'}`);
            }
            options.count = count;
        } else {
            throw new ConfigurationError(`Unknown argument: ${arg}`);
        }
    }
    return options;
}

async function main(): Promise<number> {
    const options = parseCliArgs(process.argv.slice(2));

    const config = loadConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        return 1;
    }

    const automationConfig = {
        ...defaultAutomationConfig(config),
        ...(options.count !== undefined && { productsPerRun: options.count }),
    };
    assertAutomationConfig(automationConfig);

    const { jobRunner, cursorStore } = createDependencies(config);
    if (options.reset) {
        await cursorStore.reset();
    }

    const job = await jobRunner.runNow('cli', automationConfig);
    if (job.status !== 'completed') {
        console.error(`❌ Automation failed: ${job.error ?? 'unknown error'}`);
        return 1;
    }

    console.log(`✅ ${job.result?.message ?? 'Done'} (${job.result?.productsProcessed ?? 0} product(s))`);
    return 0;
}

if (require.main === module) {
    main()
        .then((code) => process.exit(code))
        .catch((error) => {
            console.error('💥 Fatal error:', getErrorMessage(error));
            process.exit(1);
        });
}
