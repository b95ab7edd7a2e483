#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig, loadLocalConfig } from '../src/lib/config/app-config';
import { loadProjectOptions } from '../src/lib/config/project-options';
import { ErrorCode, PlanQueryError, describeError } from '../src/lib/errors/types';
import { logger } from '../src/lib/logger';
import { loadModelSnapshot } from '../src/lib/model/snapshot-model';
import { createPlanStore } from '../src/lib/sync/store-factory';
import type { CommandResult } from '../src/types';
import { runAddAttributes, runEditAttributes, runExtractAndSync, type CommandContext } from './commands';
import { EXIT_CODES, notify } from './notifier';
import { ReadlinePrompter } from './prompt';

// Load env from .env
dotenv.config({ path: '.env' });

const COMMANDS: Record<string, (ctx: CommandContext) => Promise<CommandResult>> = {
    sync: runExtractAndSync,
    'add-attributes': runAddAttributes,
    'edit-attributes': runEditAttributes
};

const USAGE = `Usage: plan-query <command> [model-snapshot.json]

Commands:
  sync              Extract the plan from the model and add or update it in the plans table
  add-attributes    Define the project attributes plan sync needs
  edit-attributes   Edit plan name, spec level, client and garage loading

The snapshot path defaults to MODEL_PATH.`;

async function main(argv: string[]): Promise<number> {
    const [command, modelArg] = argv;
    const run = command ? COMMANDS[command] : undefined;
    if (!run) {
        console.error(USAGE);
        return EXIT_CODES.failed;
    }

    const prompter = new ReadlinePrompter();
    try {
        const local = loadLocalConfig();
        const modelPath = modelArg ?? local.modelPath;

        const ctx: CommandContext = {
            prompter,
            loadModel: async () => {
                if (!modelPath) {
                    throw PlanQueryError.create(ErrorCode.CONFIG_INVALID, 'No model snapshot given and MODEL_PATH is not set');
                }
                return loadModelSnapshot(modelPath);
            },
            loadOptions: () => loadProjectOptions(local.projectOptionsPath),
            openStore: () => createPlanStore(loadConfig().store)
        };

        logger.debug('Running command', { command, modelPath });
        const result = await run(ctx);
        notify(result.notification);
        return EXIT_CODES[result.outcome];
    } catch (error) {
        notify({ level: 'error', title: 'plan-query', message: describeError(error) });
        return EXIT_CODES.failed;
    } finally {
        prompter.close();
    }
}

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        logger.error('Unexpected failure', error instanceof Error ? error : { error: String(error) });
        process.exitCode = EXIT_CODES.failed;
    });
