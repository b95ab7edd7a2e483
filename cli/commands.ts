/**
 * The three plan-query commands. Each returns one CommandResult and never
 * throws; failures become an error notification.
 */

import type { CommandResult, PlanRecord } from '../src/types';
import { describeError, toPlanQueryError } from '../src/lib/errors/types';
import { logger } from '../src/lib/logger';
import type { WritableDesignModel } from '../src/lib/model/design-model';
import {
    PROJECT_ATTRIBUTE_FIELDS,
    applyProjectAttributes,
    ensureProjectAttributes,
    readProjectAttributes,
    validateProjectAttributes,
    type ProjectAttributeField,
    type ProjectAttributeValues
} from '../src/lib/model/project-attributes';
import { buildPlanRecordWithDiagnostics } from '../src/lib/processing/plan-record-builder';
import { formatPlanDetails, formatPlanSummary } from '../src/lib/processing/plan-summary';
import type { PlanStore } from '../src/lib/sync/plan-store';
import { PlanSynchronizer } from '../src/lib/sync/synchronizer';
import { getMissingRequiredFields, type ProjectOptions } from '../src/lib/validation';
import type { Prompter } from './prompt';

export interface CommandContext {
    prompter: Prompter;
    loadModel(): Promise<WritableDesignModel>;
    loadOptions(): Promise<ProjectOptions>;
    /** Opened only once a sync is confirmed */
    openStore(): PlanStore;
}

function failed(title: string, error: unknown): CommandResult {
    const planError = toPlanQueryError(error);
    logger.error(title, { code: planError.code, message: planError.message });
    return { outcome: 'failed', notification: { level: 'error', title, message: describeError(planError) } };
}

function cancelled(message: string): CommandResult {
    return { outcome: 'cancelled', notification: { level: 'info', title: 'Cancelled', message } };
}

function describeExisting(record: PlanRecord): string {
    return `A plan "${record.planName}" (${record.specLevel}, ${record.clientSubdivision}) already exists. Update it?`;
}

// === EXTRACT AND SYNC ===

// A close failure is logged only; the sync outcome already stands
async function closeStore(store: PlanStore): Promise<void> {
    try {
        await store.close();
    } catch (error) {
        const planError = toPlanQueryError(error);
        logger.warn('Could not close the plan store', { code: planError.code, message: planError.message });
    }
}

export async function runExtractAndSync(ctx: CommandContext): Promise<CommandResult> {
    try {
        const model = await ctx.loadModel();
        const { record } = buildPlanRecordWithDiagnostics(model);

        const missing = getMissingRequiredFields(record);
        if (missing.length > 0) {
            return {
                outcome: 'failed',
                notification: {
                    level: 'warning',
                    title: 'Missing Information',
                    message: `Set these project attributes before syncing (edit-attributes): ${missing.join(', ')}`
                }
            };
        }

        const proceed = await ctx.prompter.confirm(`${formatPlanDetails(record)}\n\nSync this plan?`);
        if (!proceed) return cancelled('Sync cancelled. Nothing was written.');

        const store = ctx.openStore();
        try {
            const result = await new PlanSynchronizer(store).synchronize(record, () =>
                ctx.prompter.confirm(describeExisting(record))
            );

            if (result.status === 'cancelled') return cancelled('Update declined. The stored plan was not changed.');

            return {
                outcome: 'succeeded',
                notification: {
                    level: 'success',
                    title: result.status === 'inserted' ? 'Plan Added' : 'Plan Updated',
                    message: formatPlanSummary(record)
                }
            };
        } finally {
            await closeStore(store);
        }
    } catch (error) {
        return failed('Sync Failed', error);
    }
}

// === ADD REQUIRED ATTRIBUTES ===

export async function runAddAttributes(ctx: CommandContext): Promise<CommandResult> {
    try {
        const model = await ctx.loadModel();
        const { added, existing } = ensureProjectAttributes(model);

        if (added.length === 0) {
            return {
                outcome: 'succeeded',
                notification: { level: 'info', title: 'Attributes Present', message: `Already defined: ${existing.join(', ')}` }
            };
        }

        await model.save();

        const lines = [`Added: ${added.join(', ')}`];
        if (existing.length > 0) lines.push(`Already defined: ${existing.join(', ')}`);
        return {
            outcome: 'succeeded',
            notification: { level: 'success', title: 'Attributes Added', message: lines.join('\n') }
        };
    } catch (error) {
        return failed('Add Attributes Failed', error);
    }
}

// === EDIT PROJECT ATTRIBUTES ===

function selectionLists(options: ProjectOptions): Record<ProjectAttributeField, readonly string[] | null> {
    return {
        planName: null,
        specLevel: options.specLevels,
        clientName: options.clientNames,
        clientDivision: options.clientDivisions,
        clientSubdivision: null,
        garageLoading: options.garageLoadings
    };
}

async function collectValues(
    prompter: Prompter,
    current: ProjectAttributeValues,
    options: ProjectOptions
): Promise<ProjectAttributeValues> {
    const lists = selectionLists(options);
    const values = { ...current };

    for (const { field, label } of PROJECT_ATTRIBUTE_FIELDS) {
        const list = lists[field];
        values[field] = list
            ? await prompter.choose(label, list, current[field])
            : await prompter.ask(label, current[field]);
    }

    return values;
}

export async function runEditAttributes(ctx: CommandContext): Promise<CommandResult> {
    try {
        const model = await ctx.loadModel();
        const options = await ctx.loadOptions();
        const values = await collectValues(ctx.prompter, readProjectAttributes(model), options);

        const missing = validateProjectAttributes(values);
        if (missing.length > 0) {
            return {
                outcome: 'failed',
                notification: { level: 'warning', title: 'Missing Information', message: `Required: ${missing.join(', ')}` }
            };
        }

        if (!(await ctx.prompter.confirm('Save these values?'))) {
            return cancelled('Project attributes were not changed.');
        }

        const { written, notInModel } = applyProjectAttributes(model, values);
        await model.save();

        if (notInModel.length > 0) {
            return {
                outcome: 'succeeded',
                notification: {
                    level: 'warning',
                    title: 'Attributes Saved',
                    message: `Saved ${written.length} attributes. Not defined in the model (run add-attributes): ${notInModel.join(', ')}`
                }
            };
        }

        return {
            outcome: 'succeeded',
            notification: { level: 'success', title: 'Attributes Saved', message: `Saved ${written.length} attributes.` }
        };
    } catch (error) {
        return failed('Edit Attributes Failed', error);
    }
}
