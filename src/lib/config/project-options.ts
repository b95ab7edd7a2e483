import { readFile } from 'fs/promises';
import path from 'path';
import { ErrorCode, PlanQueryError } from '../errors/types';
import { ProjectOptionsSchema, formatZodIssues, type ProjectOptions } from '../validation';

/**
 * Selection lists offered by the project attribute form.
 * Loaded per command and passed to the form; nothing is cached here.
 */
export async function loadProjectOptions(filePath: string): Promise<ProjectOptions> {
    const absolutePath = path.resolve(filePath);

    let data: unknown;
    try {
        data = JSON.parse(await readFile(absolutePath, 'utf-8'));
    } catch (error) {
        throw PlanQueryError.create(
            ErrorCode.CONFIG_OPTIONS_INVALID,
            `Could not read project options: ${absolutePath}`,
            { path: absolutePath },
            error instanceof Error ? error : undefined
        );
    }

    const result = ProjectOptionsSchema.safeParse(data);
    if (!result.success) {
        const issues = formatZodIssues(result.error);
        throw PlanQueryError.create(
            ErrorCode.CONFIG_OPTIONS_INVALID,
            `Invalid project options ${absolutePath}:\n${issues.join('\n')}`,
            { path: absolutePath, issues }
        );
    }

    return result.data;
}
