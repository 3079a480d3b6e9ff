import { errorMessage } from '@gh-workspace/core';
import type { CliContext } from '../context.js';
import { exitCodeFor, printKeyValues, type ExitCode } from '../output.js';

const SUBMIT_KEYS = ['success', 'error'] as const;

/**
 * Submit a change through the provider that owns its project
 */
export async function submitCommand(ctx: CliContext, changeName: string): Promise<ExitCode> {
    const fail = (error: string): ExitCode => {
        printKeyValues(SUBMIT_KEYS, { success: false, error }, ctx.write);
        return 1;
    };

    try {
        const change = await ctx.changes.find(changeName);
        if (!change) {
            return fail(`ChangeSpec '${changeName}' not found`);
        }

        const detected = await ctx.providers.detect(change.filePath);
        const result = detected ? await detected.provider.submit(change) : null;
        if (!result) {
            return fail(`No workspace provider handles ${change.filePath}`);
        }

        if (result.success) {
            ctx.logger.info(`Submitted ${changeName}`);
        }
        printKeyValues(SUBMIT_KEYS, { success: result.success, error: result.error }, ctx.write);
        return exitCodeFor(result.success);
    } catch (error) {
        return fail(errorMessage(error));
    }
}
