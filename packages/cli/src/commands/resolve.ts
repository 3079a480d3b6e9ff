import { errorMessage } from '@gh-workspace/core';
import type { CliContext } from '../context.js';
import { printKeyValues, type ExitCode } from '../output.js';

export const RESOLVE_KEYS = [
    'success',
    'error',
    'project_name',
    'project_file',
    'primary_workspace_dir',
    'checkout_target',
] as const;

export async function resolveCommand(ctx: CliContext, ref: string): Promise<ExitCode> {
    try {
        const resolved = await ctx.github.resolve(ref);
        printKeyValues(
            RESOLVE_KEYS,
            {
                success: true,
                project_name: resolved.projectName,
                project_file: resolved.projectFile,
                primary_workspace_dir: resolved.primaryWorkspaceDir,
                checkout_target: resolved.checkoutTarget,
            },
            ctx.write
        );
        return 0;
    } catch (error) {
        printKeyValues(RESOLVE_KEYS, { success: false, error: errorMessage(error) }, ctx.write);
        return 1;
    }
}
