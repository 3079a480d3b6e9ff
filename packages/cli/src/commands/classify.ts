import type { CliContext } from '../context.js';
import { printKeyValues, type ExitCode } from '../output.js';

export const CLASSIFY_KEYS = ['workflow_type', 'change_label'] as const;

/**
 * Report which workflow owns a project. An unowned project is not an error.
 */
export async function classifyCommand(ctx: CliContext, projectFile: string): Promise<ExitCode> {
    const detected = await ctx.providers.detect(projectFile);
    const changeLabel = detected ? detected.provider.changeLabelFor(detected.workflowType) : null;

    printKeyValues(
        CLASSIFY_KEYS,
        { workflow_type: detected?.workflowType, change_label: changeLabel },
        ctx.write
    );
    return 0;
}
