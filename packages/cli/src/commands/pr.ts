import type { CliContext } from '../context.js';
import { exitCodeFor, printKeyValues, type ExitCode } from '../output.js';

interface CwdOptions {
    cwd?: string;
}

export async function prUrlCommand(ctx: CliContext, options: CwdOptions): Promise<ExitCode> {
    const { url } = await ctx.github.actions.getChangeUrl(options.cwd ?? process.cwd());
    printKeyValues(['url'], { url }, ctx.write);
    return 0;
}

export async function prNumberCommand(ctx: CliContext, options: CwdOptions): Promise<ExitCode> {
    const { number } = await ctx.github.actions.getChangeNumber(options.cwd ?? process.cwd());
    printKeyValues(['number'], { number }, ctx.write);
    return 0;
}

/**
 * Push a revision and make sure it has a PR
 */
export async function mailCommand(ctx: CliContext, revision: string, options: CwdOptions): Promise<ExitCode> {
    const result = await ctx.github.actions.mail(revision, options.cwd ?? process.cwd());
    printKeyValues(['success', 'error'], { success: result.success, error: result.error }, ctx.write);
    return exitCodeFor(result.success);
}
