#!/usr/bin/env node

import { Command } from 'commander';
import { errorMessage } from '@gh-workspace/core';
import { createRequire } from 'module';
import { createContext, type CliContext } from './context.js';
import type { ExitCode } from './output.js';
import { setupCommand } from './commands/setup.js';
import { runCommand } from './commands/run.js';
import { teardownCommand } from './commands/teardown.js';
import { resolveCommand } from './commands/resolve.js';
import { classifyCommand } from './commands/classify.js';
import { prUrlCommand, prNumberCommand, mailCommand } from './commands/pr.js';
import { submitCommand } from './commands/submit.js';
import { createChangeCommand } from './commands/create-change.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

program
    .name('ghws')
    .description('Pooled GitHub workspaces for automated runs, printed as key=value lines')
    .version(pkg.version)
    .option('-v, --verbose', 'Log the git and gh commands being run');

/**
 * Run a command handler with a fresh context and set the exit code.
 */
function handle(fn: (ctx: CliContext) => Promise<ExitCode>): Promise<void> {
    const opts: { verbose?: boolean } = program.opts();
    const ctx = createContext({ verbose: opts.verbose });
    return fn(ctx).then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            ctx.logger.error(errorMessage(error));
            process.exitCode = 1;
        }
    );
}

// Workspace runs
program
    .command('setup <ref>')
    .description('Resolve a reference, claim a workspace and reset it to the checkout target')
    .option('-n, --workspace <num>', 'Use this workspace number')
    .option('--no-release', 'Keep the workspace claimed after the run')
    .action((ref: string, options: { workspace?: string; release?: boolean }) =>
        handle((ctx) => setupCommand(ctx, ref, options))
    );

program
    .command('run <ref> [command...]')
    .description('Run a command in a claimed workspace, then release it and report the diff')
    .option('-n, --workspace <num>', 'Use this workspace number')
    .option('--no-release', 'Keep the workspace claimed after the run')
    .action((ref: string, command: string[], options: { workspace?: string; release?: boolean }) =>
        handle((ctx) => runCommand(ctx, ref, command, options))
    );

program
    .command('teardown <ref>')
    .description('Finish a run started with setup: release its workspace and report the diff')
    .requiredOption('-n, --workspace <num>', 'Workspace number printed by setup')
    .option('--head-before <commit>', 'head_before printed by setup')
    .option('--no-release', 'Keep the workspace claimed')
    .action((ref: string, options: { workspace: string; headBefore?: string; release?: boolean }) =>
        handle((ctx) => teardownCommand(ctx, ref, options))
    );

program
    .command('resolve <ref>')
    .description('Resolve owner/repo, a project name or a change name')
    .action((ref: string) => handle((ctx) => resolveCommand(ctx, ref)));

program
    .command('classify <project-file>')
    .description('Report the workflow type and change label of a project')
    .action((projectFile: string) => handle((ctx) => classifyCommand(ctx, projectFile)));

// Pull requests
program
    .command('pr-url')
    .description('URL of the PR for the current branch')
    .option('-C, --cwd <dir>', 'Workspace directory')
    .action((options: { cwd?: string }) => handle((ctx) => prUrlCommand(ctx, options)));

program
    .command('pr-number')
    .description('Number of the PR for the current branch')
    .option('-C, --cwd <dir>', 'Workspace directory')
    .action((options: { cwd?: string }) => handle((ctx) => prNumberCommand(ctx, options)));

program
    .command('mail <revision>')
    .description('Push a revision and open a PR if it has none')
    .option('-C, --cwd <dir>', 'Workspace directory')
    .action((revision: string, options: { cwd?: string }) =>
        handle((ctx) => mailCommand(ctx, revision, options))
    );

program
    .command('submit <change>')
    .description('Merge the PR of a change and mark it Submitted')
    .action((change: string) => handle((ctx) => submitCommand(ctx, change)));

program
    .command('create-change')
    .description('Record a change for the branch pushed from this workspace')
    .requiredOption('--name <branch>', 'Branch name')
    .requiredOption('--prompt <text>', 'Prompt the work was started from')
    .option('-C, --cwd <dir>', 'Workspace directory')
    .action((options: { name: string; prompt: string; cwd?: string }) =>
        handle((ctx) => createChangeCommand(ctx, options))
    );

await program.parseAsync();
