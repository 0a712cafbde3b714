#!/usr/bin/env node

/**
 * makegate CLI
 *
 * Usage:
 *   makegate [serve] [makefile]        Serve Makefile targets as MCP tools over stdio
 *   makegate preview [makefile]        Show which targets would be exposed
 *   makegate list [makefile]           Print exposed target names
 *   makegate run <target> [makefile]   Run one exposed target through the gate
 */

import { Command } from 'commander';
import chalk from 'chalk';
import gradient from 'gradient-string';
import type { ExecutionEvent, ExecutionStatus } from '../types/index.js';
import { parseFile } from '../parser/index.js';
import { buildCatalog, checkAllowList } from '../catalog/index.js';
import { resolveConfig, splitList, type ConfigFlags } from '../config/index.js';
import { SERVER_VERSION, formatDuration, formatRun, loadServerContext, runTarget, startStdioServer } from '../mcp/index.js';
import { setLogLevel } from '../logger.js';
import { toError } from '../errors.js';
import { formatList, formatPreview, formatToolDescriptions } from './format.js';
import { collectAssignment, exitCodeFor } from './args.js';

const program = new Command();

const ASCII_LOGO = `
 ┌┬┐┌─┐┬┌─┌─┐┌─┐┌─┐┌┬┐┌─┐
 │││├─┤├┴┐├┤ │ ┬├─┤ │ ├┤
 ┴ ┴┴ ┴┴ ┴└─┘└─┘┴ ┴ ┴ └─┘
`;

program
  .name('makegate')
  .description('Expose documented Makefile targets as MCP tools, behind an allow-list.')
  .version(SERVER_VERSION)
  .addHelpText('before', gradient(['#00ff41', '#00d4ff'])(ASCII_LOGO));

interface ServeOptions {
  logLevel?: string;
  allowedTargets?: string;
  maxOutputChars?: string;
  writeToFile?: boolean;
  tempDir?: string;
  timeout?: string;
  makeCommand?: string;
}

function flagsFrom(makefile: string | undefined, opts: ServeOptions): ConfigFlags {
  return {
    makefile,
    allowedTargets: opts.allowedTargets === undefined ? undefined : splitList(opts.allowedTargets),
    logLevel: opts.logLevel,
    maxOutputChars: opts.maxOutputChars,
    writeToFile: opts.writeToFile,
    tempDir: opts.tempDir,
    defaultTimeoutSeconds: opts.timeout,
    makeCommand: opts.makeCommand,
  };
}

function fail(err: unknown): never {
  console.error(chalk.red(`Error: ${toError(err).message}`));
  process.exit(1);
}

// ─── serve ───────────────────────────────────────────────────────────

program
  .command('serve', { isDefault: true })
  .description('Start the MCP server on stdio (default command)')
  .argument('[makefile]', 'Makefile to serve (default: $MAKEGATE_MAKEFILE or ./Makefile)')
  .option('--log-level <level>', 'debug | info | warn | error | silent')
  .option('--allowed-targets <list>', 'Comma-separated targets to expose; others stay hidden')
  .option('--max-output-chars <n>', 'Truncate tool output to this many characters (0 = unlimited)')
  .option('--write-to-file', 'Save full output of every run to a log file')
  .option('--no-write-to-file', 'Do not save output files')
  .option('--temp-dir <dir>', 'Directory for the output session')
  .option('--timeout <seconds>', 'Default timeout for a run')
  .option('--make-command <command>', 'Program used in place of make')
  .action(async (makefile: string | undefined, opts: ServeOptions) => {
    try {
      const config = resolveConfig(flagsFrom(makefile, opts));
      setLogLevel(config.logLevel);
      await startStdioServer(config);
    } catch (err) {
      fail(err);
    }
  });

// ─── preview ─────────────────────────────────────────────────────────

program
  .command('preview')
  .description('Show which targets would be exposed as tools, and which stay hidden')
  .argument('[makefile]', 'Makefile to inspect')
  .option('--allowed-targets <list>', 'Comma-separated allow-list to apply')
  .action(async (makefile: string | undefined, opts: { allowedTargets?: string }) => {
    try {
      const config = resolveConfig(flagsFrom(makefile, opts));
      setLogLevel(config.logLevel === 'info' ? 'warn' : config.logLevel);
      const rules = await parseFile(config.makefile);
      const check = checkAllowList(rules, config.allowedTargets);
      if (check.missing.length > 0) {
        console.error(chalk.yellow(`⚠ Allowed targets not found in Makefile: ${check.missing.join(', ')}`));
      }
      console.log(formatPreview(rules, buildCatalog(rules, config.allowedTargets)));
    } catch (err) {
      fail(err);
    }
  });

// ─── list ────────────────────────────────────────────────────────────

program
  .command('list')
  .description('Print the names of exposed targets, one per line')
  .argument('[makefile]', 'Makefile to inspect')
  .option('--allowed-targets <list>', 'Comma-separated allow-list to apply')
  .option('-d, --describe', 'Include each tool description')
  .action(async (makefile: string | undefined, opts: { allowedTargets?: string; describe?: boolean }) => {
    try {
      const config = resolveConfig(flagsFrom(makefile, opts));
      setLogLevel(config.logLevel === 'info' ? 'warn' : config.logLevel);
      const rules = await parseFile(config.makefile);
      const catalog = buildCatalog(rules, config.allowedTargets);
      const text = opts.describe ? formatToolDescriptions(catalog) : formatList(catalog);
      if (text) console.log(text);
    } catch (err) {
      fail(err);
    }
  });

// ─── run ─────────────────────────────────────────────────────────────

const STATUS_ICON: Record<ExecutionStatus, string> = {
  succeeded: chalk.green('✓'),
  failed: chalk.red('✗'),
  timed_out: chalk.yellow('⏱'),
  not_found: chalk.red('✗'),
  not_allowed: chalk.red('✗'),
};

program
  .command('run')
  .description('Run one exposed target with the same checks the MCP server applies')
  .argument('<target>', 'Target to run')
  .argument('[makefile]', 'Makefile that defines it')
  .option('-e, --var <KEY=VALUE>', 'Make variable (repeatable)', collectAssignment, {})
  .option('-t, --timeout <seconds>', 'Timeout for this run')
  .option('--allowed-targets <list>', 'Comma-separated allow-list to apply')
  .option('--write-to-file', 'Save the full output to a log file')
  .option('--temp-dir <dir>', 'Directory for the output session')
  .option('--make-command <command>', 'Program used in place of make')
  .action(async (
    target: string,
    makefile: string | undefined,
    opts: ServeOptions & { var: Record<string, string> },
  ) => {
    try {
      const config = resolveConfig(flagsFrom(makefile, { ...opts, timeout: undefined }));
      setLogLevel(config.logLevel === 'info' ? 'warn' : config.logLevel);
      const context = await loadServerContext(config);

      const timeoutSeconds = opts.timeout === undefined ? undefined : Number(opts.timeout);
      const onEvent = (event: ExecutionEvent) => {
        if (event.type === 'started') console.error(chalk.dim(`▶ ${target} (pid ${event.pid})`));
        if (event.type === 'output') process.stdout.write(event.chunk);
      };
      const run = await runTarget(context, { target, variables: opts.var, timeoutSeconds }, onEvent);
      const { result } = run;

      if (run.output === undefined) {
        // rejected or never started: nothing was streamed
        console.error(chalk.red(formatRun(run)));
      } else {
        const exit = result.exitCode === undefined ? '' : ` (exit ${result.exitCode})`;
        console.error(`${STATUS_ICON[result.status]} ${target} ${result.status}${exit} in ${formatDuration(result.durationMs)}`);
        if (run.output.artifact) console.error(chalk.dim(`Full output written to: ${run.output.artifact.path}`));
        if (run.output.persistError) console.error(chalk.yellow(`Could not write output file: ${run.output.persistError}`));
      }
      process.exitCode = exitCodeFor(result);
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync();
