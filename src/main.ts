#!/usr/bin/env tsx
/**
 * taskloom - recursive task orchestration CLI
 *
 * Breaks a goal into planned, executed and verified steps over the tool
 * servers listed in the config.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { createInterface } from 'readline/promises';
import { config as loadEnv } from 'dotenv';
import type { CLIOptions, Config, RunResult, RunSnapshot, TaskStatus, TaskTree } from './types';
import { loadConfig, validateConfig } from './config';
import { ConfigError, FatalError, errorMessage } from './errors';
import { initLogger, getLogger } from './utils/logger';
import { ToolBroker, MCPSessionFactory } from './mcp';
import {
  AnthropicProvider,
  DangerGate,
  LlmPlanner,
  LlmVerifier,
  ToolExecutor,
} from './agents';
import type { AgentSet, ApprovalCallback, ApprovalRequest } from './agents';
import { AssistantService } from './service';

// Load environment variables
loadEnv();

const VERSION = '0.1.0';

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_FATAL = 2;

interface RunCommandOptions {
  config?: string;
  maxAttempts?: number;
  model?: string;
  deadline?: number;
  allowDangerous: boolean;
  verbose: boolean;
}

interface ToolsCommandOptions {
  config?: string;
  verbose: boolean;
}

const STATUS_ICONS: Record<TaskStatus, string> = {
  pending: chalk.dim('○'),
  active: chalk.cyan('◐'),
  success: chalk.green('✓'),
  failed: chalk.red('✗'),
  suspended: chalk.yellow('◌'),
  decomposed: chalk.blue('▸'),
  cancelled: chalk.gray('⊘'),
};

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Load, validate and apply configuration. Exits on invalid config.
 */
function bootstrap(options: Partial<CLIOptions>, requireApiKey: boolean): Config {
  let config: Config;
  try {
    config = loadConfig(options);
  } catch (error) {
    const problems = error instanceof ConfigError ? error.problems : [errorMessage(error)];
    printConfigErrors(problems);
    process.exit(EXIT_FATAL);
  }

  initLogger({
    level: config.logging.level,
    file: config.logging.file,
    console: config.logging.console,
  });

  const configErrors = validateConfig(config, { requireApiKey });
  if (configErrors.length > 0) {
    printConfigErrors(configErrors);
    process.exit(EXIT_FATAL);
  }

  return config;
}

function printConfigErrors(problems: readonly string[]): void {
  console.error(chalk.red('Configuration errors:'));
  for (const problem of problems) {
    console.error(chalk.red(`  • ${problem}`));
  }
}

/**
 * Ask on the terminal before a held tool call runs. Prompts are taken one
 * at a time so parallel nodes do not talk over each other.
 */
function createApprover(spinner: Ora): ApprovalCallback {
  let queue: Promise<unknown> = Promise.resolve();

  const ask = async (request: ApprovalRequest): Promise<boolean> => {
    const spinning = spinner.isSpinning;
    spinner.stop();
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      console.error(chalk.yellow.bold(`\nHeld tool call ${request.intent.toolName}`));
      console.error(chalk.yellow(`  matches: ${request.pattern}`));
      console.error(chalk.dim(`  ${request.text}`));
      const answer = await rl.question('Allow this call? [y/N] ');
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
      if (spinning) spinner.start();
    }
  };

  return (request) => {
    const next = queue.then(() => ask(request));
    queue = next.catch(() => false);
    return next;
  };
}

function countNodes(tree: TaskTree | null): { total: number; done: number } {
  if (!tree) return { total: 0, done: 0 };
  let total = 0;
  let done = 0;
  const visit = (t: TaskTree): void => {
    total++;
    if (t.node.status === 'success') done++;
    t.children.forEach(visit);
  };
  visit(tree);
  return { total, done };
}

function describeSnapshot(snapshot: RunSnapshot): string {
  const { total, done } = countNodes(snapshot.tree);
  const active = snapshot.activeNodeIds.length > 0 ? ` active: ${snapshot.activeNodeIds.join(', ')}` : '';
  const last = snapshot.logs[snapshot.logs.length - 1];
  return `${done}/${total} nodes done${active}${last ? chalk.dim(`  ${last}`) : ''}`;
}

function printTree(tree: TaskTree, indent = ''): void {
  const { node } = tree;
  const attempts = node.attemptCount > 0 ? chalk.dim(` (${node.attemptCount} rejected)`) : '';
  console.log(`${indent}${STATUS_ICONS[node.status]} ${chalk.bold(node.id)} ${node.goal}${attempts}`);
  if (node.strategy) {
    console.log(`${indent}  ${chalk.dim(node.strategy)}`);
  }
  for (const child of tree.children) {
    printTree(child, indent + '  ');
  }
}

function printSummary(result: RunResult, snapshot: RunSnapshot): void {
  const { metrics } = snapshot;
  const statusColor = result.status === 'success' ? chalk.green : chalk.red;

  console.log('\n' + chalk.bold('Run Summary'));
  console.log(chalk.dim('─'.repeat(40)));
  console.log(`Run:             ${chalk.cyan(result.runId)}`);
  console.log(`Status:          ${statusColor(result.status)}`);
  console.log(`Plans:           ${chalk.cyan(metrics.plans)}`);
  console.log(`Approvals:       ${chalk.green(metrics.approvals)}`);
  console.log(`Rejects:         ${chalk.red(metrics.rejects)}`);
  console.log(`Decompositions:  ${chalk.yellow(metrics.decompositions)}`);
  console.log(`Tool calls:      ${chalk.cyan(metrics.toolCalls)} (${metrics.toolFailures} failed)`);
  console.log(`Tokens used:     ${chalk.cyan(metrics.tokensUsed.total.toLocaleString())}`);
  console.log(`Duration:        ${chalk.cyan(Math.round(metrics.durationMs / 1000))}s`);
}

function createAgents(config: Config, broker: ToolBroker, spinner: Ora): AgentSet {
  const provider = new AnthropicProvider(config.agents);
  const gate = new DangerGate(config.danger, createApprover(spinner));

  return {
    planner: new LlmPlanner(provider, () => broker.discover(), {
      minSubgoals: config.orchestrator.minSubgoals,
    }),
    executor: new ToolExecutor(broker, gate, {
      workerPoolSize: config.broker.workerPoolSize,
      defaultDeadlineMs: config.broker.defaultDeadlineMs,
    }),
    verifier: new LlmVerifier(provider),
  };
}

/**
 * Run one goal to completion
 */
async function runGoal(goal: string, options: RunCommandOptions): Promise<number> {
  const config = bootstrap(options, true);
  const logger = getLogger();
  const spinner = ora();

  const broker = new ToolBroker(config.broker, new MCPSessionFactory());
  const service = new AssistantService({ config, agents: createAgents(config, broker, spinner) });
  service.start();

  console.log(chalk.bold.cyan('\ntaskloom\n'));
  console.log(`Goal:         ${goal}`);
  console.log(`Model:        ${config.agents.model}`);
  console.log(`Servers:      ${config.broker.servers.filter((s) => s.enabled).map((s) => s.serverId).join(', ') || 'none'}`);
  console.log(`Max attempts: ${config.orchestrator.maxAttempts}`);
  console.log('');

  const runId = service.submitGoal(goal, {
    constraints: {
      allowDangerousOps: options.allowDangerous,
      deadline: options.deadline === undefined ? undefined : Date.now() + options.deadline * 1000,
    },
  });

  spinner.start(describeSnapshot(service.getSnapshot(runId)));
  const unsubscribe = service.subscribe(runId, (snapshot) => {
    spinner.text = describeSnapshot(snapshot);
  });

  const onInterrupt = (): void => {
    spinner.warn('Cancelling run (press Ctrl-C again to force quit)');
    const cancelled = service.cancel(runId);
    logger.info('Run cancelled by user', { runId, cancelled: cancelled.length });
    spinner.start('Waiting for in-flight work to stop...');
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await service.result(runId);
    if (result.status === 'success') {
      spinner.succeed('Goal achieved');
    } else {
      spinner.fail(`Run ended ${result.status}`);
    }

    console.log('');
    printTree(result.tree);
    printSummary(result, service.getSnapshot(runId));
    return result.status === 'success' ? EXIT_OK : EXIT_FAILED;
  } catch (error) {
    spinner.fail('Run aborted');
    if (error instanceof FatalError) {
      console.error(chalk.red(`\nFatal (${error.reason}):`), error.message);
    } else {
      console.error(chalk.red('\nFatal error:'), errorMessage(error));
    }
    return EXIT_FATAL;
  } finally {
    unsubscribe();
    process.off('SIGINT', onInterrupt);
    service.close();
    await broker.close();
  }
}

/**
 * Print every tool the enabled servers offer
 */
async function listTools(options: ToolsCommandOptions): Promise<number> {
  const config = bootstrap(options, false);
  const broker = new ToolBroker(config.broker, new MCPSessionFactory());
  const spinner = ora('Discovering tools...').start();

  try {
    const tools = await broker.discover();
    spinner.succeed(`Found ${tools.length} tools`);

    for (const tool of tools) {
      const tags = tool.capabilityTags.length > 0 ? chalk.dim(` [${tool.capabilityTags.join(', ')}]`) : '';
      console.log(`  ${chalk.cyan(`${tool.serverId}/${tool.toolName}`)}${tags}`);
      if (tool.description) {
        console.log(`    ${chalk.dim(tool.description)}`);
      }
    }
    return EXIT_OK;
  } finally {
    await broker.close();
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = new Command();

  program.name('taskloom').description('Recursive multi-agent task orchestrator').version(VERSION);

  program
    .command('run')
    .description('Plan, execute and verify a goal')
    .argument('<goal>', 'What should be achieved')
    .option('-c, --config <path>', 'Path to config file')
    .option('-a, --max-attempts <number>', 'Rejections before a node is decomposed', parsePositiveInt)
    .option('-m, --model <name>', 'Model for the planner and verifier')
    .option('-d, --deadline <seconds>', 'Deadline for the whole run', parsePositiveInt)
    .option('--allow-dangerous', 'Run dangerous tool calls without asking', false)
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (goal: string, options: RunCommandOptions) => {
      process.exit(await runGoal(goal, options));
    });

  program
    .command('tools')
    .description('List the tools offered by the configured servers')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (options: ToolsCommandOptions) => {
      process.exit(await listTools(options));
    });

  await program.parseAsync(process.argv);
}

// Run main
main().catch((error: unknown) => {
  console.error('Unhandled error:', error);
  process.exit(EXIT_FATAL);
});
