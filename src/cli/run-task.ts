#!/usr/bin/env node
/**
 * Command-line runner: executes one task with a configured team and prints
 * the conversation and its outcome.
 *
 * Usage: conclave-run [--config <path>] [--team <name>] <task description>
 *        conclave-run --resume <taskId>
 *        conclave-run --list-teams
 */
import 'dotenv/config';
import { existsSync, realpathSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { bootstrap } from '@/bootstrap.js';
import type { ConclaveServices } from '@/bootstrap.js';
import { loadConfig } from '@/config/loader.js';
import { exportConversation } from '@/conversation/export.js';
import { asTaskId } from '@/core/task.js';
import type { ConversationMessage, TaskOutcome } from '@/core/types.js';
import { createLogger } from '@/observability/logger.js';
import type { Team } from '@/teams/types.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const MAGENTA = '\x1b[35m';

// ─── CLI Arg Parsing ────────────────────────────────────────────

export interface CliArgs {
  configPath?: string;
  team?: string;
  resume?: string;
  /** Write the conversation history as JSON to this file when done. */
  exportPath?: string;
  listTeams: boolean;
  help: boolean;
  description: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { listTeams: false, help: false, description: '' };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--config' || arg === '-c') && next) {
      args.configPath = next;
      i++;
    } else if ((arg === '--team' || arg === '-t') && next) {
      args.team = next;
      i++;
    } else if (arg === '--resume' && next) {
      args.resume = next;
      i++;
    } else if (arg === '--export' && next) {
      args.exportPath = next;
      i++;
    } else if (arg === '--list-teams') {
      args.listTeams = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg !== undefined) {
      words.push(arg);
    }
  }

  args.description = words.join(' ').trim();
  return args;
}

// ─── Formatting ─────────────────────────────────────────────────

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}

export function formatTeams(teams: readonly Team[]): string[] {
  return teams.flatMap((team) => [
    `${BOLD}${team.name}${RESET} ${DIM}(${team.routing.type}, max ${team.maxTurns} turns)${RESET}`,
    ...(team.description ? [`  ${team.description}`] : []),
    ...team.agents.map((a) => `  ${CYAN}${a.name}${RESET}${a.description ? ` ${DIM}${a.description}${RESET}` : ''}`),
  ]);
}

export function formatMessage(message: ConversationMessage): string {
  switch (message.kind) {
    case 'task':
      return `${BOLD}Task:${RESET} ${message.content}`;
    case 'chat':
      return `${CYAN}${message.sender}:${RESET} ${message.content}`;
    case 'tool_call': {
      const args = truncate(JSON.stringify(message.toolCall.arguments), 120);
      return `${DIM}  [tool] ${message.sender} calls ${message.toolCall.toolName} ${args}${RESET}`;
    }
    case 'tool_result':
      return message.toolResult.status === 'ok'
        ? `${DIM}  [result] ${truncate(message.content, 200)}${RESET}`
        : `${RED}  [error] ${message.content}${RESET}`;
    case 'correction':
      return `${YELLOW}  [to ${message.audience}] ${message.content}${RESET}`;
    case 'speaker_selection':
      return `${MAGENTA}  [${message.sender}] ${message.content}${RESET}`;
  }
}

export function formatOutcome(outcome: TaskOutcome): string[] {
  const turns = `${outcome.turns} turn${outcome.turns === 1 ? '' : 's'}`;
  if (outcome.status === 'completed') {
    return [`${GREEN}${BOLD}Completed${RESET} after ${turns}: ${outcome.summary}`];
  }
  const reason = outcome.reason ? `[${outcome.reason.code}] ${outcome.reason.message}` : '';
  return [
    `${RED}${BOLD}Failed${RESET} after ${turns}: ${reason}`,
    ...(outcome.summary ? [`${DIM}  Last message: ${outcome.summary}${RESET}`] : []),
  ];
}

export function exitCodeFor(outcome: TaskOutcome): number {
  return outcome.status === 'completed' ? 0 : 1;
}

function usage(): string[] {
  return [
    `${BOLD}Usage:${RESET}`,
    `  conclave-run [--config <path>] [--team <name>] [--export <file>] <task description>`,
    `  conclave-run [--config <path>] [--export <file>] --resume <taskId>`,
    `  conclave-run [--config <path>] --list-teams`,
  ];
}

// ─── Execution ──────────────────────────────────────────────────

export type Output = (line: string) => void;

type CliServices = Pick<ConclaveServices, 'teams' | 'taskManager'>;

async function runOrResume(args: CliArgs, services: CliServices, out: Output): Promise<TaskOutcome | string> {
  const { teams, taskManager } = services;

  if (args.resume) {
    const taskId = asTaskId(args.resume);
    const resumed = await taskManager.resume(taskId);
    if (!resumed.ok) return resumed.error.message;
    out(`${DIM}Resuming ${taskId} with team ${resumed.value.teamName}${RESET}`);
    const waited = await taskManager.wait(taskId);
    return waited.ok ? waited.value : waited.error.message;
  }

  const teamName = args.team ?? teams.list()[0]?.name;
  if (!teamName) return 'No teams are configured';
  out(`${DIM}Running with team ${teamName}${RESET}`);
  const ran = await taskManager.run(args.description, teamName);
  return ran.ok ? ran.value : ran.error.message;
}

/** Run one CLI invocation against built services. Returns the process exit code. */
export async function execute(args: CliArgs, services: CliServices, out: Output): Promise<number> {
  if (args.listTeams) {
    formatTeams(services.teams.list()).forEach(out);
    return 0;
  }
  if (!args.resume && !args.description) {
    usage().forEach(out);
    return 2;
  }

  const result = await runOrResume(args, services, out);
  if (typeof result === 'string') {
    out(`${RED}${result}${RESET}`);
    return 1;
  }

  const record = await services.taskManager.get(result.taskId);
  if (record.ok) {
    out('');
    record.value.messages.forEach((m) => out(formatMessage(m)));
    if (args.exportPath) {
      await writeFile(args.exportPath, JSON.stringify(exportConversation(record.value), null, 2) + '\n', 'utf-8');
      out(`${DIM}History written to ${args.exportPath}${RESET}`);
    }
  }
  out('');
  formatOutcome(result).forEach(out);
  out(`${DIM}Task ID: ${result.taskId}${RESET}`);
  return exitCodeFor(result);
}

// ─── Main ───────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const out: Output = (line) => console.log(line);
  if (args.help) {
    usage().forEach(out);
    return;
  }

  const config = await loadConfig(args.configPath);
  if (!config.ok) {
    out(`${RED}${config.error.message}${RESET}`);
    const issues = config.error.context?.['issues'];
    if (Array.isArray(issues)) issues.forEach((issue) => out(`  ${JSON.stringify(issue)}`));
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ name: 'conclave-run', level: process.env['LOG_LEVEL'] ?? 'warn' });
  const services = await bootstrap(config.value, { logger });

  const interrupt = (): void => {
    out(`\n${YELLOW}Cancelling...${RESET}`);
    void services.taskManager.shutdown();
  };
  process.once('SIGINT', interrupt);

  try {
    process.exitCode = await execute(args, services, out);
  } finally {
    process.off('SIGINT', interrupt);
    await services.shutdown();
  }
}

// ─── Entry Point ────────────────────────────────────────────────

// Only run when invoked directly (not when imported for testing); npm links bins through symlinks
const entry = process.argv[1];
if (entry !== undefined && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    console.error('Fatal error:', e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
