/**
 * Command-line front end for the task runner
 *
 * Parses raw argv, routes to the run-task or run-demo handler, and returns the
 * exit code for the process.
 */

import { getTaskDefinition } from './common/task-catalog';
import { isTaskKind, TASK_KINDS } from './common/types';
import { handler as runDemo } from './functions/run-demo/index';
import { handler as runTask, RunTaskOverrides } from './functions/run-task/index';

/**
 * `positional` holds bare tokens, `flags` holds `--key` / `--key value` pairs and
 * `assignments` collects every repeatable `--set Section:Key=value`.
 */
export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string | boolean>;
  assignments: string[];
}

/**
 * A token after a flag is its value unless it is itself a flag
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  const assignments: string[] = [];

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = argv[i + 1];
      const hasValue = next !== undefined && !next.startsWith('--');

      if (key === 'set') {
        if (hasValue) assignments.push(next);
      } else {
        flags[key] = hasValue ? next : true;
      }
      i += hasValue ? 2 : 1;
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, assignments };
}

/**
 * Splits `Section:Key=value` at the first `=`
 */
export function parseAssignment(assignment: string): [string, string] | undefined {
  const separator = assignment.indexOf('=');
  if (separator <= 0) return undefined;
  return [assignment.slice(0, separator).trim(), assignment.slice(separator + 1)];
}

const FLAG_SETTINGS: Record<string, string> = {
  region: 'AWS:Region',
  'output-dir': 'Bedrock:OutputDirectory',
  'max-tokens': 'Bedrock:MaxTokens',
  'response-mode': 'Bedrock:ResponseMode',
};

export function usage(): string {
  return [
    'Usage: bedrock-task <command> [options]',
    '',
    'Commands:',
    '  <task>        Run one task (see "list")',
    '  demo          Summarize a text, then generate an image',
    '  list          Show the available tasks',
    '  help          Show this message',
    '',
    'Options:',
    '  --settings <path>          Settings file (default: appsettings.json)',
    '  --region <region>          AWS region',
    '  --model <id>               Model id for the task (not for demo)',
    '  --output-dir <dir>         Where generated images are written',
    '  --max-tokens <n>           Override max_tokens_to_sample',
    '  --response-mode <mode>     raw (default) or fields',
    '  --set <Section:Key=value>  Override any setting (repeatable)',
  ].join('\n');
}

export function listTasks(): string[] {
  return TASK_KINDS.map(kind => {
    const definition = getTaskDefinition(kind);
    return `${kind.padEnd(24)}${definition.label.padEnd(28)}${definition.defaultModelId}`;
  });
}

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function runCli(argv: string[], overrides: RunTaskOverrides = {}): Promise<number> {
  const print = overrides.print ?? ((line: string) => console.log(line));
  const { positional, flags, assignments } = parseArgs(argv);
  const command = positional[0];

  if (flags.help || command === undefined || command === 'help') {
    print(usage());
    return 0;
  }

  if (command === 'list') {
    listTasks().forEach(line => print(line));
    return 0;
  }

  const settingOverrides: Record<string, string> = {};
  for (const assignment of assignments) {
    const parsed = parseAssignment(assignment);
    if (parsed === undefined) {
      console.error(`Invalid --set value: "${assignment}" (expected Section:Key=value)`);
      return 1;
    }
    settingOverrides[parsed[0]] = parsed[1];
  }
  for (const [flag, key] of Object.entries(FLAG_SETTINGS)) {
    const value = flags[flag];
    if (typeof value === 'string') settingOverrides[key] = value;
  }

  const settingsPath = typeof flags.settings === 'string' ? flags.settings : undefined;

  if (command === 'demo') {
    if (flags.model !== undefined) {
      console.error('--model does not apply to demo; set Bedrock:TextModelId or Bedrock:ImageModelId with --set');
      return 1;
    }
    const result = await runDemo({ settingsPath, overrides: settingOverrides }, { ...overrides, print });
    return result.exitCode;
  }

  if (!isTaskKind(command)) {
    console.error(`Unknown command: "${command}"`);
    console.error(usage());
    return 1;
  }

  if (typeof flags.model === 'string') {
    settingOverrides[getTaskDefinition(command).modelSettingKey] = flags.model;
  }

  const outcome = await runTask({ task: command, settingsPath, overrides: settingOverrides }, { ...overrides, print });
  return outcome.exitCode;
}
