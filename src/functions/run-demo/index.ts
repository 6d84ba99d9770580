/**
 * RunDemo handler
 * Summarizes a text and then generates an image, sharing one settings load
 */

import { loadSettings, Settings } from '../../common/config';
import { TaskKind } from '../../common/types';
import { getErrorMessage, logError, logInfo } from '../../common/utils';
import { runWithSettings, RunTaskOverrides } from '../run-task/index';
import { COMPLETION_BANNER, reportError } from '../run-task/task-runner';
import { RunOutcome } from '../run-task/types';

export const DEMO_SEQUENCE: readonly TaskKind[] = ['summarization', 'image-generation'];

export interface RunDemoEvent {
  settingsPath?: string;
  overrides?: Record<string, string>;
  workingDirectory?: string;
}

export interface DemoOutcome {
  exitCode: number;
  outcomes: RunOutcome[];
}

/**
 * Runs each demo task in order; a failing task does not stop the next one.
 * The demo exits with the highest exit code of its tasks.
 */
export const handler = async (event: RunDemoEvent, overrides: RunTaskOverrides = {}): Promise<DemoOutcome> => {
  const print = overrides.print ?? ((line: string) => console.log(line));

  let settings: Settings;
  try {
    settings = await loadSettings({
      settingsPath: event.settingsPath,
      workingDirectory: event.workingDirectory,
      overrides: event.overrides,
    });
  } catch (error) {
    logError('Failed to load configuration', { error: getErrorMessage(error) });
    const taskError = reportError(print, error);
    print(COMPLETION_BANNER);
    print('');
    return { exitCode: taskError.exitCode, outcomes: [] };
  }

  const outcomes: RunOutcome[] = [];
  for (const task of DEMO_SEQUENCE) {
    outcomes.push(await runWithSettings({ task }, settings, { ...overrides, print }));
  }

  const exitCode = Math.max(0, ...outcomes.map(outcome => outcome.exitCode));
  logInfo('Demo sequence finished', { tasks: DEMO_SEQUENCE.length, exitCode });

  return { exitCode, outcomes };
};
