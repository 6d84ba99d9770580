/**
 * Type definitions for the run-task program
 */

import { ExtractedResult, TaskKind } from '../../common/types';
import { TaskError } from '../../common/utils';

/**
 * A request to run one task
 */
export interface RunTaskEvent {
  task: TaskKind;
  /** Explicit settings file; defaults to appsettings.json in the working directory */
  settingsPath?: string;
  /** `Section:Key` overrides that win over environment and settings file */
  overrides?: Record<string, string>;
  workingDirectory?: string;
}

/**
 * What a single run produced and how the process should exit
 */
export interface RunOutcome {
  task: TaskKind;
  exitCode: number;
  result?: ExtractedResult;
  error?: TaskError;
  /** Path of the saved image, for image generation */
  savedFile?: string;
}

export type Printer = (line: string) => void;
