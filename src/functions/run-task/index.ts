/**
 * RunTask handler
 * Resolves configuration for one task kind, wires the Bedrock client and runs it once
 */

import { createBedrockClient } from '../../common/aws/bedrock-client';
import { getAwsConfig, loadSettings, Settings } from '../../common/config';
import { TaskRunConfig } from '../../common/types';
import { getErrorMessage, logError } from '../../common/utils';
import { getTaskRunConfig } from './config';
import { BedrockInferenceInvoker, InferenceInvoker } from './services/inference-invoker';
import { ImageViewer, OutputService, SystemImageViewer } from './services/output-service';
import { RequestBuilder } from './services/request-builder';
import { ResponseExtractor } from './services/response-extractor';
import { COMPLETION_BANNER, reportError, TaskRunner } from './task-runner';
import { Printer, RunOutcome, RunTaskEvent } from './types';

/**
 * Collaborators a caller may swap out (tests, embedding programs)
 */
export interface RunTaskOverrides {
  invoker?: InferenceInvoker;
  viewer?: ImageViewer;
  print?: Printer;
  now?: () => Date;
}

/**
 * Builds a runner for an already-resolved configuration
 */
export function createTaskRunner(config: TaskRunConfig, overrides: RunTaskOverrides = {}): TaskRunner {
  const invoker = overrides.invoker ?? new BedrockInferenceInvoker(createBedrockClient(getAwsConfig(config.region)));

  return new TaskRunner({
    builder: new RequestBuilder(),
    invoker,
    extractor: new ResponseExtractor(),
    output: new OutputService(config.outputDirectory, overrides.viewer ?? new SystemImageViewer(), overrides.now),
    print: overrides.print,
  });
}

/**
 * Runs a task against settings that were already loaded
 */
export async function runWithSettings(
  event: RunTaskEvent,
  settings: Settings,
  overrides: RunTaskOverrides = {}
): Promise<RunOutcome> {
  const config = getTaskRunConfig(event.task, settings);
  return createTaskRunner(config, overrides).run(config);
}

/**
 * Entry point for a single task run
 * Configuration failures are reported like any other run failure
 */
export const handler = async (event: RunTaskEvent, overrides: RunTaskOverrides = {}): Promise<RunOutcome> => {
  const print = overrides.print ?? ((line: string) => console.log(line));

  let settings: Settings;
  try {
    settings = await loadSettings({
      settingsPath: event.settingsPath,
      workingDirectory: event.workingDirectory,
      overrides: event.overrides,
    });
  } catch (error) {
    logError('Failed to load configuration', { task: event.task, error: getErrorMessage(error) });
    const taskError = reportError(print, error);
    print(COMPLETION_BANNER);
    print('');
    return { task: event.task, exitCode: taskError.exitCode, error: taskError };
  }

  return runWithSettings(event, settings, { ...overrides, print });
};
