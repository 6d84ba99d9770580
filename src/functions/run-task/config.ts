/**
 * Configuration for the run-task program
 */

import * as path from 'path';
import { getSetting, getSettingInt, Settings } from '../../common/config';
import { getTaskDefinition } from '../../common/task-catalog';
import { ResponseMode, TaskInputs, TaskKind, TaskRunConfig } from '../../common/types';
import { logWarn } from '../../common/utils';

export const DEFAULT_REGION = 'us-east-1';

/**
 * Resolves everything one run of `task` needs from the loaded settings
 */
export function getTaskRunConfig(task: TaskKind, settings: Settings): TaskRunConfig {
  const definition = getTaskDefinition(task);

  const inputs: TaskInputs = {};
  for (const spec of definition.inputs) {
    inputs[spec.name] = getSetting(settings, spec.settingKey, spec.defaultValue);
  }

  return {
    task,
    region: getSetting(settings, 'AWS:Region', DEFAULT_REGION),
    modelId: getSetting(settings, definition.modelSettingKey, definition.defaultModelId),
    inputs,
    maxTokens: getSettingInt(settings, 'Bedrock:MaxTokens'),
    responseMode: parseResponseMode(getSetting(settings, 'Bedrock:ResponseMode', 'raw')),
    outputDirectory: path.resolve(settings.workingDirectory, getSetting(settings, 'Bedrock:OutputDirectory', '.')),
    workingDirectory: settings.workingDirectory,
  };
}

function parseResponseMode(value: string): ResponseMode {
  switch (value.toLowerCase()) {
    case 'raw':
      return 'raw';
    case 'fields':
      return 'fields';
    default:
      logWarn(`Invalid value for Bedrock:ResponseMode: "${value}", using default: raw`);
      return 'raw';
  }
}
