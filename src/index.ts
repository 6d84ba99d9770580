/**
 * Public API of the Bedrock task runner
 */

export * from './common/types';
export {
  ConfigurationError,
  DecodeError,
  InvocationError,
  MissingInputError,
  OutputError,
  ResourceNotFoundError,
  TaskError,
} from './common/utils';
export { loadSettings, getSetting } from './common/config';
export type { Settings, LoadSettingsOptions } from './common/config';
export { getTaskDefinition } from './common/task-catalog';
export type { TaskDefinition, TaskInputSpec } from './common/task-catalog';
export { createBedrockClient } from './common/aws/bedrock-client';
export { RequestBuilder } from './functions/run-task/services/request-builder';
export type { BuildOptions } from './functions/run-task/services/request-builder';
export { BedrockInferenceInvoker } from './functions/run-task/services/inference-invoker';
export type { InferenceInvoker } from './functions/run-task/services/inference-invoker';
export { ResponseExtractor } from './functions/run-task/services/response-extractor';
export type { ExtractOptions } from './functions/run-task/services/response-extractor';
export { OutputService, SystemImageViewer } from './functions/run-task/services/output-service';
export type { ImageViewer } from './functions/run-task/services/output-service';
export { TaskRunner } from './functions/run-task/task-runner';
export { handler as runTask, createTaskRunner } from './functions/run-task/index';
export { handler as runDemo } from './functions/run-demo/index';
export { getTaskRunConfig } from './functions/run-task/config';
export type { RunOutcome, RunTaskEvent } from './functions/run-task/types';
