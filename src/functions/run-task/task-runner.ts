/**
 * Task runner
 * One single-shot run: build -> invoke -> extract -> print or save
 */

import { getTaskDefinition, TaskDefinition } from '../../common/task-catalog';
import { BinaryResult, ExtractedResult, TaskInputs, TaskKind, TaskRunConfig } from '../../common/types';
import { describeError, getErrorMessage, isRecord, logError, logInfo, logWarn, TaskError } from '../../common/utils';
import { InferenceInvoker } from './services/inference-invoker';
import { OutputService } from './services/output-service';
import { RequestBuilder } from './services/request-builder';
import { ResponseExtractor } from './services/response-extractor';
import { Printer, RunOutcome } from './types';

export const COMPLETION_BANNER = 'Demo complete.';

export interface TaskRunnerDependencies {
  builder: RequestBuilder;
  invoker: InferenceInvoker;
  extractor: ResponseExtractor;
  output: OutputService;
  print?: Printer;
}

/**
 * Prints an error and its detail the way every run reports failures.
 * When the error wraps an underlying failure, that failure's stack is printed too.
 */
export function reportError(print: Printer, error: unknown): TaskError {
  const taskError =
    error instanceof TaskError
      ? error
      : new TaskError(
          `Unexpected failure: ${getErrorMessage(error)}`,
          1,
          { errorName: isRecord(error) && typeof error.name === 'string' ? error.name : typeof error },
          { cause: error }
        );

  print(`Error: ${taskError.message}`);
  print(
    taskError.details === undefined
      ? taskError.name
      : `${taskError.name} ${JSON.stringify(taskError.details)}`
  );
  if (taskError.cause !== undefined) {
    print(`Caused by: ${describeError(taskError.cause)}`);
  }
  return taskError;
}

export class TaskRunner {
  private readonly print: Printer;

  constructor(private readonly deps: TaskRunnerDependencies) {
    this.print = deps.print ?? ((line: string) => console.log(line));
  }

  /**
   * Runs one task. Never throws: every failure is printed and mapped to an exit code,
   * and the completion banner is always printed.
   */
  async run(config: TaskRunConfig): Promise<RunOutcome> {
    const definition = getTaskDefinition(config.task);
    const startTime = Date.now();

    logInfo('Task run started', { task: config.task, modelId: config.modelId, region: config.region });

    this.print(`AWS Bedrock ${definition.label} Demo`);
    this.print('');

    let outcome: RunOutcome;
    try {
      outcome = await this.execute(definition, config);
    } catch (error) {
      logError('Task run failed unexpectedly', { task: config.task, error: getErrorMessage(error) });
      const taskError = reportError(this.print, error);
      outcome = { task: config.task, exitCode: taskError.exitCode, error: taskError };
    }

    logInfo('Task run finished', {
      task: config.task,
      exitCode: outcome.exitCode,
      resultKind: outcome.result?.kind,
      duration: Date.now() - startTime,
    });

    this.print(COMPLETION_BANNER);
    this.print('');
    return outcome;
  }

  private async execute(definition: TaskDefinition, config: TaskRunConfig): Promise<RunOutcome> {
    const task = config.task;
    this.echoInputs(definition, config.inputs);

    const request = await this.deps.builder.build(task, config.inputs, {
      modelId: config.modelId,
      maxTokens: config.maxTokens,
      workingDirectory: config.workingDirectory,
    });
    if (!request.ok) {
      return this.fail(task, request.error);
    }

    const response = await this.deps.invoker.invoke(request.value);
    if (!response.ok) {
      return this.fail(task, response.error);
    }

    if (definition.extraction === 'image-artifact') {
      this.print(`Raw ${definition.resultLabel}: ${new TextDecoder().decode(response.value.rawBody)}`);
      this.print('');
    }

    const extracted = this.deps.extractor.extract(task, response.value, { responseMode: config.responseMode });
    if (!extracted.ok) {
      logWarn('Could not decode model output', { task, error: extracted.error.message });
      return this.fail(task, extracted.error);
    }

    return this.present(definition, extracted.value);
  }

  private echoInputs(definition: TaskDefinition, inputs: TaskInputs): void {
    for (const spec of definition.inputs) {
      const value = inputs[spec.name];
      if (typeof value === 'string') {
        this.print(`${spec.label}: ${value}`);
      }
    }
    if (inputs.image instanceof Uint8Array) {
      this.print(`Image: ${inputs.image.byteLength} bytes`);
    }
    this.print('');
  }

  private async present(definition: TaskDefinition, result: ExtractedResult): Promise<RunOutcome> {
    const task = definition.kind;

    switch (result.kind) {
      case 'text':
        this.print(`${definition.resultLabel}: ${result.text}`);
        this.print('');
        return { task, exitCode: 0, result };

      case 'structured':
        this.print(`${definition.resultLabel}:`);
        for (const [key, value] of Object.entries(result.fields)) {
          this.print(`  ${key}: ${value}`);
        }
        this.print('');
        return { task, exitCode: 0, result };

      case 'binary':
        return this.saveImage(task, result);

      case 'not-found':
        logWarn('No result found in model response', { task, reason: result.reason });
        this.print(
          definition.extraction === 'image-artifact'
            ? 'No base64 image found in response.'
            : `${definition.resultLabel}: no result found (${result.reason})`
        );
        return { task, exitCode: 0, result };
    }
  }

  private async saveImage(task: TaskKind, result: BinaryResult): Promise<RunOutcome> {
    const saved = await this.deps.output.saveImage(result.bytes, result.mimeHint);
    if (!saved.ok) {
      return this.fail(task, saved.error, result);
    }

    this.print(`Image saved to: ${saved.value}`);

    try {
      await this.deps.output.openImage(saved.value);
    } catch (error) {
      logWarn('Could not open image automatically', { filePath: saved.value, error: getErrorMessage(error) });
      this.print(`Could not open image automatically: ${getErrorMessage(error)}`);
    }

    return { task, exitCode: 0, result, savedFile: saved.value };
  }

  private fail(task: TaskKind, error: TaskError, result?: ExtractedResult): RunOutcome {
    const reported = reportError(this.print, error);
    return { task, exitCode: reported.exitCode, error: reported, result };
  }
}
