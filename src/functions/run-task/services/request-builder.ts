/**
 * Request builder
 * Turns a task kind and its named inputs into a Bedrock InvokeModel request
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { getTaskDefinition, RequestBody, TaskInputSpec } from '../../../common/task-catalog';
import { err, InvocationRequest, ok, Result, TaskInputs, TaskKind } from '../../../common/types';
import { getErrorCode, logDebug, MissingInputError, ResourceNotFoundError } from '../../../common/utils';

export const JSON_CONTENT_TYPE = 'application/json';

export type BuildError = MissingInputError | ResourceNotFoundError;

export interface BuildOptions {
  /** Model to address; defaults to the task's catalogue model */
  modelId?: string;
  /** Fill absent inputs from the catalogue defaults instead of failing */
  applyDefaults?: boolean;
  /** Overrides the task's default `max_tokens_to_sample` */
  maxTokens?: number;
  /** Base for relative image paths; defaults to process.cwd() */
  workingDirectory?: string;
}

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

/**
 * Builds model-specific request payloads. Performs no network access; the only
 * side effect is reading image files for image tasks.
 */
export class RequestBuilder {
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder();

  async build(
    task: TaskKind,
    inputs: TaskInputs,
    options: BuildOptions = {}
  ): Promise<Result<InvocationRequest, BuildError>> {
    const definition = getTaskDefinition(task);
    const values: Record<string, string> = {};

    for (const spec of definition.inputs) {
      if (spec.kind === 'image') {
        const image = await this.resolveImage(task, spec, inputs, options);
        if (!image.ok) return image;
        values.image = image.value;
        continue;
      }

      const value = this.resolveText(spec, inputs[spec.name], options);
      if (value === undefined) {
        return err(new MissingInputError(task, spec.name));
      }
      values[spec.name] = value;
    }

    const body: RequestBody = definition.buildBody(values);
    if (definition.maxTokens !== undefined) {
      body.max_tokens_to_sample = options.maxTokens ?? definition.maxTokens;
    }

    const payload = this.encoder.encode(JSON.stringify(body));
    const modelIdentifier = options.modelId ?? definition.defaultModelId;

    logDebug('Built invocation request', { task, modelIdentifier, payloadBytes: payload.byteLength });

    return ok({
      modelIdentifier,
      contentType: JSON_CONTENT_TYPE,
      acceptType: JSON_CONTENT_TYPE,
      payload,
    });
  }

  private resolveText(
    spec: TaskInputSpec,
    value: string | Uint8Array | undefined,
    options: BuildOptions
  ): string | undefined {
    const text = value instanceof Uint8Array ? this.decoder.decode(value) : value;
    if (text !== undefined && text.length > 0) {
      return text;
    }
    return options.applyDefaults ? spec.defaultValue : undefined;
  }

  /**
   * Image bytes come from `inputs.image` when given, otherwise from the file at `imagePath`
   */
  private async resolveImage(
    task: TaskKind,
    spec: TaskInputSpec,
    inputs: TaskInputs,
    options: BuildOptions
  ): Promise<Result<string, BuildError>> {
    const direct = inputs.image;
    if (direct instanceof Uint8Array) {
      return ok(Buffer.from(direct).toString('base64'));
    }

    const requested = inputs[spec.name];
    const imagePath =
      typeof requested === 'string' && requested.length > 0
        ? requested
        : options.applyDefaults
          ? spec.defaultValue
          : undefined;

    if (imagePath === undefined) {
      return err(new MissingInputError(task, spec.name));
    }

    const resolved = path.resolve(options.workingDirectory ?? process.cwd(), imagePath);
    try {
      const bytes = await readFile(resolved);
      return ok(bytes.toString('base64'));
    } catch (error) {
      const code = getErrorCode(error);
      if (code !== undefined && NOT_FOUND_CODES.has(code)) {
        return err(new ResourceNotFoundError(imagePath));
      }
      throw error;
    }
  }
}
