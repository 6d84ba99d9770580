/**
 * Inference invoker
 * The boundary to Amazon Bedrock: one InvokeModel call per request, no retries
 */

import {
  BedrockRuntimeServiceException,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';
import { err, InvocationRequest, InvocationResponse, ok, Result } from '../../../common/types';
import { getErrorMessage, InvocationError, isRecord, logError, logInfo } from '../../../common/utils';

export interface InferenceInvoker {
  invoke(request: InvocationRequest): Promise<Result<InvocationResponse, InvocationError>>;
}

/**
 * The slice of BedrockRuntimeClient the invoker uses
 */
export interface InvokeModelSender {
  send(command: InvokeModelCommand): Promise<{ body?: Uint8Array }>;
}

/**
 * Invokes Bedrock foundation models and passes failures back unmodified
 */
export class BedrockInferenceInvoker implements InferenceInvoker {
  constructor(private readonly client: InvokeModelSender) {}

  async invoke(request: InvocationRequest): Promise<Result<InvocationResponse, InvocationError>> {
    const startTime = Date.now();
    const modelId = request.modelIdentifier;

    try {
      logInfo('Invoking Bedrock model', { modelId, payloadBytes: request.payload.byteLength });

      const command = new InvokeModelCommand({
        modelId,
        contentType: request.contentType,
        accept: request.acceptType,
        body: request.payload,
      });

      const response = await this.client.send(command);
      const rawBody = response.body ?? new Uint8Array();

      logInfo('Bedrock model invocation completed', {
        modelId,
        responseBytes: rawBody.byteLength,
        duration: Date.now() - startTime,
      });

      return ok({ rawBody });
    } catch (error) {
      const details = describeInvocationFailure(error);

      logError('Error invoking Bedrock model', { modelId, duration: Date.now() - startTime, ...details });

      return err(
        new InvocationError(`Failed to invoke model ${modelId}: ${getErrorMessage(error)}`, details, { cause: error })
      );
    }
  }
}

function describeInvocationFailure(error: unknown): Record<string, unknown> {
  if (error instanceof BedrockRuntimeServiceException) {
    return {
      errorName: error.name,
      fault: error.$fault,
      httpStatusCode: error.$metadata.httpStatusCode,
      requestId: error.$metadata.requestId,
    };
  }
  if (isRecord(error) && typeof error.name === 'string') {
    return { errorName: error.name };
  }
  return { errorName: typeof error };
}
