/**
 * Bedrock client factory
 * Creates and configures BedrockRuntimeClient for model invocations
 */

import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { AWSConfig } from '../types';

/**
 * Creates a configured BedrockRuntimeClient
 * Credentials are resolved by the SDK's default provider chain
 */
export function createBedrockClient(config: AWSConfig): BedrockRuntimeClient {
  return new BedrockRuntimeClient({
    region: config.region,
    maxAttempts: config.maxAttempts,
  });
}
