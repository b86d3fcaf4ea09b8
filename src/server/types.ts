/**
 * Server Types
 */

import { z } from 'zod';

/**
 * MCP Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  capabilities: {
    tools?: Record<string, unknown>;
    logging?: Record<string, unknown>;
  };
}

/** How an observation is rendered into the tool's text content */
export const ObservationFormatSchema = z
  .enum(['json', 'text'])
  .describe('json: the observation as JSON; text: a plain-text summary for prompts');

export type ObservationFormat = z.infer<typeof ObservationFormatSchema>;
