/**
 * MCP Server
 *
 * Exposes the web environment as tools over stdio:
 * - env_observe: observe the active tab
 * - env_step: execute one action and observe
 * - env_reset: start over at the configured start URL
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ObservationFormat, ServerConfig } from './types.js';
import { ObservationFormatSchema } from './types.js';
import { ensureEnvironmentReady } from './server-config.js';
import { ActionRequestInputSchema } from '../actions/action.schemas.js';
import type { Observation } from '../environment/environment.types.js';
import { renderObservationText } from '../renderer/observation-renderer.js';
import {
  createErrorResponse,
  createSuccessResponse,
  type ToolResponse,
} from '../shared/errors/index.js';
import {
  getLogger,
  isLogLevel,
  type LogLevel,
  type LogNotificationSender,
} from '../shared/services/logging.service.js';

/**
 * Tool response for an observation in the requested format.
 */
export function observationResponse(observation: Observation, format: ObservationFormat = 'json'): ToolResponse {
  return createSuccessResponse(
    observation,
    format === 'text' ? renderObservationText(observation) : undefined
  );
}

/**
 * Run a tool handler with timing logs; failures become error responses.
 */
export async function executeWithLogging(
  toolName: string,
  handler: () => Promise<ToolResponse>
): Promise<ToolResponse> {
  const logger = getLogger();
  const startTime = Date.now();

  try {
    logger.debug(`Executing tool: ${toolName}`);
    const result = await handler();
    logger.debug(`Tool ${toolName} completed in ${Date.now() - startTime}ms`);
    return result;
  } catch (error) {
    logger.error(
      `Tool ${toolName} failed after ${Date.now() - startTime}ms`,
      error instanceof Error ? error : undefined,
      { toolName }
    );
    return createErrorResponse(error);
  }
}

export class WebEnvironmentServer implements LogNotificationSender {
  private readonly server: McpServer;
  private transport: StdioServerTransport | null = null;

  constructor(private readonly config: ServerConfig) {
    this.server = new McpServer(
      {
        name: config.name,
        version: config.version,
      },
      {
        capabilities: config.capabilities,
      }
    );

    this.registerLoggingHandlers();
    this.registerTools();

    getLogger().setNotificationSender(this);
  }

  /**
   * Send logging message notification via MCP protocol
   */
  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const logger = getLogger();
      const { level } = request.params;
      if (isLogLevel(level)) {
        logger.setMinLevel(level);
        logger.info(`Log level set to: ${level}`);
      }
      return {};
    });
  }

  private registerTools(): void {
    this.server.registerTool(
      'env_observe',
      {
        title: 'Observe Page',
        description: `Observe the active tab: reduced HTML, semantic ids of clickable, hoverable, input and select elements, open tabs and episode status.

Semantic ids are valid until the next observation. Use them as "target" in env_step.`,
        inputSchema: { format: ObservationFormatSchema.optional() },
      },
      async ({ format }) =>
        executeWithLogging('env_observe', async () => {
          const env = await ensureEnvironmentReady();
          return observationResponse(await env.observation(), format);
        })
    );

    this.server.registerTool(
      'env_step',
      {
        title: 'Execute Action',
        description: `Execute one action and return the next observation. Action failures are reported in the observation's "error" field.

Actions:
- click, hover, clear: {target}
- type: {target, text, enter?}
- select: {target, value}
- key_press: {key, target?}
- goto_url: {url}; back; forward; refresh
- new_tab: {url?}; switch_tab / close_tab: {tab_id}
- terminate: {answer?}`,
        inputSchema: { ...ActionRequestInputSchema.shape, format: ObservationFormatSchema.optional() },
      },
      async ({ format, ...action }) =>
        executeWithLogging('env_step', async () => {
          const env = await ensureEnvironmentReady();
          return observationResponse(await env.step(action), format);
        })
    );

    this.server.registerTool(
      'env_reset',
      {
        title: 'Reset Environment',
        description: 'Close all tabs, open the start URL in a fresh tab and clear the final answer.',
        inputSchema: { format: ObservationFormatSchema.optional() },
      },
      async ({ format }) =>
        executeWithLogging('env_reset', async () => {
          const env = await ensureEnvironmentReady();
          return observationResponse(await env.reset(), format);
        })
    );
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    getLogger().info(`${this.config.name} v${this.config.version} started`, { tools: 3 });
  }

  /**
   * Stop the MCP server
   */
  async stop(): Promise<void> {
    getLogger().setNotificationSender(null);
    await this.server.close();
  }
}
