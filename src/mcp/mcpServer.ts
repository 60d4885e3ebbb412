import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { APP_NAME, APP_VERSION, MCP_TOOL_DESCRIPTIONS } from '../config/constants';
import { generateCorrelationId, createChildLogger, withTiming } from '../utils/logger';
import { handleMcpError, ValidationError } from './errors';
import { GetLatestChartInput, GetChartByDateInput, ListChartsInput } from './schemas';
import { handleGetLatestChart, handleGetChartByDate, handleListCharts } from '../handlers/index';

export const TOOL_NAMES = {
  GET_LATEST: 'charts.getLatest',
  GET_BY_DATE: 'charts.getByDate',
  LIST: 'charts.list',
} as const;

export const mcpServer = new Server(
  {
    name: APP_NAME,
    version: APP_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

export function listTools() {
  return [
    {
      name: TOOL_NAMES.GET_LATEST,
      description: MCP_TOOL_DESCRIPTIONS.GET_LATEST_CHART,
      inputSchema: zodToJsonSchema(GetLatestChartInput),
    },
    {
      name: TOOL_NAMES.GET_BY_DATE,
      description: MCP_TOOL_DESCRIPTIONS.GET_CHART_BY_DATE,
      inputSchema: zodToJsonSchema(GetChartByDateInput),
    },
    {
      name: TOOL_NAMES.LIST,
      description: MCP_TOOL_DESCRIPTIONS.LIST_CHARTS,
      inputSchema: zodToJsonSchema(ListChartsInput),
    },
  ];
}

/** Routes one tool call; every failure leaves as an McpError. */
export async function callTool(name: string, args: unknown) {
  const correlationId = generateCorrelationId();
  const childLogger = createChildLogger(correlationId);

  try {
    childLogger.info({ tool: name }, 'Tool call received');

    switch (name) {
      case TOOL_NAMES.GET_LATEST:
        return await withTiming(childLogger, `tool:${name}`, async () =>
          handleGetLatestChart(args, childLogger)
        );

      case TOOL_NAMES.GET_BY_DATE:
        return await withTiming(childLogger, `tool:${name}`, async () =>
          handleGetChartByDate(args, childLogger)
        );

      case TOOL_NAMES.LIST:
        return await withTiming(childLogger, `tool:${name}`, async () =>
          handleListCharts(args, childLogger)
        );

      default:
        throw new ValidationError(`Unknown tool: ${name}`);
    }
  } catch (error) {
    childLogger.error({ error, tool: name }, 'Tool call failed');
    throw handleMcpError(error, `Tool call: ${name}`);
  }
}

mcpServer.setRequestHandler(ListToolsRequestSchema, async () => {
  createChildLogger(generateCorrelationId()).debug('Listing available tools');
  return { tools: listTools() };
});

mcpServer.setRequestHandler(CallToolRequestSchema, async request =>
  callTool(request.params.name, request.params.arguments)
);
