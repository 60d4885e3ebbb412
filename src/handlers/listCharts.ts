import type pino from 'pino';
import { ListChartsInput } from '../mcp/schemas';
import { getChartClient } from '../core/chartClient';
import type { ChartClient } from '../core/chartClient';
import { jsonResult } from './toolResult';
import type { ToolResult } from './toolResult';

export async function handleListCharts(
  args: unknown,
  logger: pino.Logger,
  client: ChartClient = getChartClient()
): Promise<ToolResult> {
  const input = ListChartsInput.parse(args ?? {});
  logger.debug({ input }, 'Processing chart listing request');

  if (input.provider) {
    const charts = await client.listCharts(input.provider);
    return jsonResult({ [input.provider]: charts });
  }
  return jsonResult(await client.listAllCharts());
}
