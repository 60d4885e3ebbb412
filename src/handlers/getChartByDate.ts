import type pino from 'pino';
import { GetChartByDateInput } from '../mcp/schemas';
import { getChartClient } from '../core/chartClient';
import type { ChartClient } from '../core/chartClient';
import { serializeChart } from '../core/models/chart';
import { jsonResult } from './toolResult';
import type { ToolResult } from './toolResult';

export async function handleGetChartByDate(
  args: unknown,
  logger: pino.Logger,
  client: ChartClient = getChartClient()
): Promise<ToolResult> {
  const input = GetChartByDateInput.parse(args);
  logger.info({ input }, 'Processing dated chart request');

  const chart = await client.getChartByDate(input.chart, input.date, {
    provider: input.provider,
    includeImages: input.includeImages,
    maxEntries: input.maxEntries,
    fallbackToDefault: input.fallbackToDefault,
    correlationId: logger.bindings().correlationId,
  });

  return jsonResult(serializeChart(chart));
}
