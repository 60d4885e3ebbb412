import type pino from 'pino';
import { GetLatestChartInput } from '../mcp/schemas';
import { getChartClient } from '../core/chartClient';
import type { ChartClient } from '../core/chartClient';
import { serializeChart } from '../core/models/chart';
import { jsonResult } from './toolResult';
import type { ToolResult } from './toolResult';

export async function handleGetLatestChart(
  args: unknown,
  logger: pino.Logger,
  client: ChartClient = getChartClient()
): Promise<ToolResult> {
  const input = GetLatestChartInput.parse(args ?? {});
  logger.info({ input }, 'Processing latest chart request');

  const chart = await client.getChart(input.chart, {
    provider: input.provider,
    includeImages: input.includeImages,
    maxEntries: input.maxEntries,
    fallbackToDefault: input.fallbackToDefault,
    correlationId: logger.bindings().correlationId,
  });

  logger.info(
    { chart: chart.descriptor.title, publishedDate: chart.published_date, entries: chart.entries.length },
    'Latest chart fetched'
  );
  return jsonResult(serializeChart(chart));
}
