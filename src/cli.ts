#!/usr/bin/env node

import { parseArgs } from 'util';
import { ChartCrawlerServer } from './server';
import { APP_NAME, APP_VERSION } from './config/constants';
import { DEFAULT_CHART_ID } from './config/charts';
import { getEnvironment } from './config/environment';
import { ChartClient, DEFAULT_PROVIDER } from './core/chartClient';
import { serializeChart } from './core/models/chart';
import { resolveWorkerPath } from './core/crawl/crawlRunner';
import { describeCapabilities } from './core/providers/types';
import { logger } from './utils/logger';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Fetches music charts and serves them as structured documents over the Model Context Protocol.

Usage: chart-crawler [command] [options]

Commands:
  server         Start the MCP server over STDIO (default)
  get [chart]    Fetch the latest edition of a chart and print it as JSON
  list           List the charts a provider can fetch
  health         Check configuration and the crawl worker
  version        Show version information
  help           Show this help message

Options for get:
  --provider <name>   Chart provider (default: billboard)
  --max <n>           Keep only the top n entries
  --no-images         Leave cover image URLs out
  --strict            Reject unknown chart names instead of falling back to hot-100

Options:
  --help, -h     Show help
  --version      Show version
  --verbose, -v  Verbose output

Examples:
  chart-crawler server
  chart-crawler get hot-100 --max 10
  chart-crawler get "billboard 200" --no-images
  chart-crawler list --provider billboard
`;

interface CliOptions {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  provider?: string;
  max?: string;
  'no-images'?: boolean;
  strict?: boolean;
}

interface ParsedArgs {
  values: CliOptions;
  positionals: string[];
}

function parseCliArgs(): ParsedArgs {
  try {
    return parseArgs({
      args: process.argv.slice(2),
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        provider: { type: 'string' },
        max: { type: 'string' },
        'no-images': { type: 'boolean' },
        strict: { type: 'boolean' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    logger.error({ error }, 'Invalid command line arguments');
    console.error('Error parsing arguments. Use --help for usage information.');
    process.exit(1);
  }
}

function parseMaxEntries(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.error(`❌ Invalid --max value "${raw}". Must be a positive integer.`);
    process.exit(1);
  }
  return value;
}

async function getChartCommand(chart: string, options: CliOptions): Promise<void> {
  const client = new ChartClient();
  try {
    const document = await client.getChart(chart, {
      provider: options.provider ?? DEFAULT_PROVIDER,
      maxEntries: parseMaxEntries(options.max),
      includeImages: options['no-images'] ? false : undefined,
      fallbackToDefault: options.strict ? false : undefined,
    });
    console.log(JSON.stringify(serializeChart(document), null, 2));
  } finally {
    await client.close();
  }
}

async function listChartsCommand(options: CliOptions): Promise<void> {
  const client = new ChartClient();
  try {
    const listing = options.provider
      ? { [options.provider]: await client.listCharts(options.provider) }
      : await client.listAllCharts();

    for (const [provider, charts] of Object.entries(listing)) {
      console.log(`\n📈 ${provider}`);
      console.log('-'.repeat(40));
      for (const chart of charts) {
        console.log(`${chart.title.padEnd(22)} ${chart.kind.padEnd(11)} ${chart.url}`);
        if (options.verbose && chart.description) {
          console.log(`  ${chart.description}`);
        }
      }
    }
  } finally {
    await client.close();
  }
}

function healthCommand(options: CliOptions): void {
  console.log('🔍 Health Check (Basic):');
  try {
    const env = getEnvironment();
    console.log('  ✅ Environment variables validated');
    console.log(`  ⚙️  Crawl mode: ${env.CRAWL_MODE}`);

    if (env.CRAWL_MODE === 'process') {
      console.log(`  ✅ Crawl worker: ${resolveWorkerPath()}`);
    }

    const client = new ChartClient();
    for (const name of client.providers) {
      const capabilities = describeCapabilities(client.getProvider(name).capabilities);
      console.log(`  📡 Provider ${name}: ${capabilities.join(', ')}`);
    }

    if (options.verbose) {
      console.log(`  ⏱️  Request timeout: ${env.REQUEST_TIMEOUT_MS}ms, retries: ${env.MAX_RETRIES}`);
      console.log(`  ⏱️  Worker timeout: ${env.CRAWL_WORKER_TIMEOUT_MS}ms`);
    }
    console.log('🚀 System ready');
  } catch (error) {
    console.error(
      '❌ Health check failed:',
      error instanceof Error ? error.message : 'Unknown error'
    );
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseCliArgs();

  if (values.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (values.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    process.exit(0);
  }

  const command = positionals[0] || 'server';

  switch (command) {
    case 'server': {
      const server = new ChartCrawlerServer();

      const shutdown = async (signal: string) => {
        logger.info({ signal }, 'Received shutdown signal, closing gracefully...');
        try {
          await server.stop();
          process.exit(0);
        } catch (error) {
          logger.error({ error }, 'Error during graceful shutdown');
          process.exit(1);
        }
      };

      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      process.on('SIGINT', () => void shutdown('SIGINT'));

      await server.start();
      break;
    }

    case 'get': {
      await getChartCommand(positionals[1] ?? DEFAULT_CHART_ID, values);
      break;
    }

    case 'list': {
      await listChartsCommand(values);
      break;
    }

    case 'version': {
      console.log(`${APP_NAME} v${APP_VERSION}`);
      break;
    }

    case 'help': {
      console.log(HELP_TEXT);
      break;
    }

    case 'health': {
      healthCommand(values);
      break;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Use --help for usage information.');
      process.exit(1);
    }
  }
}

main().catch(error => {
  logger.error({ error }, 'CLI execution failed');
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
  process.exit(1);
});
