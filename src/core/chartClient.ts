import type pino from 'pino';
import { getEnvironment } from '../config/environment';
import { DEFAULT_CHART_ID } from '../config/charts';
import { ValidationError } from '../mcp/errors';
import { isIsoDate } from '../utils/dates';
import { logger as rootLogger } from '../utils/logger';
import type { ChartDescriptor, ChartDocument } from './models/chart';
import { BillboardProvider } from './providers/billboardProvider';
import type { BillboardProviderConfig } from './providers/billboardProvider';
import { SpotifyProvider } from './providers/spotifyProvider';
import { assertCapability, supportsCapability } from './providers/types';
import type { ChartProvider, ChartRequestOptions } from './providers/types';

export const DEFAULT_PROVIDER = 'billboard';

export interface ChartClientOptions {
  /** Replaces the default provider set. */
  providers?: ChartProvider[];
  billboard?: BillboardProviderConfig;
  spotifyClientId?: string;
  logger?: pino.Logger;
}

export interface ProviderRequestOptions extends ChartRequestOptions {
  provider?: string;
}

/** Single entry point over every registered chart provider. */
export class ChartClient {
  private readonly registry = new Map<string, ChartProvider>();
  private readonly log: pino.Logger;

  constructor(options: ChartClientOptions = {}) {
    this.log = options.logger ?? rootLogger;
    const providers = options.providers ?? ChartClient.defaultProviders(options);
    for (const provider of providers) {
      this.registry.set(provider.name, provider);
    }
    this.log.debug({ providers: this.providers }, 'ChartClient created');
  }

  private static defaultProviders(options: ChartClientOptions): ChartProvider[] {
    const providers: ChartProvider[] = [new BillboardProvider(options.billboard)];
    const spotifyClientId = options.spotifyClientId ?? getEnvironment().SPOTIFY_CLIENT_ID;
    if (spotifyClientId) {
      providers.push(new SpotifyProvider(spotifyClientId));
    }
    return providers;
  }

  get providers(): string[] {
    return [...this.registry.keys()];
  }

  getProvider(name: string = DEFAULT_PROVIDER): ChartProvider {
    const provider = this.registry.get(name.trim().toLowerCase());
    if (!provider) {
      throw new ValidationError(
        `Unknown provider: "${name}". Available: ${this.providers.join(', ')}`
      );
    }
    return provider;
  }

  async getChart(
    chart: string = DEFAULT_CHART_ID,
    options: ProviderRequestOptions = {}
  ): Promise<ChartDocument> {
    const { provider: providerName, ...requestOptions } = options;
    const provider = this.getProvider(providerName);
    assertCapability(provider, 'Latest');
    return provider.getLatest(chart, requestOptions);
  }

  async getChartByDate(
    chart: string,
    date: string,
    options: ProviderRequestOptions = {}
  ): Promise<ChartDocument> {
    if (!isIsoDate(date)) {
      throw new ValidationError(`date must be YYYY-MM-DD, got "${date}"`);
    }
    const { provider: providerName, ...requestOptions } = options;
    const provider = this.getProvider(providerName);
    assertCapability(provider, 'Historical');
    return provider.getChart(chart, date, requestOptions);
  }

  async listCharts(providerName?: string): Promise<ChartDescriptor[]> {
    const provider = this.getProvider(providerName);
    assertCapability(provider, 'ListCharts');
    return provider.listAvailableCharts();
  }

  /** Charts of every provider that can list them; a failing provider is skipped. */
  async listAllCharts(): Promise<Record<string, ChartDescriptor[]>> {
    const listing: Record<string, ChartDescriptor[]> = {};
    for (const provider of this.registry.values()) {
      if (!supportsCapability(provider, 'ListCharts')) continue;
      try {
        listing[provider.name] = await provider.listAvailableCharts();
      } catch (error) {
        this.log.warn({ provider: provider.name, error }, 'Provider failed to list charts');
      }
    }
    return listing;
  }

  async close(): Promise<void> {
    const results = await Promise.allSettled(
      [...this.registry.values()].map(provider => provider.close())
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.log.warn(
          { provider: this.providers[index], error: result.reason },
          'Provider failed to close'
        );
      }
    });
  }
}

let sharedClient: ChartClient | null = null;

/** Process-wide client used by the MCP handlers. */
export function getChartClient(): ChartClient {
  if (!sharedClient) sharedClient = new ChartClient();
  return sharedClient;
}

export async function closeChartClient(): Promise<void> {
  if (!sharedClient) return;
  const client = sharedClient;
  sharedClient = null;
  await client.close();
}
