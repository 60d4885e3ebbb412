import { NotSupportedError } from '../../mcp/errors';
import type { ChartDescriptor, ChartDocument } from '../models/chart';

/** Bit flags; a provider's `capabilities` is their union. */
export const ProviderCapability = {
  None: 0,
  Latest: 1 << 0,
  Historical: 1 << 1,
  ListCharts: 1 << 2,
  Search: 1 << 3,
} as const;

export type ProviderCapabilityName = Exclude<keyof typeof ProviderCapability, 'None'>;

const CAPABILITY_LABELS: Record<ProviderCapabilityName, string> = {
  Latest: 'latest charts',
  Historical: 'historical charts',
  ListCharts: 'chart listing',
  Search: 'search',
};

export interface ChartRequestOptions {
  includeImages?: boolean;
  maxEntries?: number | null;
  fallbackToDefault?: boolean;
  maxRetries?: number;
  timeoutMs?: number;
  correlationId?: string;
}

export interface ChartProvider {
  readonly name: string;
  readonly capabilities: number;
  getLatest(chart: string, options?: ChartRequestOptions): Promise<ChartDocument>;
  /** `date` is YYYY-MM-DD. */
  getChart(chart: string, date: string, options?: ChartRequestOptions): Promise<ChartDocument>;
  listAvailableCharts(): Promise<ChartDescriptor[]>;
  close(): Promise<void>;
}

export function supportsCapability(
  provider: Pick<ChartProvider, 'capabilities'>,
  capability: ProviderCapabilityName
): boolean {
  const flag = ProviderCapability[capability];
  return (provider.capabilities & flag) === flag;
}

export function assertCapability(
  provider: Pick<ChartProvider, 'capabilities' | 'name'>,
  capability: ProviderCapabilityName
): void {
  if (!supportsCapability(provider, capability)) {
    throw new NotSupportedError(CAPABILITY_LABELS[capability], provider.name);
  }
}

export function describeCapabilities(capabilities: number): ProviderCapabilityName[] {
  const names: ProviderCapabilityName[] = ['Latest', 'Historical', 'ListCharts', 'Search'];
  return names.filter(name => (capabilities & ProviderCapability[name]) !== 0);
}

export function capabilityLabel(capability: ProviderCapabilityName): string {
  return CAPABILITY_LABELS[capability];
}
