import { NotSupportedError } from '../../mcp/errors';
import type { ChartDescriptor, ChartDocument } from '../models/chart';
import { ProviderCapability, capabilityLabel } from './types';
import type { ChartProvider } from './types';

const NOT_IMPLEMENTED = 'not implemented';

/**
 * Registered when a client id is configured so callers can discover it, but no
 * operation is implemented yet.
 */
export class SpotifyProvider implements ChartProvider {
  readonly name = 'spotify';
  readonly capabilities = ProviderCapability.Latest | ProviderCapability.ListCharts;

  constructor(readonly clientId?: string) {}

  async getLatest(): Promise<ChartDocument> {
    throw new NotSupportedError(capabilityLabel('Latest'), this.name, NOT_IMPLEMENTED);
  }

  async getChart(): Promise<ChartDocument> {
    throw new NotSupportedError(capabilityLabel('Historical'), this.name, NOT_IMPLEMENTED);
  }

  async listAvailableCharts(): Promise<ChartDescriptor[]> {
    throw new NotSupportedError(capabilityLabel('ListCharts'), this.name, NOT_IMPLEMENTED);
  }

  async close(): Promise<void> {}
}
