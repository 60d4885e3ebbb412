import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';

export class TimeoutError extends McpError {
  constructor(message: string, timeoutMs: number) {
    super(ErrorCode.InternalError, `${message} (timeout: ${timeoutMs}ms)`);
    this.name = 'TimeoutError';
  }
}

export class NetworkError extends McpError {
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(message: string, statusCode?: number, retryAfterMs?: number) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super(ErrorCode.InternalError, `Network error: ${message}${statusInfo}`);
    this.name = 'NetworkError';
    this.statusCode = statusCode;
    this.retryAfterMs = retryAfterMs;
  }
}

/** Unknown chart identifier while fallback is disabled. User-correctable. */
export class InvalidChartError extends McpError {
  readonly input: string;
  readonly validCharts: string[];

  constructor(input: string, validCharts: string[]) {
    super(
      ErrorCode.InvalidParams,
      `Unknown chart: "${input}". Available: ${validCharts.join(', ')}`,
      { input, validCharts }
    );
    this.name = 'InvalidChartError';
    this.input = input;
    this.validCharts = validCharts;
  }
}

export class NotSupportedError extends McpError {
  readonly capability: string;
  readonly provider: string;

  constructor(capability: string, provider: string, detail?: string) {
    const detailInfo = detail ? `: ${detail}` : '';
    super(
      ErrorCode.InvalidRequest,
      `Provider "${provider}" does not support ${capability}${detailInfo}`,
      { capability, provider }
    );
    this.name = 'NotSupportedError';
    this.capability = capability;
    this.provider = provider;
  }
}

export interface FetchFailureContext {
  chartId?: string;
  url?: string;
  cause?: unknown;
}

/** Network, worker or empty-result failure. Re-invoking may succeed. */
export class FetchFailureError extends McpError {
  readonly chartId?: string;
  readonly url?: string;

  constructor(message: string, context: FetchFailureContext = {}) {
    const chartInfo = context.chartId ? ` for chart: ${context.chartId}` : '';
    super(ErrorCode.InternalError, `Fetch failed${chartInfo}: ${message}`, {
      chartId: context.chartId,
      url: context.url,
    });
    this.name = 'FetchFailureError';
    this.chartId = context.chartId;
    this.url = context.url;
    this.cause = context.cause;
  }
}

/** An assembled entry or document broke an invariant; indicates an extraction bug. */
export class ValidationFailureError extends McpError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const issueInfo = issues.length > 0 ? ` (${issues.join('; ')})` : '';
    super(ErrorCode.InternalError, `Validation failure: ${message}${issueInfo}`, { issues });
    this.name = 'ValidationFailureError';
    this.issues = issues;
  }
}

export class ValidationError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InvalidParams, `Validation error: ${message}`);
    this.name = 'ValidationError';
  }
}

export function handleMcpError(error: unknown, context?: string): McpError {
  if (error instanceof McpError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof ZodError) {
    const issues = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new ValidationError(`${prefix}${issues.join('; ')}`);
  }

  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, `${prefix}${error.message}`);
  }

  return new McpError(ErrorCode.InternalError, `${prefix}Unknown error occurred`);
}
