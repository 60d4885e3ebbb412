import type pino from 'pino';
import { getEnvironment, isRunningInDocker } from '../config/environment';

// STDOUT carries the MCP protocol and CLI output, so logs always go to stderr
const STDERR_DESTINATION = 2;

function isPinoPrettyInstalled(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();

  // Transports run in a worker thread that would outlive the test run
  if (env.NODE_ENV === 'test') {
    return undefined;
  }

  if (env.NODE_ENV === 'development' && !isRunningInDocker() && isPinoPrettyInstalled()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION,
      },
    };
  }

  return { target: 'pino/file', options: { destination: STDERR_DESTINATION } };
}
