import type pino from 'pino';
import { getEnvironment, isRunningInDocker } from '../config/environment';

// stdout carries MCP frames, so every log line goes to stderr
const STDERR_DESTINATION = 2;

function canResolve(moduleName: string): boolean {
  try {
    require.resolve(moduleName);
    return true;
  } catch {
    return false;
  }
}

export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();

  if (env.NODE_ENV === 'test') {
    return undefined;
  }

  if (env.NODE_ENV === 'development' && !isRunningInDocker() && canResolve('pino-pretty')) {
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
