import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(level: string = 'info'): Logger {
  return pino(
    {
      name: 'srv-resolve',
      level,
    },
    pino.destination(2) // stderr: stdout carries command output
  );
}
