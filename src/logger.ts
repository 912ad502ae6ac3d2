import pino from 'pino';

// Diagnostics go to stderr: stdout carries echoed commands and tool output.
export const logger = pino(
  {
    name: 'grass-session',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2),
);
