import pino from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

// stdout carries the MCP stdio protocol, so logs always go to stderr
export const logger = pino(
  {
    name: 'unrest-monitor',
    level: cfg.logLevel,
    base: undefined,
    redact: {
      paths: ['params.key', 'params.email', 'headers["X-API-KEY"]', 'req.headers.authorization'],
      censor: '[redacted]',
    },
  },
  pino.destination(2),
);
