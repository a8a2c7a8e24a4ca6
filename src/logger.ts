import pino from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

// stderr keeps stdout free for the MCP stdio transport
export const logger = pino(
  {
    level: cfg.logLevel,
    base: undefined,
    redact: ['req.headers.authorization', 'headers.Authorization'],
  },
  pino.destination(2),
);

export type Logger = pino.Logger;
