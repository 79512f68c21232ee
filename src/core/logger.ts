/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through `pino-pretty` in
 * development. Registry failures, skipped candidates and request lines all
 * go through this instance.
 *
 * The registry client logs the query params of a failed call, which carry
 * `api_token` when one is configured; that path is redacted.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: 'controller-lookup',
  level: config.log.level,
  redact: {
    paths: ['params.api_token'],
    censor: '[redacted]',
  },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
