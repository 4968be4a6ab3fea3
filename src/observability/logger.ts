// .env must be loaded before the level is read below
import 'dotenv/config';
import pino from 'pino';

function buildTransport(): pino.TransportSingleOptions | undefined {
  // Pretty output in development only; JSON lines on stdout otherwise
  if (process.env.NODE_ENV !== 'development') return undefined;
  return { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } };
}

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: buildTransport(),
});
