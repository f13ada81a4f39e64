import { Request } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { createModuleLogger } from '../utils';
import { env } from '../config';

const httpLog = createModuleLogger('http');

// Morgan writes through winston at the "http" level
const stream: StreamOptions = {
  write: (message: string) => {
    httpLog.http(message.trim());
  },
};

// Nothing in tests; health checks are skipped
const skip = (req: Request): boolean => {
  return env.NODE_ENV === 'test' || req.originalUrl.startsWith(`${env.API_PREFIX}/health`);
};

export const requestLogger = morgan<Request>(
  env.NODE_ENV === 'production' ? 'combined' : 'dev',
  { stream, skip }
);

export default requestLogger;
