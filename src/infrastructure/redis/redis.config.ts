import { config } from '../../config/env.config.js';

export const redisConfig = {
  ttlSeconds: config.SESSION_TTL,
  prefixes: {
    conversation: 'conv',
    dedup: 'proc',
  },
} as const;
