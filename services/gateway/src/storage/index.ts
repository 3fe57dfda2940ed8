import type { GatewayConfig } from '../config';
import type { ResourceStore } from '../contracts/resourceStore';
import { getRedis } from '../redis/client';
import { MemoryResourceStore } from './memoryResourceStore';
import { RedisResourceStore } from './redisResourceStore';

export function createResourceStore(config: GatewayConfig): ResourceStore {
  const backend = config.store.backend;
  switch (backend) {
    case 'memory':
      return new MemoryResourceStore();
    case 'redis':
      return new RedisResourceStore(getRedis(config.store.redisUrl));
    default: {
      const unsupported: never = backend;
      throw new Error(`Unsupported store backend: ${String(unsupported)}`);
    }
  }
}
