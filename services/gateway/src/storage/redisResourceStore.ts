import type Redis from 'ioredis';
import { KeyedTaskQueue } from '../concurrency/keyedTaskQueue';
import { systemClock, type Clock, type ResourceStore } from '../contracts/resourceStore';
import { notFound, ok, type StoreResult } from '../errors';
import {
  LIVE_RESOURCES_KEY,
  RESOURCE_SEQ_KEY,
  TOMBSTONES_KEY,
  fromHash,
  genResourceId,
  resourceKey,
  toHash,
} from '../redis/resources';
import type { CreateResourceArgs, Resource, ResourceId, UpdateResourceArgs } from '../types';
import { checkDeletable, initialResource, nextVersion } from './rules';

const MAX_CAS_ATTEMPTS = 5;

// Both scripts compare the stored version with ARGV[1] and report
// -1 (missing), 0 (version moved on) or 1 (written).
const REPLACE_IF_VERSION = `
local current = redis.call('HGET', KEYS[1], 'version')
if not current then return -1 end
if current ~= ARGV[1] then return 0 end
for i = 2, #ARGV, 2 do
  redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1])
end
return 1
`;

const DELETE_IF_VERSION = `
local current = redis.call('HGET', KEYS[1], 'version')
if not current then return -1 end
if current ~= ARGV[1] then return 0 end
redis.call('DEL', KEYS[1])
redis.call('ZREM', KEYS[2], ARGV[2])
redis.call('SADD', KEYS[3], ARGV[2])
return 1
`;

export interface RedisStoreOptions {
  clock?: Clock;
  generateId?: (seq: number) => ResourceId;
}

/**
 * Implements `ResourceStore` on Redis.
 *
 * Updates and deletes read the resource, decide in process, then commit
 * with a script that writes only if the version is still the one read, so
 * writers in other processes sharing the database cannot lose updates.
 * Nothing holds connection state between commands; the per-id `queue`
 * keeps same-id writers of this process in order and different ids never
 * wait on each other.
 */
export class RedisResourceStore implements ResourceStore {
  private readonly queue = new KeyedTaskQueue<ResourceId>();
  private readonly clock: Clock;
  private readonly generateId: (seq: number) => ResourceId;

  constructor(
    private readonly redis: Redis,
    options: RedisStoreOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? genResourceId;
  }

  async create(args: CreateResourceArgs): Promise<StoreResult<Resource>> {
    // validate before consuming a sequence number
    const draft = initialResource('', args, 0);
    if (!draft.ok) return draft;

    const seq = await this.redis.incr(RESOURCE_SEQ_KEY);
    const id = this.generateId(seq);
    if (await this.isKnownId(id)) {
      throw new Error(`generated resource id ${id} is already in use`);
    }

    const created = initialResource(id, args, this.clock());
    if (!created.ok) return created;
    const resource = created.value;

    const replies = await this.redis
      .multi()
      .hset(resourceKey(id), toHash(resource))
      .zadd(LIVE_RESOURCES_KEY, seq, id)
      .exec();
    if (!replies) throw new Error(`resource ${id}: create transaction aborted`);
    assertNoReplyErrors(replies);
    return ok({ ...resource });
  }

  async get(id: ResourceId): Promise<StoreResult<Resource>> {
    const current = fromHash(await this.redis.hgetall(resourceKey(id)));
    if (!current) return notFound(id);
    return ok(current);
  }

  async list(): Promise<Resource[]> {
    const ids = await this.redis.zrange(LIVE_RESOURCES_KEY, 0, -1);
    if (ids.length === 0) return [];

    const pipeline = this.redis.pipeline();
    for (const id of ids) pipeline.hgetall(resourceKey(id));
    const replies = await pipeline.exec();
    if (!replies) throw new Error('resource list: pipeline returned no replies');

    const resources: Resource[] = [];
    for (const [err, hash] of replies) {
      if (err) throw err;
      if (!isStringRecord(hash)) continue;
      const resource = fromHash(hash);
      // deleted between ZRANGE and HGETALL
      if (resource) resources.push(resource);
    }
    return resources;
  }

  update(id: ResourceId, args: UpdateResourceArgs): Promise<StoreResult<Resource>> {
    return this.queue.push(id, () =>
      this.compareAndSet<Resource>(id, (current) => {
        const next = nextVersion(current, args, this.clock());
        if (!next.ok) return next;
        const resource = next.value;
        return {
          result: ok({ ...resource }),
          commit: () =>
            this.redis.eval(
              REPLACE_IF_VERSION,
              1,
              resourceKey(id),
              String(current.version),
              ...Object.entries(toHash(resource)).flat(),
            ),
        };
      }),
    );
  }

  delete(id: ResourceId, expectedVersion: number): Promise<StoreResult<void>> {
    return this.queue.push(id, () =>
      this.compareAndSet<void>(id, (current) => {
        const allowed = checkDeletable(current, expectedVersion);
        if (!allowed.ok) return allowed;
        return {
          result: allowed,
          commit: () =>
            this.redis.eval(
              DELETE_IF_VERSION,
              3,
              resourceKey(id),
              LIVE_RESOURCES_KEY,
              TOMBSTONES_KEY,
              String(current.version),
              id,
            ),
        };
      }),
    );
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  /**
   * Reads the resource, lets `decide` either refuse (typed failure) or
   * return the write to commit, and starts over when another writer moved
   * the version between the read and the commit.
   */
  private async compareAndSet<T>(
    id: ResourceId,
    decide: (current: Resource) => StoreResult<T> | PendingWrite<T>,
  ): Promise<StoreResult<T>> {
    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
      const current = fromHash(await this.redis.hgetall(resourceKey(id)));
      if (!current) return notFound(id);

      const decision = decide(current);
      if (!('commit' in decision)) return decision;

      const outcome = Number(await decision.commit());
      if (outcome === 1) return decision.result;
      if (outcome === -1) return notFound(id);
      if (outcome !== 0) throw new Error(`resource ${id}: unexpected script reply ${outcome}`);
    }
    throw new Error(`resource ${id}: version moved on ${MAX_CAS_ATTEMPTS} times in a row`);
  }

  private async isKnownId(id: ResourceId): Promise<boolean> {
    const [exists, tombstoned] = await Promise.all([
      this.redis.exists(resourceKey(id)),
      this.redis.sismember(TOMBSTONES_KEY, id),
    ]);
    return exists === 1 || tombstoned === 1;
  }
}

type ExecReply = [error: Error | null, result: unknown][];

interface PendingWrite<T> {
  result: StoreResult<T>;
  commit: () => Promise<unknown>;
}

function assertNoReplyErrors(replies: ExecReply): void {
  for (const [err] of replies) {
    if (err) throw err;
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
