import { randomUUID } from 'crypto';
import { KeyedTaskQueue } from '../concurrency/keyedTaskQueue';
import { systemClock, type Clock, type ResourceStore } from '../contracts/resourceStore';
import { notFound, ok, type StoreResult } from '../errors';
import type { CreateResourceArgs, Resource, ResourceId, UpdateResourceArgs } from '../types';
import { checkDeletable, initialResource, nextVersion } from './rules';

const MAX_ID_ATTEMPTS = 16;

export interface MemoryStoreOptions {
  clock?: Clock;
  generateId?: () => ResourceId;
}

/**
 * In-process `ResourceStore`. Map iteration order gives creation order;
 * deleted ids stay in `tombstones` for the lifetime of the store.
 */
export class MemoryResourceStore implements ResourceStore {
  private readonly resources = new Map<ResourceId, Resource>();
  private readonly tombstones = new Set<ResourceId>();
  private readonly queue = new KeyedTaskQueue<ResourceId>();
  private readonly clock: Clock;
  private readonly generateId: () => ResourceId;

  constructor(options: MemoryStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  async create(args: CreateResourceArgs): Promise<StoreResult<Resource>> {
    const id = this.freshId();
    const created = initialResource(id, args, this.clock());
    if (!created.ok) return created;

    this.resources.set(id, created.value);
    return ok({ ...created.value });
  }

  async get(id: ResourceId): Promise<StoreResult<Resource>> {
    const current = this.resources.get(id);
    if (!current) return notFound(id);
    return ok({ ...current });
  }

  async list(): Promise<Resource[]> {
    return Array.from(this.resources.values(), (r) => ({ ...r }));
  }

  update(id: ResourceId, args: UpdateResourceArgs): Promise<StoreResult<Resource>> {
    return this.queue.push<StoreResult<Resource>>(id, () => {
      const current = this.resources.get(id);
      if (!current) return notFound(id);

      const next = nextVersion(current, args, this.clock());
      if (!next.ok) return next;

      this.resources.set(id, next.value);
      return ok({ ...next.value });
    });
  }

  delete(id: ResourceId, expectedVersion: number): Promise<StoreResult<void>> {
    return this.queue.push<StoreResult<void>>(id, () => {
      const current = this.resources.get(id);
      if (!current) return notFound(id);

      const allowed = checkDeletable(current, expectedVersion);
      if (!allowed.ok) return allowed;

      this.resources.delete(id);
      this.tombstones.add(id);
      return allowed;
    });
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private freshId(): ResourceId {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId();
      if (!this.resources.has(id) && !this.tombstones.has(id)) return id;
    }
    throw new Error(`could not generate an unused resource id after ${MAX_ID_ATTEMPTS} attempts`);
  }
}
