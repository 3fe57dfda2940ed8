import type { StoreResult } from '../errors';
import type { CreateResourceArgs, Resource, ResourceId, UpdateResourceArgs } from '../types';

/**
 * Authoritative owner of all resources.
 * Every method hands back copies; callers never share state with the store.
 * Mutations of one id are serialized, mutations of different ids are not.
 */
export interface ResourceStore {
  create(args: CreateResourceArgs): Promise<StoreResult<Resource>>;
  get(id: ResourceId): Promise<StoreResult<Resource>>;
  /** Live resources in creation order. */
  list(): Promise<Resource[]>;
  update(id: ResourceId, args: UpdateResourceArgs): Promise<StoreResult<Resource>>;
  delete(id: ResourceId, expectedVersion: number): Promise<StoreResult<void>>;
  close(): Promise<void>;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
