import type { Resource, ResourceId } from '../types';

export const resourceKey = (id: ResourceId) => `gw:resource:${id}`;
export const LIVE_RESOURCES_KEY = 'gw:resources';   // zset, scored by creation sequence
export const TOMBSTONES_KEY = 'gw:tombstones';      // set of deleted ids
export const RESOURCE_SEQ_KEY = 'gw:resource:seq';  // monotonic counter

export function toHash(r: Resource): Record<string, string> {
  return {
    id: r.id,
    title: r.title,
    description: r.description,
    version: String(r.version),
    created_at: String(r.created_at),
    updated_at: String(r.updated_at),
  };
}

/** Returns null for a missing key or a hash that is not a resource. */
export function fromHash(hash: Record<string, string>): Resource | null {
  if (!hash || !hash.id || hash.title === undefined) return null;

  const version = Number(hash.version);
  const created_at = Number(hash.created_at);
  const updated_at = Number(hash.updated_at);
  if (![version, created_at, updated_at].every(Number.isFinite)) return null;

  return {
    id: hash.id,
    title: hash.title,
    description: hash.description ?? '',
    version,
    created_at,
    updated_at,
  };
}

export function genResourceId(seq: number): ResourceId {
  const rand = Math.random().toString(36).slice(2, 10);
  return `${seq.toString(36)}-${rand}`;
}
