import { z } from 'zod';
import type { ErrorKind } from '../errors';
import type { CreateResourceArgs, Resource, ResourceId } from '../types';

const DEFAULT_BASE_URL = 'http://localhost:8080';
const DEFAULT_UPDATE_ATTEMPTS = 3;

type FetchImpl = typeof fetch;

export interface GatewayClientOptions {
  /** e.g. http://<identity>.onion when fetch is routed through a SOCKS-capable agent */
  baseUrl?: string;
  fetch?: FetchImpl;
}

const resourceSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  version: z.number().int(),
  created_at: z.number(),
  updated_at: z.number(),
});

const listSchema = z.object({ resources: z.array(resourceSchema) });

const deleteSchema = z.object({ deleted: z.literal(true), id: z.string() });

const errorSchema = z.object({
  error: z.object({
    kind: z.enum(['InvalidInput', 'NotFound', 'VersionConflict', 'HostRejected', 'Internal']),
    message: z.string(),
    current_version: z.number().int().optional(),
  }),
});

/** A gateway error response, carrying its kind. */
export class GatewayRequestError extends Error {
  constructor(
    readonly kind: ErrorKind | 'Unexpected',
    message: string,
    readonly status: number,
    readonly currentVersion?: number,
  ) {
    super(message);
    this.name = 'GatewayRequestError';
  }
}

export interface ResourceChanges {
  title?: string;
  description?: string;
}

export interface GatewayClient {
  create(args: CreateResourceArgs): Promise<Resource>;
  get(id: ResourceId): Promise<Resource>;
  list(): Promise<Resource[]>;
  update(id: ResourceId, expectedVersion: number, changes: ResourceChanges): Promise<Resource>;
  delete(id: ResourceId, expectedVersion: number): Promise<void>;
}

export function createGatewayClient(options: GatewayClientOptions = {}): GatewayClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');

  const fetchImpl: FetchImpl | undefined = options.fetch ?? globalThis.fetch;
  if (!fetchImpl) {
    throw new Error('createGatewayClient: fetch implementation required');
  }
  const boundFetch: FetchImpl = fetchImpl.bind(globalThis);

  async function call<T>(path: string, schema: z.ZodType<T>, init?: RequestInit): Promise<T> {
    const res = await boundFetch(`${baseUrl}${path}`, init);
    const body = await safeReadJson(res);

    if (!res.ok) {
      const parsed = errorSchema.safeParse(body);
      if (parsed.success) {
        const { kind, message, current_version } = parsed.data.error;
        throw new GatewayRequestError(kind, message, res.status, current_version);
      }
      throw new GatewayRequestError('Unexpected', `${path} failed: ${res.status} ${res.statusText}`, res.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new GatewayRequestError('Unexpected', `${path} returned an unexpected body`, res.status);
    }
    return parsed.data;
  }

  const post = (body: unknown): RequestInit => ({
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });

  return {
    create: (args) => call('/resource.create', resourceSchema, post(args)),
    get: (id) => call(`/resource.get?${new URLSearchParams({ id }).toString()}`, resourceSchema, { method: 'GET' }),
    list: async () => (await call('/resource.list', listSchema, { method: 'GET' })).resources,
    update: (id, expectedVersion, changes) =>
      call('/resource.update', resourceSchema, post({ id, expected_version: expectedVersion, ...changes })),
    delete: async (id, expectedVersion) => {
      await call('/resource.delete', deleteSchema, post({ id, expected_version: expectedVersion }));
    },
  };
}

/**
 * Read-modify-write with optimistic concurrency: re-reads the resource and
 * recomputes the changes whenever the gateway reports VersionConflict.
 */
export async function updateWithRetry(
  client: GatewayClient,
  id: ResourceId,
  mutate: (current: Resource) => ResourceChanges,
  maxAttempts = DEFAULT_UPDATE_ATTEMPTS,
): Promise<Resource> {
  let lastConflict: GatewayRequestError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const current = await client.get(id);
    try {
      return await client.update(id, current.version, mutate(current));
    } catch (err) {
      if (err instanceof GatewayRequestError && err.kind === 'VersionConflict') {
        lastConflict = err;
        continue;
      }
      throw err;
    }
  }

  throw lastConflict ?? new Error(`updateWithRetry: no attempt made for ${id}`);
}

async function safeReadJson(res: Response): Promise<unknown> {
  try {
    const text = await res.text();
    return text ? JSON.parse(text) : null;
  } catch {
    return null;
  }
}
