import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ResourceStore } from '../contracts/resourceStore';
import { DESCRIPTION_MAX_LENGTH, TITLE_MAX_LENGTH } from '../storage/rules';
import { badRequest, sendStoreError } from './reply';

// ---------- Schemas ----------
const title = z.string().trim().min(1, 'title must not be empty').max(TITLE_MAX_LENGTH);
const description = z.string().max(DESCRIPTION_MAX_LENGTH);
const id = z.string().min(1, 'id required');
const expectedVersion = z.number().int().positive();

const createSchema = z.object({
  title,
  description: description.optional(),
});

const getSchema = z.object({ id });

const updateSchema = z.object({
  id,
  expected_version: expectedVersion,
  title: title.optional(),
  description: description.optional(),
});

const deleteSchema = z.object({
  id,
  expected_version: expectedVersion,
});

// ---------- Routes ----------
export async function registerResourceRoutes(app: FastifyInstance, store: ResourceStore) {
  // Create
  app.post('/resource.create', async (req, reply) => {
    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const result = await store.create(parsed.data);
    if (!result.ok) return sendStoreError(reply, result.error);

    req.log.info({ id: result.value.id }, 'Resource created');
    return reply.code(201).send(result.value);
  });

  // Read
  app.get('/resource.get', async (req, reply) => {
    const parsed = getSchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const result = await store.get(parsed.data.id);
    if (!result.ok) return sendStoreError(reply, result.error);
    return reply.send(result.value);
  });

  // List, in creation order
  app.get('/resource.list', async (_req, reply) => {
    const resources = await store.list();
    return reply.send({ resources });
  });

  // Update (optimistic: expected_version must match)
  app.post('/resource.update', async (req, reply) => {
    const parsed = updateSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { id: resourceId, ...changes } = parsed.data;
    const result = await store.update(resourceId, changes);
    if (!result.ok) return sendStoreError(reply, result.error);

    req.log.info({ id: resourceId, version: result.value.version }, 'Resource updated');
    return reply.send(result.value);
  });

  // Delete (tombstones the id)
  app.post('/resource.delete', async (req, reply) => {
    const parsed = deleteSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { id: resourceId, expected_version } = parsed.data;
    const result = await store.delete(resourceId, expected_version);
    if (!result.ok) return sendStoreError(reply, result.error);

    req.log.info({ id: resourceId }, 'Resource deleted');
    return reply.send({ deleted: true, id: resourceId });
  });
}
