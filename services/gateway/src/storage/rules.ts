import { invalidInput, ok, versionConflict, type StoreResult } from '../errors';
import type { CreateResourceArgs, Resource, ResourceId, UpdateResourceArgs } from '../types';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 10_000;

function checkTitle(title: string): string | null {
  if (title.length === 0) return 'title must not be empty';
  if (title.length > TITLE_MAX_LENGTH) return `title must be at most ${TITLE_MAX_LENGTH} characters`;
  return null;
}

function checkDescription(description: string): string | null {
  if (description.length > DESCRIPTION_MAX_LENGTH) {
    return `description must be at most ${DESCRIPTION_MAX_LENGTH} characters`;
  }
  return null;
}

/** Builds version 1 of a resource, or the reason it cannot be created. */
export function initialResource(id: ResourceId, args: CreateResourceArgs, now: number): StoreResult<Resource> {
  const title = args.title.trim();
  const description = args.description ?? '';
  const problem = checkTitle(title) ?? checkDescription(description);
  if (problem) return invalidInput(problem);

  return ok({ id, title, description, version: 1, created_at: now, updated_at: now });
}

/**
 * Applies an update to the current state of a resource.
 * Checks the expected version before anything else, so a stale writer
 * always sees VersionConflict rather than a validation error.
 */
export function nextVersion(current: Resource, args: UpdateResourceArgs, now: number): StoreResult<Resource> {
  if (args.expected_version !== current.version) {
    return versionConflict(current.id, args.expected_version, current.version);
  }

  const title = args.title !== undefined ? args.title.trim() : current.title;
  const description = args.description ?? current.description;
  const problem = checkTitle(title) ?? checkDescription(description);
  if (problem) return invalidInput(problem);

  return ok({
    ...current,
    title,
    description,
    version: current.version + 1,
    // wall clock may step back; updated_at must not
    updated_at: Math.max(now, current.updated_at),
  });
}

export function checkDeletable(current: Resource, expectedVersion: number): StoreResult<void> {
  if (expectedVersion !== current.version) {
    return versionConflict(current.id, expectedVersion, current.version);
  }
  return ok(undefined);
}
