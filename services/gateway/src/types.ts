export type ResourceId = string;

export interface Resource {
  id: ResourceId;      // assigned by the store, never reused
  title: string;
  description: string;
  version: number;
  created_at: number;  // epoch ms
  updated_at: number;  // epoch ms, >= created_at
}

export interface CreateResourceArgs {
  title: string;
  description?: string;
}

// Fields left undefined are not touched by the update
export interface UpdateResourceArgs {
  expected_version: number;
  title?: string;
  description?: string;
}
