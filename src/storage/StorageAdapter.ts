import type { CategoryId, Reflection, ReflectionId, ReflectionPatch, Vector } from '../types/Reflection.js';

export interface ScoredReflection {
  reflection: Reflection;
  score: number;
}

/**
 * Durable record store boundary. Every call is atomic on its own and
 * project-scoped; a rejection from any of them means the store is
 * unreachable for that operation.
 */
export interface RecordStore {
  // Core record operations
  persist(reflection: Reflection): Promise<ReflectionId>;
  fetchById(id: ReflectionId): Promise<Reflection | null>;
  update(id: ReflectionId, patch: ReflectionPatch): Promise<Reflection | null>;

  // Search
  lexicalSearch(text: string, project: string, limit: number): Promise<Reflection[]>;
  /** `project: null` searches every project; `categoryId: null` skips category narrowing. */
  vectorSearch(
    embedding: Vector,
    project: string | null,
    categoryId: CategoryId | null,
    limit: number,
  ): Promise<ScoredReflection[]>;

  // Warm-up and reclustering
  listAll(): Promise<Reflection[]>;

  // Lifecycle management
  initialize?(): Promise<void>;
  close?(): Promise<void>;
}
