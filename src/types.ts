export interface Memory {
  id: number;
  content: string;
  contentHash: string;
  tags: string[];
  memoryType: string;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
  deletedAt: string | null;
  accessCount: number;
}

export interface MemoryRow {
  id: number;
  content_hash: string;
  content: string;
  tags: string | null;
  memory_type: string | null;
  metadata: string | null;
  created_at: number;
  updated_at: number;
  created_at_iso: string | null;
  updated_at_iso: string | null;
  deleted_at: number | null;
  access_count: number;
}

/** Input for {@link MemoryStore.storeMemory}. Hash and timestamps are filled in when absent. */
export interface NewMemory {
  content: string;
  tags?: string[];
  memoryType?: string;
  metadata?: Record<string, unknown>;
  contentHash?: string;
  createdAt?: Date;
  updatedAt?: Date;
}

export interface GraphEdge {
  sourceHash: string;
  targetHash: string;
  similarity: number;
  connectionTypes: string;
  relationshipType: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface GraphEdgeRow {
  source_hash: string;
  target_hash: string;
  similarity: number;
  connection_types: string;
  metadata: string | null;
  created_at: number;
  relationship_type: string | null;
}

export interface NewGraphEdge {
  sourceHash: string;
  targetHash: string;
  similarity: number;
  connectionTypes?: string;
  relationshipType?: string;
  metadata?: Record<string, unknown>;
}

export interface StoreStats {
  count: number;
  deletedCount: number;
  edgeCount: number;
  sizeBytes: number;
}

export interface MemoryStoreConfig {
  dbPath: string;
  /** How long a write waits for a lock held by another connection before failing. */
  busyTimeoutMs?: number;
}

export interface ScoringWeights {
  relevance: number;
  recency: number;
  access: number;
  halfLifeDays: number;
}

export interface ScoredMemory {
  memory: Memory;
  score: number;
}

/**
 * The external text-completion capability. Implementations reject with
 * CapabilityUnavailableError when the backend cannot be reached.
 */
export interface TextCompleter {
  complete(prompt: string, maxTokens: number, temperature?: number): Promise<string>;
}

export type LlmProvider = "openai" | "anthropic";

export interface LlmConfig {
  provider: LlmProvider;
  model: string;
  baseUrl?: string;
  apiKey?: string;
}

export interface AppConfig {
  dbPath: string;
  backupPath: string;
  sessionLogPath: string;
  openQuestionsPath: string;
  /** Where `predict` writes the next-session briefing. */
  preloadPath: string;
  busyTimeoutMs: number;
  llm: LlmConfig;
}
