import { Logger } from '../logging/logger.js';
import { cosineSimilarity, type EmbeddingProvider } from '../embedding/embedding-provider.js';
import { EmbeddingError, describeError } from '../agent/errors.js';
import { ToolCatalog, type ToolDefinition } from './tool-catalog.js';

/**
 * Scoring knobs for {@link ToolManager.search}
 */
export interface ToolSearchConfig {
  /** Cosine similarity a tool must exceed to count as a semantic match */
  similarityFloor: number;
  /** Semantic score at or above which a match is activated */
  semanticActivationThreshold: number;
  /** Keyword score at or above which a match is activated */
  keywordActivationThreshold: number;
  /** Default number of results */
  topK: number;
}

export const DEFAULT_TOOL_SEARCH_CONFIG: ToolSearchConfig = {
  similarityFloor: 0.3,
  semanticActivationThreshold: 0.4,
  keywordActivationThreshold: 1.0,
  topK: 3,
};

export const DEFAULT_CATEGORY = 'general';

export interface RegisterToolOptions {
  keywords?: string[];
  category?: string;
  /** Keep the tool visible for the lifetime of the manager */
  alwaysLoad?: boolean;
}

/**
 * Registry entry for one tool
 */
export interface ToolRegistration {
  definition: ToolDefinition;
  keywords: ReadonlySet<string>;
  category: string;
  embedding?: number[];
}

export interface ToolMatch {
  name: string;
  description: string;
  category: string;
  score: number;
}

export type ToolSearchMode = 'semantic' | 'keyword';

export interface ToolSearchOptions {
  category?: string;
  topK?: number;
}

export interface ToolManagerStats {
  totalRegistered: number;
  currentlyLoaded: number;
  alwaysLoaded: number;
  semanticSearchEnabled: boolean;
}

interface RegistryEntry {
  keywords: Set<string>;
  category: string;
  embedding?: number[];
}

/**
 * A keyword hits when each of its words occurs somewhere in the query
 */
function keywordMatches(keyword: string, queryLower: string): boolean {
  const words = keyword.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
  return words.length > 0 && words.every((word) => queryLower.includes(word));
}

/**
 * ToolManager - Decides which tool definitions are visible to the model.
 *
 * Holds every declared tool with its discovery metadata and two activation
 * sets: `alwaysActive` only grows; `currentlyActive` always contains it and
 * grows through {@link search} hits or {@link loadTools}.
 */
export class ToolManager {
  private catalog = new ToolCatalog();
  private entries: Map<string, RegistryEntry> = new Map();
  private alwaysActive: Set<string> = new Set();
  private currentlyActive: Set<string> = new Set();
  private config: ToolSearchConfig;
  private embeddingProvider: EmbeddingProvider | null;
  private logger: Logger;

  constructor(
    options: { embeddingProvider?: EmbeddingProvider; search?: Partial<ToolSearchConfig> } = {},
    logger?: Logger
  ) {
    this.embeddingProvider = options.embeddingProvider ?? null;
    this.config = { ...DEFAULT_TOOL_SEARCH_CONFIG, ...options.search };
    this.logger = (logger ?? new Logger()).child({ component: 'tool-manager' });
  }

  getConfig(): ToolSearchConfig {
    return { ...this.config };
  }

  get semanticSearchEnabled(): boolean {
    return this.embeddingProvider !== null;
  }

  /**
   * Adds or replaces a tool. When an embedding provider is configured the
   * tool's name, description and keywords are embedded; a failed embedding
   * is logged and leaves the tool reachable through keyword search only.
   */
  async registerTool(name: string, definition: ToolDefinition, options: RegisterToolOptions = {}): Promise<void> {
    const keywords = new Set((options.keywords ?? []).map((k) => k.trim()).filter((k) => k.length > 0));
    const entry: RegistryEntry = {
      keywords,
      category: options.category ?? DEFAULT_CATEGORY,
    };

    this.catalog.set(name, definition);
    this.entries.set(name, entry);

    if (options.alwaysLoad) {
      this.alwaysActive.add(name);
      this.currentlyActive.add(name);
    }

    if (this.embeddingProvider) {
      const text = `${name}: ${definition.description}. Keywords: ${[...keywords].join(', ')}`;
      try {
        entry.embedding = await this.embeddingProvider.embed(text);
      } catch (error) {
        const embeddingError = new EmbeddingError(`Failed to compute embedding for ${name}: ${describeError(error)}`, error);
        await this.logger.error(embeddingError.message, embeddingError, { toolName: name });
      }
    }

    await this.logger.debug('Registered tool', {
      toolName: name,
      category: entry.category,
      alwaysLoad: options.alwaysLoad ?? false,
    });
  }

  has(name: string): boolean {
    return this.catalog.has(name);
  }

  getRegistration(name: string): ToolRegistration | undefined {
    const definition = this.catalog.get(name);
    const entry = this.entries.get(name);
    if (!definition || !entry) return undefined;

    return {
      definition,
      keywords: entry.keywords,
      category: entry.category,
      ...(entry.embedding ? { embedding: entry.embedding } : {}),
    };
  }

  listRegistrations(): ToolRegistration[] {
    return this.catalog
      .names()
      .map((name) => this.getRegistration(name))
      .filter((registration): registration is ToolRegistration => registration !== undefined);
  }

  /**
   * Distinct categories in registration order
   */
  categories(): string[] {
    return [...new Set(Array.from(this.entries.values(), (entry) => entry.category))];
  }

  /**
   * Ranks tools for a natural-language query and activates confident hits.
   *
   * Semantic similarity is tried first; keyword scoring is used when it yields
   * nothing (no provider, no stored embeddings, provider failure, or nothing
   * above the similarity floor).
   */
  async search(query: string, options: ToolSearchOptions = {}): Promise<ToolMatch[]> {
    const topK = options.topK ?? this.config.topK;
    let mode: ToolSearchMode = 'semantic';
    let matches = await this.semanticMatches(query, options.category);

    if (matches.length === 0) {
      mode = 'keyword';
      await this.logger.info('Falling back to keyword search', { query });
      matches = this.keywordMatches(query, options.category);
    }

    matches.sort((a, b) => b.score - a.score);
    const results = matches.slice(0, topK);

    const threshold =
      mode === 'semantic' ? this.config.semanticActivationThreshold : this.config.keywordActivationThreshold;
    const toLoad = results.filter((match) => match.score >= threshold).map((match) => match.name);

    if (toLoad.length > 0) {
      this.loadTools(toLoad);
      await this.logger.info(`Found and loaded ${toLoad.length} tools`, { query, mode, tools: toLoad });
    } else if (results.length > 0) {
      await this.logger.info(`Found ${results.length} tools but none met threshold >= ${threshold}`, { query, mode });
    }

    return results;
  }

  private hasEmbeddings(): boolean {
    for (const entry of this.entries.values()) {
      if (entry.embedding) return true;
    }
    return false;
  }

  private async semanticMatches(query: string, category?: string): Promise<ToolMatch[]> {
    if (!this.embeddingProvider || !this.hasEmbeddings()) {
      return [];
    }

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddingProvider.embed(query);
    } catch (error) {
      await this.logger.error('Semantic search failed', new EmbeddingError(describeError(error), error), { query });
      return [];
    }

    const matches: ToolMatch[] = [];
    for (const [name, entry] of this.entries) {
      if (category && entry.category !== category) continue;
      if (!entry.embedding) continue;

      const similarity = cosineSimilarity(queryEmbedding, entry.embedding);
      if (similarity > this.config.similarityFloor) {
        matches.push(this.toMatch(name, entry, similarity));
      }
    }
    return matches;
  }

  private keywordMatches(query: string, category?: string): ToolMatch[] {
    const queryLower = query.toLowerCase();
    const queryWords = queryLower.split(/\s+/).filter((word) => word.length > 3);

    const matches: ToolMatch[] = [];
    for (const [name, entry] of this.entries) {
      if (category && entry.category !== category) continue;

      let score = 0;
      for (const keyword of entry.keywords) {
        if (keywordMatches(keyword, queryLower)) {
          score += 1.0;
        }
      }

      const description = this.catalog.get(name)?.description.toLowerCase() ?? '';
      if (queryWords.some((word) => description.includes(word))) {
        score += 0.5;
      }

      if (score > 0) {
        matches.push(this.toMatch(name, entry, score));
      }
    }
    return matches;
  }

  private toMatch(name: string, entry: RegistryEntry, score: number): ToolMatch {
    return {
      name,
      description: this.catalog.get(name)?.description ?? '',
      category: entry.category,
      score,
    };
  }

  /**
   * Definitions of every active tool, in activation order
   */
  getActiveTools(): ToolDefinition[] {
    const tools: ToolDefinition[] = [];
    for (const name of this.currentlyActive) {
      const definition = this.catalog.get(name);
      if (definition) tools.push(definition);
    }
    return tools;
  }

  isActive(name: string): boolean {
    return this.currentlyActive.has(name);
  }

  isAlwaysLoaded(name: string): boolean {
    return this.alwaysActive.has(name);
  }

  /**
   * Activates registered names; unknown names are ignored
   */
  loadTools(names: string[]): void {
    for (const name of names) {
      if (this.catalog.has(name)) {
        this.currentlyActive.add(name);
      }
    }
  }

  /**
   * Deactivates names; always-loaded tools stay active
   */
  unloadTools(names: string[]): void {
    for (const name of names) {
      if (!this.alwaysActive.has(name)) {
        this.currentlyActive.delete(name);
      }
    }
  }

  clearLoadedTools(): void {
    this.currentlyActive = new Set(this.alwaysActive);
  }

  getStats(): ToolManagerStats {
    return {
      totalRegistered: this.catalog.size,
      currentlyLoaded: this.currentlyActive.size,
      alwaysLoaded: this.alwaysActive.size,
      semanticSearchEnabled: this.semanticSearchEnabled,
    };
  }
}
