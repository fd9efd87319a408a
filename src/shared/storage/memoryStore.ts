/**
 * In-Memory Entity Store
 *
 * Memory-based implementation for testing and development.
 * Data persists only for the lifetime of the instance; stored and returned
 * documents are copies, so callers cannot mutate what is held.
 */

import type {
  EntityKind,
  EntityStore,
  ProcessedDocument,
  SourceDocument
} from '../../improvement/types';

function keyOf(kind: EntityKind, id: string): string {
  return `${kind}:${id}`;
}

export class MemoryEntityStore implements EntityStore {
  private sources = new Map<string, SourceDocument>();
  private processed = new Map<string, ProcessedDocument>();

  async getSource(kind: EntityKind, id: string): Promise<SourceDocument | null> {
    const document = this.sources.get(keyOf(kind, id));
    return document ? { ...document } : null;
  }

  async getProcessed(kind: EntityKind, id: string): Promise<ProcessedDocument | null> {
    const document = this.processed.get(keyOf(kind, id));
    return document ? structuredClone(document) : null;
  }

  async saveSource(document: SourceDocument): Promise<void> {
    this.sources.set(keyOf(document.kind, document.id), { ...document });
  }

  async saveProcessed(document: ProcessedDocument): Promise<void> {
    this.processed.set(keyOf(document.kind, document.id), structuredClone(document));
  }

  /**
   * Clear all stored documents
   */
  clear(): void {
    this.sources.clear();
    this.processed.clear();
  }
}
