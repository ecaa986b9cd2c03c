// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORAGE — In-Memory DocumentStorage for Testing
// ═══════════════════════════════════════════════════════════════════════════════

import type { DocumentStorage } from './types.js';

export class MemoryDocumentStorage implements DocumentStorage {
  readonly name = 'memory';

  private contents: string | null;
  private writes = 0;

  constructor(initialContents: string | null = null) {
    this.contents = initialContents;
  }

  async read(): Promise<string | null> {
    return this.contents;
  }

  async write(contents: string): Promise<void> {
    this.contents = contents;
    this.writes++;
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  peek(): string | null {
    return this.contents;
  }

  get writeCount(): number {
    return this.writes;
  }

  clear(): void {
    this.contents = null;
    this.writes = 0;
  }
}
