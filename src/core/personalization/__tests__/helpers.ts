// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Clocks and Storage Stand-ins
// ═══════════════════════════════════════════════════════════════════════════════

import { MemoryDocumentStorage } from '../../../storage/index.js';
import { ProfileStore, type ProfileStoreOptions } from '../profile-store.js';

/**
 * Clock starting at 2024-01-01T00:00:00Z that moves one second per call.
 */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

/**
 * Memory storage whose reads and writes can be made to fail.
 */
export class FlakyStorage extends MemoryDocumentStorage {
  writeFailuresRemaining = 0;
  readFailure: Error | null = null;

  async read(): Promise<string | null> {
    if (this.readFailure) throw this.readFailure;
    return super.read();
  }

  async write(contents: string): Promise<void> {
    if (this.writeFailuresRemaining > 0) {
      this.writeFailuresRemaining--;
      throw new Error('disk full');
    }
    return super.write(contents);
  }
}

/**
 * Memory storage whose writes can be held open to observe interleavings.
 */
export class GatedStorage extends MemoryDocumentStorage {
  writesStarted = 0;
  private gate: Promise<void> | null = null;
  private openGate: () => void = () => undefined;

  hold(): void {
    this.gate = new Promise<void>(resolve => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.gate = null;
    this.openGate();
  }

  async write(contents: string): Promise<void> {
    this.writesStarted++;
    if (this.gate) await this.gate;
    return super.write(contents);
  }
}

export function createTestStore(
  storage: MemoryDocumentStorage = new MemoryDocumentStorage(),
  options: Partial<ProfileStoreOptions> = {}
): ProfileStore {
  return new ProfileStore({
    storage,
    lockTimeoutMs: 1000,
    writeMaxRetries: 2,
    writeRetryDelayMs: 0,
    clock: steppingClock(),
    ...options,
  });
}
