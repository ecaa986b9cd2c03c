// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Durable Medium for the Memory Document
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Holds one serialized document. Implementations must make `write` all or
 * nothing: a reader sees either the previous contents or the new contents,
 * never a mix.
 */
export interface DocumentStorage {
  /** Backend name for logs and health output */
  readonly name: string;

  /** Current contents, or null when nothing has been written yet */
  read(): Promise<string | null>;

  /** Replace the contents in a single visible step */
  write(contents: string): Promise<void>;

  /** Release connections or handles */
  close(): Promise<void>;
}
