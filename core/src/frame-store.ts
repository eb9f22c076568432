/**
 * Frame store: where commands load their input frame and save their result.
 *
 * @example
 * ```typescript
 * const store = new MemoryFrameStore();
 * await store.save('orders', frame);
 * const loaded = await store.load('orders');
 * ```
 */

import { FrameNotFoundError } from './errors.js';
import type { Frame } from './frame.js';

export interface FrameStore {
  /**
   * @throws FrameNotFoundError if no frame is stored under `id`
   */
  load(id: string): Promise<Frame>;

  /** Store `frame` under `id`, replacing any previous frame */
  save(id: string, frame: Frame): Promise<void>;

  has(id: string): Promise<boolean>;

  delete(id: string): Promise<void>;

  list(): Promise<string[]>;
}

/**
 * In-memory FrameStore. Frames are immutable, so they are stored by
 * reference.
 */
export class MemoryFrameStore implements FrameStore {
  private frames = new Map<string, Frame>();
  private saveCount = 0;

  async load(id: string): Promise<Frame> {
    const frame = this.frames.get(id);
    if (!frame) {
      throw new FrameNotFoundError(id);
    }
    return frame;
  }

  async save(id: string, frame: Frame): Promise<void> {
    this.frames.set(id, frame);
    this.saveCount++;
  }

  async has(id: string): Promise<boolean> {
    return this.frames.has(id);
  }

  async delete(id: string): Promise<void> {
    this.frames.delete(id);
  }

  async list(): Promise<string[]> {
    return [...this.frames.keys()].sort();
  }

  /** Number of save() calls since construction or the last clear() */
  get saves(): number {
    return this.saveCount;
  }

  /** Clear all stored frames (useful for test cleanup) */
  clear(): void {
    this.frames.clear();
    this.saveCount = 0;
  }
}
