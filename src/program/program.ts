import type { Block } from './block.js';
import { blockSize } from './block.js';

/**
 * Ordered arena of blocks at a base load address.
 *
 * Blocks are immutable; edits insert, remove, move or replace entries in the arena and
 * addresses are always recomputed from scratch by the resolver.
 */
export class Program {
  private readonly arena: Block[];

  constructor(
    readonly base: number,
    blocks: readonly Block[] = [],
  ) {
    this.arena = [...blocks];
  }

  get blocks(): readonly Block[] {
    return this.arena;
  }

  /** Index of the block labelled `label`, or -1. */
  blockIndex(label: string): number {
    return this.arena.findIndex((b) => b.label === label);
  }

  replace(index: number, block: Block): void {
    this.checkIndex(index);
    this.arena[index] = block;
  }

  /** Insert before `index`; `index === blocks.length` appends. */
  insert(index: number, block: Block): void {
    if (index !== this.arena.length) this.checkIndex(index);
    this.arena.splice(index, 0, block);
  }

  remove(index: number): Block {
    this.checkIndex(index);
    const [removed] = this.arena.splice(index, 1);
    if (removed === undefined) throw new RangeError(`block index ${index} out of range`);
    return removed;
  }

  /** Move one block so that it ends up at index `to`. */
  move(from: number, to: number): void {
    this.checkIndex(to);
    this.arena.splice(to, 0, this.remove(from));
  }

  totalSize(): number {
    return this.arena.reduce((sum, b) => sum + blockSize(b), 0);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.arena.length) {
      throw new RangeError(`block index ${index} out of range`);
    }
  }
}
