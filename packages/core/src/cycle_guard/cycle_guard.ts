/**
 * CycleGuard - tracks the real paths of directories on the active descent
 *
 * The chain is a stack: the walker enters a directory before reading its
 * children and leaves it once its last child has been rendered, so the chain
 * only ever holds ancestors of the current position.
 *
 * @module cycle_guard
 */
export class CycleGuard {
  private readonly chain: string[] = [];
  private readonly active = new Set<string>();

  /**
   * True when descending into this real path would revisit an ancestor.
   */
  contains(realPath: string): boolean {
    return this.active.has(realPath);
  }

  /**
   * Pushes a real path onto the chain.
   * @returns false (and leaves the chain unchanged) when the path is already on it
   */
  enter(realPath: string): boolean {
    if (this.active.has(realPath)) {
      return false;
    }
    this.chain.push(realPath);
    this.active.add(realPath);
    return true;
  }

  /**
   * Pops the most recent real path. Must mirror a successful enter().
   */
  leave(realPath: string): void {
    const top = this.chain[this.chain.length - 1];
    if (top !== realPath) {
      throw new Error(`CycleGuard: leaving ${realPath} but ${top ?? 'nothing'} is on top`);
    }
    this.chain.pop();
    this.active.delete(realPath);
  }

  get depth(): number {
    return this.chain.length;
  }
}
