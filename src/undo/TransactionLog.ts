/**
 * Transaction Log
 *
 * Snapshot based undo/redo store keyed by object identity. Objects are
 * mutated in place by their owners; before the first mutation inside a
 * snapshot level the owner calls `saveForUndo`, which keeps a clone of the
 * previous state. Undo swaps the clone back in, so after an undo the log
 * holds a different object for the same entity. Owners that index the
 * objects themselves re-read them through `startReadObject`/`readObject`.
 */

import type { Undoable } from "../board/types";

interface HistoryNode<T> {
  object: T;
  /** Snapshot level at which this state was created */
  level: number;
  /** Earlier state of the same entity */
  undo: HistoryNode<T> | null;
  /** Later state of the same entity, set once this state was restored by undo */
  redo: HistoryNode<T> | null;
}

export class TransactionLog<T extends Undoable<T>> {
  /** Live object -> its current node. Iteration order is the replay order. */
  private nodes = new Map<T, HistoryNode<T>>();
  /** Nodes inserted at a level and removed again by undoing that level */
  private removed = new Map<number, HistoryNode<T>[]>();
  private level = 0;
  /** Highest level redo can reach */
  private redoLimit = 0;
  private replay: T[] = [];

  /** Register a new object at the current level. */
  insert(object: T): void {
    this.disableRedo();
    this.nodes.set(object, { object, level: this.level, undo: null, redo: null });
  }

  /**
   * Keep the current state of `object` so the next undo can restore it.
   * Only the first call per snapshot level stores anything.
   */
  saveForUndo(object: T): void {
    const node = this.nodes.get(object);
    if (!node) {
      throw new Error("TransactionLog.saveForUndo: object is not in the log");
    }
    this.disableRedo();
    if (node.level === this.level) return;

    node.undo = {
      object: object.clone(),
      level: node.level,
      undo: node.undo,
      redo: null,
    };
    node.level = this.level;
  }

  /** Close the current level and open a new one. */
  generateSnapshot(): void {
    this.disableRedo();
    this.level++;
    this.redoLimit = this.level;
  }

  canUndo(): boolean {
    return this.level > 0;
  }

  canRedo(): boolean {
    return this.level < this.redoLimit;
  }

  /**
   * Restore the state at the previous snapshot. Returns false if there is
   * none. Restored objects are added to `changed`, objects whose insertion
   * was undone to `cancelled`.
   */
  undo(changed?: T[] | null, cancelled?: T[] | null): boolean {
    if (!this.canUndo()) return false;

    const restored: T[] = [];
    const removedHere: HistoryNode<T>[] = [];
    for (const [object, node] of [...this.nodes]) {
      if (node.level !== this.level) continue;
      this.nodes.delete(object);
      if (node.undo) {
        const previous = node.undo;
        previous.redo = node;
        this.nodes.set(previous.object, previous);
        restored.push(previous.object);
      } else {
        removedHere.push(node);
        cancelled?.push(object);
      }
    }
    this.removed.set(this.level, removedHere);
    this.level--;

    this.replay = restored;
    changed?.push(...restored);
    return true;
  }

  /**
   * Restore the state before the last undo. Returns false if nothing was
   * undone since the last edit. Restored and re-inserted objects are added
   * to `changed`.
   */
  redo(changed?: T[] | null): boolean {
    if (!this.canRedo()) return false;
    this.level++;

    const restored: T[] = [];
    for (const [object, node] of [...this.nodes]) {
      const next = node.redo;
      if (!next || next.level !== this.level) continue;
      this.nodes.delete(object);
      this.nodes.set(next.object, next);
      restored.push(next.object);
    }
    for (const node of this.removed.get(this.level) ?? []) {
      this.nodes.set(node.object, node);
      restored.push(node.object);
    }
    this.removed.delete(this.level);

    this.replay = restored;
    changed?.push(...restored);
    return true;
  }

  /** Start iterating over the objects restored by the last undo/redo. */
  startReadObject(): Iterator<T> {
    return this.replay[Symbol.iterator]();
  }

  /** Next replayed object, or null at the end. */
  readObject(it: Iterator<T>): T | null {
    const next = it.next();
    return next.done ? null : next.value;
  }

  contains(object: T): boolean {
    return this.nodes.has(object);
  }

  /** Number of live objects */
  get size(): number {
    return this.nodes.size;
  }

  /** Edits after an undo discard everything that could be redone. */
  private disableRedo(): void {
    if (!this.canRedo()) return;
    for (const node of this.nodes.values()) {
      node.redo = null;
    }
    for (const level of [...this.removed.keys()]) {
      if (level > this.level) this.removed.delete(level);
    }
    this.redoLimit = this.level;
  }
}
