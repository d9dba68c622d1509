import type { Component } from "./Component";

/** Board location in integer board units */
export interface Point {
  x: number;
  y: number;
}

/** Displacement in board units */
export interface Vector {
  x: number;
  y: number;
}

/** Placement side of a component */
export type Side = "front" | "back";

/**
 * Package reference of a component. The outline and pads live elsewhere;
 * the registry only carries the reference.
 */
export interface ComponentPackage {
  readonly name: string;
}

/**
 * Objects kept in a transaction log must be able to produce a copy of
 * their current state.
 */
export interface Undoable<T> {
  clone(): T;
}

/** Receives the components touched by an undo or redo. */
export interface BoardObservers {
  notifyMoved(component: Component): void;
}

/** Options for Component constructor */
export interface ComponentOptions {
  name: string;
  number: number;
  location: Point;
  /** Rotation in degrees */
  rotation?: number;
  side?: Side;
  frontPackage: ComponentPackage;
  /** Defaults to the front package */
  backPackage?: ComponentPackage;
  positionFixed?: boolean;
}

/** Result entry of `Components.checkConsistency()` */
export interface SlotDrift {
  /** Number the slot stands for (index + 1) */
  slot: number;
  /** Number stored on the component found in that slot */
  stored: number;
}
