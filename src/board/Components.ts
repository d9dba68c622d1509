/**
 * Component Registry
 *
 * Holds the components of a board, indexed by component number, and runs
 * every placement edit through the transaction log so it can be undone.
 */

import { Component } from "./Component";
import { TransactionLog } from "../undo/TransactionLog";
import type { BoardObservers, ComponentPackage, Point, SlotDrift, Vector } from "./types";

/** The part of the transaction log the registry relies on. */
export interface ComponentLog {
  insert(component: Component): void;
  saveForUndo(component: Component): void;
  generateSnapshot(): void;
  undo(changed?: Component[] | null, cancelled?: Component[] | null): boolean;
  redo(changed?: Component[] | null): boolean;
  canUndo(): boolean;
  canRedo(): boolean;
  startReadObject(): Iterator<Component>;
  readObject(it: Iterator<Component>): Component | null;
  contains(component: Component): boolean;
}

export class Components implements Iterable<Component> {
  /** Slot `number - 1` holds component `number`. Slots are never removed. */
  private componentArr: Component[] = [];
  /**
   * If true, components on the back side are rotated before mirroring,
   * else they are mirrored before rotating.
   */
  private flipStyleRotateFirst = false;

  constructor(private readonly undoList: ComponentLog = new TransactionLog<Component>()) {}

  /**
   * Insert a new component. The items of its package are not touched here.
   * If `onFront` is false the component is placed on the back side and uses
   * `backPackage`.
   */
  add(
    name: string,
    location: Point,
    rotation: number,
    onFront: boolean,
    frontPackage: ComponentPackage,
    backPackage: ComponentPackage,
    positionFixed: boolean
  ): Component;
  /** Insert a new component with a generated name (`Component#<number>`). */
  add(location: Point, rotation: number, onFront: boolean, pkg: ComponentPackage): Component;
  add(
    nameOrLocation: string | Point,
    locationOrRotation: Point | number,
    rotationOrOnFront: number | boolean,
    onFrontOrPackage: boolean | ComponentPackage,
    frontPackage?: ComponentPackage,
    backPackage?: ComponentPackage,
    positionFixed?: boolean
  ): Component {
    if (typeof nameOrLocation !== "string") {
      if (
        typeof locationOrRotation !== "number" ||
        typeof rotationOrOnFront !== "boolean" ||
        typeof onFrontOrPackage === "boolean"
      ) {
        throw new TypeError("Components.add: expected (location, rotation, onFront, package)");
      }
      return this.addUnnamed(nameOrLocation, locationOrRotation, rotationOrOnFront, onFrontOrPackage);
    }
    if (
      typeof locationOrRotation === "number" ||
      typeof rotationOrOnFront !== "number" ||
      typeof onFrontOrPackage !== "boolean" ||
      !frontPackage ||
      !backPackage
    ) {
      throw new TypeError(
        "Components.add: expected (name, location, rotation, onFront, frontPackage, backPackage, positionFixed)"
      );
    }

    const component = new Component({
      name: nameOrLocation,
      number: this.componentArr.length + 1,
      location: locationOrRotation,
      rotation: rotationOrOnFront,
      side: onFrontOrPackage ? "front" : "back",
      frontPackage,
      backPackage,
      positionFixed: positionFixed ?? false,
    });
    this.componentArr.push(component);
    this.undoList.insert(component);
    return component;
  }

  /** Same as the short form of `add`. */
  addUnnamed(location: Point, rotation: number, onFront: boolean, pkg: ComponentPackage): Component {
    const name = `Component#${this.componentArr.length + 1}`;
    return this.add(name, location, rotation, onFront, pkg, pkg, false);
  }

  /**
   * Look up a component.
   *
   * By name: the first component with that name, or null.
   * By number (1 to `count()`): the component in that slot. Any other number
   * throws a RangeError.
   */
  get(name: string): Component | null;
  get(componentNo: number): Component;
  get(key: string | number): Component | null {
    if (typeof key === "string") {
      return this.componentArr.find((c) => c.name === key) ?? null;
    }

    if (!Number.isInteger(key) || key < 1 || key > this.componentArr.length) {
      throw new RangeError(
        `Components.get: component number ${key} is out of range 1..${this.componentArr.length}`
      );
    }
    const result = this.componentArr[key - 1];
    if (result.number !== key) {
      console.warn(`⚠️  Components.get: inconsistent component number (slot ${key} holds #${result.number})`);
    }
    return result;
  }

  /** Number of component slots. Never decreases. */
  count(): number {
    return this.componentArr.length;
  }

  /**
   * Whether the component with this number is on the board, i.e. its
   * creation has not been undone.
   */
  isPlaced(componentNo: number): boolean {
    return this.undoList.contains(this.get(componentNo));
  }

  /** Components currently on the board, by number. */
  *[Symbol.iterator](): Iterator<Component> {
    for (const component of this.componentArr) {
      if (this.undoList.contains(component)) {
        yield component;
      }
    }
  }

  /** Slots whose component carries a different number than the slot. */
  checkConsistency(): SlotDrift[] {
    const drift: SlotDrift[] = [];
    this.componentArr.forEach((component, index) => {
      if (component.number !== index + 1) {
        drift.push({ slot: index + 1, stored: component.number });
      }
    });
    return drift;
  }

  /** Close the current undo step and open a new one. */
  generateSnapshot(): void {
    this.undoList.generateSnapshot();
  }

  canUndo(): boolean {
    return this.undoList.canUndo();
  }

  canRedo(): boolean {
    return this.undoList.canRedo();
  }

  /** Restore the situation at the previous snapshot. Returns false if no more undo is possible. */
  undo(observers?: BoardObservers | null): boolean {
    if (!this.undoList.undo(null, null)) {
      return false;
    }
    this.restoreFromUndoList(observers);
    return true;
  }

  /** Restore the situation before the last undo. Returns false if no more redo is possible. */
  redo(observers?: BoardObservers | null): boolean {
    if (!this.undoList.redo(null)) {
      return false;
    }
    this.restoreFromUndoList(observers);
    return true;
  }

  /**
   * Move a component, recorded for undo. Edits of a component whose
   * creation was undone are ignored with a warning.
   */
  move(componentNo: number, vector: Vector): void {
    const component = this.placedForEdit(componentNo, "move");
    if (!component) return;
    this.undoList.saveForUndo(component);
    component.translateBy(vector);
  }

  /** Turn a component by `factor` times 90 degrees around `pole`, recorded for undo. */
  turn90Degree(componentNo: number, factor: number, pole: Point): void {
    const component = this.placedForEdit(componentNo, "turn90Degree");
    if (!component) return;
    this.undoList.saveForUndo(component);
    component.turn90Degree(factor, pole);
  }

  /** Rotate a component by `angle` degrees around `pole`, recorded for undo. */
  rotate(componentNo: number, angle: number, pole: Point): void {
    const component = this.placedForEdit(componentNo, "rotate");
    if (!component) return;
    this.undoList.saveForUndo(component);
    component.rotate(angle, pole, this.flipStyleRotateFirst);
  }

  /**
   * Move a component to the other board side, mirrored at the vertical
   * line through `pole`, recorded for undo.
   */
  changeSide(componentNo: number, pole: Point): void {
    const component = this.placedForEdit(componentNo, "changeSide");
    if (!component) return;
    this.undoList.saveForUndo(component);
    component.changeSide(pole);
  }

  getFlipStyleRotateFirst(): boolean {
    return this.flipStyleRotateFirst;
  }

  /** Only affects later `rotate` calls. */
  setFlipStyleRotateFirst(value: boolean): void {
    this.flipStyleRotateFirst = value;
  }

  /**
   * The component to edit, or null (with a warning) when its creation has
   * been undone. Such a component is not in the log, so an edit could not be
   * recorded for undo.
   */
  private placedForEdit(componentNo: number, operation: string): Component | null {
    const component = this.get(componentNo);
    if (!this.undoList.contains(component)) {
      console.warn(`⚠️  Components.${operation}: component #${componentNo} is not on the board, edit ignored`);
      return null;
    }
    return component;
  }

  private restoreFromUndoList(observers?: BoardObservers | null): void {
    const it = this.undoList.startReadObject();
    for (let component = this.undoList.readObject(it); component; component = this.undoList.readObject(it)) {
      const index = component.number - 1;
      if (index < 0 || index >= this.componentArr.length) {
        throw new RangeError(`Components: replayed component number ${component.number} has no slot`);
      }
      this.componentArr[index] = component;
      observers?.notifyMoved(component);
    }
  }
}
