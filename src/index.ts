/**
 * Board component registry
 *
 * Number-indexed components of a board layout with snapshot based undo/redo.
 */

// Core types
export type { Point, Vector, Side, ComponentPackage, Undoable, BoardObservers, ComponentOptions, SlotDrift } from "./board/types";

// Classes
export { Component } from "./board/Component";
export { Components } from "./board/Components";
export type { ComponentLog } from "./board/Components";
export { TransactionLog } from "./undo/TransactionLog";
export { translatePoint, turn90, rotatePoint, mirrorVertical, normalizeAngle } from "./board/geometry";

// Edit scripts and placement export
export { parseScript, loadScript, applyScript, ScriptError } from "./cli/script";
export type { EditScript, EditStep, StepOutcome } from "./cli/script";
export { buildCpl, resolveOverride } from "./cli/utils/cpl";
export { loadSettings, parseSettings } from "./cli/config";
export type { BoardSettings, PlacementOverride } from "./cli/config";
