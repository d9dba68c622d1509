/**
 * Edit scripts
 *
 * A YAML list of placement edits that `board-edit replay` runs against a
 * fresh registry:
 *
 * ```yaml
 * flipStyleRotateFirst: true
 * steps:
 *   - add: { name: R1, x: 0, y: 0, package: R_0603_1608Metric }
 *   - snapshot
 *   - move: { component: R1, x: 500, y: 0 }
 *   - undo
 * ```
 */

import * as yaml from "js-yaml";
import { Components } from "../board/Components";
import type { Component } from "../board/Component";
import type { BoardObservers, Point, Side, Vector } from "../board/types";
import { isRecord } from "./config";

/** Component reference in a step: number or name */
export type ComponentRef = number | string;

export type EditStep =
  | {
      kind: "add";
      name?: string;
      location: Point;
      rotation: number;
      side: Side;
      package: string;
      backPackage?: string;
      fixed: boolean;
    }
  | { kind: "move"; component: ComponentRef; vector: Vector }
  | { kind: "turn"; component: ComponentRef; factor: number; pole?: Point }
  | { kind: "rotate"; component: ComponentRef; angle: number; pole?: Point }
  | { kind: "flip"; component: ComponentRef; pole?: Point }
  | { kind: "flipStyle"; rotateFirst: boolean }
  | { kind: "snapshot" }
  | { kind: "undo" }
  | { kind: "redo" };

export interface EditScript {
  /** Overrides the board.yml setting when present */
  flipStyleRotateFirst?: boolean;
  steps: EditStep[];
}

export interface StepOutcome {
  step: number;
  kind: EditStep["kind"];
  /** Result of undo/redo */
  applied?: boolean;
  /** Components reported by the observer during undo/redo */
  moved?: string[];
  /** Component created by an add step */
  created?: number;
}

/** Problem in an edit script. `step` is 1-based, null for the script header. */
export class ScriptError extends Error {
  constructor(message: string, readonly step: number | null) {
    super(step === null ? message : `step ${step}: ${message}`);
    this.name = "ScriptError";
  }
}

const BARE_STEPS = ["snapshot", "undo", "redo"] as const;
type BareStep = (typeof BARE_STEPS)[number];

function isBareStep(value: string): value is BareStep {
  return BARE_STEPS.some((s) => s === value);
}

class StepReader {
  constructor(private readonly fields: Record<string, unknown>, private readonly step: number) {}

  number(key: string, fallback?: number): number {
    const value = this.fields[key];
    if (value === undefined && fallback !== undefined) return fallback;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ScriptError(`"${key}" must be a number`, this.step);
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    const value = this.fields[key];
    if (value === undefined) return undefined;
    if (typeof value !== "string") {
      throw new ScriptError(`"${key}" must be a string`, this.step);
    }
    return value;
  }

  string(key: string): string {
    const value = this.optionalString(key);
    if (value === undefined) {
      throw new ScriptError(`"${key}" is required`, this.step);
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.fields[key];
    if (value === undefined) return fallback;
    if (typeof value !== "boolean") {
      throw new ScriptError(`"${key}" must be true or false`, this.step);
    }
    return value;
  }

  component(): ComponentRef {
    const value = this.fields.component;
    if (typeof value === "string") return value;
    if (typeof value === "number" && Number.isInteger(value)) return value;
    throw new ScriptError(`"component" must be a component number or name`, this.step);
  }

  pole(): Point | undefined {
    const value = this.fields.pole;
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      throw new ScriptError(`"pole" must be a mapping with x and y`, this.step);
    }
    return new StepReader(value, this.step).point();
  }

  point(): Point {
    return { x: this.number("x"), y: this.number("y") };
  }

  side(): Side {
    const value = this.fields.side ?? "front";
    if (value !== "front" && value !== "back") {
      throw new ScriptError(`"side" must be front or back`, this.step);
    }
    return value;
  }
}

function parseStep(raw: unknown, step: number): EditStep {
  if (typeof raw === "string") {
    if (isBareStep(raw)) return { kind: raw };
    throw new ScriptError(`unknown step "${raw}"`, step);
  }
  if (!isRecord(raw) || Object.keys(raw).length !== 1) {
    throw new ScriptError("expected a step name or a single-key mapping", step);
  }

  const [kind, body] = Object.entries(raw)[0];
  if (kind === "flipStyle") {
    if (typeof body !== "boolean") {
      throw new ScriptError(`"flipStyle" must be true or false`, step);
    }
    return { kind: "flipStyle", rotateFirst: body };
  }
  if (!isRecord(body)) {
    throw new ScriptError(`"${kind}" needs a mapping`, step);
  }
  const r = new StepReader(body, step);

  switch (kind) {
    case "add":
      return {
        kind: "add",
        name: r.optionalString("name"),
        location: r.point(),
        rotation: r.number("rotation", 0),
        side: r.side(),
        package: r.string("package"),
        backPackage: r.optionalString("backPackage"),
        fixed: r.boolean("fixed", false),
      };
    case "move":
      return { kind: "move", component: r.component(), vector: r.point() };
    case "turn":
      return { kind: "turn", component: r.component(), factor: r.number("factor", 1), pole: r.pole() };
    case "rotate":
      return { kind: "rotate", component: r.component(), angle: r.number("angle"), pole: r.pole() };
    case "flip":
      return { kind: "flip", component: r.component(), pole: r.pole() };
    default:
      throw new ScriptError(`unknown step "${kind}"`, step);
  }
}

/** Validate the parsed YAML of an edit script. */
export function parseScript(raw: unknown): EditScript {
  if (!isRecord(raw)) {
    throw new ScriptError("expected a mapping with a steps list", null);
  }
  if (!Array.isArray(raw.steps)) {
    throw new ScriptError(`"steps" must be a list`, null);
  }
  const flip = raw.flipStyleRotateFirst;
  if (flip !== undefined && typeof flip !== "boolean") {
    throw new ScriptError(`"flipStyleRotateFirst" must be true or false`, null);
  }

  return {
    flipStyleRotateFirst: flip,
    steps: raw.steps.map((s: unknown, i: number) => parseStep(s, i + 1)),
  };
}

export function loadScript(content: string): EditScript {
  return parseScript(yaml.load(content));
}

function resolve(components: Components, ref: ComponentRef, step: number): number {
  let no: number;
  if (typeof ref === "number") {
    if (ref < 1 || ref > components.count()) {
      throw new ScriptError(`no component #${ref}`, step);
    }
    no = ref;
  } else {
    const found = components.get(ref);
    if (!found) {
      throw new ScriptError(`no component named "${ref}"`, step);
    }
    no = found.number;
  }
  if (!components.isPlaced(no)) {
    throw new ScriptError(`component #${no} is not on the board`, step);
  }
  return no;
}

/**
 * Run the steps of a script against `components`, in order.
 * Poles default to the component's own location.
 */
export function applyScript(script: EditScript, components: Components): StepOutcome[] {
  if (script.flipStyleRotateFirst !== undefined) {
    components.setFlipStyleRotateFirst(script.flipStyleRotateFirst);
  }

  const outcomes: StepOutcome[] = [];
  script.steps.forEach((edit, i) => {
    const step = i + 1;
    const outcome: StepOutcome = { step, kind: edit.kind };

    switch (edit.kind) {
      case "add": {
        const front = { name: edit.package };
        const back = edit.backPackage ? { name: edit.backPackage } : front;
        const name = edit.name ?? `Component#${components.count() + 1}`;
        const onFront = edit.side === "front";
        const created = components.add(name, edit.location, edit.rotation, onFront, front, back, edit.fixed);
        outcome.created = created.number;
        break;
      }
      case "move":
        components.move(resolve(components, edit.component, step), edit.vector);
        break;
      case "turn": {
        const no = resolve(components, edit.component, step);
        components.turn90Degree(no, edit.factor, edit.pole ?? components.get(no).location);
        break;
      }
      case "rotate": {
        const no = resolve(components, edit.component, step);
        components.rotate(no, edit.angle, edit.pole ?? components.get(no).location);
        break;
      }
      case "flip": {
        const no = resolve(components, edit.component, step);
        components.changeSide(no, edit.pole ?? components.get(no).location);
        break;
      }
      case "flipStyle":
        components.setFlipStyleRotateFirst(edit.rotateFirst);
        break;
      case "snapshot":
        components.generateSnapshot();
        break;
      case "undo":
      case "redo": {
        const moved: string[] = [];
        const observers: BoardObservers = {
          notifyMoved: (component: Component) => moved.push(component.name),
        };
        outcome.applied = edit.kind === "undo" ? components.undo(observers) : components.redo(observers);
        outcome.moved = moved;
        break;
      }
    }
    outcomes.push(outcome);
  });
  return outcomes;
}
