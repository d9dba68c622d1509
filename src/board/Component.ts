import { ComponentOptions, ComponentPackage, Point, Side, Undoable, Vector } from "./types";
import { mirrorVertical, normalizeAngle, rotatePoint, translatePoint, turn90 } from "./geometry";

/**
 * A component placed on the board.
 *
 * Identity (`name`, `number`) is fixed at creation. The pose is changed in
 * place by the transform methods below; callers that need undo go through
 * `Components`, which captures the previous state first.
 *
 * @example
 * ```ts
 * const r1 = new Component({
 *   name: "R1", number: 1,
 *   location: { x: 0, y: 0 },
 *   frontPackage: { name: "R_0603_1608Metric" },
 * });
 * r1.turn90Degree(1, { x: 0, y: 0 });
 * ```
 */
export class Component implements Undoable<Component> {
  readonly name: string;
  readonly number: number;
  readonly frontPackage: ComponentPackage;
  readonly backPackage: ComponentPackage;

  private _location: Point;
  private _rotation: number;
  private _side: Side;
  private _positionFixed: boolean;

  constructor(options: ComponentOptions) {
    this.name = options.name;
    this.number = options.number;
    this.frontPackage = options.frontPackage;
    this.backPackage = options.backPackage ?? options.frontPackage;
    this._location = { x: options.location.x, y: options.location.y };
    this._rotation = normalizeAngle(options.rotation ?? 0);
    this._side = options.side ?? "front";
    this._positionFixed = options.positionFixed ?? false;
  }

  get location(): Readonly<Point> {
    return this._location;
  }

  /** Rotation in degrees, in [0, 360) */
  get rotation(): number {
    return this._rotation;
  }

  get side(): Side {
    return this._side;
  }

  get placedOnFront(): boolean {
    return this._side === "front";
  }

  get positionFixed(): boolean {
    return this._positionFixed;
  }

  /** The package used on the current side */
  getPackage(): ComponentPackage {
    return this.placedOnFront ? this.frontPackage : this.backPackage;
  }

  translateBy(vector: Vector): void {
    this._location = translatePoint(this._location, vector);
  }

  /** Turn by `factor` quarter turns counter-clockwise around `pole`. */
  turn90Degree(factor: number, pole: Point): void {
    this._rotation = normalizeAngle(this._rotation + factor * 90);
    this._location = turn90(this._location, factor, pole);
  }

  /**
   * Rotate by `angle` degrees around `pole`.
   *
   * On the back side with `flipStyleRotateFirst` the component was rotated
   * before it was mirrored, so its own rotation runs the other way.
   */
  rotate(angle: number, pole: Point, flipStyleRotateFirst: boolean): void {
    let turnAngle = angle;
    if (flipStyleRotateFirst && !this.placedOnFront) {
      turnAngle = 360 - angle;
    }
    this._rotation = normalizeAngle(this._rotation + turnAngle);
    this._location = rotatePoint(this._location, angle, pole);
  }

  /** Move to the other side, mirrored at the vertical line through `pole`. */
  changeSide(pole: Point): void {
    this._side = this.placedOnFront ? "back" : "front";
    this._location = mirrorVertical(this._location, pole);
  }

  clone(): Component {
    return new Component({
      name: this.name,
      number: this.number,
      location: this._location,
      rotation: this._rotation,
      side: this._side,
      frontPackage: this.frontPackage,
      backPackage: this.backPackage,
      positionFixed: this._positionFixed,
    });
  }

  toString(): string {
    return `${this.name} (#${this.number})`;
  }
}
