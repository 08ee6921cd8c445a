/**
 * precip-radial — physical quantities
 *
 * Angle and Velocity are immutable value objects. Each stores its magnitude
 * in one base unit (radians, metres per second) and converts on read, so two
 * quantities built from different units compare by value.
 */

const RADIANS_PER_DEGREE = Math.PI / 180;

/** 1 in/h expressed in m/s: 0.0254 m per inch over 3600 s per hour. */
export const METERS_PER_SECOND_PER_INCH_PER_HOUR = 0.0254 / 3600;

/** 1 mm/h expressed in m/s. */
export const METERS_PER_SECOND_PER_MILLIMETER_PER_HOUR = 0.001 / 3600;

// ─── Angle ────────────────────────────────────────────────────────────────────

export class Angle {
  private constructor(private readonly _radians: number) {}

  static fromDegrees(degrees: number): Angle {
    return new Angle(degrees * RADIANS_PER_DEGREE);
  }

  static fromRadians(radians: number): Angle {
    return new Angle(radians);
  }

  get radians(): number {
    return this._radians;
  }

  get degrees(): number {
    return this._radians / RADIANS_PER_DEGREE;
  }

  equals(other: Angle): boolean {
    return this._radians === other._radians;
  }

  toString(): string {
    return `${this.degrees}°`;
  }
}

// ─── Velocity ─────────────────────────────────────────────────────────────────

/**
 * A speed. Precipitation rate is carried as a velocity: depth of water per
 * unit time, e.g. inches per hour.
 */
export class Velocity {
  private constructor(private readonly _metersPerSecond: number) {}

  static fromMetersPerSecond(metersPerSecond: number): Velocity {
    return new Velocity(metersPerSecond);
  }

  static fromInchesPerHour(inchesPerHour: number): Velocity {
    return new Velocity(inchesPerHour * METERS_PER_SECOND_PER_INCH_PER_HOUR);
  }

  static fromMillimetersPerHour(millimetersPerHour: number): Velocity {
    return new Velocity(millimetersPerHour * METERS_PER_SECOND_PER_MILLIMETER_PER_HOUR);
  }

  get metersPerSecond(): number {
    return this._metersPerSecond;
  }

  get inchesPerHour(): number {
    return this._metersPerSecond / METERS_PER_SECOND_PER_INCH_PER_HOUR;
  }

  get millimetersPerHour(): number {
    return this._metersPerSecond / METERS_PER_SECOND_PER_MILLIMETER_PER_HOUR;
  }

  equals(other: Velocity): boolean {
    return this._metersPerSecond === other._metersPerSecond;
  }

  toString(): string {
    return `${this.inchesPerHour} in/h`;
  }
}
