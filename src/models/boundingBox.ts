export interface GeoPoint {
  lon: number;
  lat: number;
}

/**
 * Axis-aligned lon/lat rectangle. X is longitude, Y is latitude.
 */
export class BoundingBox {
  readonly xMin: number;
  readonly xMax: number;
  readonly yMin: number;
  readonly yMax: number;

  constructor(xMin: number, xMax: number, yMin: number, yMax: number) {
    this.xMin = xMin;
    this.xMax = xMax;
    this.yMin = yMin;
    this.yMax = yMax;
    Object.freeze(this);
  }

  get width(): number {
    return this.xMax - this.xMin;
  }

  get height(): number {
    return this.yMax - this.yMin;
  }

  get center(): GeoPoint {
    return {
      lon: (this.xMin + this.xMax) / 2,
      lat: (this.yMin + this.yMax) / 2,
    };
  }

  equals(other: BoundingBox | null | undefined): boolean {
    if (!other) {
      return false;
    }
    return (
      this.xMin === other.xMin &&
      this.xMax === other.xMax &&
      this.yMin === other.yMin &&
      this.yMax === other.yMax
    );
  }

  /**
   * Interior overlap only: boxes sharing just an edge or a corner do not intersect.
   */
  intersects(other: BoundingBox): boolean {
    return (
      this.xMin < other.xMax &&
      this.xMax > other.xMin &&
      this.yMin < other.yMax &&
      this.yMax > other.yMin
    );
  }

  containsPoint(lon: number, lat: number): boolean {
    return (
      lon >= this.xMin && lon <= this.xMax && lat >= this.yMin && lat <= this.yMax
    );
  }

  toJSON(): { xMin: number; xMax: number; yMin: number; yMax: number } {
    return {
      xMin: this.xMin,
      xMax: this.xMax,
      yMin: this.yMin,
      yMax: this.yMax,
    };
  }

  toString(): string {
    return `Xmin: ${this.xMin}, Xmax: ${this.xMax}, Ymin: ${this.yMin}, Ymax: ${this.yMax}`;
  }
}
