import path from "path";

/**
 * Identity of a tile: the final path component of its file name.
 *
 * Both "/" and "\" separate path components, whatever the host platform, so
 * an index written on Windows reads back the same on Linux. Comparison is an
 * ordinal, case-sensitive string comparison everywhere: "N45E005.hgt" and
 * "n45e005.hgt" are different tiles, even on case-insensitive file systems.
 *
 * The directory is deliberately ignored: "srtm/N45E005.hgt" and
 * "backup/N45E005.hgt" are the same tile. Indexes keyed by TileKey keep only
 * one of them.
 */
export class TileKey {
  readonly baseName: string;
  private readonly hashCode: number;

  private constructor(baseName: string) {
    this.baseName = baseName;
    this.hashCode = hashString(baseName);
  }

  static fromFilename(filename: string): TileKey {
    return new TileKey(path.win32.basename(filename));
  }

  equals(other: TileKey | null | undefined): boolean {
    return other != null && other.baseName === this.baseName;
  }

  hash(): number {
    return this.hashCode;
  }

  toString(): string {
    return this.baseName;
  }
}

/** 32-bit signed `h = 31 * h + c` over UTF-16 code units. */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(hash, 31) + value.charCodeAt(i)) | 0;
  }
  return hash;
}
