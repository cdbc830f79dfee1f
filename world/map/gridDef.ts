// ============================================================================
// GRID DEFINITION - Square combat grid with real-valued coordinates
// ============================================================================

export interface GridDef {
  /** Cells per side; valid coordinates are [0, size - 1] on both axes */
  readonly size: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Create a new grid definition */
export function createGridDef(size: number): GridDef {
  return {
    size: Math.max(1, Math.floor(size)),
  };
}

/** Check if coordinates are within grid bounds */
export function isInBounds(grid: GridDef, x: number, y: number): boolean {
  const max = grid.size - 1;
  return x >= 0 && x <= max && y >= 0 && y <= max;
}

/**
 * Clamp coordinates to grid bounds.
 * Sub-cell precision is kept; NaN collapses to the origin.
 */
export function clampToBounds(grid: GridDef, x: number, y: number): Point {
  const max = grid.size - 1;
  return {
    x: Number.isNaN(x) ? 0 : Math.max(0, Math.min(max, x)),
    y: Number.isNaN(y) ? 0 : Math.max(0, Math.min(max, y)),
  };
}

/** Integer cell a coordinate is drawn in */
export function toCell(value: number): number {
  return Math.trunc(value);
}

/** Starting cell for the player */
export function gridCenter(grid: GridDef): Point {
  const mid = Math.floor(grid.size / 2);
  return { x: mid, y: mid };
}
