import { describe, it, expect } from 'vitest';
import { clampToBounds, createGridDef, gridCenter, isInBounds, toCell } from '../map/gridDef';

const grid = createGridDef(20);

describe('isInBounds', () => {
  it('accepts the closed range [0, size - 1] on both axes', () => {
    expect(isInBounds(grid, 0, 0)).toBe(true);
    expect(isInBounds(grid, 19, 19)).toBe(true);
    expect(isInBounds(grid, 18.5, 0.25)).toBe(true);
  });

  it('rejects anything past an edge', () => {
    expect(isInBounds(grid, -0.1, 5)).toBe(false);
    expect(isInBounds(grid, 5, 19.5)).toBe(false);
    expect(isInBounds(grid, Number.NaN, 5)).toBe(false);
  });
});

describe('clampToBounds', () => {
  it('pulls coordinates back onto the grid and keeps fractions', () => {
    expect(clampToBounds(grid, -3, 21)).toEqual({ x: 0, y: 19 });
    expect(clampToBounds(grid, 4.75, 19)).toEqual({ x: 4.75, y: 19 });
  });

  it('sends NaN to the origin', () => {
    const p = clampToBounds(grid, Number.NaN, 7);
    expect(p).toEqual({ x: 0, y: 7 });
    expect(isInBounds(grid, p.x, p.y)).toBe(true);
  });
});

describe('grid helpers', () => {
  it('floors the size and keeps at least one cell', () => {
    expect(createGridDef(7.9)).toEqual({ size: 7 });
    expect(createGridDef(0)).toEqual({ size: 1 });
  });

  it('truncates to the drawn cell and centres the player', () => {
    expect(toCell(3.99)).toBe(3);
    expect(gridCenter(grid)).toEqual({ x: 10, y: 10 });
  });
});
