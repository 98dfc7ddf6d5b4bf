export const CELL_SIZE = 1; // World units per grid cell

export interface Vec2 {
  x: number;
  y: number;
}

export interface Cell {
  x: number;
  y: number;
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

export function length(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

export function normalize(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

export function isZero(v: Vec2): boolean {
  return v.x === 0 && v.y === 0;
}

export function worldToCell(x: number, y: number): Cell {
  return { x: Math.floor(x / CELL_SIZE), y: Math.floor(y / CELL_SIZE) };
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Round half away from zero to 2 decimals. Never returns -0. */
export function quantize(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * 100) / 100;
  return rounded === 0 ? 0 : rounded;
}

export function quantizeVec(v: Vec2): Vec2 {
  return { x: quantize(v.x), y: quantize(v.y) };
}

export function kineticEnergy(mass: number, v: Vec2): number {
  return 0.5 * mass * dot(v, v);
}
