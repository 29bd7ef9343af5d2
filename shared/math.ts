// ============================================
// Shared Math Helpers
// Pure 2D vector functions for the simulation plane
// ============================================

/**
 * A point (or displacement) in the simulation plane.
 * Never mutated: every helper returns a new value.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export function point(x: number, y: number): Point {
  return { x, y };
}

/**
 * Vector addition
 */
export function add(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

/**
 * Euclidean distance between two points
 */
export function distance(a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Vector of the given length pointing along `angle` (radians)
 * Used to turn a random heading into a per-tick displacement
 */
export function fromAngle(angle: number, length: number): Point {
  return { x: Math.cos(angle) * length, y: Math.sin(angle) * length };
}
