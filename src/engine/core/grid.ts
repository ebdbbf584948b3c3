import type { GridPosition } from '../types';

// max(|dx|, |dy|): 8-directional movement, diagonals cost the same as orthogonals
export function chebyshevDistance(a: GridPosition, b: GridPosition): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function positionsEqual(a: GridPosition, b: GridPosition): boolean {
  return a.x === b.x && a.y === b.y;
}

export function positionKey(pos: GridPosition): string {
  return `${pos.x},${pos.y}`;
}

export function parsePositionKey(key: string): GridPosition {
  const [x, y] = key.split(',').map((part) => parseInt(part, 10));
  return { x, y };
}

export function isWithinBounds(pos: GridPosition, size: { width: number; height: number }): boolean {
  return pos.x >= 0 && pos.y >= 0 && pos.x < size.width && pos.y < size.height;
}
