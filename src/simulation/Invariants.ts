import type { World } from '../core/ECS';
import { Position, particleQuery } from '../core/ECS';
import type { Bounds } from '../utils/Bounds';
import { worldToCell } from '../utils/MathUtils';
import { cellKey } from '../utils/SpatialIndex';

export interface InvariantReport {
  overlaps: [number, number][];
  outOfBounds: number[];
}

export function checkInvariants(world: World, bounds: Bounds): InvariantReport {
  const overlaps: [number, number][] = [];
  const outOfBounds: number[] = [];
  const seen = new Map<number, number>();

  const eids = particleQuery(world);
  for (let i = 0; i < eids.length; i++) {
    const eid = eids[i];
    const x = Position.x[eid];
    const y = Position.y[eid];
    if (!bounds.contains({ x, y })) outOfBounds.push(eid);

    const k = cellKey(worldToCell(x, y));
    const other = seen.get(k);
    if (other !== undefined) overlaps.push([other, eid]);
    else seen.set(k, eid);
  }

  return { overlaps, outOfBounds };
}

export function isClean(report: InvariantReport): boolean {
  return report.overlaps.length === 0 && report.outOfBounds.length === 0;
}
