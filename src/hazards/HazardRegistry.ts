import type { IPosition } from '../world/interfaces/ICoordinates.ts'
import type { HazardRecord } from './interfaces/IHazard.ts'
import { clearanceTo } from './HazardVolume.ts'

/**
 * Transient hazards injected by combat or task logic (a hostile standing on
 * the route, a trap someone just noticed). Merged with the world's own hazards
 * on every query.
 */
export class HazardRegistry {
  private readonly hazards = new Map<string, HazardRecord>()

  inject(hazard: HazardRecord, expiresAtTick?: number): HazardRecord {
    const record: HazardRecord = Object.freeze(
      expiresAtTick === undefined ? { ...hazard } : { ...hazard, expiresAtTick }
    )
    this.hazards.set(record.id, record)
    return record
  }

  remove(id: string): boolean {
    return this.hazards.delete(id)
  }

  /**
   * Drop hazards whose expiry tick has passed. Returns the ids removed.
   */
  expire(tick: number): string[] {
    const removed: string[] = []
    for (const [id, hazard] of this.hazards) {
      if (hazard.expiresAtTick !== undefined && hazard.expiresAtTick < tick) {
        this.hazards.delete(id)
        removed.push(id)
      }
    }
    return removed
  }

  /**
   * Live hazards within `radius` of a position.
   */
  near(position: IPosition, radius: number, tick: number): HazardRecord[] {
    const result: HazardRecord[] = []
    for (const hazard of this.hazards.values()) {
      if (hazard.expiresAtTick !== undefined && hazard.expiresAtTick < tick) continue
      if (clearanceTo(position, hazard) <= radius) {
        result.push(hazard)
      }
    }
    return result
  }

  all(): HazardRecord[] {
    return Array.from(this.hazards.values())
  }

  get size(): number {
    return this.hazards.size
  }
}

/**
 * Merge hazard lists, keeping the first record seen for each id.
 */
export function mergeHazards(...lists: readonly (readonly HazardRecord[])[]): HazardRecord[] {
  const merged = new Map<string, HazardRecord>()
  for (const list of lists) {
    for (const hazard of list) {
      if (!merged.has(hazard.id)) {
        merged.set(hazard.id, hazard)
      }
    }
  }
  return Array.from(merged.values())
}
