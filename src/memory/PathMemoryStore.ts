/**
 * Shared cache of planned paths keyed by coarse region pair.
 *
 * Readers never lock: each key maps to a frozen array of frozen path snapshots,
 * replaced wholesale on every write. Writers serialize per key, so updates to
 * unrelated region pairs never wait on each other. Paths are never removed while
 * leased; a failed path is only marked deprecated.
 */

import type { IPosition, RegionPairKey } from '../world/interfaces/ICoordinates.ts'
import type { CapabilitySet } from '../movement/interfaces/IMovement.ts'
import type { Path, PathStatus } from '../pathfinding/interfaces/IPathfinding.ts'
import type { LeaseRelease, PathMemoryConfig, PathMemoryStats } from './interfaces/IPathMemory.ts'
import { satisfies } from '../movement/TerrainCost.ts'
import { createRegionPairKey } from '../world/interfaces/ICoordinates.ts'
import { DEFAULT_REGION_SIZE, regionPairKeyOf } from '../world/coordinates/CoordinateUtils.ts'
import { KeyedMutex } from './KeyedMutex.ts'

export const DEFAULT_MEMORY_CONFIG: PathMemoryConfig = {
  capacityPerKey: 4,
  successAlpha: 0.2,
  failureBeta: 0.3,
  deprecationFloor: 0.2,
  staleAfterMs: 10 * 60 * 1000,
  regionSize: DEFAULT_REGION_SIZE,
  debug: false,
}

function freezePath(path: Path): Path {
  return Object.freeze({
    ...path,
    waypoints: Object.freeze(path.waypoints.map((waypoint) => Object.freeze({ ...waypoint }))),
    modeSequence: Object.freeze([...path.modeSequence]),
    requiredCapabilities: Object.freeze([...path.requiredCapabilities]),
  })
}

function compareByConfidence(a: Path, b: Path): number {
  if (a.confidenceRating !== b.confidenceRating) return b.confidenceRating - a.confidenceRating
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

export class PathMemoryStore {
  readonly config: PathMemoryConfig

  private readonly snapshots = new Map<RegionPairKey, readonly Path[]>()
  private readonly keyOfPath = new Map<string, RegionPairKey>()
  private readonly leases = new Map<string, number>()
  private readonly mutex = new KeyedMutex()
  private evicted = 0

  constructor(config: Partial<PathMemoryConfig> = {}) {
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config }
  }

  /**
   * Usable candidates for a trip, best rated first. Lock-free.
   */
  lookup(origin: IPosition, destination: IPosition, capabilities: CapabilitySet): readonly Path[] {
    const key = regionPairKeyOf(origin, destination, this.config.regionSize)
    return this.lookupByKey(key, capabilities)
  }

  lookupByKey(key: RegionPairKey, capabilities: CapabilitySet): readonly Path[] {
    const snapshot = this.snapshots.get(key) ?? []
    return snapshot.filter(
      (path) => path.status !== 'deprecated' && satisfies(capabilities, path.requiredCapabilities)
    )
  }

  get(pathId: string): Path | undefined {
    const key = this.keyOfPath.get(pathId)
    if (key === undefined) return undefined
    return this.snapshots.get(key)?.find((path) => path.id === pathId)
  }

  /**
   * Add a path (or replace an older snapshot with the same id).
   */
  async record(path: Path): Promise<Path> {
    const key = createRegionPairKey(path.originRegion, path.destinationRegion)
    const frozen = freezePath(path)

    return this.mutex.runExclusive(key, () => {
      const current = this.snapshots.get(key) ?? []
      const next = current.filter((existing) => existing.id !== frozen.id)
      next.push(frozen)

      this.swap(key, current, this.evict(key, next))
      this.keyOfPath.set(frozen.id, key)

      if (this.config.debug) {
        console.log(`[PathMemory] Recorded ${frozen.id} under ${key}`)
      }
      return frozen
    })
  }

  /**
   * Mark a path deprecated after a waypoint failed. It stays in memory until
   * nobody holds a lease on it, but is excluded from lookups immediately.
   */
  async invalidate(pathId: string, failingWaypoint: number): Promise<Path | undefined> {
    const updated = await this.update(pathId, (path) => ({ ...path, status: 'deprecated' }))
    if (updated) {
      console.warn(`Path ${pathId} invalidated at waypoint ${failingWaypoint}`)
    }
    return updated
  }

  /**
   * A full traversal succeeded: rating moves toward 1 and the path is revalidated.
   */
  async recordSuccess(pathId: string, now: number = Date.now()): Promise<Path | undefined> {
    const alpha = this.config.successAlpha
    return this.update(pathId, (path) => ({
      ...path,
      confidenceRating: path.confidenceRating + alpha * (1 - path.confidenceRating),
      verifiedThrough: path.waypoints.length - 1,
      lastValidatedAt: now,
      status: path.status === 'deprecated' ? 'deprecated' : 'fresh',
    }))
  }

  /**
   * An agent reached `waypointIndex`; everything up to it is known traversable.
   */
  async recordProgress(pathId: string, waypointIndex: number): Promise<Path | undefined> {
    return this.update(pathId, (path) =>
      waypointIndex > path.verifiedThrough
        ? { ...path, verifiedThrough: Math.min(waypointIndex, path.waypoints.length - 1) }
        : null
    )
  }

  /**
   * An agent failed to reach `waypointIndex`. Failing somewhere that previously
   * succeeded deprecates the path outright; otherwise the rating decays.
   */
  async recordFailure(pathId: string, waypointIndex: number): Promise<Path | undefined> {
    const { failureBeta, deprecationFloor } = this.config
    const updated = await this.update(pathId, (path) => {
      if (waypointIndex <= path.verifiedThrough) {
        return { ...path, status: 'deprecated' }
      }
      const confidenceRating = path.confidenceRating * (1 - failureBeta)
      const status: PathStatus = confidenceRating < deprecationFloor ? 'deprecated' : path.status
      return { ...path, confidenceRating, status }
    })

    if (updated?.status === 'deprecated') {
      console.warn(`Path ${pathId} deprecated after failure at waypoint ${waypointIndex}`)
    }
    return updated
  }

  /**
   * Pin a path while an agent traverses it. Leased paths are never evicted.
   */
  lease(pathId: string): LeaseRelease {
    this.leases.set(pathId, (this.leases.get(pathId) ?? 0) + 1)
    let released = false
    return () => {
      if (released) return
      released = true
      const count = (this.leases.get(pathId) ?? 1) - 1
      if (count <= 0) {
        this.leases.delete(pathId)
      } else {
        this.leases.set(pathId, count)
      }
    }
  }

  isLeased(pathId: string): boolean {
    return this.leases.has(pathId)
  }

  /**
   * Mark fresh paths not validated within `staleAfterMs` as stale.
   * Returns how many paths changed.
   */
  async sweep(now: number = Date.now()): Promise<number> {
    let changed = 0
    for (const key of Array.from(this.snapshots.keys())) {
      changed += await this.mutex.runExclusive(key, () => {
        const current = this.snapshots.get(key) ?? []
        let count = 0
        const next = current.map((path) => {
          if (path.status !== 'fresh' || now - path.lastValidatedAt <= this.config.staleAfterMs) {
            return path
          }
          count++
          return freezePath({ ...path, status: 'stale', version: path.version + 1 })
        })
        if (count > 0) {
          this.swap(key, current, this.evict(key, next))
        }
        return count
      })
    }
    return changed
  }

  stats(): PathMemoryStats {
    const stats: PathMemoryStats = {
      keys: this.snapshots.size,
      paths: 0,
      fresh: 0,
      stale: 0,
      deprecated: 0,
      leased: this.leases.size,
      evicted: this.evicted,
    }
    for (const snapshot of this.snapshots.values()) {
      for (const path of snapshot) {
        stats.paths++
        stats[path.status]++
      }
    }
    return stats
  }

  /**
   * Replace one path's snapshot. `change` returns null to leave it as is.
   */
  private async update(
    pathId: string,
    change: (path: Path) => Path | null
  ): Promise<Path | undefined> {
    const key = this.keyOfPath.get(pathId)
    if (key === undefined) {
      console.warn(`Path ${pathId} not found in memory`)
      return undefined
    }

    return this.mutex.runExclusive(key, () => {
      const current = this.snapshots.get(key) ?? []
      const existing = current.find((path) => path.id === pathId)
      if (!existing) return undefined

      const changed = change(existing)
      if (changed === null) return existing

      const replacement = freezePath({ ...changed, version: existing.version + 1 })
      const next = current.map((path) => (path.id === pathId ? replacement : path))
      this.swap(key, current, this.evict(key, next))
      return replacement
    })
  }

  /**
   * Drop deprecated, unleased paths while the key is over capacity.
   */
  private evict(key: RegionPairKey, paths: Path[]): Path[] {
    const sorted = [...paths].sort(compareByConfidence)
    let excess = sorted.length - this.config.capacityPerKey

    for (let i = sorted.length - 1; i >= 0 && excess > 0; i--) {
      const path = sorted[i]
      if (path.status === 'deprecated' && !this.leases.has(path.id)) {
        sorted.splice(i, 1)
        this.keyOfPath.delete(path.id)
        this.evicted++
        excess--
      }
    }

    if (excess > 0 && this.config.debug) {
      console.log(`[PathMemory] ${key} over capacity by ${excess}, nothing evictable`)
    }
    return sorted
  }

  /**
   * Publish a new snapshot array if nobody swapped it since `expected` was read.
   */
  private swap(key: RegionPairKey, expected: readonly Path[], next: Path[]): void {
    const actual = this.snapshots.get(key) ?? []
    if (actual !== expected && this.snapshots.has(key)) {
      throw new Error(`Concurrent write to path memory key ${key}`)
    }
    this.snapshots.set(key, Object.freeze(next))
  }
}
