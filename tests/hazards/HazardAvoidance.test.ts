import { describe, it, expect } from 'vitest'
import type { HazardRecord } from '../../src/hazards/interfaces/IHazard.ts'
import { HazardAvoidanceEngine, mergeConstraints } from '../../src/hazards/HazardAvoidance.ts'
import { HazardCritical } from '../../src/core/errors.ts'
import { pathThrough } from '../support/worlds.ts'

function hazard(overrides: Partial<HazardRecord> & Pick<HazardRecord, 'id' | 'location'>): HazardRecord {
  return { type: 'fall', radius: 0, severity: 'lethal', ...overrides }
}

describe('HazardAvoidanceEngine', () => {
  const engine = new HazardAvoidanceEngine()
  const straight = pathThrough('path-straight', [
    { x: 0, y: 1, z: 7 },
    { x: 20, y: 1, z: 7 },
  ])

  describe('clearanceFor', () => {
    it('holds lethal hazards at the configured distance', () => {
      expect(engine.clearanceFor(hazard({ id: 'a', location: { x: 0, y: 0, z: 0 } }))).toBe(3)
    })

    it('lets a constraint demand more than the default', () => {
      const pit = hazard({ id: 'a', location: { x: 0, y: 0, z: 0 } })
      expect(engine.clearanceFor(pit, [{ hazardId: 'a', minClearance: 5 }])).toBe(5)
      expect(engine.clearanceFor(pit, [{ hazardId: 'b', minClearance: 5 }])).toBe(3)
    })

    it('puts no hard limit on dangerous hazards', () => {
      expect(engine.clearanceFor(hazard({ id: 'a', location: { x: 0, y: 0, z: 0 }, severity: 'dangerous' }))).toBe(0)
    })
  })

  describe('filter', () => {
    it('sends a path that passes too close to a lethal hazard back for rerouting', () => {
      const pit = hazard({ id: 'pit', location: { x: 10, y: 1, z: 9 } })

      expect(engine.filter(straight, [pit])).toEqual({
        verdict: 'reroute',
        reason: 'lethal-clearance',
        constraints: [{ hazardId: 'pit', minClearance: 3 }],
      })
    })

    it('accepts a path that keeps its distance', () => {
      const pit = hazard({ id: 'pit', location: { x: 10, y: 1, z: 11 } })

      expect(engine.filter(straight, [pit])).toEqual({ verdict: 'accept', exposureSeconds: 0, advisories: [] })
    })

    it('rejects a path whose endpoint is inside lethal clearance', () => {
      const pit = hazard({ id: 'pit', location: { x: 20, y: 1, z: 8 } })
      const verdict = engine.filter(straight, [pit])

      expect(verdict.verdict).toBe('reject')
      if (verdict.verdict !== 'reject') return
      expect(verdict.error).toBeInstanceOf(HazardCritical)
      expect(verdict.error.hazardId).toBe('pit')
      expect(verdict.error.lastGoodPathId).toBe('path-straight')
    })

    it('reports advisories without blocking', () => {
      const mob = hazard({ id: 'mob', type: 'hostile-presence', location: { x: 10, y: 1, z: 7 }, radius: 1, severity: 'advisory' })
      const verdict = engine.filter(straight, [mob])

      expect(verdict.verdict).toBe('accept')
      if (verdict.verdict !== 'accept') return
      expect(verdict.advisories.map((h) => h.id)).toEqual(['mob'])
    })

    it('counts time spent inside dangerous volumes', () => {
      // Samples every 0.25 cells: 81 points, 8 of them inside x 9.1..11.1
      const lava = hazard({ id: 'lava', type: 'liquid-damage', location: { x: 10.1, y: 1, z: 7 }, radius: 1, severity: 'dangerous' })
      const verdict = engine.filter(straight, [lava])

      expect(verdict.verdict).toBe('accept')
      if (verdict.verdict !== 'accept') return
      expect(verdict.exposureSeconds).toBeCloseTo(20 * (8 / 81), 9)
    })

    it('demands a reroute when dangerous exposure runs too long', () => {
      const strict = new HazardAvoidanceEngine({ maxDangerousExposureSeconds: 1 })
      const lava = hazard({ id: 'lava', type: 'liquid-damage', location: { x: 10.1, y: 1, z: 7 }, radius: 1, severity: 'dangerous' })

      expect(strict.filter(straight, [lava])).toEqual({
        verdict: 'reroute',
        reason: 'dangerous-exposure',
        constraints: [{ hazardId: 'lava', minClearance: 1 }],
      })
    })
  })

  describe('lethalOnPath', () => {
    const route = pathThrough('path-route', [
      { x: 0, y: 1, z: 0 },
      { x: 10, y: 1, z: 0 },
      { x: 10, y: 1, z: 10 },
    ])

    it('finds a lethal hazard on the remaining path', () => {
      const pit = hazard({ id: 'pit', location: { x: 11, y: 1, z: 6 } })
      const critical = engine.lethalOnPath(route, [pit])

      expect(critical?.hazardId).toBe('pit')
      expect(critical?.lastGoodPathId).toBe('path-route')
    })

    it('ignores segments already travelled', () => {
      const pit = hazard({ id: 'pit', location: { x: 4, y: 1, z: 1 } })

      expect(engine.lethalOnPath(route, [pit], 0)).not.toBeNull()
      expect(engine.lethalOnPath(route, [pit], 2)).toBeNull()
    })

    it('ignores non-lethal hazards', () => {
      const mob = hazard({ id: 'mob', location: { x: 5, y: 1, z: 0 }, severity: 'dangerous' })
      expect(engine.lethalOnPath(route, [mob])).toBeNull()
    })
  })
})

describe('mergeConstraints', () => {
  it('keeps the larger clearance for each hazard, sorted by id', () => {
    expect(
      mergeConstraints(
        [{ hazardId: 'b', minClearance: 3 }, { hazardId: 'a', minClearance: 4 }],
        [{ hazardId: 'b', minClearance: 5 }, { hazardId: 'a', minClearance: 1 }]
      )
    ).toEqual([
      { hazardId: 'a', minClearance: 4 },
      { hazardId: 'b', minClearance: 5 },
    ])
  })
})
