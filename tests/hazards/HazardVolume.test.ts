import { describe, it, expect } from 'vitest'
import type { HazardRecord } from '../../src/hazards/interfaces/IHazard.ts'
import { clearanceTo, fractionInside, segmentClearance } from '../../src/hazards/HazardVolume.ts'

// Unit box around the origin: [-1, 1] on every axis
const block: HazardRecord = { id: 'block', type: 'fall', location: { x: 0, y: 0, z: 0 }, radius: 1, severity: 'lethal' }

describe('HazardVolume', () => {
  describe('segmentClearance', () => {
    it('measures the exact distance where a diagonal passes a corner', () => {
      // Closest approach is at the segment midpoint (2.25, 0, 2.25), off every sampling step
      const clearance = segmentClearance({ x: 1.5, y: 0, z: 3 }, { x: 3, y: 0, z: 1.5 }, block)

      expect(clearance).toBeCloseTo(2.5 / Math.SQRT2, 10)
      expect(clearance).toBeLessThan(1.77)
    })

    it('measures a segment running alongside a face', () => {
      expect(segmentClearance({ x: -3, y: 0, z: 2 }, { x: 3, y: 0, z: 2 }, block)).toBe(1)
    })

    it('is zero for a segment passing through the volume', () => {
      expect(segmentClearance({ x: -3, y: 0.5, z: 0 }, { x: 3, y: 0.5, z: 0 }, block)).toBe(0)
    })

    it('falls back to the nearer endpoint when the segment points away', () => {
      expect(segmentClearance({ x: 4, y: 0, z: 0 }, { x: 9, y: 0, z: 0 }, block)).toBe(3)
    })

    it('agrees with the point clearance for a zero-length segment', () => {
      const point = { x: 3, y: 3, z: 1 }
      expect(segmentClearance(point, point, block)).toBe(clearanceTo(point, block))
    })
  })

  describe('fractionInside', () => {
    it('counts the share of samples inside the volume', () => {
      // 17 samples from x=-2 to x=2, the 9 with |x| <= 1 are inside
      expect(fractionInside({ x: -2, y: 0, z: 0 }, { x: 2, y: 0, z: 0 }, block)).toBeCloseTo(9 / 17, 10)
    })
  })
})
