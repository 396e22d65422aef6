import { describe, it, expect } from 'vitest'
import * as THREE from 'three'
import { LeaderTrail, slotOffset, slotPosition } from '../../src/coordination/Formation.ts'

function walkTrail(trail: LeaderTrail, xs: number[]): void {
  for (const x of xs) {
    trail.record({ x, y: 1, z: 0 })
  }
}

describe('LeaderTrail', () => {
  it('keeps the newest points up to capacity', () => {
    const trail = new LeaderTrail(3)
    walkTrail(trail, [0, 1, 2, 3])

    expect(trail.length).toBe(3)
    expect(trail.latest()).toEqual({ x: 3, y: 1, z: 0 })
    expect(trail.at(2)).toEqual({ x: 1, y: 1, z: 0 })
    expect(trail.at(3)).toBeUndefined()
  })

  it('ignores a repeat of the latest point', () => {
    const trail = new LeaderTrail(4)
    walkTrail(trail, [0, 1, 1, 1])

    expect(trail.length).toBe(2)
  })

  it('walks back along the trail by distance', () => {
    const trail = new LeaderTrail(16)
    walkTrail(trail, [0, 1, 2, 2.5, 3])

    const point = trail.pointBehind(1.5)
    expect(point?.position).toEqual({ x: 1.5, y: 1, z: 0 })
    expect(point?.heading.toArray()).toEqual([1, 0, 0])
  })

  it('clamps to the oldest point', () => {
    const trail = new LeaderTrail(16)
    walkTrail(trail, [0, 1, 2])

    expect(trail.pointBehind(10)?.position).toEqual({ x: 0, y: 1, z: 0 })
  })

  it('has no point before the leader has been recorded', () => {
    expect(new LeaderTrail(2).pointBehind(1)).toBeNull()
  })

  it('forgets everything on clear', () => {
    const trail = new LeaderTrail(4)
    walkTrail(trail, [0, 1])
    trail.clear()

    expect(trail.length).toBe(0)
    expect(trail.latest()).toBeUndefined()
  })

  it('needs room for at least two points', () => {
    expect(() => new LeaderTrail(1)).toThrow('Trail capacity must be at least 2, got 1')
  })
})

describe('slotOffset', () => {
  it('lines a column up behind the leader', () => {
    expect(slotOffset('column', 2, 3, 2)).toEqual({ behind: 4, along: 0, lateral: 0 })
  })

  it('alternates sides in a line', () => {
    expect(slotOffset('line', 1, 3, 2)).toEqual({ behind: 0, along: 0, lateral: 2 })
    expect(slotOffset('line', 2, 3, 2)).toEqual({ behind: 0, along: 0, lateral: -2 })
    expect(slotOffset('line', 3, 3, 2)).toEqual({ behind: 0, along: 0, lateral: 4 })
  })

  it('spreads a wedge back and out', () => {
    expect(slotOffset('wedge', 3, 4, 2)).toEqual({ behind: 4, along: 0, lateral: 4 })
    expect(slotOffset('wedge', 4, 4, 2)).toEqual({ behind: 4, along: 0, lateral: -4 })
  })

  it('spaces a circle evenly around the leader', () => {
    const offset = slotOffset('circle', 1, 3, 2)
    expect(offset.behind).toBe(0)
    expect(offset.along).toBeCloseTo(0, 9)
    expect(offset.lateral).toBeCloseTo(2, 9)
  })
})

describe('slotPosition', () => {
  it('puts positive lateral offsets to the right of the heading', () => {
    const anchor = { position: { x: 5, y: 1, z: 5 }, heading: new THREE.Vector3(1, 0, 0) }

    expect(slotPosition(anchor, { behind: 0, along: 1, lateral: 2 })).toEqual({ x: 6, y: 1, z: 7 })
  })
})
