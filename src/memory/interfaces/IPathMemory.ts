export interface PathMemoryConfig {
  /** Paths kept per region pair before deprecated ones are evicted */
  capacityPerKey: number
  /** EMA weight of a successful traversal */
  successAlpha: number
  /** Fraction of rating lost on an unverified failure */
  failureBeta: number
  /** Rating below which a path is deprecated */
  deprecationFloor: number
  /** Age after which an unvalidated fresh path turns stale */
  staleAfterMs: number
  /** Region edge length used to key lookups */
  regionSize: number
  debug: boolean
}

export interface PathMemoryStats {
  keys: number
  paths: number
  fresh: number
  stale: number
  deprecated: number
  leased: number
  evicted: number
}

/**
 * Releases a lease taken with `PathMemoryStore.lease`. Safe to call twice.
 */
export type LeaseRelease = () => void
