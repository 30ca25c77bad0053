export interface TraceEvent {
  // Kept verbatim; anything but L, S and M is replayed as a no-op
  op: string
  address: bigint
  size: number
  line: number
}

export interface EventTally {
  total: number
  simulated: number
  ignored: number
}
