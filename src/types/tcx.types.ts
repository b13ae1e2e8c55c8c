export type Trackpoint = {
  time: string
  distanceMeters?: number
  heartRateBpm?: number
}

export type TcxActivity = {
  sport: string | null
  trackpoints: Trackpoint[]
}

export type ParsedTcx = {
  activities: TcxActivity[]
}
