import type {
  AvailabilityWindow,
  EventLocation,
  MatchScore,
  Opportunity,
  Profile,
  VolunteerEvent
} from '../types.js'

export const SCORE_WEIGHTS = {
  skill: 0.4,
  availability: 0.3,
  preference: 0.2,
  distance: 0.1
} as const

const MINUTES_PER_DAY = 24 * 60
const EARTH_RADIUS_KM = 6371

/** `HH:MM` to minutes after midnight. */
export function parseTime(value: string): number {
  const [hours, minutes] = value.split(':').map(Number)
  return hours * 60 + minutes
}

/** UTC weekday with Monday = 0. */
export function weekdayOf(date: Date): number {
  return (date.getUTCDay() + 6) % 7
}

function minutesOfDay(date: Date): number {
  return date.getUTCHours() * 60 + date.getUTCMinutes()
}

function normalize(values: string[]): Set<string> {
  return new Set(values.map((value) => value.trim().toLowerCase()))
}

export function requiredSkillsFor(opportunity: Opportunity, event: VolunteerEvent | null): string[] {
  if (opportunity.requiredSkills.length > 0) return opportunity.requiredSkills
  return event?.requiredSkills ?? []
}

export function skillScore(profileSkills: string[], requiredSkills: string[]): number {
  const required = normalize(requiredSkills)
  if (required.size === 0) return 1

  const owned = normalize(profileSkills)
  let matched = 0
  for (const skill of required) {
    if (owned.has(skill)) matched++
  }
  return matched / required.size
}

/**
 * Share of the shift covered by windows on the shift's weekday. The shift runs
 * from the event start to its end, or for `minHours` (1 h by default), and
 * never past midnight.
 */
export function availabilityScore(
  windows: AvailabilityWindow[],
  opportunity: Opportunity,
  event: VolunteerEvent | null
): number {
  if (windows.length === 0) return 0

  if (!event) {
    const minHours = opportunity.minHours ?? 0
    const availableHours = windows.reduce(
      (sum, window) => sum + (parseTime(window.end) - parseTime(window.start)) / 60,
      0
    )
    return availableHours >= minHours ? 1 : availableHours / Math.max(minHours, 1)
  }

  const weekday = weekdayOf(event.startsAt)
  const shiftStart = minutesOfDay(event.startsAt)
  const durationMinutes = event.endsAt
    ? (event.endsAt.getTime() - event.startsAt.getTime()) / 60000
    : (opportunity.minHours ?? 1) * 60
  const shiftEnd = Math.min(shiftStart + durationMinutes, MINUTES_PER_DAY)
  const shiftLength = shiftEnd - shiftStart
  if (shiftLength <= 0) return 0

  let covered = 0
  for (const window of windows) {
    if (window.weekday !== weekday) continue
    const overlap = Math.min(shiftEnd, parseTime(window.end)) - Math.max(shiftStart, parseTime(window.start))
    if (overlap > 0) covered += overlap
  }
  return Math.min(1, covered / shiftLength)
}

export function preferenceScore(tags: string[], opportunity: Opportunity): number {
  if (tags.length === 0) return 0.5

  const text = `${opportunity.title} ${opportunity.description ?? ''}`.toLowerCase()
  const matching = tags.filter((tag) => text.includes(tag.toLowerCase())).length
  return matching > 0 ? Math.min(1, matching * 0.5) : 0.3
}

export function haversineKm(
  from: { latitude: number; longitude: number },
  to: { latitude: number; longitude: number }
): number {
  const toRadians = (degrees: number) => (degrees * Math.PI) / 180
  const dLat = toRadians(to.latitude - from.latitude)
  const dLon = toRadians(to.longitude - from.longitude)
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(a))
}

function sameText(a: string | null, b: string | null): boolean {
  return a !== null && b !== null && a.trim().toLowerCase() === b.trim().toLowerCase()
}

export function distanceScore(
  profile: Profile,
  location: EventLocation | null,
  defaultMaxTravelKm: number
): number {
  const home = profile.location
  if (!home || !location) return 0.5

  if (
    home.latitude !== null &&
    home.longitude !== null &&
    location.latitude !== null &&
    location.longitude !== null
  ) {
    const distance = haversineKm(
      { latitude: home.latitude, longitude: home.longitude },
      { latitude: location.latitude, longitude: location.longitude }
    )
    const maxTravelKm = profile.maxTravelKm ?? defaultMaxTravelKm
    return Math.max(0, 1 - distance / maxTravelKm)
  }

  const statesKnown = home.state !== null && location.state !== null
  const sameState = sameText(home.state, location.state)
  if (sameText(home.city, location.city) && (!statesKnown || sameState)) return 1
  if (sameState) return 0.7
  if (statesKnown) return 0.1
  return 0.5
}

export function roundScore(value: number): number {
  return Math.round(value * 10000) / 10000
}

export function scoreMatch(
  profile: Profile,
  opportunity: Opportunity,
  event: VolunteerEvent | null,
  defaultMaxTravelKm: number
): MatchScore {
  const skill = skillScore(profile.skills, requiredSkillsFor(opportunity, event))
  const availability = availabilityScore(profile.availability, opportunity, event)
  const preference = preferenceScore(profile.tags, opportunity)
  const distance = distanceScore(profile, event?.location ?? null, defaultMaxTravelKm)

  return {
    totalScore: roundScore(
      SCORE_WEIGHTS.skill * skill +
        SCORE_WEIGHTS.availability * availability +
        SCORE_WEIGHTS.preference * preference +
        SCORE_WEIGHTS.distance * distance
    ),
    skillMatchScore: skill,
    availabilityScore: availability,
    preferenceScore: preference,
    distanceScore: distance
  }
}
