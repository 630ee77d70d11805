import { MEDIA_PERSPECTIVES } from '../collections/enums'
import type { UserRecord } from '../collections/schemas'
import type { PreferenceShare } from './types'

const PREFERENCE_ORDER: PreferenceShare['preference'][] = [...MEDIA_PERSPECTIVES, 'unknown']

export function preferenceDistribution(users: readonly UserRecord[]): PreferenceShare[] {
  if (users.length === 0) return []

  const counts = new Map<PreferenceShare['preference'], number>()
  for (const user of users) {
    const preference = user.politicalPreference ?? 'unknown'
    counts.set(preference, (counts.get(preference) ?? 0) + 1)
  }

  return PREFERENCE_ORDER.flatMap((preference) => {
    const count = counts.get(preference) ?? 0
    return count ? [{ preference, count, share: count / users.length }] : []
  })
}
