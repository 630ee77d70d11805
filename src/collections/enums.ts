export const CATEGORIES = ['politics', 'economy', 'society', 'culture', 'technology', 'international'] as const
export type Category = (typeof CATEGORIES)[number]

export const PERSPECTIVES = ['left', 'center', 'right'] as const
export type Perspective = (typeof PERSPECTIVES)[number]

// Media sources and user preferences use a five-point scale.
export const MEDIA_PERSPECTIVES = ['left', 'center_left', 'center', 'center_right', 'right'] as const
export type MediaPerspective = (typeof MEDIA_PERSPECTIVES)[number]

const PERSPECTIVE_BUCKETS: Record<MediaPerspective, Perspective> = {
  left: 'left',
  center_left: 'left',
  center: 'center',
  center_right: 'right',
  right: 'right'
}

export function toPerspectiveBucket(perspective: MediaPerspective): Perspective {
  return PERSPECTIVE_BUCKETS[perspective]
}

export function isMediaPerspective(value: unknown): value is MediaPerspective {
  return typeof value === 'string' && MEDIA_PERSPECTIVES.some((p) => p === value)
}
