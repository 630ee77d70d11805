import { createMemoryCache } from '../cache'
import type { CacheFactory, MemoCache } from '../cache'
import { info } from '../logger'
import { loadCollection } from './loader'
import type { LoadOutcome } from './loader'
import { COLLECTIONS } from './schemas'
import type {
  CollectionDefinition,
  CollectionName,
  CommentLikeRecord,
  CommentRecord,
  EvaluationRecord,
  IssueRecord,
  MediaSourceRecord,
  ScoreHistoryRecord,
  SubscriptionRecord,
  TopicRecord,
  UserRecord,
  WatchHistoryRecord
} from './schemas'

type LoadCache<T> = MemoCache<LoadOutcome<T>>

type CollectionCaches = {
  users: LoadCache<UserRecord>
  scoreHistory: LoadCache<ScoreHistoryRecord>
  topics: LoadCache<TopicRecord>
  subscriptions: LoadCache<SubscriptionRecord>
  issues: LoadCache<IssueRecord>
  evaluations: LoadCache<EvaluationRecord>
  mediaSources: LoadCache<MediaSourceRecord>
  watchHistory: LoadCache<WatchHistoryRecord>
  comments: LoadCache<CommentRecord>
  commentLikes: LoadCache<CommentLikeRecord>
}

/**
 * One zero-argument accessor per exported collection. Each file is read once
 * and served from the cache until `invalidate` is called; later changes to
 * the file on disk are not picked up before that.
 */
export class CollectionStore {
  private readonly caches: CollectionCaches

  constructor(
    readonly dataDir: string,
    createCache: CacheFactory = createMemoryCache
  ) {
    this.caches = {
      users: createCache(),
      scoreHistory: createCache(),
      topics: createCache(),
      subscriptions: createCache(),
      issues: createCache(),
      evaluations: createCache(),
      mediaSources: createCache(),
      watchHistory: createCache(),
      comments: createCache(),
      commentLikes: createCache()
    }
  }

  private cached<T>(cache: LoadCache<T>, definition: CollectionDefinition<T>) {
    return cache.getOrCompute(definition.fileName, () => loadCollection(this.dataDir, definition))
  }

  users() {
    return this.cached(this.caches.users, COLLECTIONS.users)
  }

  scoreHistory() {
    return this.cached(this.caches.scoreHistory, COLLECTIONS.scoreHistory)
  }

  topics() {
    return this.cached(this.caches.topics, COLLECTIONS.topics)
  }

  subscriptions() {
    return this.cached(this.caches.subscriptions, COLLECTIONS.subscriptions)
  }

  issues() {
    return this.cached(this.caches.issues, COLLECTIONS.issues)
  }

  evaluations() {
    return this.cached(this.caches.evaluations, COLLECTIONS.evaluations)
  }

  mediaSources() {
    return this.cached(this.caches.mediaSources, COLLECTIONS.mediaSources)
  }

  watchHistory() {
    return this.cached(this.caches.watchHistory, COLLECTIONS.watchHistory)
  }

  comments() {
    return this.cached(this.caches.comments, COLLECTIONS.comments)
  }

  commentLikes() {
    return this.cached(this.caches.commentLikes, COLLECTIONS.commentLikes)
  }

  load(name: CollectionName): Promise<LoadOutcome<unknown>> {
    switch (name) {
      case 'users':
        return this.users()
      case 'scoreHistory':
        return this.scoreHistory()
      case 'topics':
        return this.topics()
      case 'subscriptions':
        return this.subscriptions()
      case 'issues':
        return this.issues()
      case 'evaluations':
        return this.evaluations()
      case 'mediaSources':
        return this.mediaSources()
      case 'watchHistory':
        return this.watchHistory()
      case 'comments':
        return this.comments()
      case 'commentLikes':
        return this.commentLikes()
    }
  }

  invalidate(name?: CollectionName) {
    if (name) {
      this.caches[name].invalidate()
      info(`Invalidated cached collection ${name}`)
      return
    }
    for (const cache of Object.values(this.caches)) cache.invalidate()
    info('Invalidated all cached collections')
  }
}
