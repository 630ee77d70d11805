import cors from 'cors'
import express from 'express'
import type { Express, NextFunction, Request, Response } from 'express'
import type { Server } from 'http'
import { DEFAULT_REPORT_DAYS } from '../../src/aggregates/userReport'
import { toCollectionName } from '../../src/collections/schemas'
import type { CollectionStore } from '../../src/collections/store'
import type { DashboardResult, DashboardService } from '../../src/dashboard'
import { DEFAULT_TOPIC_LIMIT } from '../../src/dashboard'
import { InvalidParameterError, NotFoundError } from '../../src/errors'
import { createLogger } from '../../src/logger'
import { parseDayRange, parseIdList, parseLimit } from '../../src/params'

const log = createLogger('ui-server')

type Handler = (req: Request, res: Response) => Promise<void>

// express 4 does not forward rejected promises to the error middleware
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next)
  }
}

function query(req: Request, name: string): string | undefined {
  const value = req.query[name]
  return typeof value === 'string' ? value : undefined
}

function send<T>(res: Response, result: DashboardResult<T>) {
  if (result.success) {
    res.json(result.data)
    return
  }
  res.status(503).json({ error: result.error, failures: result.failures })
}

export function createApp(service: DashboardService, store: CollectionStore) {
  const app = express()
  app.use(cors())
  app.use(express.json())

  app.get(
    '/api/collections',
    route(async (_req, res) => {
      res.json(await service.collectionStatus())
    })
  )

  app.get(
    '/api/preferences',
    route(async (_req, res) => {
      send(res, await service.overallPreference())
    })
  )

  app.get(
    '/api/scores',
    route(async (req, res) => {
      const { start, end } = parseDayRange(query(req, 'start'), query(req, 'end'))
      send(res, await service.scoreTimeSeries(start, end))
    })
  )

  app.get(
    '/api/topics',
    route(async (req, res) => {
      send(res, await service.topTopics(parseLimit('top', query(req, 'top'), DEFAULT_TOPIC_LIMIT)))
    })
  )

  app.get(
    '/api/topics/wordcloud',
    route(async (req, res) => {
      send(res, await service.topicCloud(parseLimit('top', query(req, 'top'), DEFAULT_TOPIC_LIMIT)))
    })
  )

  app.get(
    '/api/issues/recent',
    route(async (req, res) => {
      send(res, await service.recentIssues(parseLimit('limit', query(req, 'limit'), service.recentLimit)))
    })
  )

  app.get(
    '/api/issues/:id/evaluations',
    route(async (req, res) => {
      send(res, await service.issueEvaluation(req.params.id))
    })
  )

  app.get(
    '/api/users/recent',
    route(async (req, res) => {
      send(res, await service.recentUsers(parseLimit('limit', query(req, 'limit'), service.recentLimit)))
    })
  )

  app.get(
    '/api/users/:id/journey',
    route(async (req, res) => {
      send(res, await service.userJourney(req.params.id))
    })
  )

  app.get(
    '/api/users/:id/report',
    route(async (req, res) => {
      send(res, await service.userMonthlyReport(req.params.id, parseLimit('days', query(req, 'days'), DEFAULT_REPORT_DAYS)))
    })
  )

  app.get(
    '/api/media',
    route(async (_req, res) => {
      send(res, await service.mediaSources())
    })
  )

  app.get(
    '/api/media/support',
    route(async (req, res) => {
      send(res, await service.mediaSupport(parseIdList(query(req, 'ids'))))
    })
  )

  app.post('/api/cache/invalidate', (req: Request, res: Response) => {
    const requested: unknown = req.body?.collection
    if (requested === undefined) {
      store.invalidate()
      res.json({ invalidated: 'all' })
      return
    }
    const name = typeof requested === 'string' ? toCollectionName(requested) : undefined
    if (!name) {
      res.status(400).json({ error: `Unknown collection: ${String(requested)}` })
      return
    }
    store.invalidate(name)
    res.json({ invalidated: name })
  })

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof NotFoundError) {
      res.status(404).json({ error: err.message, entity: err.entity, id: err.id })
      return
    }
    if (err instanceof InvalidParameterError) {
      res.status(400).json({ error: err.message, parameter: err.parameter })
      return
    }
    if (err instanceof SyntaxError) {
      log.info('rejected malformed JSON body on', req.path)
      res.status(400).json({ error: 'Malformed JSON body' })
      return
    }
    log.error('request failed', req.method, req.path, err)
    res.status(500).json({ error: err instanceof Error ? err.message : String(err) })
  })

  return app
}

// A failed listen (port taken, no permission) is logged and fails the process.
export function startServer(app: Express, port: number, onListening: () => void = () => {}): Server {
  const server = app.listen(port, onListening)
  server.on('error', (err) => {
    log.error(`cannot listen on port ${port}`, err)
    process.exitCode = 1
  })
  return server
}
