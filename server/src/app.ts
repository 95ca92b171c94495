import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import { analyzeRecords, applyExclusions, type AnalyzeOptions } from './analyze.js'
import type { LinkResolver } from './links/resolver.js'
import { AppError, errorMessage } from './errors.js'
import { logError } from './log.js'
import { parseAnalyzeRequest, parseMerchantRequest, parseSavingsRequest } from './validate.js'

export interface AppDeps {
  resolver: LinkResolver
  analyzeOptions?: Omit<AnalyzeOptions, 'exclude'>
}

function sendError(res: Response, route: string, err: unknown) {
  if (err instanceof AppError && err.status < 500) {
    res.status(err.status).json({ error: err.message })
    return
  }
  logError(route, err)
  res.status(500).json({ error: errorMessage(err) })
}

export function createApp({ resolver, analyzeOptions = {} }: AppDeps) {
  const app = express()

  app.use(cors())
  app.use(express.json({ limit: '5mb' }))

  // GET /api/health
  app.get('/api/health', (_req, res) => {
    try {
      res.json({
        ok: true,
        knownMerchants: resolver.knownMerchants.size,
        cachedLinks: resolver.cache.size,
      })
    } catch (err) {
      sendError(res, 'health', err)
    }
  })

  // POST /api/analyze
  app.post('/api/analyze', async (req, res) => {
    try {
      const { records, exclude } = parseAnalyzeRequest(req.body)
      const result = await analyzeRecords(records, resolver, { ...analyzeOptions, exclude })
      res.json(result)
    } catch (err) {
      sendError(res, 'analyze', err)
    }
  })

  // POST /api/savings: re-sum after exclusions without regrouping
  app.post('/api/savings', (req, res) => {
    try {
      const { groups, exclude } = parseSavingsRequest(req.body)
      res.json(applyExclusions(groups, exclude))
    } catch (err) {
      sendError(res, 'savings', err)
    }
  })

  // GET /api/links?merchant=
  app.get('/api/links', async (req, res) => {
    try {
      const { merchant } = req.query
      if (typeof merchant !== 'string') {
        res.status(400).json({ error: 'merchant query parameter is required' })
        return
      }
      res.json(await resolver.resolveDetailed(merchant))
    } catch (err) {
      sendError(res, 'links', err)
    }
  })

  // DELETE /api/links/cache/:key
  app.delete('/api/links/cache/:key', (req, res) => {
    try {
      const removed = resolver.invalidate(req.params.key)
      res.json({ ok: true, removed })
    } catch (err) {
      sendError(res, 'links-cache', err)
    }
  })

  // POST /api/merchants
  app.post('/api/merchants', (req, res) => {
    try {
      const { merchant, url } = parseMerchantRequest(req.body)
      resolver.knownMerchants.add(merchant, url)
      if (resolver.knownMerchants.filePath) resolver.knownMerchants.save()
      res.status(201).json({ merchant, url, knownMerchants: resolver.knownMerchants.size })
    } catch (err) {
      sendError(res, 'merchants', err)
    }
  })

  // Malformed JSON bodies and other middleware failures
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
      ? err.status
      : 500
    if (status >= 500) logError('http', err)
    res.status(status).json({ error: errorMessage(err) })
  })

  return app
}
