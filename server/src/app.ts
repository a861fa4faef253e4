import express from 'express'
import cors from 'cors'
import type { NextFunction, Request, Response } from 'express'

import {
  handleDownload,
  handleLengthToggle,
  handleNodeClick,
  handleReload,
  handleReset,
  handleSuggestions,
  handleTopicSubmit,
  handleUpload,
  type CallbackDeps,
} from './callbacks'
import { errorMessage, errorStatus } from './errors'

type Handler = (body: unknown, deps: CallbackDeps) => unknown

function route(deps: CallbackDeps, handler: Handler) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await handler(req.body, deps))
    } catch (e) {
      next(e)
    }
  }
}

export function createApp(deps: CallbackDeps) {
  const app = express()
  app.use(cors())
  // session files with long explanations can exceed the default 100kb
  app.use(express.json({ limit: '2mb' }))

  app.get('/health', (_req, res) => {
    res.json({ ok: true })
  })

  app.get('/api/session/initial', (_req, res) => {
    res.json(handleReset())
  })

  app.post('/api/session', route(deps, handleTopicSubmit))
  app.post('/api/session/expand', route(deps, handleNodeClick))
  app.post('/api/session/length', route(deps, handleLengthToggle))
  app.post('/api/session/reload', route(deps, handleReload))
  app.post('/api/session/suggestions', route(deps, handleSuggestions))
  app.post('/api/session/export', route(deps, body => handleDownload(body)))
  app.post('/api/session/import', route(deps, body => handleUpload(body)))

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err)
    if (status >= 500) console.error(`[server] ${req.method} ${req.path} failed:`, err)
    res.status(status).json({ error: errorMessage(err) })
  })

  return app
}
