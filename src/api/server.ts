import express, { type Express, type Request, type Response } from 'express'
import type { Server } from 'http'
import type { MonitorControls } from '@/models'
import type { Logger } from '@/services/logger.service'

export function createStatusApp(controls: MonitorControls): Express {
  const app = express()

  app.get('/api/health', (_req: Request, res: Response) => {
    const { phase } = controls.status()
    res.status(phase === 'running' ? 200 : 503).json({
      status: phase === 'running' ? 'healthy' : phase,
      timestamp: Date.now()
    })
  })

  app.get('/api/status', (_req: Request, res: Response) => {
    res.json(controls.status())
  })

  app.post('/api/control/stop', (_req: Request, res: Response) => {
    controls.requestStop()
    res.status(202).json({ accepted: true, intent: 'stop' })
  })

  app.post('/api/control/restart', (_req: Request, res: Response) => {
    controls.requestRestart()
    res.status(202).json({ accepted: true, intent: 'restart' })
  })

  return app
}

export function startServer(app: Express, port: number, host: string, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'Status API listening')
      resolve(server)
    })
    server.on('error', reject)
  })
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()))
  })
}
