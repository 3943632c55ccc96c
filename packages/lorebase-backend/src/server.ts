import { createServer as createHttpServer } from 'http'
import dotenv from 'dotenv'
import { buildPostgresPool, loadEnvConfig } from './env'
import { createKnowledgeServer } from './index'
import { createKnowledgeBase } from './kb/service'
import { Logger } from './types'

/**
 * Container entrypoint: reads `.env`, picks the vector store, wires the
 * provider chain and serves the JSON API until SIGINT/SIGTERM.
 */
async function main() {
  dotenv.config()
  const logger: Logger = {
    info: (...args) => console.log('[info]', new Date().toISOString(), ...args),
    warn: (...args) => console.warn('[warn]', new Date().toISOString(), ...args),
    error: (...args) => console.error('[error]', new Date().toISOString(), ...args),
    debug: (...args) => console.debug('[debug]', new Date().toISOString(), ...args),
  }

  const env = loadEnvConfig(process.env, logger)
  const pool = env.vectorStore.kind === 'postgres' ? buildPostgresPool(env.vectorStore.postgresUrl) : null
  const kb = createKnowledgeBase(env, logger, { pool: pool ?? undefined })
  const backend = createKnowledgeServer({ env, kb, logger })

  const httpServer = createHttpServer((req, res) => {
    backend.handler(req, res).catch((err) => {
      logger.error('[http] unhandled error', err)
      if (!res.headersSent) res.statusCode = 500
      res.end()
    })
  })
  await new Promise<void>((resolve) => httpServer.listen(env.port, env.host, resolve))
  logger.info('[startup] lorebase listening', { host: env.host, port: env.port, store: env.vectorStore.kind, index: env.index.name })

  const shutdown = (signal: string) => {
    logger.info('[startup] shutting down', { signal })
    httpServer.close(() => {
      const closing = pool ? pool.end() : Promise.resolve()
      closing.then(
        () => process.exit(0),
        (err) => {
          logger.error('[startup] pool close failed', err)
          process.exit(1)
        },
      )
    })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch((err) => {
  console.error('[fatal] lorebase failed to start', err)
  process.exit(1)
})
