#!/usr/bin/env node
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import getPort from 'get-port'
import { buildServer } from './app.js'
import { loadConfig, type AppConfig } from './config.js'
import { DEFAULT_PORT } from './constants.js'
import { logger } from './logger.js'

const SERVER_DIR = dirname(fileURLToPath(import.meta.url))
const CLIENT_DIST_DIR = resolve(SERVER_DIR, '../client')

let config: AppConfig
try {
  config = loadConfig()
} catch (err) {
  logger.fatal({ err }, 'Invalid configuration, see .env.example')
  process.exit(1)
}

const server = await buildServer({ config, clientDistDir: CLIENT_DIST_DIR })

// Start server
const start = async () => {
  try {
    const port = config.port ?? (await getPort({ port: DEFAULT_PORT }))

    await server.listen({ port })

    if (port !== DEFAULT_PORT) {
      server.log.info(`Port ${DEFAULT_PORT} is in use, using port ${port} instead`)
    }

    server.log.info(`Dashboard running on http://localhost:${port}`)
    server.log.info(`Reporting campus ${config.campusId} over the last ${config.days} days`)
  } catch (err) {
    server.log.error(err)
    process.exit(1)
  }
}

await start()
