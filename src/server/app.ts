import Fastify from 'fastify'
import fastifyStatic from '@fastify/static'
import { existsSync } from 'fs'
import type { AppConfig } from './config.js'
import { LocationFetcher } from './intra/fetcher.js'
import { registerStatisticsRoutes } from './routes/statistics.js'

export interface ServerOptions {
  config: AppConfig
  fetcher?: LocationFetcher
  clientDistDir?: string
  now?: () => Date
}

export async function buildServer(options: ServerOptions) {
  const { config } = options

  const server = Fastify({
    logger: { level: config.logLevel }
  })

  const clientDistDir = options.clientDistDir
  if (clientDistDir && existsSync(clientDistDir)) {
    await server.register(fastifyStatic, {
      root: clientDistDir
    })

    server.setNotFoundHandler((request, reply) => {
      const url = request.raw.url || ''
      if (url.startsWith('/api')) {
        reply.code(404).send({ error: 'Not found' })
        return
      }
      reply.sendFile('index.html')
    })
  }

  const fetcher =
    options.fetcher ??
    new LocationFetcher({
      baseUrl: config.intra.baseUrl,
      credentials: {
        clientId: config.intra.clientId,
        clientSecret: config.intra.clientSecret
      },
      logger: server.log
    })

  await registerStatisticsRoutes(server, { config, fetcher, now: options.now })

  return server
}
