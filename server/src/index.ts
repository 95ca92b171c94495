import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { createLinkResolver } from './links/index.js'
import { log, logError } from './log.js'

const config = loadConfig()
const resolver = createLinkResolver(config)

const app = createApp({
  resolver,
  analyzeOptions: { grouping: { threshold: config.groupSimilarityThreshold } },
})

const server = app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`)
})

function shutdown(signal: string) {
  log('server', { message: 'shutting down', signal })
  server.close(err => {
    if (err) logError('server', err)
    resolver.close()
    process.exit(err ? 1 : 0)
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
