import { CollectionStore } from '../../src/collections/store'
import { loadConfig, loadEnv } from '../../src/config'
import { DashboardService } from '../../src/dashboard'
import { createLogger } from '../../src/logger'
import { createApp, startServer } from './app'

const log = createLogger('ui-server')

loadEnv()
const config = loadConfig()
const store = new CollectionStore(config.dataDir)
const service = new DashboardService(store, {
  recentLimit: config.recentLimit,
  mediaCompareLimit: config.mediaCompareLimit
})

startServer(createApp(service, store), config.port, () => {
  log.info(`listening on http://localhost:${config.port} (data: ${config.dataDir})`)
})
