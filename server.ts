/**
 * Process entry: loads `.env`, prepares the schema and serves the API.
 */
import 'dotenv/config'
import { createPool, ensureSchema } from './server/src/db.js'
import { loadEnv } from './server/src/env.js'
import { HistoryProtectionCoordinator } from './server/src/historyCoordinator.js'
import { createApp } from './server/src/index.js'

const env = loadEnv(process.env)
const pool = createPool(env.databaseUrl)
await ensureSchema(pool)

const coordinator = new HistoryProtectionCoordinator(pool, { pageSize: env.historyPageSize })
const app = createApp({ pool, coordinator, annotationWindowDays: env.annotationWindowDays })

app.listen(env.port, () => {
  console.log(`[burnup] listening on http://localhost:${env.port}`)
})
