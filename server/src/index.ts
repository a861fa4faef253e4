import 'dotenv/config'

import { createApp } from './app'
import { loadServerConfig } from './config'
import { createExplainer } from './llm'

const config = loadServerConfig()
const app = createApp({ explainer: createExplainer(config) })

app.listen(config.port, () => {
  console.log(`[server] listening on http://localhost:${config.port} (model ${config.useMock ? 'mock' : config.model})`)
})
