import bole from 'bole'

import { middleware, runserver } from '../../src'
import { createApp } from './app'

/* istanbul ignore next */
if (require.main === module) {
  const app = createApp()

  runserver({
    middleware: [middleware.log, ...app.middleware],
    handlers: app.handlers,
  })
    .then((server) => {
      server.listen(Number(process.env.PORT) || 5000, () => {
        const addrinfo = server.address()
        if (!addrinfo) {
          return
        }
        bole('navbar:server').info(`now listening on port ${typeof addrinfo === 'string' ? addrinfo : addrinfo.port}`)
      })
    })
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.stack : err)
      process.exit(1)
    })
}
