declare module 'bole' {
  import { Writable } from 'stream'

  namespace bole {
    type Level = 'debug' | 'info' | 'warn' | 'error'

    interface LogFn {
      (...args: unknown[]): void
    }

    interface Logger {
      (name: string): Logger
      debug: LogFn
      info: LogFn
      warn: LogFn
      error: LogFn
    }

    interface OutputOptions {
      level: string
      stream: Writable
    }
  }

  interface Bole {
    (name: string): bole.Logger
    output(options: bole.OutputOptions | bole.OutputOptions[]): Bole
    reset(): Bole
  }

  const bole: Bole
  export = bole
}
