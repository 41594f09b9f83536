import type { SessionPayload } from '../auth/session.ts'

declare module 'hono' {
  interface ContextVariableMap {
    session: SessionPayload
  }
}

export {}
