import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogValue = string | number | boolean | null | undefined | object

export type LogMessage =
  | string
  | { message: string; [key: string]: LogValue }

export const log = (message: LogMessage): void => {
  const fields = typeof message === 'string' ? { message } : message
  console.log({
    ...fields,
    app: name,
    version,
  })
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
