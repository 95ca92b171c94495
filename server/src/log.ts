type Meta = Record<string, unknown>

function debugEnabled(): boolean {
  return (process.env.LOG_LEVEL || '').toLowerCase() === 'debug'
}

export function log(tag: string, meta: Meta = {}) {
  console.log(`[${tag}]`, JSON.stringify(meta))
}

export function logDebug(tag: string, meta: Meta = {}) {
  if (!debugEnabled()) return
  console.debug(`[${tag}]`, JSON.stringify(meta))
}

export function logWarn(tag: string, meta: Meta = {}) {
  console.warn(`[${tag}]`, JSON.stringify(meta))
}

export function logError(tag: string, err: unknown, meta: Meta = {}) {
  console.error(
    `[${tag}]`,
    JSON.stringify({
      ...meta,
      error: err instanceof Error ? err.message : String(err),
    })
  )
}
