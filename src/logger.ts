export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.DEV_LOG === '1' ||
  process.env.DEV_LOG === 'true' ||
  !!process.env.CTRL_MAPPER_DEBUG

export function debug(...args: unknown[]) {
  if (DEV_LOG) console.debug('[debug]', ...args)
}

export function info(...args: unknown[]) {
  console.info('[info]', ...args)
}

export function warn(...args: unknown[]) {
  console.warn('[warn]', ...args)
}

export function error(...args: unknown[]) {
  console.error('[error]', ...args)
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
