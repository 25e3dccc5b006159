export const PG_UNIQUE_VIOLATION = '23505'
export const PG_FOREIGN_KEY_VIOLATION = '23503'

/**
 * Extrae el SQLSTATE de un error del driver
 * Drizzle puede envolver el error de postgres-js en `cause`
 */
export function getPgErrorCode(error: unknown): string | undefined {
  let current: unknown = error
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code
    }
    current = current.cause
  }
  return undefined
}
